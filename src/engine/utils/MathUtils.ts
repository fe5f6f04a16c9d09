import type { Vec3 } from '@/engine/data/types/City';

export type Rng = () => number;

export const MathUtils = {
  /** Euclidean distance in 3D */
  dist3(a: Vec3, b: Vec3): number {
    return Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z);
  },

  /** Random integer in [min, max] inclusive */
  randInt(min: number, max: number, rng: Rng = Math.random): number {
    return Math.floor(rng() * (max - min + 1)) + min;
  },

  /** Random float in [min, max) */
  randFloat(min: number, max: number, rng: Rng = Math.random): number {
    return min + (max - min) * rng();
  },

  pick<T>(items: readonly T[], rng: Rng = Math.random): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(rng() * items.length)];
  },

  /** Fisher-Yates; returns a new array */
  shuffle<T>(items: readonly T[], rng: Rng = Math.random): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(rng() * (i + 1));
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  },

  /** Point at `angle` on a circle of `radius` around `center`, keeping the center height */
  onCircle(center: Vec3, radius: number, angle: number): Vec3 {
    return {
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle),
      z: center.z,
    };
  },

  /** Random point within `radius` of `center` in the XY plane; Z is kept */
  jitter(center: Vec3, radius: number, rng: Rng = Math.random): Vec3 {
    const angle = rng() * 2 * Math.PI;
    const distance = rng() * radius;
    return MathUtils.onCircle(center, distance, angle);
  },

  /** Random point on a ring between `inner` and `outer` around `center` */
  ring(center: Vec3, inner: number, outer: number, rng: Rng = Math.random): Vec3 {
    const angle = rng() * 2 * Math.PI;
    return MathUtils.onCircle(center, MathUtils.randFloat(inner, outer, rng), angle);
  },
};
