// ─────────────────────────────────────────────
//  Path Progression Driver
//  Per tick: pick each idle actor's target, detect arrival,
//  advance its progress and order the next leg straight away.
//  Native and bot actors go through the same IMover capability.
// ─────────────────────────────────────────────

import type { CityData, Vec3 } from '@/engine/data/types/City';
import type { ActorDirectoryState, PathProgress } from '@/engine/data/types/Siege';
import type { IMover } from './Mover';
import type { Rng } from '@/engine/utils/MathUtils';
import { MathUtils } from '@/engine/utils/MathUtils';
import { resolveTarget } from '@/engine/systems/path/WaypointPath';
import { advanceActor } from '@/engine/systems/directory/ActorDirectory';

/** Distance at which a path point counts as reached */
export const ARRIVAL_THRESHOLD = 10;
/** Move orders land within this XY radius of the path point */
export const MOVE_JITTER_RADIUS = 5;

export interface ProgressAdvance {
  id: string;
  progress: PathProgress;
}

export interface DriverTickResult {
  directory: ActorDirectoryState;
  ordersIssued: number;
  advanced: ProgressAdvance[];
}

export const PathProgressionDriver = {
  /** Order `mover` toward the target of `progress`; false once the march is over */
  dispatch(mover: IMover, progress: PathProgress, city: CityData, rng: Rng): boolean {
    if (progress.arrived) return false;
    mover.issueMoveOrder(jitteredTarget(resolveTarget(progress, city), rng));
    return true;
  },

  tick(
    directory: ActorDirectoryState,
    movers: readonly IMover[],
    city: CityData,
    rng: Rng,
  ): DriverTickResult {
    let dir = directory;
    let ordersIssued = 0;
    const advanced: ProgressAdvance[] = [];

    for (const mover of movers) {
      const entry = dir[mover.id];
      if (!entry || entry.progress.arrived) continue;
      if (!mover.isAlive() || mover.isBusy()) continue;

      const target = resolveTarget(entry.progress, city);
      if (MathUtils.dist3(mover.position(), target) > ARRIVAL_THRESHOLD) {
        mover.issueMoveOrder(jitteredTarget(target, rng));
        ordersIssued++;
        continue;
      }

      dir = advanceActor(dir, mover.id, city.waypoints);
      const next = dir[mover.id]?.progress;
      if (!next) continue;
      advanced.push({ id: mover.id, progress: next });
      if (PathProgressionDriver.dispatch(mover, next, city, rng)) ordersIssued++;
    }

    return { directory: dir, ordersIssued, advanced };
  },
};

// Z stays at the authored height so orders never path through geometry
function jitteredTarget(target: Vec3, rng: Rng): Vec3 {
  return MathUtils.jitter(target, MOVE_JITTER_RADIUS, rng);
}
