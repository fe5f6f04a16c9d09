// ─────────────────────────────────────────────
//  IWorldLocator Interface
//  Host-side world access: scenes, ground queries and actor handles.
//  Implementations: host adapter (real), InMemoryWorld (headless)
// ─────────────────────────────────────────────

import type { Vec3 } from '@/engine/data/types/City';
import type { ReactState } from '@/engine/data/types/SiegeConfig';

export interface SpawnOptions {
  level: number;
  scale: number;
  factionId: number;
  reactState: ReactState;
  orientation?: number;
}

export interface IActorHandle {
  readonly id: string;
  readonly templateId: number;
  readonly name: string;

  isAlive(): boolean;
  /** 0–100 */
  healthPct(): number;
  position(): Vec3;
  isInCombat(): boolean;
  /** True while a movement order is still being carried out */
  isMoving(): boolean;

  speak(text: string): void;
  despawn(): void;
  /** Bring a dead actor back in place, keeping its identity */
  respawn(): void;
  setFaction(factionId: number): void;
  setReactState(state: ReactState): void;
  setMovementOrder(point: Vec3, walk: boolean): void;
}

export interface IScene {
  readonly regionId: number;

  /** Ground height near (x, y) searching from `zHint`, or null when none is found */
  groundHeight(x: number, y: number, zHint: number): number | null;

  /** Returns null when the host could not place the actor */
  spawnActor(templateId: number, position: Vec3, options: SpawnOptions): IActorHandle | null;

  findActor(id: string): IActorHandle | null;

  findActorsByTemplate(templateId: number, near: Vec3, radius: number): IActorHandle[];
}

export interface IWorldLocator {
  findScene(regionId: number): IScene | null;
}
