// ─────────────────────────────────────────────
//  IBotIntegration Interface
//  Lifecycle hooks into an external bot subsystem.
//  The bots' own AI stays on the host side; the siege only
//  recruits, steers by travel target and releases them.
//  Implementations: host adapter, NullBotIntegration (subsystem absent)
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from '@/engine/data/types/City';

export interface IBotHandle {
  readonly id: string;
  readonly name: string;
  readonly faction: CityFaction;

  level(): number;
  regionId(): number;
  position(): Vec3;
  orientation(): number;

  isInWorld(): boolean;
  isAlive(): boolean;
  isInCombat(): boolean;
  isInInstance(): boolean;
  isGrouped(): boolean;
  isTeleporting(): boolean;

  isPvP(): boolean;
  setPvP(enabled: boolean): void;

  hasStrategy(name: string): boolean;
  addStrategy(name: string): void;
  removeStrategy(name: string): void;

  teleport(regionId: number, position: Vec3, orientation: number): void;
  resurrect(): void;
  stopCombat(): void;

  setTravelTarget(point: Vec3): void;
  isTraveling(): boolean;
}

export interface IBotIntegration {
  /** False when the subsystem is not loaded; every other call is then a no-op */
  readonly available: boolean;
  listBots(): IBotHandle[];
  findBot(id: string): IBotHandle | null;
}
