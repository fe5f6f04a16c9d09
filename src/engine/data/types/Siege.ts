// ─────────────────────────────────────────────
//  Siege — per-event actor and outcome types
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from './City';

export type SiegeSide = 'attacker' | 'defender';

/** Unit category; each tier has its own level, scale and respawn delay */
export type UnitTier = 'leader' | 'miniBoss' | 'elite' | 'minion' | 'defender' | 'bot';

/** Which collaborator drives the actor: the world's own units or the external bot subsystem */
export type ActorKind = 'native' | 'bot';

export type SiegePhase = 'narrative' | 'combat' | 'ended';

/**
 * March progress along the city path.
 * Attackers count up from 0 to the waypoint count (objective anchor),
 * defenders count down from the waypoint count to 0 (rally anchor).
 * `arrived` is set once the terminal anchor has been reached.
 */
export interface PathProgress {
  role: SiegeSide;
  index: number;
  arrived: boolean;
}

export interface DirectoryEntry {
  id: string;
  tier: UnitTier;
  side: SiegeSide;
  kind: ActorKind;
  progress: PathProgress;
}

export type ActorDirectoryState = Record<string, DirectoryEntry>;

export interface DeathRecord {
  id: string;
  tier: UnitTier;
  side: SiegeSide;
  kind: ActorKind;
  diedAt: number;
}

export type SiegeWinner = 'attackers' | 'defenders';

export type EndReason =
  | 'objective_destroyed'
  | 'objective_missing'
  | 'time_expired'
  | 'forced'
  | 'aborted';

export interface SiegeOutcome {
  /** null when the event was aborted */
  winner: SiegeWinner | null;
  winningFaction: CityFaction | null;
  reason: EndReason;
  endedAt: number;
}

export interface WeatherSnapshot {
  type: number;
  grade: number;
}

/** Where a recruited bot came from, restored when the siege releases it */
export interface BotReturnRecord {
  botId: string;
  regionId: number;
  position: Vec3;
  orientation: number;
  wasPvP: boolean;
  /** AI strategy removed on recruitment, restored on release */
  rpgStrategy: string | null;
}

export type CountdownMilestone = 75 | 50 | 25;
