// ─────────────────────────────────────────────
//  Siege State — immutable per-event state
//  Updated only through SiegeStore (immer).
// ─────────────────────────────────────────────

import type {
  ActorDirectoryState,
  BotReturnRecord,
  CountdownMilestone,
  DeathRecord,
  DirectoryEntry,
  SiegeOutcome,
  SiegePhase,
  WeatherSnapshot,
} from '@/engine/data/types/Siege';

export interface ObjectiveRef {
  /** null when no objective actor was found at creation */
  actorId: string | null;
  name: string | null;
}

export interface EnvironmentOverride {
  snapshot: WeatherSnapshot | null;
  active: boolean;
}

export interface SiegeEventState {
  readonly id: string;
  readonly cityId: string;
  readonly phase: SiegePhase;

  readonly startTime: number;
  readonly endTime: number;
  readonly combatStartedAt: number | null;

  readonly objective: ObjectiveRef;
  /** Template of the attacking army's leader */
  readonly leaderTemplateId: number;

  readonly script: string[];
  readonly scriptCursor: number;
  readonly countdown: Record<CountdownMilestone, boolean>;
  readonly lastYellAt: number;
  readonly lastStatusAt: number;

  readonly directory: ActorDirectoryState;
  readonly deathQueue: DeathRecord[];
  readonly botReturns: BotReturnRecord[];
  readonly botsReleased: boolean;

  readonly environment: EnvironmentOverride;
  readonly outcome: SiegeOutcome | null;
}

export const SiegeStateQuery = {
  actors(state: SiegeEventState): DirectoryEntry[] {
    return Object.values(state.directory);
  },

  natives(state: SiegeEventState): DirectoryEntry[] {
    return SiegeStateQuery.actors(state).filter(e => e.kind === 'native');
  },

  bots(state: SiegeEventState): DirectoryEntry[] {
    return SiegeStateQuery.actors(state).filter(e => e.kind === 'bot');
  },

  /** Leaders and mini-bosses of the attacking army */
  speakers(state: SiegeEventState): DirectoryEntry[] {
    return SiegeStateQuery.natives(state).filter(e =>
      e.side === 'attacker' && (e.tier === 'leader' || e.tier === 'miniBoss'));
  },

  remainingSeconds(state: SiegeEventState, now: number): number {
    return Math.max(0, state.endTime - now);
  },

  isEnded(state: SiegeEventState): boolean {
    return state.phase === 'ended';
  },
};
