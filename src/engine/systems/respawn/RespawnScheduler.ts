// ─────────────────────────────────────────────
//  Respawn Scheduler — death queue with per-tier delays
//  Pure functions over the queue and the directory; the actual
//  respawn is delegated to a Respawner supplied by the siege.
//  A respawn that fails stays queued and is retried next tick.
// ─────────────────────────────────────────────

import type { WaypointPath } from '@/engine/data/types/City';
import type { ActorDirectoryState, DeathRecord, DirectoryEntry } from '@/engine/data/types/Siege';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import { reassignActor } from '@/engine/systems/directory/ActorDirectory';

/** Brings an actor back; returns its live identity, or null to retry later */
export type Respawner = (record: DeathRecord) => string | null;

export interface RespawnResult {
  queue: DeathRecord[];
  directory: ActorDirectoryState;
  respawned: Array<{ previousId: string; actorId: string }>;
}

export const RespawnScheduler = {
  isQueued(queue: readonly DeathRecord[], id: string): boolean {
    return queue.some(r => r.id === id);
  },

  /** Queues a death once; returns the same queue when already queued */
  recordDeath(queue: DeathRecord[], entry: DirectoryEntry, now: number): DeathRecord[] {
    if (RespawnScheduler.isQueued(queue, entry.id)) return queue;
    return [...queue, { id: entry.id, tier: entry.tier, side: entry.side, kind: entry.kind, diedAt: now }];
  },

  delayFor(config: SiegeConfig, record: DeathRecord): number {
    if (record.tier === 'bot') return config.bots.respawnDelay;
    return config.respawnDelays[record.tier];
  },

  isDue(record: DeathRecord, now: number, delay: number): boolean {
    return now - record.diedAt >= delay;
  },

  processDue(
    queue: DeathRecord[],
    directory: ActorDirectoryState,
    now: number,
    path: WaypointPath,
    delayOf: (record: DeathRecord) => number,
    respawn: Respawner,
  ): RespawnResult {
    let dir = directory;
    const remaining: DeathRecord[] = [];
    const respawned: RespawnResult['respawned'] = [];

    for (const record of queue) {
      if (!RespawnScheduler.isDue(record, now, delayOf(record))) {
        remaining.push(record);
        continue;
      }
      const actorId = respawn(record);
      if (actorId === null) {
        remaining.push(record);
        continue;
      }
      dir = reassignActor(dir, record.id, actorId, path);
      respawned.push({ previousId: record.id, actorId });
    }

    if (respawned.length === 0) return { queue, directory, respawned };
    return { queue: remaining, directory: dir, respawned };
  },
};
