// ─────────────────────────────────────────────
//  Actor Directory — per-siege registry of actor progress
//  Pure functions, no side effects. Rejected operations
//  return the same state object.
//  Invariant: one entry per actor identity; a respawned actor
//  is re-keyed under its new identity, never re-pointed.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WaypointPath } from '@/engine/data/types/City';
import type {
  ActorDirectoryState,
  ActorKind,
  DirectoryEntry,
  SiegeSide,
  UnitTier,
} from '@/engine/data/types/Siege';
import { advanceProgress, startProgress } from '@/engine/systems/path/WaypointPath';
import { SiegeError } from '@/engine/utils/SiegeError';
import { Logger } from '@/engine/utils/Logger';

export function emptyDirectory(): ActorDirectoryState {
  return {};
}

export function registerActor(
  dir: ActorDirectoryState,
  id: string,
  tier: UnitTier,
  side: SiegeSide,
  kind: ActorKind,
  path: WaypointPath,
): ActorDirectoryState {
  if (dir[id]) {
    const message = `[ActorDirectory] Duplicate actor: ${id}`;
    if (Logger.isDebug()) throw new SiegeError('DuplicateActor', message);
    Logger.warn(message);
    return dir;
  }
  return produce(dir, draft => {
    draft[id] = { id, tier, side, kind, progress: startProgress(side, path) };
  });
}

export function advanceActor(dir: ActorDirectoryState, id: string, path: WaypointPath): ActorDirectoryState {
  const entry = dir[id];
  if (!entry) return dir;
  const next = advanceProgress(entry.progress, path);
  if (next === entry.progress) return dir;
  return produce(dir, draft => {
    const target = draft[id];
    if (target) target.progress = next;
  });
}

/** Moves an entry to a respawned actor's identity with its march reset */
export function reassignActor(
  dir: ActorDirectoryState,
  oldId: string,
  newId: string,
  path: WaypointPath,
): ActorDirectoryState {
  const entry = dir[oldId];
  if (!entry) return dir;
  if (oldId !== newId && dir[newId]) {
    Logger.warn(`[ActorDirectory] Cannot reassign ${oldId}: ${newId} is already registered`);
    return dir;
  }
  return produce(dir, draft => {
    delete draft[oldId];
    draft[newId] = {
      id: newId,
      tier: entry.tier,
      side: entry.side,
      kind: entry.kind,
      progress: startProgress(entry.side, path),
    };
  });
}

export function removeActor(dir: ActorDirectoryState, id: string): ActorDirectoryState {
  if (!dir[id]) return dir;
  return produce(dir, draft => {
    delete draft[id];
  });
}

export function getActor(dir: ActorDirectoryState, id: string): DirectoryEntry | undefined {
  return dir[id];
}

export function listActors(
  dir: ActorDirectoryState,
  filter?: (entry: DirectoryEntry) => boolean,
): DirectoryEntry[] {
  const all = Object.values(dir);
  return filter ? all.filter(filter) : all;
}
