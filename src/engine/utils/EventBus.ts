// ─────────────────────────────────────────────
//  Typed Siege Event Bus
//  Observability channel for siege lifecycle events.
//  Engine state never depends on listeners.
// ─────────────────────────────────────────────

import type { SiegeOutcome, SiegePhase, SiegeSide, UnitTier } from '@/engine/data/types/Siege';

/** Centralised map of all siege events and their payload types */
export interface SiegeEventMap {
  siegeStarted:    { siegeId: string; cityId: string; startTime: number; endTime: number };
  phaseChanged:    { siegeId: string; from: SiegePhase; to: SiegePhase };
  siegeEnded:      { siegeId: string; cityId: string; outcome: SiegeOutcome };

  // Actor lifecycle
  actorSpawned:    { siegeId: string; actorId: string; tier: UnitTier; side: SiegeSide };
  actorDied:       { siegeId: string; actorId: string; tier: UnitTier; side: SiegeSide };
  actorRespawned:  { siegeId: string; previousId: string; actorId: string };
  waypointReached: { siegeId: string; actorId: string; index: number; arrived: boolean };

  logMessage:      { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerMap = { [K in keyof SiegeEventMap]?: Listener<SiegeEventMap[K]>[] };

class TypedSiegeEventBus {
  private listeners: ListenerMap = {};

  on<K extends keyof SiegeEventMap>(event: K, listener: Listener<SiegeEventMap[K]>): void {
    const arr: Listener<SiegeEventMap[K]>[] = (this.listeners[event] ??= []);
    arr.push(listener);
  }

  off<K extends keyof SiegeEventMap>(event: K, listener: Listener<SiegeEventMap[K]>): void {
    const arr: Listener<SiegeEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof SiegeEventMap>(event: K, payload: SiegeEventMap[K]): void {
    const arr: Listener<SiegeEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}

/** Singleton event bus */
export const SiegeEventBus = new TypedSiegeEventBus();
