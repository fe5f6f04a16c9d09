// ─────────────────────────────────────────────
//  Siege Store — one per active siege
//  immer produce + subscribe, same shape as the other stores.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { SiegeEventState } from './SiegeState';

type StoreListener = (state: SiegeEventState) => void;

export class SiegeStore {
  private state: SiegeEventState;
  private listeners: StoreListener[] = [];

  constructor(initial: SiegeEventState) {
    this.state = initial;
  }

  getState(): SiegeEventState {
    return this.state;
  }

  apply(recipe: (draft: Draft<SiegeEventState>) => void): void {
    const next = produce(this.state, recipe);
    if (next === this.state) return;
    this.state = next;
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
