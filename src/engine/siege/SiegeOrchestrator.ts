// ─────────────────────────────────────────────
//  Siege Orchestrator
//  Owns the active sieges and the config snapshot; decides when a
//  new siege starts and retires finished ones. The host constructs
//  one and calls tick() once per world update.
// ─────────────────────────────────────────────

import type { CityData, CityFaction } from '@/engine/data/types/City';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import type { SiegeWinner } from '@/engine/data/types/Siege';
import type { SiegeServices } from './SiegeServices';
import type { SiegeStatus } from './SiegeEventStateMachine';
import { SiegeEventStateMachine } from './SiegeEventStateMachine';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';

/** Ended sieges stay queryable this long before they are purged */
export const PURGE_GRACE_SECONDS = 60;

export type StartRejection =
  | 'disabled'
  | 'unknown_city'
  | 'city_disabled'
  | 'already_under_siege'
  | 'no_eligible_city';

export type StartResult =
  | { ok: true; siege: SiegeEventStateMachine }
  | { ok: false; reason: StartRejection; city?: CityData };

export type StopResult =
  | { ok: true; siege: SiegeEventStateMachine }
  | { ok: false; reason: 'unknown_city' | 'not_active'; city?: CityData };

export interface OrchestratorStatus {
  enabled: boolean;
  allowMultipleCities: boolean;
  sieges: SiegeStatus[];
  nextSiegeIn: number | null;
}

export class SiegeOrchestrator {
  private config: SiegeConfig;
  private sieges: SiegeEventStateMachine[] = [];
  private nextSiegeAt: number | null = null;
  private siegeCounter = 0;

  constructor(config: SiegeConfig, private readonly services: SiegeServices) {
    this.config = config;
    Logger.setDebug(config.debug);
  }

  getConfig(): SiegeConfig {
    return this.config;
  }

  /** Schedules the first automatic siege */
  start(): void {
    if (!this.config.enabled) {
      Logger.log('[SiegeOrchestrator] City sieges are disabled');
      return;
    }
    this.scheduleNext(this.services.clock.now());
  }

  /** Running sieges play out even while the module is disabled; only new starts stop */
  tick(): void {
    const now = this.services.clock.now();

    for (const siege of this.sieges) siege.tick();
    this.purge(now);

    if (!this.config.enabled) return;
    if (this.nextSiegeAt !== null && now >= this.nextSiegeAt) {
      const result = this.startSiege();
      if (!result.ok) Logger.debug(`[SiegeOrchestrator] Scheduled siege skipped: ${result.reason}`);
      this.scheduleNext(now);
    }
  }

  // ── Commands ──────────────────────────────────────────────

  /** Starts a siege in the named city, or in a random eligible one */
  startSiege(cityRef?: string): StartResult {
    if (!this.config.enabled) return { ok: false, reason: 'disabled' };

    let city: CityData | undefined;
    if (cityRef !== undefined) {
      city = this.findCity(cityRef);
      if (!city) return { ok: false, reason: 'unknown_city' };
      if (!city.enabled) return { ok: false, reason: 'city_disabled', city };
      if (this.runningIn(city.id)) return { ok: false, reason: 'already_under_siege', city };
    } else {
      city = MathUtils.pick(this.eligibleCities(), this.services.rng);
      if (!city) return { ok: false, reason: 'no_eligible_city' };
    }

    const id = `siege_${city.id}_${++this.siegeCounter}`;
    const siege = SiegeEventStateMachine.create(id, this.config, city, this.services);
    this.sieges.push(siege);
    return { ok: true, siege };
  }

  /** Force-ends the siege in a city with `winnerFaction` as the victor, then drops it */
  stopSiege(cityRef: string, winnerFaction: CityFaction): StopResult {
    const city = this.findCity(cityRef);
    if (!city) return { ok: false, reason: 'unknown_city' };
    const siege = this.runningIn(city.id);
    if (!siege) return { ok: false, reason: 'not_active', city };

    const winner: SiegeWinner = winnerFaction === city.faction ? 'defenders' : 'attackers';
    siege.end(winner, 'forced');
    this.remove(siege);
    return { ok: true, siege };
  }

  /** Aborts and drops sieges in one city or everywhere; returns how many were removed */
  cleanup(cityRef?: string): number {
    const city = cityRef !== undefined ? this.findCity(cityRef) : undefined;
    if (cityRef !== undefined && !city) return 0;

    const targets = this.sieges.filter(s => !city || s.city.id === city.id);
    for (const siege of targets) {
      siege.end(null, 'aborted');
      this.remove(siege);
    }
    return targets.length;
  }

  /** New sieges use the new config; running ones keep the snapshot they started with */
  reload(config: SiegeConfig): void {
    const wasEnabled = this.config.enabled;
    this.config = config;
    Logger.setDebug(config.debug);
    if (!config.enabled) {
      this.nextSiegeAt = null;
    } else if (!wasEnabled || this.nextSiegeAt === null) {
      this.scheduleNext(this.services.clock.now());
    }
    Logger.log('[SiegeOrchestrator] Configuration reloaded');
  }

  shutdown(): void {
    const count = this.cleanup();
    this.nextSiegeAt = null;
    if (count > 0) Logger.log(`[SiegeOrchestrator] Shut down ${count} sieges`);
  }

  // ── Queries ───────────────────────────────────────────────

  findCity(ref: string): CityData | undefined {
    const key = ref.trim().toLowerCase();
    return this.config.cities.find(c => c.id === key || c.name.toLowerCase() === key);
  }

  /** All sieges, including ended ones inside their grace window */
  allSieges(): readonly SiegeEventStateMachine[] {
    return this.sieges;
  }

  runningSieges(): SiegeEventStateMachine[] {
    return this.sieges.filter(s => !s.isEnded());
  }

  runningIn(cityId: string): SiegeEventStateMachine | undefined {
    return this.sieges.find(s => s.city.id === cityId && !s.isEnded());
  }

  latestIn(cityId: string): SiegeEventStateMachine | undefined {
    return this.runningIn(cityId) ?? [...this.sieges].reverse().find(s => s.city.id === cityId);
  }

  /** Enabled cities with no running siege; none while one runs and concurrency is off */
  eligibleCities(): CityData[] {
    if (!this.config.allowMultipleCities && this.runningSieges().length > 0) return [];
    return this.config.cities.filter(c => c.enabled && !this.runningIn(c.id));
  }

  status(): OrchestratorStatus {
    return {
      enabled: this.config.enabled,
      allowMultipleCities: this.config.allowMultipleCities,
      sieges: this.sieges.map(s => s.status()),
      nextSiegeIn: this.config.enabled ? this.secondsUntilNextSiege() : null,
    };
  }

  secondsUntilNextSiege(): number | null {
    if (this.nextSiegeAt === null) return null;
    return Math.max(0, this.nextSiegeAt - this.services.clock.now());
  }

  // ── Internals ─────────────────────────────────────────────

  private scheduleNext(now: number): void {
    const delay = MathUtils.randInt(this.config.timerMin, this.config.timerMax, this.services.rng);
    this.nextSiegeAt = now + delay;
    Logger.debug(`[SiegeOrchestrator] Next siege in ${Math.floor(delay / 60)} minutes`);
  }

  private purge(now: number): void {
    const before = this.sieges.length;
    this.sieges = this.sieges.filter(s => {
      const outcome = s.getState().outcome;
      return !outcome || now - outcome.endedAt <= PURGE_GRACE_SECONDS;
    });
    if (this.sieges.length !== before) {
      Logger.debug(`[SiegeOrchestrator] Purged ${before - this.sieges.length} finished sieges`);
    }
  }

  private remove(siege: SiegeEventStateMachine): void {
    this.sieges = this.sieges.filter(s => s !== siege);
  }
}
