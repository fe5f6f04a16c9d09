// ─────────────────────────────────────────────
//  Siege Event State Machine
//  narrative → combat → ended, one instance per active siege.
//
//  Narrative: countdown announcements, scripted dialogue, weather.
//  Combat:    path driver → respawns → death detection → taunts
//             → status → win check, in that order every tick.
//  Ended:     inert; despawn, revert and release happen exactly once.
// ─────────────────────────────────────────────

import type { CityData, CityFaction, Vec3 } from '@/engine/data/types/City';
import { factionLabel, opposingFaction } from '@/engine/data/types/City';
import type {
  CountdownMilestone,
  DeathRecord,
  DirectoryEntry,
  EndReason,
  SiegeOutcome,
  SiegePhase,
  SiegeSide,
  SiegeWinner,
} from '@/engine/data/types/Siege';
import type { ReactState, SiegeConfig } from '@/engine/data/types/SiegeConfig';
import type { IActorHandle, IScene } from '@/engine/world/IWorldLocator';
import type { IMover } from '@/engine/systems/movement/Mover';
import type { NativeTier, WaveSpec } from '@/engine/systems/formation/FormationSpawner';
import type { TextId } from '@/engine/systems/announce/SiegeAnnouncer';
import type { ObjectiveRef, SiegeEventState } from '@/engine/state/SiegeState';
import type { SiegeServices } from './SiegeServices';
import { SiegeStore } from '@/engine/state/SiegeStore';
import { SiegeStateQuery } from '@/engine/state/SiegeState';
import { NativeMover, BotMover } from '@/engine/systems/movement/Mover';
import { PathProgressionDriver } from '@/engine/systems/movement/PathProgressionDriver';
import {
  ATTACKER_HEIGHT_PROBE,
  FormationSpawner,
} from '@/engine/systems/formation/FormationSpawner';
import { RespawnScheduler } from '@/engine/systems/respawn/RespawnScheduler';
import { registerActor } from '@/engine/systems/directory/ActorDirectory';
import { BotRoster } from '@/engine/systems/bots/BotRoster';
import { SiegeDialogue } from '@/engine/systems/dialogue/SiegeDialogue';
import { SiegeAnnouncer } from '@/engine/systems/announce/SiegeAnnouncer';
import { distributeRewards } from '@/engine/systems/reward/RewardSystem';
import { describeLeader, dueMilestone, percentRemaining } from '@/engine/systems/status/SiegeStatusReport';
import { MathUtils } from '@/engine/utils/MathUtils';
import { SiegeEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

const TRANSITIONS: Record<SiegePhase, SiegePhase[]> = {
  narrative: ['combat', 'ended'],
  combat: ['ended'],
  ended: [],
};

const COUNTDOWN_TEXT: Record<CountdownMilestone, TextId> = {
  75: 'countdown75',
  50: 'countdown50',
  25: 'countdown25',
};

/** Objective actors are searched for this far around the objective anchor */
export const OBJECTIVE_SEARCH_RADIUS = 100;

/** Respawned defenders land on a ring this far from the objective anchor */
export const DEFENDER_RESPAWN_RING = { inner: 10, outer: 15 } as const;

export interface SiegeStatus {
  siegeId: string;
  cityId: string;
  cityName: string;
  phase: SiegePhase;
  remainingSeconds: number;
  actorCount: number;
  objective: {
    actorId: string | null;
    name: string | null;
    alive: boolean | null;
    healthPct: number | null;
  };
  outcome: SiegeOutcome | null;
}

export class SiegeEventStateMachine {
  private readonly store: SiegeStore;
  private readonly announcer: SiegeAnnouncer;

  private constructor(
    readonly config: SiegeConfig,
    readonly city: CityData,
    private readonly services: SiegeServices,
    initial: SiegeEventState,
  ) {
    this.store = new SiegeStore(initial);
    this.announcer = new SiegeAnnouncer(services.audience, config.announceRadius);
  }

  /** Creates the siege and runs its opening: warnings, weather, bots and both waves */
  static create(
    id: string,
    config: SiegeConfig,
    city: CityData,
    services: SiegeServices,
  ): SiegeEventStateMachine {
    const now = services.clock.now();
    const attacking = opposingFaction(city.faction);
    const scene = services.world.findScene(city.regionId);
    const objective = resolveObjective(scene, city);
    const leaders = config.creatures[attacking].leaders;
    const leaderTemplateId = MathUtils.pick(leaders, services.rng) ?? config.creatures[attacking].miniBoss;

    const machine = new SiegeEventStateMachine(config, city, services, {
      id,
      cityId: city.id,
      phase: 'narrative',
      startTime: now,
      endTime: now + config.eventDuration,
      combatStartedAt: null,
      objective,
      leaderTemplateId,
      script: SiegeDialogue.prepareScript(config.narrativeScripts[attacking], city.name, objective.name, services.rng),
      scriptCursor: 0,
      countdown: { 75: false, 50: false, 25: false },
      lastYellAt: now,
      lastStatusAt: now,
      directory: {},
      deathQueue: [],
      botReturns: [],
      botsReleased: false,
      environment: { snapshot: null, active: false },
      outcome: null,
    });
    machine.open(scene);
    return machine;
  }

  // ── Queries ───────────────────────────────────────────────

  get id(): string {
    return this.store.getState().id;
  }

  get phase(): SiegePhase {
    return this.store.getState().phase;
  }

  getState(): SiegeEventState {
    return this.store.getState();
  }

  subscribe(listener: (state: SiegeEventState) => void): () => void {
    return this.store.subscribe(listener);
  }

  isEnded(): boolean {
    return SiegeStateQuery.isEnded(this.store.getState());
  }

  findEntry(actorId: string): DirectoryEntry | undefined {
    return this.store.getState().directory[actorId];
  }

  status(): SiegeStatus {
    const state = this.store.getState();
    const objective = this.objectiveActor(this.scene());
    return {
      siegeId: state.id,
      cityId: this.city.id,
      cityName: this.city.name,
      phase: state.phase,
      remainingSeconds: SiegeStateQuery.remainingSeconds(state, this.services.clock.now()),
      actorCount: SiegeStateQuery.actors(state).length,
      objective: {
        actorId: state.objective.actorId,
        name: state.objective.name,
        alive: objective ? objective.isAlive() : null,
        healthPct: objective ? objective.healthPct() : null,
      },
      outcome: state.outcome,
    };
  }

  // ── Tick ──────────────────────────────────────────────────

  tick(): void {
    const state = this.store.getState();
    if (state.phase === 'ended') return;

    const now = this.services.clock.now();
    const scene = this.scene();

    if (state.phase === 'narrative') {
      this.runNarrative(now);
      if (now - state.startTime >= this.config.cinematicDelay) this.enterCombat(now, scene);
    }

    if (this.store.getState().phase === 'combat') this.runCombat(now, scene);
  }

  /**
   * Ends the siege. `winner` null aborts it: no announcement of a winner
   * and no rewards. Returns false when the siege had already ended.
   */
  end(winner: SiegeWinner | null, reason: EndReason): boolean {
    if (this.isEnded()) {
      Logger.debug(`[SiegeEventStateMachine] ${this.city.name}: end(${reason}) ignored, already ended`);
      return false;
    }
    if (!this.transition('ended')) return false;

    const now = this.services.clock.now();
    const winningFaction = winner ? this.factionOf(winner === 'attackers' ? 'attacker' : 'defender') : null;
    const outcome: SiegeOutcome = { winner, winningFaction, reason, endedAt: now };
    this.store.apply(draft => {
      draft.outcome = outcome;
      draft.deathQueue = [];
    });

    const scene = this.scene();
    this.despawnNatives(scene);
    if (reason !== 'aborted') this.announcer.announce(this.city, 'siegeEnd', { CITY: this.city.name });
    this.revertEnvironment();

    if (winner && winningFaction) {
      this.announceWinner(winner, winningFaction);
      this.playMusic(winner === 'defenders' ? this.config.music.victory : this.config.music.defeat);
      if (this.config.rewards.onDefense) {
        distributeRewards({
          city: this.city,
          faction: winningFaction,
          sessions: this.announcer.localSessions(this.city),
          minLevel: this.config.minimumLevel,
          rewards: this.config.rewards,
          granter: this.services.rewards,
        });
      }
    }

    if (reason === 'objective_destroyed') this.restoreObjective(scene);
    this.releaseBots();

    Logger.log(`[SiegeEventStateMachine] Siege of ${this.city.name} ended: ${winner ?? 'no winner'} (${reason})`);
    SiegeEventBus.emit('siegeEnded', { siegeId: this.id, cityId: this.city.id, outcome });
    return true;
  }

  // ── Opening ───────────────────────────────────────────────

  private open(scene: IScene | null): void {
    const state = this.store.getState();
    const cityName = this.city.name;

    if (state.objective.actorId === null) {
      Logger.warn(`[SiegeEventStateMachine] No objective actor found in ${cityName}; attackers win by default`);
    }

    this.announcer.announce(this.city, 'preWarning', { CITY: cityName, SECONDS: this.config.cinematicDelay });
    this.applyEnvironment();
    this.recruitBots();
    this.announcer.announce(this.city, 'siegeStart', { CITY: cityName });

    if (scene) {
      this.spawnWave(scene, FormationSpawner.attackerWave(this.config, this.city, state.leaderTemplateId));
      if (this.config.defendersEnabled) {
        this.spawnWave(scene, FormationSpawner.defenderWave(this.config, this.city));
      }
    } else {
      Logger.warn(`[SiegeEventStateMachine] Region ${this.city.regionId} is not loaded; ${cityName} siege starts without waves`);
    }

    this.playMusic(this.config.music.narrative);

    Logger.log(`[SiegeEventStateMachine] Siege of ${cityName} started with ${SiegeStateQuery.actors(this.store.getState()).length} actors`);
    SiegeEventBus.emit('siegeStarted', {
      siegeId: state.id,
      cityId: this.city.id,
      startTime: state.startTime,
      endTime: state.endTime,
    });
  }

  private spawnWave(scene: IScene, wave: WaveSpec): void {
    const result = FormationSpawner.spawnWave(scene, wave, this.store.getState().directory, {
      path: this.city.waypoints,
      neutralFactionId: this.config.factionTemplates.neutral,
      leaderYells: this.config.leaderSpawnYells,
      rng: this.services.rng,
    });
    this.store.apply(draft => { draft.directory = result.directory; });
    for (const actor of result.spawned) {
      SiegeEventBus.emit('actorSpawned', { siegeId: this.id, actorId: actor.id, tier: actor.tier, side: actor.side });
    }
  }

  private recruitBots(): void {
    const { bots: settings } = this.config;
    if (!settings.enabled || !this.services.bots.available) return;

    const sides: Array<{ side: SiegeSide; max: number; anchor: Vec3 }> = [
      { side: 'defender', max: settings.maxDefenders, anchor: this.city.objective },
      { side: 'attacker', max: settings.maxAttackers, anchor: this.city.rally },
    ];
    for (const { side, max, anchor } of sides) {
      const recruitment = BotRoster.recruit(this.services.bots, {
        faction: this.factionOf(side),
        side,
        regionId: this.city.regionId,
        anchor,
        max,
        minLevel: settings.minLevel,
      }, this.services.rng);

      let dir = this.store.getState().directory;
      for (const botId of recruitment.ids) {
        dir = registerActor(dir, botId, 'bot', side, 'bot', this.city.waypoints);
      }
      this.store.apply(draft => {
        draft.directory = dir;
        draft.botReturns.push(...recruitment.returns);
      });
    }
  }

  // ── Narrative ─────────────────────────────────────────────

  private runNarrative(now: number): void {
    const state = this.store.getState();
    const elapsed = now - state.startTime;

    const milestone = dueMilestone(percentRemaining(elapsed, this.config.cinematicDelay), state.countdown);
    if (milestone !== null) {
      this.store.apply(draft => { draft.countdown[milestone] = true; });
      this.announcer.broadcast(COUNTDOWN_TEXT[milestone], {
        CITY: this.city.name,
        SECONDS: Math.max(0, this.config.cinematicDelay - elapsed),
      });
    }

    if (now - state.lastYellAt < this.config.yellFrequency) return;
    this.store.apply(draft => { draft.lastYellAt = now; });

    const next = SiegeDialogue.nextLine({ script: state.script, cursor: state.scriptCursor });
    if (!next) return;
    const speaker = this.randomSpeaker(this.scene());
    if (!speaker) return;
    speaker.speak(next.line);
    this.store.apply(draft => { draft.scriptCursor = next.cursor; });
  }

  private enterCombat(now: number, scene: IScene | null): void {
    if (!this.transition('combat')) return;
    this.store.apply(draft => { draft.combatStartedAt = now; });

    this.announcer.broadcast('battleStart', { CITY: this.city.name });
    this.playMusic(this.config.music.combat);

    const { rng } = this.services;
    for (const entry of SiegeStateQuery.actors(this.store.getState())) {
      if (entry.kind === 'native') {
        const actor = scene?.findActor(entry.id) ?? null;
        if (!actor) continue;
        actor.setFaction(this.factionTemplateOf(entry.side));
        actor.setReactState(this.reactStateOf(entry.side));
        PathProgressionDriver.dispatch(new NativeMover(actor), entry.progress, this.city, rng);
      } else {
        const bot = this.services.bots.findBot(entry.id);
        if (!bot) continue;
        BotRoster.activate(bot);
        PathProgressionDriver.dispatch(new BotMover(bot), entry.progress, this.city, rng);
      }
    }
    Logger.log(`[SiegeEventStateMachine] ${this.city.name}: combat begins`);
  }

  // ── Combat ────────────────────────────────────────────────

  private runCombat(now: number, scene: IScene | null): void {
    this.driveActors(scene);
    this.processRespawns(now, scene);
    this.detectDeaths(now, scene);
    this.combatTaunt(now, scene);
    this.statusUpdate(now, scene);

    const verdict = this.evaluateWinCondition(now, scene);
    if (verdict) this.end(verdict.winner, verdict.reason);
  }

  private driveActors(scene: IScene | null): void {
    const state = this.store.getState();
    const result = PathProgressionDriver.tick(state.directory, this.movers(scene), this.city, this.services.rng);
    if (result.directory === state.directory) return;
    this.store.apply(draft => { draft.directory = result.directory; });
    for (const step of result.advanced) {
      SiegeEventBus.emit('waypointReached', {
        siegeId: state.id,
        actorId: step.id,
        index: step.progress.index,
        arrived: step.progress.arrived,
      });
    }
  }

  private processRespawns(now: number, scene: IScene | null): void {
    const state = this.store.getState();
    if (state.deathQueue.length === 0) return;

    const result = RespawnScheduler.processDue(
      state.deathQueue,
      state.directory,
      now,
      this.city.waypoints,
      record => RespawnScheduler.delayFor(this.config, record),
      record => this.respawnActor(record, scene),
    );
    if (result.respawned.length === 0) return;

    this.store.apply(draft => {
      draft.deathQueue = result.queue;
      draft.directory = result.directory;
    });

    for (const { previousId, actorId } of result.respawned) {
      const entry = result.directory[actorId];
      const mover = entry ? this.moverFor(entry, scene) : null;
      if (entry && mover) PathProgressionDriver.dispatch(mover, entry.progress, this.city, this.services.rng);
      SiegeEventBus.emit('actorRespawned', { siegeId: state.id, previousId, actorId });
    }
  }

  private detectDeaths(now: number, scene: IScene | null): void {
    const state = this.store.getState();
    let queue = state.deathQueue;

    for (const entry of SiegeStateQuery.actors(state)) {
      if (RespawnScheduler.isQueued(queue, entry.id)) continue;
      if (!this.isDead(entry, scene)) continue;
      if (entry.kind === 'native' && !this.config.respawnEnabled) continue;

      queue = RespawnScheduler.recordDeath(queue, entry, now);
      SiegeEventBus.emit('actorDied', { siegeId: state.id, actorId: entry.id, tier: entry.tier, side: entry.side });
    }

    if (queue !== state.deathQueue) this.store.apply(draft => { draft.deathQueue = queue; });
  }

  private combatTaunt(now: number, scene: IScene | null): void {
    const state = this.store.getState();
    if (now - state.lastYellAt < this.config.yellFrequency) return;
    this.store.apply(draft => { draft.lastYellAt = now; });

    const line = SiegeDialogue.randomLine(this.config.combatYells, this.services.rng);
    const speaker = this.randomSpeaker(scene);
    if (line && speaker) speaker.speak(line);
  }

  private statusUpdate(now: number, scene: IScene | null): void {
    const state = this.store.getState();
    if (now - state.lastStatusAt < this.config.statusInterval) return;
    this.store.apply(draft => { draft.lastStatusAt = now; });

    const objective = this.objectiveActor(scene);
    const health = objective && objective.isAlive() ? objective.healthPct() : null;
    const minutesLeft = Math.floor(SiegeStateQuery.remainingSeconds(state, now) / 60);
    this.announcer.broadcast('status', {
      CITY: this.city.name,
      MINUTES: minutesLeft,
      LEADER: describeLeader(health, minutesLeft),
    });
  }

  /** The one objective check: missing or dead objective, then time */
  private evaluateWinCondition(
    now: number,
    scene: IScene | null,
  ): { winner: SiegeWinner; reason: EndReason } | null {
    const state = this.store.getState();
    if (state.objective.actorId === null) return { winner: 'attackers', reason: 'objective_missing' };
    if (scene) {
      const objective = scene.findActor(state.objective.actorId);
      if (!objective || !objective.isAlive()) return { winner: 'attackers', reason: 'objective_destroyed' };
    }
    if (now >= state.endTime) return { winner: 'defenders', reason: 'time_expired' };
    return null;
  }

  // ── Respawn ───────────────────────────────────────────────

  private respawnActor(record: DeathRecord, scene: IScene | null): string | null {
    if (record.kind === 'bot') {
      const bot = this.services.bots.findBot(record.id);
      if (!bot) return null;
      const anchor = record.side === 'attacker' ? this.city.rally : this.city.objective;
      BotRoster.revive(bot, this.city.regionId, anchor, this.services.rng);
      return bot.id;
    }

    if (!scene || record.tier === 'bot') return null;
    const tier = record.tier;
    const point = record.side === 'attacker'
      ? this.city.rally
      : MathUtils.ring(this.city.objective, DEFENDER_RESPAWN_RING.inner, DEFENDER_RESPAWN_RING.outer, this.services.rng);

    const actor = FormationSpawner.spawnUnit(
      scene,
      this.templateFor(tier),
      point,
      record.side === 'attacker' ? ATTACKER_HEIGHT_PROBE : 0,
      {
        level: this.config.levels[tier],
        scale: this.config.scales[tier],
        factionId: this.factionTemplateOf(record.side),
        reactState: this.reactStateOf(record.side),
      },
    );
    if (!actor) return null;

    scene.findActor(record.id)?.despawn();
    Logger.debug(`[SiegeEventStateMachine] Respawned ${tier} ${record.id} as ${actor.id}`);
    return actor.id;
  }

  private templateFor(tier: NativeTier): number {
    if (tier === 'leader') return this.store.getState().leaderTemplateId;
    if (tier === 'defender') return this.config.creatures[this.city.faction].defender;
    return this.config.creatures[opposingFaction(this.city.faction)][tier];
  }

  // ── Ending ────────────────────────────────────────────────

  private announceWinner(winner: SiegeWinner, faction: CityFaction): void {
    this.announcer.announce(this.city, winner === 'defenders' ? 'winDefenders' : 'winAttackers', {
      FACTION: factionLabel(faction),
      CITY: this.city.name,
    });
  }

  private despawnNatives(scene: IScene | null): void {
    if (!scene) return;
    for (const entry of SiegeStateQuery.natives(this.store.getState())) {
      scene.findActor(entry.id)?.despawn();
    }
  }

  private restoreObjective(scene: IScene | null): void {
    const objective = this.objectiveActor(scene);
    if (objective && !objective.isAlive()) {
      objective.respawn();
      Logger.log(`[SiegeEventStateMachine] ${objective.name} restored in ${this.city.name}`);
    }
  }

  private releaseBots(): void {
    const state = this.store.getState();
    if (state.botsReleased) return;
    this.store.apply(draft => { draft.botsReleased = true; });
    if (state.botReturns.length === 0) return;
    const released = BotRoster.release(this.services.bots, state.botReturns);
    Logger.log(`[SiegeEventStateMachine] Released ${released}/${state.botReturns.length} bots from ${this.city.name}`);
  }

  // ── Environment ───────────────────────────────────────────

  private applyEnvironment(): void {
    const { weather } = this.config;
    if (!weather.enabled || this.store.getState().environment.active) return;
    const snapshot = this.services.ambience.readWeather(this.city) ?? { type: 0, grade: 0 };
    this.services.ambience.setWeather(this.city, { type: weather.type, grade: weather.grade });
    this.store.apply(draft => { draft.environment = { snapshot, active: true }; });
  }

  private revertEnvironment(): void {
    const { environment } = this.store.getState();
    if (!environment.active) return;
    if (environment.snapshot) this.services.ambience.setWeather(this.city, environment.snapshot);
    this.store.apply(draft => { draft.environment.active = false; });
  }

  private playMusic(musicId: number): void {
    if (!this.config.music.enabled || musicId <= 0) return;
    this.services.ambience.playMusic(this.city, musicId, this.config.announceRadius);
  }

  // ── Helpers ───────────────────────────────────────────────

  private transition(to: SiegePhase): boolean {
    const from = this.store.getState().phase;
    if (!TRANSITIONS[from].includes(to)) {
      Logger.error(`[SiegeEventStateMachine] Invalid transition: ${from} → ${to}`);
      return false;
    }
    this.store.apply(draft => { draft.phase = to; });
    SiegeEventBus.emit('phaseChanged', { siegeId: this.id, from, to });
    return true;
  }

  private scene(): IScene | null {
    return this.services.world.findScene(this.city.regionId);
  }

  private objectiveActor(scene: IScene | null): IActorHandle | null {
    const { actorId } = this.store.getState().objective;
    if (!scene || actorId === null) return null;
    return scene.findActor(actorId);
  }

  private factionOf(side: SiegeSide): CityFaction {
    return side === 'defender' ? this.city.faction : opposingFaction(this.city.faction);
  }

  private factionTemplateOf(side: SiegeSide): number {
    return this.config.factionTemplates[this.factionOf(side)];
  }

  private reactStateOf(side: SiegeSide): ReactState {
    if (side === 'defender') return 'aggressive';
    return this.config.aggroPlayers && this.config.aggroNPCs ? 'aggressive' : 'defensive';
  }

  private moverFor(entry: DirectoryEntry, scene: IScene | null): IMover | null {
    if (entry.kind === 'bot') {
      const bot = this.services.bots.findBot(entry.id);
      return bot ? new BotMover(bot) : null;
    }
    const actor = scene?.findActor(entry.id) ?? null;
    return actor ? new NativeMover(actor) : null;
  }

  private movers(scene: IScene | null): IMover[] {
    const movers: IMover[] = [];
    for (const entry of SiegeStateQuery.actors(this.store.getState())) {
      const mover = this.moverFor(entry, scene);
      if (mover) movers.push(mover);
    }
    return movers;
  }

  /** Dead, or gone from the scene for a native actor */
  private isDead(entry: DirectoryEntry, scene: IScene | null): boolean {
    if (entry.kind === 'bot') {
      const bot = this.services.bots.findBot(entry.id);
      return bot !== null && !bot.isAlive();
    }
    if (!scene) return false;
    const actor = scene.findActor(entry.id);
    return !actor || !actor.isAlive();
  }

  private randomSpeaker(scene: IScene | null): IActorHandle | null {
    if (!scene) return null;
    const live = SiegeStateQuery.speakers(this.store.getState())
      .map(e => scene.findActor(e.id))
      .filter((a): a is IActorHandle => a !== null && a.isAlive());
    return MathUtils.pick(live, this.services.rng) ?? null;
  }
}

function resolveObjective(scene: IScene | null, city: CityData): ObjectiveRef {
  if (!scene) return { actorId: null, name: null };
  const found = scene
    .findActorsByTemplate(city.objectiveTemplateId, city.objective, OBJECTIVE_SEARCH_RADIUS)
    .find(a => a.isAlive());
  return found ? { actorId: found.id, name: found.name } : { actorId: null, name: null };
}
