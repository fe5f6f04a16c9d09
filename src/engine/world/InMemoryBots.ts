// ─────────────────────────────────────────────
//  InMemoryBots
//  Scriptable bot subsystem for the simulation and the tests.
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from '@/engine/data/types/City';
import type { IBotHandle, IBotIntegration } from './IBotIntegration';

export interface BotInit {
  id: string;
  name?: string;
  faction: CityFaction;
  level?: number;
  regionId?: number;
  position?: Vec3;
  orientation?: number;
  pvp?: boolean;
  strategies?: string[];
}

export class InMemoryBot implements IBotHandle {
  readonly id: string;
  readonly name: string;
  readonly faction: CityFaction;
  lvl: number;
  region: number;
  pos: Vec3;
  facing: number;
  inWorld = true;
  alive = true;
  inCombat = false;
  inInstance = false;
  grouped = false;
  teleporting = false;
  pvp: boolean;
  travelTarget: Vec3 | null = null;
  /** When true, travel targets are reached at once */
  instantTravel = true;
  readonly strategies: Set<string>;
  readonly teleports: Array<{ regionId: number; position: Vec3; orientation: number }> = [];

  constructor(init: BotInit) {
    this.id = init.id;
    this.name = init.name ?? init.id;
    this.faction = init.faction;
    this.lvl = init.level ?? 80;
    this.region = init.regionId ?? 1;
    this.pos = { ...(init.position ?? { x: 0, y: 0, z: 0 }) };
    this.facing = init.orientation ?? 0;
    this.pvp = init.pvp ?? false;
    this.strategies = new Set(init.strategies ?? ['new rpg']);
  }

  level(): number { return this.lvl; }
  regionId(): number { return this.region; }
  position(): Vec3 { return this.pos; }
  orientation(): number { return this.facing; }

  isInWorld(): boolean { return this.inWorld; }
  isAlive(): boolean { return this.alive; }
  isInCombat(): boolean { return this.inCombat; }
  isInInstance(): boolean { return this.inInstance; }
  isGrouped(): boolean { return this.grouped; }
  isTeleporting(): boolean { return this.teleporting; }

  isPvP(): boolean { return this.pvp; }
  setPvP(enabled: boolean): void { this.pvp = enabled; }

  hasStrategy(name: string): boolean { return this.strategies.has(name); }
  addStrategy(name: string): void { this.strategies.add(name); }
  removeStrategy(name: string): void { this.strategies.delete(name); }

  teleport(regionId: number, position: Vec3, orientation: number): void {
    this.region = regionId;
    this.pos = { ...position };
    this.facing = orientation;
    this.teleports.push({ regionId, position: { ...position }, orientation });
  }

  resurrect(): void {
    this.alive = true;
  }

  stopCombat(): void {
    this.inCombat = false;
  }

  setTravelTarget(point: Vec3): void {
    if (this.instantTravel) {
      this.pos = { ...point };
      this.travelTarget = null;
    } else {
      this.travelTarget = point;
    }
  }

  isTraveling(): boolean {
    return this.travelTarget !== null;
  }

  kill(): void {
    this.alive = false;
    this.inCombat = false;
  }
}

export class InMemoryBots implements IBotIntegration {
  readonly available = true;
  private bots = new Map<string, InMemoryBot>();

  add(init: BotInit): InMemoryBot {
    const bot = new InMemoryBot(init);
    this.bots.set(bot.id, bot);
    return bot;
  }

  listBots(): InMemoryBot[] {
    return [...this.bots.values()];
  }

  findBot(id: string): InMemoryBot | null {
    return this.bots.get(id) ?? null;
  }
}
