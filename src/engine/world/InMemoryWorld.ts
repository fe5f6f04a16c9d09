// ─────────────────────────────────────────────
//  InMemoryWorld
//  Headless world for the simulation and the tests.
//  Actors are plain objects; movement orders complete instantly
//  unless the scene is told otherwise.
// ─────────────────────────────────────────────

import type { Vec3 } from '@/engine/data/types/City';
import type { ReactState } from '@/engine/data/types/SiegeConfig';
import type { IActorHandle, IScene, IWorldLocator, SpawnOptions } from './IWorldLocator';
import { MathUtils } from '@/engine/utils/MathUtils';

export class InMemoryActor implements IActorHandle {
  alive = true;
  health = 100;
  inCombat = false;
  moving = false;
  despawned = false;
  factionId: number;
  reactState: ReactState;
  pos: Vec3;
  moveTarget: Vec3 | null = null;
  readonly speech: string[] = [];
  readonly orders: Vec3[] = [];

  constructor(
    private readonly scene: InMemoryScene,
    readonly id: string,
    readonly templateId: number,
    readonly name: string,
    position: Vec3,
    readonly options: SpawnOptions,
  ) {
    this.pos = { ...position };
    this.factionId = options.factionId;
    this.reactState = options.reactState;
  }

  isAlive(): boolean { return this.alive; }
  healthPct(): number { return this.health; }
  position(): Vec3 { return this.pos; }
  isInCombat(): boolean { return this.inCombat; }
  isMoving(): boolean { return this.moving; }

  speak(text: string): void {
    this.speech.push(text);
  }

  despawn(): void {
    this.despawned = true;
    this.scene.remove(this.id);
  }

  respawn(): void {
    this.alive = true;
    this.health = 100;
  }

  setFaction(factionId: number): void {
    this.factionId = factionId;
  }

  setReactState(state: ReactState): void {
    this.reactState = state;
  }

  setMovementOrder(point: Vec3, _walk: boolean): void {
    this.orders.push(point);
    if (this.scene.instantMovement) {
      this.pos = { ...point };
      this.moving = false;
    } else {
      this.moveTarget = point;
      this.moving = true;
    }
  }

  /** Finishes a pending movement order */
  completeMove(): void {
    if (this.moveTarget) this.pos = { ...this.moveTarget };
    this.moveTarget = null;
    this.moving = false;
  }

  kill(): void {
    this.alive = false;
    this.health = 0;
    this.inCombat = false;
  }
}

export class InMemoryScene implements IScene {
  /** When true, movement orders teleport the actor to the target */
  instantMovement = true;
  /** Returned by groundHeight; null simulates a failed ground query */
  groundZ: number | null = null;
  readonly failingTemplates = new Set<number>();
  readonly names = new Map<number, string>();

  private actors = new Map<string, InMemoryActor>();
  private nextId = 0;

  constructor(readonly regionId: number) {}

  groundHeight(_x: number, _y: number, _zHint: number): number | null {
    return this.groundZ;
  }

  spawnActor(templateId: number, position: Vec3, options: SpawnOptions): InMemoryActor | null {
    if (this.failingTemplates.has(templateId)) return null;
    const id = `r${this.regionId}-a${++this.nextId}`;
    const name = this.names.get(templateId) ?? `Creature ${templateId}`;
    const actor = new InMemoryActor(this, id, templateId, name, position, options);
    this.actors.set(id, actor);
    return actor;
  }

  findActor(id: string): InMemoryActor | null {
    return this.actors.get(id) ?? null;
  }

  findActorsByTemplate(templateId: number, near: Vec3, radius: number): InMemoryActor[] {
    return [...this.actors.values()].filter(
      a => a.templateId === templateId && MathUtils.dist3(a.pos, near) <= radius,
    );
  }

  /** Places a named resident actor, such as a city leader */
  place(templateId: number, name: string, position: Vec3): InMemoryActor {
    this.names.set(templateId, name);
    const actor = this.spawnActor(templateId, position, {
      level: 83, scale: 1, factionId: 0, reactState: 'defensive',
    });
    if (!actor) throw new Error(`Template ${templateId} is set to fail`);
    return actor;
  }

  allActors(): InMemoryActor[] {
    return [...this.actors.values()];
  }

  remove(id: string): void {
    this.actors.delete(id);
  }
}

export class InMemoryWorld implements IWorldLocator {
  private scenes = new Map<number, InMemoryScene>();

  addScene(regionId: number): InMemoryScene {
    const scene = new InMemoryScene(regionId);
    this.scenes.set(regionId, scene);
    return scene;
  }

  unload(regionId: number): void {
    this.scenes.delete(regionId);
  }

  findScene(regionId: number): InMemoryScene | null {
    return this.scenes.get(regionId) ?? null;
  }
}
