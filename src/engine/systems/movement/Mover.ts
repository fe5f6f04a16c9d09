// ─────────────────────────────────────────────
//  Mover — the one capability the path driver needs.
//  NativeMover drives a world actor directly,
//  BotMover steers an external bot by travel target.
// ─────────────────────────────────────────────

import type { Vec3 } from '@/engine/data/types/City';
import type { IActorHandle } from '@/engine/world/IWorldLocator';
import type { IBotHandle } from '@/engine/world/IBotIntegration';

export interface IMover {
  readonly id: string;
  position(): Vec3;
  isAlive(): boolean;
  /** Fighting, or still carrying out its last order */
  isBusy(): boolean;
  issueMoveOrder(point: Vec3): void;
}

export class NativeMover implements IMover {
  constructor(private readonly actor: IActorHandle) {}

  get id(): string {
    return this.actor.id;
  }

  position(): Vec3 {
    return this.actor.position();
  }

  isAlive(): boolean {
    return this.actor.isAlive();
  }

  isBusy(): boolean {
    return this.actor.isInCombat() || this.actor.isMoving();
  }

  issueMoveOrder(point: Vec3): void {
    this.actor.setMovementOrder(point, false);
  }
}

export class BotMover implements IMover {
  constructor(private readonly bot: IBotHandle) {}

  get id(): string {
    return this.bot.id;
  }

  position(): Vec3 {
    return this.bot.position();
  }

  isAlive(): boolean {
    return this.bot.isInWorld() && this.bot.isAlive();
  }

  isBusy(): boolean {
    return this.bot.isInCombat() || this.bot.isTraveling();
  }

  issueMoveOrder(point: Vec3): void {
    this.bot.setTravelTarget(point);
  }
}
