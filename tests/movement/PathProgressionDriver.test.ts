import { describe, it, expect, beforeEach } from 'vitest';
import type { Vec3 } from '@/engine/data/types/City';
import type { IMover } from '@/engine/systems/movement/Mover';
import { BotMover, NativeMover } from '@/engine/systems/movement/Mover';
import { PathProgressionDriver, ARRIVAL_THRESHOLD } from '@/engine/systems/movement/PathProgressionDriver';
import { emptyDirectory, registerActor } from '@/engine/systems/directory/ActorDirectory';
import { InMemoryWorld } from '@/engine/world/InMemoryWorld';
import { InMemoryBots } from '@/engine/world/InMemoryBots';
import { SiegeEventBus } from '@/engine/utils/EventBus';
import { makeCity } from '../integration/helpers';

const rng = () => 0;

class FakeMover implements IMover {
  alive = true;
  busy = false;
  readonly orders: Vec3[] = [];
  constructor(readonly id: string, public pos: Vec3) {}
  position(): Vec3 { return this.pos; }
  isAlive(): boolean { return this.alive; }
  isBusy(): boolean { return this.busy; }
  issueMoveOrder(point: Vec3): void { this.orders.push(point); }
}

const WAYPOINTS: Vec3[] = [{ x: -300, y: 0, z: 0 }, { x: -100, y: 0, z: 0 }];

beforeEach(() => {
  SiegeEventBus.clear();
});

describe('PathProgressionDriver', () => {
  const city = makeCity({ waypoints: WAYPOINTS });

  it('orders an actor that is far from its target toward it', () => {
    const dir = registerActor(emptyDirectory(), 'a1', 'minion', 'attacker', 'native', WAYPOINTS);
    const mover = new FakeMover('a1', city.rally);
    const result = PathProgressionDriver.tick(dir, [mover], city, rng);
    expect(result.directory).toBe(dir);
    expect(result.ordersIssued).toBe(1);
    expect(mover.orders).toEqual([{ x: -300, y: 0, z: 0 }]);
  });

  it('advances on arrival and orders the next leg in the same tick', () => {
    const dir = registerActor(emptyDirectory(), 'a1', 'minion', 'attacker', 'native', WAYPOINTS);
    const mover = new FakeMover('a1', { x: -300 + ARRIVAL_THRESHOLD - 1, y: 0, z: 0 });
    const result = PathProgressionDriver.tick(dir, [mover], city, rng);
    expect(result.directory['a1']?.progress).toEqual({ role: 'attacker', index: 1, arrived: false });
    expect(result.advanced).toEqual([{ id: 'a1', progress: { role: 'attacker', index: 1, arrived: false } }]);
    expect(mover.orders).toEqual([{ x: -100, y: 0, z: 0 }]);
  });

  it('skips dead, busy and unregistered movers', () => {
    const dir = registerActor(emptyDirectory(), 'a1', 'minion', 'attacker', 'native', WAYPOINTS);
    const dead = new FakeMover('a1', city.rally);
    dead.alive = false;
    const stranger = new FakeMover('zz', city.rally);
    expect(PathProgressionDriver.tick(dir, [dead, stranger], city, rng).ordersIssued).toBe(0);

    const busy = new FakeMover('a1', city.rally);
    busy.busy = true;
    expect(PathProgressionDriver.tick(dir, [busy], city, rng).ordersIssued).toBe(0);
  });

  it('defenders march from the last waypoint to the rally point', () => {
    const dir = registerActor(emptyDirectory(), 'd1', 'defender', 'defender', 'native', WAYPOINTS);
    const mover = new FakeMover('d1', { x: -100, y: 0, z: 0 });
    const result = PathProgressionDriver.tick(dir, [mover], city, rng);
    expect(result.directory['d1']?.progress.index).toBe(1);
    expect(mover.orders).toEqual([{ x: -300, y: 0, z: 0 }]);
  });

  it('issues no order once an actor has arrived', () => {
    const plain = makeCity();
    const dir = registerActor(emptyDirectory(), 'a1', 'minion', 'attacker', 'native', []);
    const mover = new FakeMover('a1', plain.objective);
    const first = PathProgressionDriver.tick(dir, [mover], plain, rng);
    expect(first.directory['a1']?.progress.arrived).toBe(true);
    expect(first.ordersIssued).toBe(0);
    const second = PathProgressionDriver.tick(first.directory, [mover], plain, rng);
    expect(second.directory).toBe(first.directory);
    expect(mover.orders).toHaveLength(0);
  });

  it('keeps move orders within the jitter radius of the path point', () => {
    const dir = registerActor(emptyDirectory(), 'a1', 'minion', 'attacker', 'native', WAYPOINTS);
    const mover = new FakeMover('a1', city.rally);
    PathProgressionDriver.tick(dir, [mover], city, () => 0.999);
    const order = mover.orders[0];
    expect(order).toBeDefined();
    if (!order) return;
    expect(Math.hypot(order.x + 300, order.y)).toBeLessThanOrEqual(5);
    expect(order.z).toBe(0);
  });
});

describe('Mover adapters', () => {
  it('NativeMover walks actors and reports movement as busy', () => {
    const scene = new InMemoryWorld().addScene(1);
    scene.instantMovement = false;
    const actor = scene.spawnActor(1, { x: 0, y: 0, z: 0 }, { level: 1, scale: 1, factionId: 35, reactState: 'passive' });
    expect(actor).not.toBeNull();
    if (!actor) return;
    const mover = new NativeMover(actor);
    mover.issueMoveOrder({ x: 5, y: 0, z: 0 });
    expect(mover.isBusy()).toBe(true);
    actor.completeMove();
    expect(mover.isBusy()).toBe(false);
    expect(mover.position()).toEqual({ x: 5, y: 0, z: 0 });
  });

  it('BotMover steers by travel target and treats out-of-world bots as dead', () => {
    const bot = new InMemoryBots().add({ id: 'b1', faction: 'horde' });
    bot.instantTravel = false;
    const mover = new BotMover(bot);
    mover.issueMoveOrder({ x: 9, y: 9, z: 0 });
    expect(bot.travelTarget).toEqual({ x: 9, y: 9, z: 0 });
    expect(mover.isBusy()).toBe(true);
    bot.inWorld = false;
    expect(mover.isAlive()).toBe(false);
  });
});
