// ─────────────────────────────────────────────
//  Siege Scenario
//  Drives the orchestrator the way a host would: one tick per
//  world update, admin commands in between.
// ─────────────────────────────────────────────

import { describe, it, expect, beforeEach } from 'vitest';
import type { SiegeEventMap } from '@/engine/utils/EventBus';
import { SiegeEventBus } from '@/engine/utils/EventBus';
import { SiegeOrchestrator } from '@/engine/siege/SiegeOrchestrator';
import { SiegeCommandCoordinator } from '@/engine/coordinator/SiegeCommandCoordinator';
import type { SiegeHarness } from './helpers';
import { makeHarness } from './helpers';

let h: SiegeHarness;
let orchestrator: SiegeOrchestrator;
let commands: SiegeCommandCoordinator;
let phases: Array<SiegeEventMap['phaseChanged']>;

beforeEach(() => {
  SiegeEventBus.clear();
  h = makeHarness();
  orchestrator = new SiegeOrchestrator(h.config, h.services);
  commands = new SiegeCommandCoordinator(orchestrator, h.world);
  phases = [];
  SiegeEventBus.on('phaseChanged', e => phases.push(e));
});

function runUntil(t: number, step = 5): void {
  for (let now = h.clock.now() + step; now <= t; now += step) {
    h.clock.set(now);
    orchestrator.tick();
  }
}

describe('Siege scenario', () => {
  it('runs a scheduled siege to a defender victory and retires it', () => {
    const defender = h.audience.join({ id: 'p1', faction: 'alliance', regionId: 7, position: h.city.center });
    const attacker = h.audience.join({ id: 'p2', faction: 'horde', regionId: 7, position: h.city.center });
    orchestrator.start();

    runUntil(7200);
    const siege = orchestrator.latestIn('testhold');
    expect(siege?.getState().startTime).toBe(7200);

    runUntil(7200 + 1800);
    expect(phases.map(p => `${p.from}>${p.to}`)).toEqual(['narrative>combat', 'combat>ended']);
    expect(siege?.getState().outcome).toEqual({
      winner: 'defenders', winningFaction: 'alliance', reason: 'time_expired', endedAt: 9000,
    });
    expect(h.ledger.honor.get(defender.id)).toBe(100);
    expect(h.ledger.honor.has(attacker.id)).toBe(false);

    expect(h.scene.allActors().map(a => a.id)).toEqual(['r7-a1']);

    runUntil(9000 + 65);
    expect(orchestrator.allSieges()).toHaveLength(0);
    expect(orchestrator.secondsUntilNextSiege()).toBe(7200 + 7200 - 9065);
  });

  it('lets an admin start a siege that the attackers win', () => {
    const raider = h.audience.join({ id: 'p2', faction: 'horde', regionId: 7, position: h.city.center });
    expect(commands.execute('start testhold')).toEqual(['Siege started in Testhold.']);

    runUntil(200);
    expect(orchestrator.latestIn('testhold')?.phase).toBe('combat');
    h.leader?.kill();
    runUntil(205);

    expect(orchestrator.latestIn('testhold')?.getState().outcome?.reason).toBe('objective_destroyed');
    expect(h.ledger.honor.get(raider.id)).toBe(100);
    expect(h.leader?.isAlive()).toBe(true);
    expect(commands.execute('status')[1]).toBe('Active sieges: 0');
  });
});
