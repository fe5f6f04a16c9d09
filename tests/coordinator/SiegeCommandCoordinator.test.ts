import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import type { OptionMap } from '@/engine/loader/SiegeConfigLoader';
import {
  MARKER_SCALE,
  MARKER_TEMPLATE_ID,
  SiegeCommandCoordinator,
} from '@/engine/coordinator/SiegeCommandCoordinator';
import { SiegeOrchestrator } from '@/engine/siege/SiegeOrchestrator';
import { SiegeEventBus } from '@/engine/utils/EventBus';
import type { HarnessOptions, SiegeHarness } from '../integration/helpers';
import { makeHarness } from '../integration/helpers';

let h: SiegeHarness;
let orchestrator: SiegeOrchestrator;

function setup(opts: HarnessOptions = {}, options?: () => OptionMap): SiegeCommandCoordinator {
  h = makeHarness(opts);
  orchestrator = new SiegeOrchestrator(h.config, h.services);
  return new SiegeCommandCoordinator(orchestrator, h.world, options);
}

beforeEach(() => {
  SiegeEventBus.clear();
});

describe('SiegeCommandCoordinator — start/stop/cleanup', () => {
  it('prints the command list for unknown input', () => {
    const cmd = setup();
    expect(cmd.execute('')).toEqual([
      'Commands: start [city], stop <city> <alliance|horde>, cleanup [city], status, '
        + 'waypoints <city>, distance [city], info <actorId>, reload',
    ]);
    expect(cmd.execute('dance')).toEqual(cmd.execute(''));
  });

  it('starts a siege and reports why a start was refused', () => {
    const cmd = setup();
    expect(cmd.execute('start Testhold')).toEqual(['Siege started in Testhold.']);
    expect(cmd.execute('START testhold')).toEqual(["City 'Testhold' is already under siege!"]);
    expect(cmd.execute('start')).toEqual(['No eligible city is available for a siege.']);
    expect(cmd.execute('start nowhere')).toEqual(['Invalid city name. Valid cities: Testhold']);
  });

  it('reports a disabled module or city', () => {
    expect(setup({ config: { enabled: false } }).execute('start')).toEqual(['City Siege is disabled.']);
    expect(setup({ city: { enabled: false } }).execute('start testhold'))
      .toEqual(["City 'Testhold' is disabled in configuration."]);
  });

  it('validates stop arguments', () => {
    const cmd = setup();
    expect(cmd.execute('stop testhold')).toEqual(['Usage: stop <city> <alliance|horde>']);
    expect(cmd.execute('stop nowhere horde')).toEqual(['Invalid city name. Valid cities: Testhold']);
    expect(cmd.execute('stop testhold scourge')).toEqual(["Invalid faction. Use 'alliance' or 'horde'."]);
    expect(cmd.execute('stop testhold horde')).toEqual(['No active siege in Testhold']);
  });

  it('stops a running siege with the named winner', () => {
    const cmd = setup();
    cmd.execute('start testhold');
    expect(cmd.execute('stop testhold Alliance')).toEqual(['Siege of Testhold ended. Winner: Alliance.']);
    expect(orchestrator.allSieges()).toHaveLength(0);
  });

  it('cleans up sieges', () => {
    const cmd = setup();
    expect(cmd.execute('cleanup')).toEqual(['No siege events to cleanup.']);
    expect(cmd.execute('cleanup nowhere')).toEqual(['Invalid city name. Valid cities: Testhold']);
    cmd.execute('start testhold');
    expect(cmd.execute('cleanup testhold')).toEqual(['Cleaned up 1 siege event(s).']);
  });
});

describe('SiegeCommandCoordinator — status', () => {
  it('reports an idle module', () => {
    const cmd = setup();
    expect(cmd.execute('status')).toEqual([
      'City Siege: enabled (multiple cities not allowed)',
      'Active sieges: 0',
      'No siege scheduled.',
    ]);
  });

  it('lists running sieges and the next scheduled one', () => {
    const cmd = setup();
    orchestrator.start();
    cmd.execute('start testhold');
    expect(cmd.execute('status')).toEqual([
      'City Siege: enabled (multiple cities not allowed)',
      'Active sieges: 1',
      '  Testhold [narrative] - 7 actors, 30 min left, leader: alive (100%)',
      'Next siege in 120 minutes.',
    ]);
  });

  it('shows a dead leader', () => {
    const cmd = setup();
    cmd.execute('start testhold');
    h.leader?.kill();
    expect(cmd.execute('status')[2]).toBe('  Testhold [narrative] - 7 actors, 30 min left, leader: dead');
  });
});

describe('SiegeCommandCoordinator — debugging aids', () => {
  const waypoints = [{ x: -300, y: 0, z: 0 }, { x: -100, y: 0, z: 0 }];

  it('toggles waypoint markers', () => {
    const cmd = setup({ city: { waypoints } });
    expect(cmd.execute('waypoints testhold')).toEqual(['Spawned 4 waypoint markers in Testhold.']);

    const markers = h.scene.allActors().filter(a => a.templateId === MARKER_TEMPLATE_ID);
    expect(markers.map(m => m.pos)).toEqual([
      { x: -500, y: 0, z: 0 }, { x: -300, y: 0, z: 0 }, { x: -100, y: 0, z: 0 }, { x: 0, y: 0, z: 10 },
    ]);
    expect(markers.every(m => m.options.scale === MARKER_SCALE && m.reactState === 'passive')).toBe(true);

    expect(cmd.execute('waypoints testhold')).toEqual(['Removed 4 waypoint markers from Testhold.']);
    expect(h.scene.allActors().filter(a => a.templateId === MARKER_TEMPLATE_ID)).toHaveLength(0);
  });

  it('refuses markers for an unloaded region', () => {
    const cmd = setup();
    const other: SiegeConfig = {
      ...orchestrator.getConfig(),
      cities: [{ ...h.city, id: 'farpoint', name: 'Farpoint', regionId: 99 }],
    };
    orchestrator.reload(other);
    expect(cmd.execute('waypoints farpoint')).toEqual(['Region 99 is not loaded.']);
  });

  it('measures the caller distance to each city', () => {
    const cmd = setup();
    const near = h.audience.join({ id: 'p1', faction: 'alliance', regionId: 7, position: { x: 30, y: 40, z: 0 } });
    const far = h.audience.join({ id: 'p2', faction: 'alliance', regionId: 7, position: { x: 3000, y: 0, z: 0 } });
    const away = h.audience.join({ id: 'p3', faction: 'horde', regionId: 1, position: { x: 0, y: 0, z: 0 } });

    expect(cmd.execute('distance')).toEqual(['This command needs an in-world caller.']);
    expect(cmd.execute('distance', near)).toEqual(['Testhold: 50.0 yards (in range)']);
    expect(cmd.execute('distance testhold', far)).toEqual(['Testhold: 3000.0 yards (out of range)']);
    expect(cmd.execute('distance', away)).toEqual(['Testhold: different region']);
  });

  it('describes a siege actor', () => {
    const cmd = setup();
    cmd.execute('start testhold');
    expect(cmd.execute('info r7-a2')).toEqual([
      'r7-a2: attacker leader (native) in Testhold',
      'Progress: waypoint 0/0',
      'Target: (0.0, 0.0, 10.0)',
    ]);
    expect(cmd.execute('info r7-a99')).toEqual(['Actor r7-a99 is not part of any siege.']);
    expect(cmd.execute('info')).toEqual(['Usage: info <actorId>']);
  });
});

describe('SiegeCommandCoordinator — reload', () => {
  it('is unavailable without an option source', () => {
    expect(setup().execute('reload')).toEqual(['Reload is not available.']);
  });

  it('reloads options into the orchestrator', () => {
    const cmd = setup({}, () => ({ 'CitySiege.EventDuration': '10' }));
    expect(cmd.execute('reload')).toEqual(['City Siege configuration reloaded.']);
    expect(orchestrator.getConfig().eventDuration).toBe(600);
  });

  it('reports a failing option source', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cmd = setup({}, () => {
      throw new Error('file missing');
    });
    expect(cmd.execute('reload')).toEqual(['Reload failed: file missing']);
    expect(error).toHaveBeenCalledWith('[ERROR] [SiegeCommandCoordinator] Reload failed: file missing');
    error.mockRestore();
  });
});
