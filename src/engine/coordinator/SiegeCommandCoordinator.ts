// ─────────────────────────────────────────────
//  SiegeCommandCoordinator
//  Administrative text commands mapped onto the orchestrator.
//  Every command returns reply lines; nothing is thrown back at
//  the host.
// ─────────────────────────────────────────────

import type { CityData, CityFaction, Vec3 } from '@/engine/data/types/City';
import { factionLabel } from '@/engine/data/types/City';
import type { ISession } from '@/engine/world/IAudience';
import type { IWorldLocator } from '@/engine/world/IWorldLocator';
import type { OptionMap } from '@/engine/loader/SiegeConfigLoader';
import type { SiegeStatus } from '@/engine/siege/SiegeEventStateMachine';
import type { SiegeOrchestrator } from '@/engine/siege/SiegeOrchestrator';
import { loadSiegeConfig } from '@/engine/loader/SiegeConfigLoader';
import { resolveTarget } from '@/engine/systems/path/WaypointPath';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';

export const MARKER_TEMPLATE_ID = 15631;
export const MARKER_SCALE = 3;

const HELP = 'Commands: start [city], stop <city> <alliance|horde>, cleanup [city], status, '
  + 'waypoints <city>, distance [city], info <actorId>, reload';

interface MarkerSet {
  regionId: number;
  actorIds: string[];
}

export class SiegeCommandCoordinator {
  private markers = new Map<string, MarkerSet>();

  constructor(
    private readonly orchestrator: SiegeOrchestrator,
    private readonly world: IWorldLocator,
    private readonly options?: () => OptionMap,
  ) {}

  execute(line: string, caller?: ISession): string[] {
    const [command = '', ...args] = line.trim().split(/\s+/).filter(t => t.length > 0);
    switch (command.toLowerCase()) {
      case 'start': return this.start(args[0]);
      case 'stop': return this.stop(args[0], args[1]);
      case 'cleanup': return this.cleanup(args[0]);
      case 'status': return this.status();
      case 'waypoints': return this.waypoints(args[0]);
      case 'distance': return this.distance(caller, args[0]);
      case 'info': return this.info(args[0]);
      case 'reload': return this.reload();
      default: return [HELP];
    }
  }

  // ── Commands ──────────────────────────────────

  private start(cityRef: string | undefined): string[] {
    const result = this.orchestrator.startSiege(cityRef);
    if (result.ok) return [`Siege started in ${result.siege.city.name}.`];

    switch (result.reason) {
      case 'disabled': return ['City Siege is disabled.'];
      case 'unknown_city': return [this.invalidCity()];
      case 'city_disabled': return [`City '${result.city?.name ?? cityRef}' is disabled in configuration.`];
      case 'already_under_siege': return [`City '${result.city?.name ?? cityRef}' is already under siege!`];
      case 'no_eligible_city': return ['No eligible city is available for a siege.'];
    }
  }

  private stop(cityRef: string | undefined, factionArg: string | undefined): string[] {
    if (cityRef === undefined || factionArg === undefined) return ['Usage: stop <city> <alliance|horde>'];
    const city = this.orchestrator.findCity(cityRef);
    if (!city) return [this.invalidCity()];
    const faction = parseFaction(factionArg);
    if (!faction) return ["Invalid faction. Use 'alliance' or 'horde'."];

    const result = this.orchestrator.stopSiege(city.id, faction);
    if (!result.ok) return [`No active siege in ${city.name}`];
    return [`Siege of ${city.name} ended. Winner: ${factionLabel(faction)}.`];
  }

  private cleanup(cityRef: string | undefined): string[] {
    if (cityRef !== undefined && !this.orchestrator.findCity(cityRef)) return [this.invalidCity()];
    const count = this.orchestrator.cleanup(cityRef);
    if (count === 0) return ['No siege events to cleanup.'];
    return [`Cleaned up ${count} siege event(s).`];
  }

  private status(): string[] {
    const status = this.orchestrator.status();
    const lines = [
      `City Siege: ${status.enabled ? 'enabled' : 'disabled'}`
        + ` (multiple cities ${status.allowMultipleCities ? 'allowed' : 'not allowed'})`,
      `Active sieges: ${status.sieges.filter(s => s.phase !== 'ended').length}`,
    ];
    for (const siege of status.sieges) lines.push(`  ${describeSiege(siege)}`);
    lines.push(status.nextSiegeIn === null
      ? 'No siege scheduled.'
      : `Next siege in ${Math.floor(status.nextSiegeIn / 60)} minutes.`);
    return lines;
  }

  /** Toggles marker actors on a city's rally point, waypoints and objective */
  private waypoints(cityRef: string | undefined): string[] {
    if (cityRef === undefined) return ['Usage: waypoints <city>'];
    const city = this.orchestrator.findCity(cityRef);
    if (!city) return [this.invalidCity()];

    const existing = this.markers.get(city.id);
    if (existing) {
      const scene = this.world.findScene(existing.regionId);
      for (const id of existing.actorIds) scene?.findActor(id)?.despawn();
      this.markers.delete(city.id);
      return [`Removed ${existing.actorIds.length} waypoint markers from ${city.name}.`];
    }

    const scene = this.world.findScene(city.regionId);
    if (!scene) return [`Region ${city.regionId} is not loaded.`];

    const points: Vec3[] = [city.rally, ...city.waypoints, city.objective];
    const actorIds: string[] = [];
    for (const point of points) {
      const marker = scene.spawnActor(MARKER_TEMPLATE_ID, point, {
        level: 1,
        scale: MARKER_SCALE,
        factionId: this.orchestrator.getConfig().factionTemplates.neutral,
        reactState: 'passive',
      });
      if (marker) actorIds.push(marker.id);
    }
    this.markers.set(city.id, { regionId: city.regionId, actorIds });
    return [`Spawned ${actorIds.length} waypoint markers in ${city.name}.`];
  }

  private distance(caller: ISession | undefined, cityRef: string | undefined): string[] {
    if (!caller) return ['This command needs an in-world caller.'];

    let cities: CityData[];
    if (cityRef !== undefined) {
      const city = this.orchestrator.findCity(cityRef);
      if (!city) return [this.invalidCity()];
      cities = [city];
    } else {
      cities = this.orchestrator.getConfig().cities;
    }

    const radius = this.orchestrator.getConfig().announceRadius;
    const here = caller.position();
    return cities.map(city => {
      if (caller.regionId !== city.regionId) return `${city.name}: different region`;
      const d = MathUtils.dist3(here, city.center);
      const inRange = radius <= 0 || d <= radius;
      return `${city.name}: ${d.toFixed(1)} yards (${inRange ? 'in range' : 'out of range'})`;
    });
  }

  private info(actorId: string | undefined): string[] {
    if (actorId === undefined) return ['Usage: info <actorId>'];
    for (const siege of this.orchestrator.allSieges()) {
      const entry = siege.findEntry(actorId);
      if (!entry) continue;
      const { progress } = entry;
      const target = resolveTarget(progress, siege.city);
      return [
        `${actorId}: ${entry.side} ${entry.tier} (${entry.kind}) in ${siege.city.name}`,
        progress.arrived
          ? 'Progress: arrived'
          : `Progress: waypoint ${progress.index}/${siege.city.waypoints.length}`,
        `Target: ${formatPoint(target)}`,
      ];
    }
    return [`Actor ${actorId} is not part of any siege.`];
  }

  private reload(): string[] {
    if (!this.options) return ['Reload is not available.'];
    try {
      this.orchestrator.reload(loadSiegeConfig(this.options()));
      return ['City Siege configuration reloaded.'];
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      Logger.error(`[SiegeCommandCoordinator] Reload failed: ${message}`);
      return [`Reload failed: ${message}`];
    }
  }

  private invalidCity(): string {
    const names = this.orchestrator.getConfig().cities.map(c => c.name).join(', ');
    return `Invalid city name. Valid cities: ${names}`;
  }
}

function parseFaction(arg: string): CityFaction | null {
  const key = arg.toLowerCase();
  return key === 'alliance' || key === 'horde' ? key : null;
}

function formatPoint(p: Vec3): string {
  return `(${p.x.toFixed(1)}, ${p.y.toFixed(1)}, ${p.z.toFixed(1)})`;
}

function describeSiege(siege: SiegeStatus): string {
  const { objective } = siege;
  let leader: string;
  if (objective.alive === null) leader = 'leader: unknown';
  else if (objective.alive) leader = `leader: alive (${Math.round(objective.healthPct ?? 0)}%)`;
  else leader = 'leader: dead';
  const minutes = Math.floor(siege.remainingSeconds / 60);
  return `${siege.cityName} [${siege.phase}] - ${siege.actorCount} actors, ${minutes} min left, ${leader}`;
}
