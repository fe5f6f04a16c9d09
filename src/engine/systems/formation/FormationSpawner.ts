// ─────────────────────────────────────────────
//  Formation Spawner
//  Places each wave in concentric rings around its anchor:
//  leaders at the center, mini-bosses in a command circle,
//  elites mid-rank and minions on the outer perimeter.
//  A failed placement is skipped; partial waves are kept.
// ─────────────────────────────────────────────

import type { CityData, Vec3, WaypointPath } from '@/engine/data/types/City';
import { opposingFaction } from '@/engine/data/types/City';
import type { ActorDirectoryState, SiegeSide, UnitTier } from '@/engine/data/types/Siege';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import type { IActorHandle, IScene, SpawnOptions } from '@/engine/world/IWorldLocator';
import type { Rng } from '@/engine/utils/MathUtils';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';
import { registerActor } from '@/engine/systems/directory/ActorDirectory';
import { SiegeDialogue } from '@/engine/systems/dialogue/SiegeDialogue';

export type NativeTier = Exclude<UnitTier, 'bot'>;

const BASE_RADIUS = 35;

export const ATTACKER_RING_RADIUS: Record<Exclude<NativeTier, 'defender'>, number> = {
  leader: 3,
  miniBoss: BASE_RADIUS * 0.3,
  elite: BASE_RADIUS * 0.6,
  minion: BASE_RADIUS,
};

export const DEFENDER_RING_RADIUS = 10;

/** Attackers search for ground from this far above the authored point */
export const ATTACKER_HEIGHT_PROBE = 50;

/** Actors are placed this far above resolved ground */
export const GROUND_OFFSET = 0.5;

export interface FormationRank {
  tier: NativeTier;
  templateId: number;
  count: number;
  radius: number;
  level: number;
  scale: number;
}

export interface WaveSpec {
  side: SiegeSide;
  anchor: Vec3;
  heightProbe: number;
  ranks: FormationRank[];
}

export interface SpawnedActor {
  id: string;
  tier: NativeTier;
  side: SiegeSide;
}

export interface WaveContext {
  path: WaypointPath;
  neutralFactionId: number;
  leaderYells: readonly string[];
  rng: Rng;
}

export interface WaveResult {
  directory: ActorDirectoryState;
  spawned: SpawnedActor[];
  failed: number;
}

export const FormationSpawner = {
  /** Evenly spaced points on a ring, starting at angle 0 */
  ringPositions(anchor: Vec3, radius: number, count: number): Vec3[] {
    const step = (2 * Math.PI) / Math.max(1, count);
    const points: Vec3[] = [];
    for (let i = 0; i < count; i++) {
      points.push(MathUtils.onCircle(anchor, radius, step * i));
    }
    return points;
  },

  /** Ground-snapped point; keeps the authored Z when no ground is found */
  resolveGround(scene: IScene, point: Vec3, heightProbe: number): Vec3 {
    const ground = scene.groundHeight(point.x, point.y, point.z + heightProbe);
    if (ground === null || !Number.isFinite(ground)) {
      Logger.debug(`[FormationSpawner] No ground at (${point.x.toFixed(1)}, ${point.y.toFixed(1)}), using authored Z`);
      return point;
    }
    return { ...point, z: ground + GROUND_OFFSET };
  },

  spawnUnit(
    scene: IScene,
    templateId: number,
    point: Vec3,
    heightProbe: number,
    options: SpawnOptions,
  ): IActorHandle | null {
    const position = FormationSpawner.resolveGround(scene, point, heightProbe);
    const actor = scene.spawnActor(templateId, position, options);
    if (!actor) {
      Logger.warn(`[FormationSpawner] Spawn failed for template ${templateId} at (${position.x.toFixed(1)}, ${position.y.toFixed(1)}, ${position.z.toFixed(1)})`);
    }
    return actor;
  },

  attackerWave(config: SiegeConfig, city: CityData, leaderTemplateId: number): WaveSpec {
    const creatures = config.creatures[opposingFaction(city.faction)];
    const counts = config.spawnCounts;
    const rank = (tier: Exclude<NativeTier, 'defender'>, templateId: number, count: number): FormationRank => ({
      tier,
      templateId,
      count,
      radius: ATTACKER_RING_RADIUS[tier],
      level: config.levels[tier],
      scale: config.scales[tier],
    });
    return {
      side: 'attacker',
      anchor: city.rally,
      heightProbe: ATTACKER_HEIGHT_PROBE,
      ranks: [
        rank('leader', leaderTemplateId, counts.leaders),
        rank('miniBoss', creatures.miniBoss, counts.miniBosses),
        rank('elite', creatures.elite, counts.elites),
        rank('minion', creatures.minion, counts.minions),
      ],
    };
  },

  defenderWave(config: SiegeConfig, city: CityData): WaveSpec {
    return {
      side: 'defender',
      anchor: city.objective,
      heightProbe: 0,
      ranks: [{
        tier: 'defender',
        templateId: config.creatures[city.faction].defender,
        count: config.spawnCounts.defenders,
        radius: DEFENDER_RING_RADIUS,
        level: config.levels.defender,
        scale: config.scales.defender,
      }],
    };
  },

  spawnWave(
    scene: IScene,
    wave: WaveSpec,
    directory: ActorDirectoryState,
    ctx: WaveContext,
  ): WaveResult {
    let dir = directory;
    const spawned: SpawnedActor[] = [];
    let failed = 0;

    for (const rank of wave.ranks) {
      for (const point of FormationSpawner.ringPositions(wave.anchor, rank.radius, rank.count)) {
        const actor = FormationSpawner.spawnUnit(scene, rank.templateId, point, wave.heightProbe, {
          level: rank.level,
          scale: rank.scale,
          factionId: ctx.neutralFactionId,
          reactState: 'passive',
        });
        if (!actor) {
          failed++;
          continue;
        }

        dir = registerActor(dir, actor.id, rank.tier, wave.side, 'native', ctx.path);
        spawned.push({ id: actor.id, tier: rank.tier, side: wave.side });

        if (rank.tier === 'leader' && actor.isAlive()) {
          const yell = SiegeDialogue.randomLine(ctx.leaderYells, ctx.rng);
          if (yell) actor.speak(yell);
        }
      }
    }

    if (failed > 0) {
      Logger.warn(`[FormationSpawner] ${wave.side} wave: ${spawned.length} spawned, ${failed} failed`);
    }
    return { directory: dir, spawned, failed };
  },
};
