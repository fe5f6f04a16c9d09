// ─────────────────────────────────────────────
//  SiegeConfigLoader
//  Turns a flat key → value option set into a typed SiegeConfig.
//  Every key lives under the `CitySiege.` prefix; a missing key keeps
//  its default, an invalid one is reported and keeps its default.
// ─────────────────────────────────────────────

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CityData, CityFaction, Vec3 } from '@/engine/data/types/City';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import { SiegeDialogue } from '@/engine/systems/dialogue/SiegeDialogue';
import { Logger } from '@/engine/utils/Logger';
import citiesJson from '@/engine/data/defaults/cities.json';
import dialogueJson from '@/engine/data/defaults/dialogue.json';

export type OptionValue = string | number | boolean;
export type OptionMap = Readonly<Record<string, OptionValue>>;

export const OPTION_PREFIX = 'CitySiege.';

// ── Option schemas ──────────────────────────────────────────

const TRUE_WORDS = ['1', 'true', 'yes', 'on'];

const BoolOption = z.union([
  z.boolean(),
  z.number().transform(n => n !== 0),
  z.string().trim().toLowerCase()
    .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off']))
    .transform(v => TRUE_WORDS.includes(v)),
]);

// a blank string is a missing value, not zero
const NumberOption = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]);

const UIntOption = NumberOption.pipe(z.number().int().nonnegative());

const FloatOption = NumberOption.pipe(z.number().finite());

const TextOption = z.union([z.string(), z.number().transform(String)]);

const IdListOption = z.union([
  z.number().int().nonnegative().transform(n => [n]),
  z.string()
    .transform(s => s.split(',').map(p => p.trim()).filter(p => p.length > 0).map(Number))
    .pipe(z.array(z.number().int().nonnegative()).min(1)),
]);

// ── Bundled defaults ────────────────────────────────────────

const Vec3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() });

const CityDefaultsSchema = z.array(z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  regionId: z.number().int().nonnegative(),
  faction: z.enum(['alliance', 'horde']),
  center: Vec3Schema,
  rally: Vec3Schema,
  objective: Vec3Schema,
  objectiveTemplateId: z.number().int().nonnegative(),
}));

const DialogueDefaultsSchema = z.object({
  leaderSpawn: z.array(z.string()),
  combat: z.array(z.string()),
  narrative: z.object({
    alliance: z.array(z.array(z.string())),
    horde: z.array(z.array(z.string())),
  }),
});

type CityDefaults = z.infer<typeof CityDefaultsSchema>[number];

// ── Reader ──────────────────────────────────────────────────

class OptionReader {
  constructor(private readonly options: OptionMap) {}

  read<S extends z.ZodTypeAny>(key: string, schema: S, fallback: z.output<S>): z.output<S> {
    const fullKey = OPTION_PREFIX + key;
    const raw = this.options[fullKey];
    if (raw === undefined) return fallback;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      Logger.warn(`[SiegeConfigLoader] Invalid value for ${fullKey}: '${String(raw)}', using default`);
      return fallback;
    }
    return parsed.data;
  }

  bool(key: string, fallback: boolean): boolean {
    return this.read(key, BoolOption, fallback);
  }

  uint(key: string, fallback: number): number {
    return this.read(key, UIntOption, fallback);
  }

  float(key: string, fallback: number): number {
    return this.read(key, FloatOption, fallback);
  }

  text(key: string, fallback: string): string {
    return this.read(key, TextOption, fallback);
  }

  ids(key: string, fallback: number[]): number[] {
    return this.read(key, IdListOption, fallback);
  }

  point(key: string, fallback: Vec3): Vec3 {
    return {
      x: this.float(`${key}X`, fallback.x),
      y: this.float(`${key}Y`, fallback.y),
      z: this.float(`${key}Z`, fallback.z),
    };
  }

  has(key: string): boolean {
    return this.options[OPTION_PREFIX + key] !== undefined;
  }
}

// ── Cities ──────────────────────────────────────────────────

function readWaypoints(reader: OptionReader, cityName: string): Vec3[] {
  const count = reader.uint(`${cityName}.WaypointCount`, 0);
  const points: Vec3[] = [];
  for (let i = 1; i <= count; i++) {
    const p = reader.point(`${cityName}.Waypoint${i}.`, { x: 0, y: 0, z: 0 });
    // an all-zero point is an unset slot
    if (p.x === 0 && p.y === 0 && p.z === 0) continue;
    points.push(p);
  }
  return points;
}

function readCity(reader: OptionReader, base: CityDefaults): CityData {
  return {
    ...base,
    rally: reader.point(`${base.name}.Spawn`, base.rally),
    objective: reader.point(`${base.name}.Leader`, base.objective),
    waypoints: readWaypoints(reader, base.name),
    enabled: reader.bool(`${base.name}.Enabled`, true),
  };
}

// ── Public API ──────────────────────────────────────────────

export function loadSiegeConfig(options: OptionMap = {}): SiegeConfig {
  const reader = new OptionReader(options);
  const cityDefaults = CityDefaultsSchema.parse(citiesJson);
  const dialogue = DialogueDefaultsSchema.parse(dialogueJson);

  const timerMin = reader.uint('TimerMin', 120) * 60;
  let timerMax = reader.uint('TimerMax', 240) * 60;
  if (timerMax < timerMin) {
    Logger.warn('[SiegeConfigLoader] TimerMax is below TimerMin, using TimerMin for both');
    timerMax = timerMin;
  }

  const scripts = (faction: CityFaction, key: string): string[][] =>
    reader.has(key) ? SiegeDialogue.parseScripts(reader.text(key, '')) : dialogue.narrative[faction];
  const yells = (key: string, fallback: string[]): string[] =>
    reader.has(key) ? SiegeDialogue.parseLines(reader.text(key, '')) : fallback;

  return {
    enabled: reader.bool('Enabled', true),
    debug: reader.bool('DebugMode', false),

    timerMin,
    timerMax,
    eventDuration: reader.uint('EventDuration', 30) * 60,
    cinematicDelay: reader.uint('CinematicDelay', 150),
    yellFrequency: reader.uint('YellFrequency', 30),
    statusInterval: reader.uint('StatusInterval', 300),

    allowMultipleCities: reader.bool('AllowMultipleCities', false),
    announceRadius: reader.float('AnnounceRadius', 1500),
    minimumLevel: reader.uint('MinimumLevel', 1),

    spawnCounts: {
      minions: reader.uint('SpawnCount.Minions', 15),
      elites: reader.uint('SpawnCount.Elites', 5),
      miniBosses: reader.uint('SpawnCount.MiniBosses', 2),
      leaders: reader.uint('SpawnCount.Leaders', 1),
      defenders: reader.uint('Defenders.Count', 10),
    },
    defendersEnabled: reader.bool('Defenders.Enabled', true),
    creatures: {
      alliance: {
        minion: reader.uint('Creature.Alliance.Minion', 17919),
        elite: reader.uint('Creature.Alliance.Elite', 17920),
        miniBoss: reader.uint('Creature.Alliance.MiniBoss', 17921),
        defender: reader.uint('Creature.Alliance.Defender', 17919),
        leaders: reader.ids('Creature.Alliance.Leaders', [29611, 2784, 7999, 17468]),
      },
      horde: {
        minion: reader.uint('Creature.Horde.Minion', 17932),
        elite: reader.uint('Creature.Horde.Elite', 17933),
        miniBoss: reader.uint('Creature.Horde.MiniBoss', 17934),
        defender: reader.uint('Creature.Horde.Defender', 17932),
        leaders: reader.ids('Creature.Horde.Leaders', [4949, 3057, 10181, 16802]),
      },
    },
    levels: {
      leader: reader.uint('Level.Leader', 80),
      miniBoss: reader.uint('Level.MiniBoss', 80),
      elite: reader.uint('Level.Elite', 75),
      minion: reader.uint('Level.Minion', 70),
      defender: reader.uint('Level.Defender', 70),
    },
    scales: {
      leader: reader.float('Scale.Leader', 1.6),
      miniBoss: reader.float('Scale.MiniBoss', 1.3),
      elite: reader.float('Scale.Elite', 1),
      minion: reader.float('Scale.Minion', 1),
      defender: reader.float('Scale.Defender', 1),
    },

    aggroPlayers: reader.bool('AggroPlayers', true),
    aggroNPCs: reader.bool('AggroNPCs', true),
    factionTemplates: {
      alliance: reader.uint('Faction.Alliance', 84),
      horde: reader.uint('Faction.Horde', 83),
      neutral: reader.uint('Faction.Neutral', 35),
    },

    respawnEnabled: reader.bool('Respawn.Enabled', true),
    respawnDelays: {
      leader: reader.uint('Respawn.LeaderTime', 300),
      miniBoss: reader.uint('Respawn.MiniBossTime', 180),
      elite: reader.uint('Respawn.EliteTime', 120),
      minion: reader.uint('Respawn.MinionTime', 60),
      defender: reader.uint('Respawn.DefenderTime', 45),
    },

    rewards: {
      onDefense: reader.bool('RewardOnDefense', true),
      honor: reader.uint('RewardHonor', 100),
      goldBase: reader.uint('GoldBase', 5000),
      goldPerLevel: reader.uint('GoldPerLevel', 5000),
    },

    leaderSpawnYells: yells('Yell.LeaderSpawn', dialogue.leaderSpawn),
    combatYells: yells('Yell.Combat', dialogue.combat),
    narrativeScripts: {
      alliance: scripts('alliance', 'RP.Alliance'),
      horde: scripts('horde', 'RP.Horde'),
    },

    bots: {
      enabled: reader.bool('Playerbots.Enabled', false),
      minLevel: reader.uint('Playerbots.MinLevel', 70),
      maxDefenders: reader.uint('Playerbots.MaxDefenders', 20),
      maxAttackers: reader.uint('Playerbots.MaxAttackers', 20),
      respawnDelay: reader.uint('Playerbots.RespawnDelay', 30),
    },
    weather: {
      enabled: reader.bool('Weather.Enabled', true),
      type: reader.uint('Weather.Type', 4),
      grade: reader.float('Weather.Grade', 0.8),
    },
    music: {
      enabled: reader.bool('Music.Enabled', true),
      narrative: reader.uint('Music.RPMusicId', 11803),
      combat: reader.uint('Music.CombatMusicId', 11804),
      victory: reader.uint('Music.VictoryMusicId', 16039),
      defeat: reader.uint('Music.DefeatMusicId', 14127),
    },

    cities: cityDefaults.map(base => readCity(reader, base)),
  };
}

/** Parses `Key = Value` lines; `#` starts a comment, values may be quoted */
export function parseOptionText(text: string): Record<string, string> {
  const options: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#') || line.startsWith('[')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    options[key] = value;
  }
  return options;
}

export function loadSiegeConfigFile(path: string): SiegeConfig {
  return loadSiegeConfig(parseOptionText(readFileSync(path, 'utf8')));
}
