// ─────────────────────────────────────────────
//  Siege Config — typed snapshot of the option set
//  Times are seconds, money is copper.
// ─────────────────────────────────────────────

import type { CityData, CityFaction } from './City';
import type { UnitTier } from './Siege';

export type ReactState = 'passive' | 'defensive' | 'aggressive';

export interface FactionCreatureSet {
  minion: number;
  elite: number;
  miniBoss: number;
  defender: number;
  /** Pool of leader templates; one is picked per siege */
  leaders: number[];
}

export interface SpawnCounts {
  minions: number;
  elites: number;
  miniBosses: number;
  leaders: number;
  defenders: number;
}

export interface BotSettings {
  enabled: boolean;
  minLevel: number;
  maxDefenders: number;
  maxAttackers: number;
  respawnDelay: number;
}

export interface WeatherSettings {
  enabled: boolean;
  type: number;
  grade: number;
}

export interface MusicSettings {
  enabled: boolean;
  narrative: number;
  combat: number;
  victory: number;
  defeat: number;
}

export interface RewardSettings {
  onDefense: boolean;
  honor: number;
  goldBase: number;
  goldPerLevel: number;
}

export interface SiegeConfig {
  enabled: boolean;
  debug: boolean;

  timerMin: number;
  timerMax: number;
  eventDuration: number;
  cinematicDelay: number;
  yellFrequency: number;
  statusInterval: number;

  allowMultipleCities: boolean;
  /** 0 means server-wide */
  announceRadius: number;
  minimumLevel: number;

  spawnCounts: SpawnCounts;
  defendersEnabled: boolean;
  creatures: Record<CityFaction, FactionCreatureSet>;
  levels: Record<Exclude<UnitTier, 'bot'>, number>;
  scales: Record<Exclude<UnitTier, 'bot'>, number>;

  aggroPlayers: boolean;
  aggroNPCs: boolean;
  factionTemplates: Record<CityFaction | 'neutral', number>;

  respawnEnabled: boolean;
  respawnDelays: Record<Exclude<UnitTier, 'bot'>, number>;

  rewards: RewardSettings;

  leaderSpawnYells: string[];
  combatYells: string[];
  /** Narrative scripts spoken by each faction's attacking army */
  narrativeScripts: Record<CityFaction, string[][]>;

  bots: BotSettings;
  weather: WeatherSettings;
  music: MusicSettings;

  cities: CityData[];
}
