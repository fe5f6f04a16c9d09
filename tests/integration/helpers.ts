// ─────────────────────────────────────────────
//  Siege Test Helpers
//  Build headless siege scenarios against the in-memory world.
//  rng is pinned to 0: first pick, no jitter, inner ring radius.
// ─────────────────────────────────────────────

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { CityData, Vec3 } from '@/engine/data/types/City';
import type { WeatherSnapshot } from '@/engine/data/types/Siege';
import type { SiegeConfig } from '@/engine/data/types/SiegeConfig';
import type { IAmbience } from '@/engine/world/IAmbience';
import type { SiegeServices } from '@/engine/siege/SiegeServices';
import { loadSiegeConfig } from '@/engine/loader/SiegeConfigLoader';
import { InMemoryWorld } from '@/engine/world/InMemoryWorld';
import type { InMemoryActor, InMemoryScene } from '@/engine/world/InMemoryWorld';
import { InMemoryAudience, RewardLedger } from '@/engine/world/InMemoryAudience';
import { InMemoryBots } from '@/engine/world/InMemoryBots';
import { ManualClock } from '@/engine/utils/Clock';

export const ORIGIN: Vec3 = { x: 0, y: 0, z: 0 };

export const LEADER_TEMPLATE = 9000;
export const LEADER_NAME = 'Lord Tester';

// ── City / config factories ──────────────────

export function makeCity(overrides: Partial<CityData> = {}): CityData {
  return {
    id: 'testhold',
    name: 'Testhold',
    regionId: 7,
    faction: 'alliance',
    center: { x: 0, y: 0, z: 0 },
    rally: { x: -500, y: 0, z: 0 },
    objective: { x: 0, y: 0, z: 10 },
    waypoints: [],
    objectiveTemplateId: LEADER_TEMPLATE,
    enabled: true,
    ...overrides,
  };
}

/**
 * Defaults from the loader with a small army:
 * 1 leader, 1 mini-boss, 1 elite, 2 minions, 2 defenders.
 */
export function makeConfig(overrides: Partial<SiegeConfig> = {}): SiegeConfig {
  const base = loadSiegeConfig();
  return {
    ...base,
    spawnCounts: { leaders: 1, miniBosses: 1, elites: 1, minions: 2, defenders: 2 },
    narrativeScripts: {
      alliance: [['For the Alliance, {CITY}!']],
      horde: [['{CITY} will burn!', '{LEADER}, come out!', 'Last words.']],
    },
    combatYells: ['Taunt!'],
    leaderSpawnYells: ['We have arrived!'],
    cities: [makeCity()],
    ...overrides,
  };
}

// ── Harness ──────────────────────────────────

export interface AmbienceMock extends IAmbience {
  readWeather: Mock<(city: CityData) => WeatherSnapshot | null>;
  setWeather: Mock<(city: CityData, weather: WeatherSnapshot) => void>;
  playMusic: Mock<(city: CityData, musicId: number, radius: number) => void>;
}

export const CLEAR_SKY: WeatherSnapshot = { type: 1, grade: 0.25 };

export function makeAmbience(): AmbienceMock {
  return {
    readWeather: vi.fn<(city: CityData) => WeatherSnapshot | null>(() => CLEAR_SKY),
    setWeather: vi.fn<(city: CityData, weather: WeatherSnapshot) => void>(),
    playMusic: vi.fn<(city: CityData, musicId: number, radius: number) => void>(),
  };
}

export interface SiegeHarness {
  city: CityData;
  config: SiegeConfig;
  world: InMemoryWorld;
  scene: InMemoryScene;
  leader: InMemoryActor | null;
  audience: InMemoryAudience;
  ledger: RewardLedger;
  bots: InMemoryBots;
  ambience: AmbienceMock;
  clock: ManualClock;
  services: SiegeServices;
}

export interface HarnessOptions {
  config?: Partial<SiegeConfig>;
  city?: Partial<CityData>;
  /** Place the objective actor at the objective anchor (default true) */
  withLeader?: boolean;
}

export function makeHarness(opts: HarnessOptions = {}): SiegeHarness {
  const city = makeCity(opts.city);
  const config = makeConfig({ cities: [city], ...opts.config });
  const world = new InMemoryWorld();
  const scene = world.addScene(city.regionId);
  const leader = opts.withLeader === false
    ? null
    : scene.place(city.objectiveTemplateId, LEADER_NAME, city.objective);
  const audience = new InMemoryAudience();
  const ledger = new RewardLedger();
  const bots = new InMemoryBots();
  const ambience = makeAmbience();
  const clock = new ManualClock(0);

  return {
    city,
    config,
    world,
    scene,
    leader,
    audience,
    ledger,
    bots,
    ambience,
    clock,
    services: { world, audience, ambience, rewards: ledger, bots, clock, rng: () => 0 },
  };
}
