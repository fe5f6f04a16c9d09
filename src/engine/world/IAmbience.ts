// ─────────────────────────────────────────────
//  IAmbience Interface
//  Weather and music side effects around a city.
//  Implementations: host adapter (real), NullAmbience (headless)
// ─────────────────────────────────────────────

import type { CityData } from '@/engine/data/types/City';
import type { WeatherSnapshot } from '@/engine/data/types/Siege';

export interface IAmbience {
  /** Current weather of the city's zone, or null when the host cannot read it */
  readWeather(city: CityData): WeatherSnapshot | null;

  setWeather(city: CityData, weather: WeatherSnapshot): void;

  /** Play a music track for sessions within `radius` of the city center (0 = whole region) */
  playMusic(city: CityData, musicId: number, radius: number): void;
}
