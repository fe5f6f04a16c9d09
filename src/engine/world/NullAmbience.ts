import type { IAmbience } from './IAmbience';
import type { WeatherSnapshot } from '@/engine/data/types/Siege';

export class NullAmbience implements IAmbience {
  readWeather(): WeatherSnapshot | null { return null; }
  setWeather(): void {}
  playMusic(): void {}
}
