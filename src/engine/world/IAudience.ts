// ─────────────────────────────────────────────
//  IAudience Interface
//  Connected sessions for announcements, rewards and ambience.
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from '@/engine/data/types/City';

export interface ISession {
  readonly id: string;
  readonly name: string;
  /** e.g. 'enUS', 'frFR' */
  readonly locale: string;
  readonly faction: CityFaction;
  readonly level: number;
  readonly regionId: number;
  position(): Vec3;
  send(text: string): void;
}

export interface IAudience {
  all(): ISession[];
  /** Sessions in `regionId` within `radius` of `center` (3D distance) */
  near(regionId: number, center: Vec3, radius: number): ISession[];
}
