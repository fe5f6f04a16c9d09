// ─────────────────────────────────────────────
//  SiegeAnnouncer
//  Localized siege messages. City-scoped messages go to sessions
//  within the announce radius (everyone when the radius is 0);
//  broadcasts go to every session.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { CityData } from '@/engine/data/types/City';
import type { IAudience, ISession } from '@/engine/world/IAudience';
import type { TemplateValues } from '@/engine/utils/TextTemplate';
import { TextTemplate } from '@/engine/utils/TextTemplate';
import textsJson from '@/engine/data/defaults/texts.json';

export const DEFAULT_LOCALE = 'enUS';

export const TEXT_IDS = [
  'preWarning',
  'siegeStart',
  'siegeEnd',
  'winDefenders',
  'winAttackers',
  'reward',
  'rewardReceived',
  'countdown75',
  'countdown50',
  'countdown25',
  'battleStart',
  'status',
] as const;

export type TextId = typeof TEXT_IDS[number];

const TextTableSchema = z.record(z.string(), z.record(z.string(), z.string()))
  .refine(table => TEXT_IDS.every(id => table[DEFAULT_LOCALE]?.[id] !== undefined), {
    message: `every text id needs a ${DEFAULT_LOCALE} entry`,
  });

const TEXTS = TextTableSchema.parse(textsJson);

export function localizedText(locale: string, id: TextId, values: TemplateValues): string {
  const template = TEXTS[locale]?.[id] ?? TEXTS[DEFAULT_LOCALE]?.[id] ?? id;
  return TextTemplate.render(template, values);
}

export class SiegeAnnouncer {
  constructor(
    private readonly audience: IAudience,
    private readonly announceRadius: number,
  ) {}

  /** Sessions that hear about a siege in `city` */
  recipients(city: CityData): ISession[] {
    if (this.announceRadius <= 0) return this.audience.all();
    return this.audience.near(city.regionId, city.center, this.announceRadius);
  }

  /** Sessions standing in the city's region, limited by the announce radius when set */
  localSessions(city: CityData): ISession[] {
    if (this.announceRadius <= 0) return this.audience.all().filter(s => s.regionId === city.regionId);
    return this.audience.near(city.regionId, city.center, this.announceRadius);
  }

  announce(city: CityData, id: TextId, values: TemplateValues): number {
    return this.sendEach(this.recipients(city), id, values);
  }

  broadcast(id: TextId, values: TemplateValues): number {
    return this.sendEach(this.audience.all(), id, values);
  }

  private sendEach(sessions: ISession[], id: TextId, values: TemplateValues): number {
    for (const session of sessions) {
      session.send(localizedText(session.locale, id, values));
    }
    return sessions.length;
  }
}
