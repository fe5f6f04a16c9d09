// ─────────────────────────────────────────────
//  Reward System — honor and money for the winning side
// ─────────────────────────────────────────────

import type { CityData, CityFaction } from '@/engine/data/types/City';
import type { RewardSettings } from '@/engine/data/types/SiegeConfig';
import type { ISession } from '@/engine/world/IAudience';
import type { IRewardGranter } from '@/engine/world/IRewardGranter';
import { localizedText } from '@/engine/systems/announce/SiegeAnnouncer';
import { Logger } from '@/engine/utils/Logger';

const COPPER_PER_SILVER = 100;
const COPPER_PER_GOLD = 10000;

export interface Payout {
  honor: number;
  copper: number;
}

export function payoutFor(rewards: RewardSettings, level: number): Payout {
  return { honor: rewards.honor, copper: rewards.goldBase + rewards.goldPerLevel * level };
}

/** "1g 2s 3c"; leading zero units are left out */
export function formatMoney(copper: number): string {
  const gold = Math.floor(copper / COPPER_PER_GOLD);
  const silver = Math.floor((copper % COPPER_PER_GOLD) / COPPER_PER_SILVER);
  const rest = copper % COPPER_PER_SILVER;
  if (gold > 0) return `${gold}g ${silver}s ${rest}c`;
  if (silver > 0) return `${silver}s ${rest}c`;
  return `${rest}c`;
}

export function describePayout(payout: Payout): string | null {
  const parts: string[] = [];
  if (payout.honor > 0) parts.push(`${payout.honor} Honor`);
  if (payout.copper > 0) parts.push(formatMoney(payout.copper));
  return parts.length > 0 ? parts.join(' and ') : null;
}

export interface RewardRequest {
  city: CityData;
  faction: CityFaction;
  /** Candidate sessions, already scoped to the city */
  sessions: readonly ISession[];
  minLevel: number;
  rewards: RewardSettings;
  granter: IRewardGranter;
}

/** Returns the number of rewarded sessions */
export function distributeRewards(req: RewardRequest): number {
  let rewarded = 0;
  for (const session of req.sessions) {
    if (session.faction !== req.faction || session.level < req.minLevel) continue;

    const payout = payoutFor(req.rewards, session.level);
    if (payout.honor > 0) req.granter.grantHonor(session, payout.honor);
    if (payout.copper > 0) req.granter.grantMoney(session, payout.copper);

    const amounts = describePayout(payout);
    session.send(amounts
      ? localizedText(session.locale, 'rewardReceived', { CITY: req.city.name, AMOUNTS: amounts })
      : localizedText(session.locale, 'reward', { CITY: req.city.name }));
    rewarded++;
  }
  Logger.log(`[RewardSystem] Rewarded ${rewarded} ${req.faction} players for ${req.city.name}`);
  return rewarded;
}
