// ─────────────────────────────────────────────
//  Bot Roster — recruiting, activating and releasing
//  external bots for a siege. The bots' own AI keeps running;
//  the siege only swaps strategies and steers them.
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from '@/engine/data/types/City';
import type { BotReturnRecord, SiegeSide } from '@/engine/data/types/Siege';
import type { IBotHandle, IBotIntegration } from '@/engine/world/IBotIntegration';
import type { Rng } from '@/engine/utils/MathUtils';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';

/** Wandering strategies suspended while a bot takes part in a siege */
export const RPG_STRATEGIES = ['new rpg', 'rpg'] as const;
export const PVP_STRATEGY = 'pvp';
export const TRAVEL_STRATEGY = 'travel';

/** Bots are placed within this radius of their anchor */
export const BOT_PLACEMENT_RADIUS = 10;
/** A living bot this close to its anchor needs no respawn */
export const BOT_ANCHOR_TOLERANCE = 15;

export interface RecruitRequest {
  faction: CityFaction;
  side: SiegeSide;
  regionId: number;
  anchor: Vec3;
  max: number;
  minLevel: number;
}

export interface Recruitment {
  ids: string[];
  returns: BotReturnRecord[];
}

export const BotRoster = {
  isEligible(bot: IBotHandle, faction: CityFaction, minLevel: number): boolean {
    return bot.isInWorld()
      && bot.faction === faction
      && bot.level() >= minLevel
      && bot.isAlive()
      && !bot.isInCombat()
      && !bot.isInInstance()
      && !bot.isGrouped();
  },

  recruit(integration: IBotIntegration, request: RecruitRequest, rng: Rng): Recruitment {
    if (!integration.available || request.max === 0) return { ids: [], returns: [] };

    const eligible = integration.listBots().filter(b => BotRoster.isEligible(b, request.faction, request.minLevel));
    const chosen = MathUtils.shuffle(eligible, rng).slice(0, request.max);

    const returns: BotReturnRecord[] = [];
    for (const bot of chosen) {
      const rpgStrategy = RPG_STRATEGIES.find(s => bot.hasStrategy(s)) ?? null;
      returns.push({
        botId: bot.id,
        regionId: bot.regionId(),
        position: bot.position(),
        orientation: bot.orientation(),
        wasPvP: bot.isPvP(),
        rpgStrategy,
      });
      if (rpgStrategy) bot.removeStrategy(rpgStrategy);
      bot.teleport(request.regionId, MathUtils.jitter(request.anchor, BOT_PLACEMENT_RADIUS, rng), 0);
    }

    Logger.debug(`[BotRoster] Recruited ${chosen.length}/${eligible.length} ${request.faction} bots as ${request.side}s`);
    return { ids: chosen.map(b => b.id), returns };
  },

  /** Combat start: PvP on, hand the bot to the travel strategy */
  activate(bot: IBotHandle): void {
    bot.setPvP(true);
    bot.addStrategy(PVP_STRATEGY);
    bot.addStrategy(TRAVEL_STRATEGY);
  },

  /**
   * Puts a dead or stray bot back at its anchor.
   * Returns false when the bot is already alive near the anchor.
   */
  revive(bot: IBotHandle, regionId: number, anchor: Vec3, rng: Rng): boolean {
    if (bot.isAlive() && MathUtils.dist3(bot.position(), anchor) <= BOT_ANCHOR_TOLERANCE) return false;
    if (!bot.isAlive()) bot.resurrect();
    bot.teleport(regionId, MathUtils.jitter(anchor, BOT_PLACEMENT_RADIUS, rng), 0);
    BotRoster.activate(bot);
    return true;
  },

  /** Restores every bot that can safely go home; returns how many were restored */
  release(integration: IBotIntegration, returns: readonly BotReturnRecord[]): number {
    let released = 0;
    for (const record of returns) {
      const bot = integration.findBot(record.botId);
      if (!bot) continue;
      if (!bot.isAlive() || bot.isInInstance() || bot.isTeleporting()) {
        Logger.debug(`[BotRoster] Leaving ${bot.name} in place`);
        continue;
      }
      bot.stopCombat();
      bot.removeStrategy(PVP_STRATEGY);
      bot.removeStrategy(TRAVEL_STRATEGY);
      bot.setPvP(record.wasPvP);
      if (record.rpgStrategy) bot.addStrategy(record.rpgStrategy);
      bot.teleport(record.regionId, record.position, record.orientation);
      released++;
    }
    return released;
  },
};
