import { describe, it, expect, beforeEach } from 'vitest';
import {
  describePayout,
  distributeRewards,
  formatMoney,
  payoutFor,
} from '@/engine/systems/reward/RewardSystem';
import { InMemoryAudience, RewardLedger } from '@/engine/world/InMemoryAudience';
import { SiegeEventBus } from '@/engine/utils/EventBus';
import { makeCity } from '../integration/helpers';

const REWARDS = { onDefense: true, honor: 100, goldBase: 5000, goldPerLevel: 5000 };

beforeEach(() => {
  SiegeEventBus.clear();
});

describe('formatMoney', () => {
  it('omits leading zero units', () => {
    expect(formatMoney(10203)).toBe('1g 2s 3c');
    expect(formatMoney(203)).toBe('2s 3c');
    expect(formatMoney(3)).toBe('3c');
    expect(formatMoney(10000)).toBe('1g 0s 0c');
  });
});

describe('payouts', () => {
  it('scales copper with level', () => {
    expect(payoutFor(REWARDS, 80)).toEqual({ honor: 100, copper: 405000 });
  });

  it('describes honor and money together', () => {
    expect(describePayout({ honor: 100, copper: 405000 })).toBe('100 Honor and 40g 50s 0c');
    expect(describePayout({ honor: 0, copper: 250 })).toBe('2s 50c');
    expect(describePayout({ honor: 0, copper: 0 })).toBeNull();
  });
});

describe('distributeRewards', () => {
  const city = makeCity();

  it('rewards the winning faction at or above the minimum level', () => {
    const audience = new InMemoryAudience();
    const ledger = new RewardLedger();
    const hero = audience.join({ id: 'hero', faction: 'alliance', level: 80, regionId: 7, position: city.center });
    audience.join({ id: 'low', faction: 'alliance', level: 9, regionId: 7, position: city.center });
    audience.join({ id: 'enemy', faction: 'horde', level: 80, regionId: 7, position: city.center });

    const count = distributeRewards({
      city, faction: 'alliance', sessions: audience.all(), minLevel: 10, rewards: REWARDS, granter: ledger,
    });

    expect(count).toBe(1);
    expect(ledger.honor.get('hero')).toBe(100);
    expect(ledger.money.get('hero')).toBe(405000);
    expect(ledger.honor.has('low')).toBe(false);
    expect(ledger.honor.has('enemy')).toBe(false);
    expect(hero.inbox).toEqual([
      '[City Siege] You have been rewarded for defending Testhold! Received: 100 Honor and 40g 50s 0c',
    ]);
  });

  it('sends the plain reward text when nothing is granted', () => {
    const audience = new InMemoryAudience();
    const ledger = new RewardLedger();
    const hero = audience.join({ id: 'hero', faction: 'alliance', level: 1, regionId: 7, position: city.center });
    distributeRewards({
      city,
      faction: 'alliance',
      sessions: audience.all(),
      minLevel: 1,
      rewards: { onDefense: true, honor: 0, goldBase: 0, goldPerLevel: 0 },
      granter: ledger,
    });
    expect(ledger.money.size).toBe(0);
    expect(hero.inbox).toEqual(['[City Siege] You have been rewarded for defending Testhold!']);
  });
});
