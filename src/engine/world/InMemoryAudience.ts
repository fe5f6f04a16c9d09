// ─────────────────────────────────────────────
//  InMemoryAudience
//  Sessions with an inbox, and a ledger that records granted rewards.
// ─────────────────────────────────────────────

import type { CityFaction, Vec3 } from '@/engine/data/types/City';
import type { IAudience, ISession } from './IAudience';
import type { IRewardGranter } from './IRewardGranter';
import { MathUtils } from '@/engine/utils/MathUtils';

export interface SessionInit {
  id: string;
  name?: string;
  locale?: string;
  faction: CityFaction;
  level?: number;
  regionId: number;
  position: Vec3;
}

export class InMemorySession implements ISession {
  readonly id: string;
  readonly name: string;
  readonly locale: string;
  readonly faction: CityFaction;
  readonly level: number;
  regionId: number;
  pos: Vec3;
  readonly inbox: string[] = [];

  constructor(init: SessionInit) {
    this.id = init.id;
    this.name = init.name ?? init.id;
    this.locale = init.locale ?? 'enUS';
    this.faction = init.faction;
    this.level = init.level ?? 80;
    this.regionId = init.regionId;
    this.pos = { ...init.position };
  }

  position(): Vec3 {
    return this.pos;
  }

  send(text: string): void {
    this.inbox.push(text);
  }
}

export class InMemoryAudience implements IAudience {
  private sessions: InMemorySession[] = [];

  join(init: SessionInit): InMemorySession {
    const session = new InMemorySession(init);
    this.sessions.push(session);
    return session;
  }

  all(): InMemorySession[] {
    return [...this.sessions];
  }

  near(regionId: number, center: Vec3, radius: number): InMemorySession[] {
    return this.sessions.filter(
      s => s.regionId === regionId && MathUtils.dist3(s.pos, center) <= radius,
    );
  }
}

export class RewardLedger implements IRewardGranter {
  readonly honor = new Map<string, number>();
  readonly money = new Map<string, number>();

  grantHonor(session: ISession, amount: number): void {
    this.honor.set(session.id, (this.honor.get(session.id) ?? 0) + amount);
  }

  grantMoney(session: ISession, copper: number): void {
    this.money.set(session.id, (this.money.get(session.id) ?? 0) + copper);
  }
}
