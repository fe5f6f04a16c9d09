import type { ISession } from './IAudience';

export interface IRewardGranter {
  grantHonor(session: ISession, amount: number): void;
  /** Amount in copper */
  grantMoney(session: ISession, copper: number): void;
}
