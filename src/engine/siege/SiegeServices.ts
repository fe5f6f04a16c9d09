import type { IWorldLocator } from '@/engine/world/IWorldLocator';
import type { IAudience } from '@/engine/world/IAudience';
import type { IAmbience } from '@/engine/world/IAmbience';
import type { IRewardGranter } from '@/engine/world/IRewardGranter';
import type { IBotIntegration } from '@/engine/world/IBotIntegration';
import type { Clock } from '@/engine/utils/Clock';
import type { Rng } from '@/engine/utils/MathUtils';

/** Host collaborators shared by every siege */
export interface SiegeServices {
  world: IWorldLocator;
  audience: IAudience;
  ambience: IAmbience;
  rewards: IRewardGranter;
  bots: IBotIntegration;
  clock: Clock;
  rng: Rng;
}
