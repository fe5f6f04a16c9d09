import type { IBotHandle, IBotIntegration } from './IBotIntegration';

export class NullBotIntegration implements IBotIntegration {
  readonly available = false;
  listBots(): IBotHandle[] { return []; }
  findBot(): IBotHandle | null { return null; }
}
