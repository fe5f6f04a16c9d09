import { SiegeEventBus } from './EventBus';

export type LogClass = 'system' | 'debug' | 'warn' | 'error';

const CLASS_MAP: Record<LogClass, string> = {
  system: 'ls',
  debug:  'ld',
  warn:   'lw',
  error:  'le',
};

let debugEnabled = false;

export const Logger = {
  setDebug(enabled: boolean): void {
    debugEnabled = enabled;
  },

  isDebug(): boolean {
    return debugEnabled;
  },

  log(text: string, type: LogClass = 'system'): void {
    if (type === 'debug' && !debugEnabled) return;
    const line = `[${type.toUpperCase()}] ${text}`;
    if (type === 'error') console.error(line);
    else if (type === 'warn') console.warn(line);
    else console.log(line);
    SiegeEventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },

  debug(text: string): void {
    Logger.log(text, 'debug');
  },

  warn(text: string): void {
    Logger.log(text, 'warn');
  },

  error(text: string): void {
    Logger.log(text, 'error');
  },
};
