import { TypedEventBus } from './EventBus';

export type LogClass = 'normal' | 'modifier' | 'damage' | 'critical' | 'environment' | 'system' | 'warning';

const TAG: Record<LogClass, string> = {
  normal:      'ELEM',
  modifier:    'MOD',
  damage:      'DMG',
  critical:    'CRIT',
  environment: 'ENV',
  system:      'SYS',
  warning:     'WARN',
};

export interface LogEvents {
  logMessage: { text: string; cls: LogClass };
}

const bus = new TypedEventBus<LogEvents>();
let consoleEnabled = true;

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    if (consoleEnabled) console.log(`[${TAG[type]}] ${text}`);
    bus.emit('logMessage', { text, cls: type });
  },

  warn(text: string): void {
    if (consoleEnabled) console.warn(`[${TAG.warning}] ${text}`);
    bus.emit('logMessage', { text, cls: 'warning' });
  },

  /** Mirror log lines into a debug overlay, test, or file sink */
  subscribe(listener: (e: LogEvents['logMessage']) => void): () => void {
    return bus.on('logMessage', listener);
  },

  setConsoleEnabled(enabled: boolean): void {
    consoleEnabled = enabled;
  },
};
