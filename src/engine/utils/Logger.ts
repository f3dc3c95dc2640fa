import { WorldEventBus } from '@/engine/strategic/WorldEventBus';

export type LogClass = 'normal' | 'move' | 'battle' | 'planner' | 'warning' | 'system';

const CLASS_MAP: Record<LogClass, string> = {
  normal:  'le',
  move:    'lm',
  battle:  'lb',
  planner: 'lp',
  warning: 'lw',
  system:  'ls',
};

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    console.log(`[${type.toUpperCase()}] ${text}`);
    WorldEventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },

  /** Degraded-but-recovered conditions (search caps, corrupt parent chains). */
  warn(text: string): void {
    console.warn(`[WARNING] ${text}`);
    WorldEventBus.emit('logMessage', { text, cls: CLASS_MAP.warning });
  },
};
