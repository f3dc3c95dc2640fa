import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorldEventBus } from '@/engine/strategic/WorldEventBus';
import { Logger } from '@/engine/utils/Logger';

beforeEach(() => {
  WorldEventBus.clear();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('WorldEventBus', () => {
  it('delivers payloads to every listener of an event', () => {
    const a = vi.fn();
    const b = vi.fn();
    WorldEventBus.on('armyMoved', a);
    WorldEventBus.on('armyMoved', b);

    WorldEventBus.emit('armyMoved', { armyId: 'a1', fromRegion: 0, toRegion: 1 });

    expect(a).toHaveBeenCalledWith({ armyId: 'a1', fromRegion: 0, toRegion: 1 });
    expect(b).toHaveBeenCalledTimes(1);
  });

  it('off removes a single listener', () => {
    const a = vi.fn();
    WorldEventBus.on('turnStarted', a);
    WorldEventBus.off('turnStarted', a);

    WorldEventBus.emit('turnStarted', { playerId: 'f1', turn: 1 });
    expect(a).not.toHaveBeenCalled();
  });

  it('a listener may unsubscribe itself mid-emit', () => {
    const calls: string[] = [];
    const once = (): void => {
      calls.push('once');
      WorldEventBus.off('turnFinished', once);
    };
    WorldEventBus.on('turnFinished', once);
    WorldEventBus.on('turnFinished', () => calls.push('always'));

    WorldEventBus.emit('turnFinished', { playerId: 'f1', turn: 1, moves: 0 });
    WorldEventBus.emit('turnFinished', { playerId: 'f1', turn: 1, moves: 0 });

    expect(calls).toEqual(['once', 'always', 'always']);
  });
});

describe('Logger', () => {
  it('writes to the console and mirrors onto the bus', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const messages: { text: string; cls: string }[] = [];
    WorldEventBus.on('logMessage', m => messages.push(m));

    Logger.log('a1 moved', 'move');

    expect(log).toHaveBeenCalledWith('[MOVE] a1 moved');
    expect(messages).toEqual([{ text: 'a1 moved', cls: 'lm' }]);
  });

  it('warn uses console.warn and the warning class', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const messages: { text: string; cls: string }[] = [];
    WorldEventBus.on('logMessage', m => messages.push(m));

    Logger.warn('cap hit');

    expect(warn).toHaveBeenCalledWith('[WARNING] cap hit');
    expect(messages).toEqual([{ text: 'cap hit', cls: 'lw' }]);
  });
});
