import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WorldStore } from '@/engine/strategic/state/WorldStore';
import { WorldStateQuery } from '@/engine/strategic/state/WorldState';
import { WorldEventBus } from '@/engine/strategic/WorldEventBus';
import { chainMap, createWorld, makeArmy, makeTerritory } from '../integration/helpers';

beforeEach(() => {
  WorldEventBus.clear();
});

describe('WorldStore', () => {
  it('init sorts territories by id', () => {
    const store = new WorldStore();
    store.init(['f1'], [makeTerritory(1), makeTerritory(0, 'f1')], []);

    expect(store.getState().territories.map(t => t.id)).toEqual([0, 1]);
    expect(store.getState().turn).toBe(1);
  });

  it('init rejects sparse region ids', () => {
    const store = new WorldStore();
    expect(() => store.init(['f1'], [makeTerritory(0), makeTerritory(2)], [])).toThrow('dense');
  });

  it('dispatch applies a valid action and notifies subscribers', () => {
    const { store } = createWorld(chainMap(2));
    const listener = vi.fn();
    store.subscribe(listener);

    const accepted = store.dispatch({
      type: 'TEST',
      validate: () => true,
      execute: s => ({ ...s, turn: s.turn + 1 }),
    });

    expect(accepted).toBe(true);
    expect(store.getState().turn).toBe(2);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('dispatch rejects an invalid action without notifying', () => {
    const { store } = createWorld(chainMap(2));
    const listener = vi.fn();
    store.subscribe(listener);
    const before = store.getState();

    const accepted = store.dispatch({
      type: 'TEST',
      validate: () => false,
      execute: s => ({ ...s, turn: 99 }),
    });

    expect(accepted).toBe(false);
    expect(store.getState()).toBe(before);
    expect(listener).not.toHaveBeenCalled();
  });

  it('unsubscribe stops notifications', () => {
    const { store } = createWorld(chainMap(2));
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    unsubscribe();

    store.dispatch({ type: 'TEST', validate: () => true, execute: s => ({ ...s, turn: 5 }) });
    expect(listener).not.toHaveBeenCalled();
    expect(store.getState().turn).toBe(5);
  });
});

describe('WorldStateQuery', () => {
  const state = createWorld(chainMap(3), {
    territories: [makeTerritory(0, 'f1'), makeTerritory(2, 'f1')],
    armies: [makeArmy('c', 'f1', 0), makeArmy('a', 'f1', 2), makeArmy('b', 'f2', 0)],
  }).store.getState();

  it('armiesOfFaction is sorted by id', () => {
    expect(WorldStateQuery.armiesOfFaction(state, 'f1').map(a => a.id)).toEqual(['a', 'c']);
  });

  it('regionsOwnedBy lists owned region ids', () => {
    expect(WorldStateQuery.regionsOwnedBy(state, 'f1')).toEqual([0, 2]);
    expect(WorldStateQuery.regionsOwnedBy(state, 'f2')).toEqual([]);
  });

  it('army returns undefined when missing', () => {
    expect(WorldStateQuery.army(state, 'zzz')).toBeUndefined();
  });
});
