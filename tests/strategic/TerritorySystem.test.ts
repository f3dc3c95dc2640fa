import { describe, it, expect, beforeEach } from 'vitest';
import type { WorldMapData } from '@/engine/strategic/data/types/World';
import {
  buildAdjacencyMap, getFrontierRegions, getEnterCost, transferTerritory, findNearestOwnedStronghold,
} from '@/engine/strategic/systems/TerritorySystem';
import { IMPASSABLE } from '@/engine/strategic/services/ITerritoryService';
import { WorldEventBus } from '@/engine/strategic/WorldEventBus';
import { TEST_CONFIG, createWorld, makeRegion, makeTerritory, road } from '../integration/helpers';

// 0 ─ 1 ─ 2 ─ 3      0 → 4 one-way      1 ─ 5 closed      3 is sea
const testMap: WorldMapData = {
  regions: [
    makeRegion(0, 'plains', { stronghold: true }),
    makeRegion(1, 'forest'),
    makeRegion(2, 'coast', { stronghold: true }),
    makeRegion(3, 'sea'),
    makeRegion(4, 'hills'),
    makeRegion(5, 'marsh'),
  ],
  edges: [
    road(0, 1), road(1, 2), road(2, 3),
    road(0, 4, { bidirectional: false }),
    road(1, 5, { passable: false }),
  ],
};

function makeState() {
  return createWorld(testMap, {
    territories: [makeTerritory(0, 'f1'), makeTerritory(1, 'f1'), makeTerritory(2, 'f2', { defenders: 4 })],
  }).store.getState();
}

beforeEach(() => {
  WorldEventBus.clear();
});

describe('TerritorySystem', () => {
  describe('adjacency', () => {
    it('buildAdjacencyMap follows passable edges in both directions', () => {
      const adj = buildAdjacencyMap(testMap);

      expect(adj[0]).toEqual([1, 4]);
      expect(adj[1]).toEqual([0, 2]);
      expect(adj[4]).toEqual([]);
      expect(adj[5]).toEqual([]);
    });
  });

  describe('getFrontierRegions', () => {
    it('lists unowned neighbours of owned regions, ascending', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(getFrontierRegions(adj, makeState(), 'f1')).toEqual([2, 4]);
      expect(getFrontierRegions(adj, makeState(), 'f2')).toEqual([1, 3]);
    });

    it('is empty for a faction with no regions', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(getFrontierRegions(adj, makeState(), 'f3')).toEqual([]);
    });
  });

  describe('getEnterCost', () => {
    it('charges the terrain cost on foreign ground', () => {
      const state = makeState();
      expect(getEnterCost(testMap, state, TEST_CONFIG, 4, 'f1')).toBe(4);
      expect(getEnterCost(testMap, state, TEST_CONFIG, 1, 'f2')).toBe(8);
    });

    it('discounts own regions by one', () => {
      const state = makeState();
      expect(getEnterCost(testMap, state, TEST_CONFIG, 0, 'f1')).toBe(4);
      expect(getEnterCost(testMap, state, TEST_CONFIG, 1, 'f1')).toBe(7);
    });

    it('never discounts below one', () => {
      const state = makeState();
      expect(getEnterCost(testMap, state, TEST_CONFIG, 2, 'f2')).toBe(1);
    });

    it('blocks impassable terrain and unknown regions', () => {
      const state = makeState();
      expect(getEnterCost(testMap, state, TEST_CONFIG, 3, 'f1')).toBe(IMPASSABLE);
      expect(getEnterCost(testMap, state, TEST_CONFIG, 42, 'f1')).toBe(IMPASSABLE);
    });

    it('blocks terrain with no configured cost', () => {
      const state = makeState();
      const config = { ...TEST_CONFIG, terrainCosts: { plains: 5 } };
      expect(getEnterCost(testMap, state, config, 4, 'f1')).toBe(IMPASSABLE);
    });
  });

  describe('transferTerritory', () => {
    it('changes the owner and clears the garrison', () => {
      const state = transferTerritory(makeState(), 2, 'f1');
      expect(state.territories[2]).toMatchObject({ owner: 'f1', defenders: 0 });
    });

    it('returns the same state for a no-op transfer', () => {
      const state = makeState();
      expect(transferTerritory(state, 0, 'f1')).toBe(state);
      expect(transferTerritory(state, 99, 'f1')).toBe(state);
    });
  });

  describe('findNearestOwnedStronghold', () => {
    it('returns the start when it qualifies', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(findNearestOwnedStronghold(testMap, adj, makeState(), TEST_CONFIG, 0, 'f1')).toBe(0);
    });

    it('finds the cheapest owned stronghold', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(findNearestOwnedStronghold(testMap, adj, makeState(), TEST_CONFIG, 1, 'f1')).toBe(0);
      expect(findNearestOwnedStronghold(testMap, adj, makeState(), TEST_CONFIG, 0, 'f2')).toBe(2);
    });

    it('ignores strongholds held by others', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(findNearestOwnedStronghold(testMap, adj, makeState(), TEST_CONFIG, 1, 'f3')).toBeNull();
    });

    it('cannot walk against a one-way road', () => {
      const adj = buildAdjacencyMap(testMap);
      expect(findNearestOwnedStronghold(testMap, adj, makeState(), TEST_CONFIG, 4, 'f1')).toBeNull();
    });

    it('never crosses impassable terrain', () => {
      // 0 (f1) ─ 1 sea ─ 2 (f1, stronghold)
      const worldMap: WorldMapData = {
        regions: [makeRegion(0), makeRegion(1, 'sea'), makeRegion(2, 'plains', { stronghold: true })],
        edges: [road(0, 1), road(1, 2)],
      };
      const state = createWorld(worldMap, {
        territories: [makeTerritory(0, 'f1'), makeTerritory(1), makeTerritory(2, 'f1')],
      }).store.getState();

      expect(findNearestOwnedStronghold(worldMap, buildAdjacencyMap(worldMap), state, TEST_CONFIG, 0, 'f1')).toBeNull();
    });

    it('ranks by MP cost rather than steps', () => {
      // 0 ─ 1 mountain ─ 2 (stronghold)   0 ─ 3 desert ─ 4 desert ─ 5 (stronghold)
      const worldMap: WorldMapData = {
        regions: [
          makeRegion(0),
          makeRegion(1, 'mountain'),
          makeRegion(2, 'plains', { stronghold: true }),
          makeRegion(3, 'desert'),
          makeRegion(4, 'desert'),
          makeRegion(5, 'plains', { stronghold: true }),
        ],
        edges: [road(0, 1), road(1, 2), road(0, 3), road(3, 4), road(4, 5)],
      };
      const state = createWorld(worldMap, {
        territories: [makeTerritory(0, 'f1'), makeTerritory(2, 'f1'), makeTerritory(5, 'f1')],
      }).store.getState();

      expect(findNearestOwnedStronghold(worldMap, buildAdjacencyMap(worldMap), state, TEST_CONFIG, 0, 'f1')).toBe(5);
    });

    it('equal costs resolve to the lower region id', () => {
      // 2 (stronghold) ─ 0 ─ 1 (stronghold)
      const worldMap: WorldMapData = {
        regions: [
          makeRegion(0),
          makeRegion(1, 'plains', { stronghold: true }),
          makeRegion(2, 'plains', { stronghold: true }),
        ],
        edges: [road(0, 2), road(0, 1)],
      };
      const state = createWorld(worldMap, {
        territories: [makeTerritory(0, 'f1'), makeTerritory(1, 'f1'), makeTerritory(2, 'f1')],
      }).store.getState();

      expect(findNearestOwnedStronghold(worldMap, buildAdjacencyMap(worldMap), state, TEST_CONFIG, 0, 'f1')).toBe(1);
    });
  });
});
