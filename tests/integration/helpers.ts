// ─────────────────────────────────────────────
//  Integration Test Helpers
//  Build headless world scenarios: a WorldStore plus its region graph.
//  Use store.dispatch(action) or the AI services to drive state.
// ─────────────────────────────────────────────

import type { RegionId, RegionNode, WorldEdge, WorldMapData, WorldTerrain } from '@/engine/strategic/data/types/World';
import type { TerritoryState } from '@/engine/strategic/data/types/Territory';
import type { ArmyState } from '@/engine/strategic/data/types/Army';
import type { PlanningConfig } from '@/config';
import { DEFAULT_PLANNING_CONFIG, createPlanningConfig } from '@/config';
import { WorldStore } from '@/engine/strategic/state/WorldStore';

// ── Shared planning config ───────────────────

/**
 * Round numbers everywhere, no jitter.
 * plains 5 · forest 8 · hills 4 · mountain 6 · marsh 3 · desert 2 · coast 1 · sea blocked
 */
export const TEST_CONFIG: PlanningConfig = createPlanningConfig({
  populationBands: {
    ...DEFAULT_PLANNING_CONFIG.populationBands,
    hamlet: { min: 100, max: 2_100 },
  },
  resourceMaxima: { food: 8, wood: 8, stone: 8, iron: 8, gold: 90 },
  resourceWeights: { food: 1, wood: 1, stone: 1, iron: 1 },
  jitterAmplitude: 0,
  terrainCosts: { plains: 5, forest: 8, hills: 4, mountain: 6, marsh: 3, desert: 2, coast: 1 },
  impassableTerrains: ['sea'],
});

export function testConfig(overrides: Partial<PlanningConfig> = {}): PlanningConfig {
  return { ...TEST_CONFIG, ...overrides };
}

// ── Map factories ────────────────────────────

export function makeRegion(
  id: RegionId,
  terrain: WorldTerrain = 'plains',
  overrides: Partial<RegionNode> = {},
): RegionNode {
  return {
    id, terrain, tier: 'hamlet', stronghold: false,
    ...overrides,
  };
}

export function road(from: RegionId, to: RegionId, overrides: Partial<WorldEdge> = {}): WorldEdge {
  return { id: `e${from}-${to}`, from, to, bidirectional: true, passable: true, ...overrides };
}

/** 0 — 1 — … — (n-1), all one terrain. */
export function chainMap(n: number, terrain: WorldTerrain = 'plains'): WorldMapData {
  const regions = Array.from({ length: n }, (_, i) => makeRegion(i, terrain));
  const edges = regions.slice(1).map(r => road(r.id - 1, r.id));
  return { regions, edges };
}

// ── State factories ──────────────────────────

export function makeTerritory(
  id: RegionId,
  owner: string | null = null,
  overrides: Partial<TerritoryState> = {},
): TerritoryState {
  return {
    id, owner, population: 100,
    resources: { food: 0, wood: 0, stone: 0, iron: 0, gold: 0 },
    defenders: 0,
    ...overrides,
  };
}

export function makeArmy(
  id: string,
  factionId: string,
  locationRegionId: RegionId,
  overrides: Partial<ArmyState> = {},
): ArmyState {
  return {
    id, name: id, factionId, locationRegionId,
    movementPoints: 10, maxMovementPoints: 10,
    strength: 100, maxStrength: 100,
    ...overrides,
  };
}

export interface WorldFixture {
  store: WorldStore;
  worldMap: WorldMapData;
}

/**
 * One store over `worldMap`. Territories default to neutral; list the owned
 * (or otherwise customised) ones in `territories`.
 */
export function createWorld(
  worldMap: WorldMapData,
  options: {
    factions?: string[];
    territories?: TerritoryState[];
    armies?: ArmyState[];
  } = {},
): WorldFixture {
  const custom = new Map((options.territories ?? []).map(t => [t.id, t]));
  const territories = worldMap.regions.map(r => custom.get(r.id) ?? makeTerritory(r.id));

  const store = new WorldStore();
  store.init(options.factions ?? ['f1', 'f2'], territories, options.armies ?? []);
  return { store, worldMap };
}
