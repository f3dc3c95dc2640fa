// ─────────────────────────────────────────────
//  Territory System — Graph queries + ownership
//  Pure functions, no side effects.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { RegionId, WorldMapData } from '../data/types/World';
import type { WorldState } from '../state/WorldState';
import type { PlanningConfig } from '@/config';
import { IMPASSABLE } from '../services/ITerritoryService';
import { PriorityQueue } from '@/engine/utils/PriorityQueue';

// --- Adjacency Graph Helpers ---

/** Build a dense adjacency list (index = region id) from passable edges. */
export function buildAdjacencyMap(worldMap: WorldMapData): RegionId[][] {
  const adj: RegionId[][] = worldMap.regions.map(() => []);

  for (const edge of worldMap.edges) {
    if (!edge.passable) continue;
    adj[edge.from]?.push(edge.to);
    if (edge.bidirectional) {
      adj[edge.to]?.push(edge.from);
    }
  }

  return adj;
}

// --- Frontier ---

/** Regions adjacent to any region owned by factionId but not owned by it, ascending ids. */
export function getFrontierRegions(
  adjacency: RegionId[][],
  state: WorldState,
  factionId: string,
): RegionId[] {
  const frontier = new Set<RegionId>();

  for (const territory of state.territories) {
    if (territory.owner !== factionId) continue;
    for (const neighbor of (adjacency[territory.id] ?? [])) {
      if (state.territories[neighbor]?.owner !== factionId) frontier.add(neighbor);
    }
  }

  return [...frontier].sort((a, b) => a - b);
}

// --- Movement Cost ---

/**
 * MP price to enter a region: terrain base cost, one cheaper (floor 1)
 * when the region already belongs to factionId. IMPASSABLE for blocked terrain.
 */
export function getEnterCost(
  worldMap: WorldMapData,
  state: WorldState,
  config: PlanningConfig,
  regionId: RegionId,
  factionId: string,
): number {
  const region = worldMap.regions[regionId];
  if (!region) return IMPASSABLE;
  if (config.impassableTerrains.includes(region.terrain)) return IMPASSABLE;

  const base = config.terrainCosts[region.terrain];
  if (base === undefined || !Number.isFinite(base) || base < 0) return IMPASSABLE;

  const owned = state.territories[regionId]?.owner === factionId;
  if (owned && base > 1) return Math.max(1, base - 1);
  return base;
}

// --- Ownership ---

/** Transfer territory ownership. Resets the garrison of the captured region. */
export function transferTerritory(state: WorldState, regionId: RegionId, newOwner: string): WorldState {
  const territory = state.territories[regionId];
  if (!territory) return state;
  if (territory.owner === newOwner) return state;

  return produce(state, draft => {
    const t = draft.territories[regionId];
    if (!t) return;
    t.owner = newOwner;
    t.defenders = 0;
  });
}

// --- Stronghold Search ---

/**
 * Cheapest-to-reach stronghold owned by the faction, the start included.
 * Priced with getEnterCost, so impassable terrain is never crossed.
 * Equal costs resolve to the lower region id.
 */
export function findNearestOwnedStronghold(
  worldMap: WorldMapData,
  adjacency: RegionId[][],
  state: WorldState,
  config: PlanningConfig,
  fromRegion: RegionId,
  factionId: string,
): RegionId | null {
  const isOwnedStronghold = (id: RegionId): boolean =>
    worldMap.regions[id]?.stronghold === true && state.territories[id]?.owner === factionId;

  if (isOwnedStronghold(fromRegion)) return fromRegion;

  const best = new Map<RegionId, number>([[fromRegion, 0]]);
  const done = new Set<RegionId>();
  const queue = new PriorityQueue<{ regionId: RegionId; cost: number }>(e => e.cost);
  queue.insert({ regionId: fromRegion, cost: 0 });

  let found: RegionId | null = null;
  let foundCost = Infinity;

  for (let entry = queue.extractMin(); entry; entry = queue.extractMin()) {
    if (entry.cost > foundCost) break;
    if (done.has(entry.regionId)) continue;
    done.add(entry.regionId);

    if (isOwnedStronghold(entry.regionId)) {
      if (found === null || entry.regionId < found) {
        found = entry.regionId;
        foundCost = entry.cost;
      }
      continue;
    }

    for (const neighbor of (adjacency[entry.regionId] ?? [])) {
      const step = getEnterCost(worldMap, state, config, neighbor, factionId);
      if (step === IMPASSABLE) continue;
      const next = entry.cost + step;
      if (next < (best.get(neighbor) ?? Infinity)) {
        best.set(neighbor, next);
        queue.insert({ regionId: neighbor, cost: next });
      }
    }
  }

  return found;
}
