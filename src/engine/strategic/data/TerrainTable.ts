// ─────────────────────────────────────────────
//  Terrain Table — archetypes read from terrains.json
// ─────────────────────────────────────────────

import terrainJson from '@/assets/data/terrains.json';
import type { WorldTerrain } from './types/World';
import type { ResourcePool } from './types/Territory';

export interface TerrainArchetype {
  key: WorldTerrain;
  /** Base MP to enter a region of this terrain */
  moveCost: number;
  passable: boolean;
  /** Resource amounts a region of this terrain can reach */
  yields: ResourcePool;
}

const TERRAINS: readonly TerrainArchetype[] = terrainJson as TerrainArchetype[];

export function getTerrainArchetypes(): readonly TerrainArchetype[] {
  return TERRAINS;
}

/** Highest attainable amount of each resource across all archetypes. */
export function computeResourceMaxima(
  archetypes: readonly TerrainArchetype[] = TERRAINS,
): ResourcePool {
  const max: ResourcePool = { food: 0, wood: 0, stone: 0, iron: 0, gold: 0 };
  for (const t of archetypes) {
    max.food  = Math.max(max.food, t.yields.food);
    max.wood  = Math.max(max.wood, t.yields.wood);
    max.stone = Math.max(max.stone, t.yields.stone);
    max.iron  = Math.max(max.iron, t.yields.iron);
    max.gold  = Math.max(max.gold, t.yields.gold);
  }
  return max;
}
