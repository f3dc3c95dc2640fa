// ─────────────────────────────────────────────
//  Territory Runtime State
// ─────────────────────────────────────────────

import type { RegionId } from './World';

export const PRIMARY_RESOURCES = ['food', 'wood', 'stone', 'iron'] as const;

export type PrimaryResource = typeof PRIMARY_RESOURCES[number];

/** Primary resources plus the treasury (gold). */
export interface ResourcePool {
  food: number;
  wood: number;
  stone: number;
  iron: number;
  gold: number;
}

export interface TerritoryState {
  id: RegionId;
  owner: string | null;           // Faction id or null (neutral)
  population: number;
  resources: ResourcePool;
  defenders: number;              // Garrison troops; >0 makes a neutral region contested
}
