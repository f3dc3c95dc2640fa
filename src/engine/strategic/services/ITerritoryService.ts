// ─────────────────────────────────────────────
//  ITerritoryService — Region graph + ownership queries for the AI
//  Implementations: WorldTerritoryService (store-backed)
// ─────────────────────────────────────────────

import type { RegionId, RegionTier } from '../data/types/World';
import type { ResourcePool } from '../data/types/Territory';

/** enterCost() sentinel: the region cannot be entered. Prunes the edge. */
export const IMPASSABLE = Number.POSITIVE_INFINITY;

/** Read-only snapshot of the attributes the scorer needs. */
export interface RegionInfo {
  id: RegionId;
  tier: RegionTier;
  population: number;
  resources: ResourcePool;
  owner: string | null;
  defenders: number;
  stronghold: boolean;
}

export interface ITerritoryService {
  /** Number of regions; valid ids are 0..regionCount()-1. */
  regionCount(): number;

  neighborRegions(id: RegionId): RegionId[];

  regionOwner(id: RegionId): string | null;

  /** Regions adjacent to any region owned by playerId but not owned by it. */
  frontierRegions(playerId: string): RegionId[];

  /** MP price of entering `id`: terrain cost, discounted for own regions, or IMPASSABLE. */
  enterCost(id: RegionId, playerId: string): number;

  /** Cheapest-to-reach stronghold owned by playerId (MP cost), `from` itself included. */
  nearestOwnedStronghold(from: RegionId, playerId: string): RegionId | null;

  isStronghold(id: RegionId): boolean;

  regionInfo(id: RegionId): RegionInfo;

  setRegionOwner(id: RegionId, playerId: string): void;
}
