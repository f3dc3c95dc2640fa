// ─────────────────────────────────────────────
//  World Map Data Types — Region adjacency graph
//  Regions are nodes keyed by dense integer ids, edges are routes.
// ─────────────────────────────────────────────

/** Dense graph-node id: 0..regionCount-1. */
export type RegionId = number;

/** Administrative tiers, lowest first. Order defines the level ordinal 1..5. */
export const REGION_TIERS = ['hamlet', 'village', 'town', 'city', 'capital'] as const;

export type RegionTier = typeof REGION_TIERS[number];

export type WorldTerrain =
  | 'plains'
  | 'forest'
  | 'hills'
  | 'mountain'
  | 'marsh'
  | 'desert'
  | 'coast'
  | 'sea';

export interface RegionNode {
  id: RegionId;
  terrain: WorldTerrain;
  tier: RegionTier;
  stronghold: boolean;            // Can refill armies
}

export interface WorldEdge {
  id: string;
  from: RegionId;
  to: RegionId;
  bidirectional: boolean;
  passable: boolean;
}

export interface WorldMapData {
  regions: RegionNode[];          // regions[i].id === i
  edges: WorldEdge[];
}
