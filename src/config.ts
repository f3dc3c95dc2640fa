// ─────────────────────────────────────────────
//  Planning configuration — balance constants the AI consumes.
//  The AI never derives these from live data, so scores stay
//  comparable across a session.
// ─────────────────────────────────────────────

import type { RegionTier } from '@/engine/strategic/data/types/World';
import type { PrimaryResource, ResourcePool } from '@/engine/strategic/data/types/Territory';
import type { WorldTerrain } from '@/engine/strategic/data/types/World';
import { computeResourceMaxima, getTerrainArchetypes } from '@/engine/strategic/data/TerrainTable';

export interface PopulationBand {
  min: number;
  max: number;
}

export interface ScoreWeights {
  population: number;
  resources: number;
  level: number;
  ownership: number;
}

export interface OwnershipScores {
  neutral: number;
  self: number;
  rival: number;
}

export interface PlanningConfig {
  /** Reference population per tier; the lowest tier's band normalises population. */
  populationBands: Record<RegionTier, PopulationBand>;
  /** Max attainable amount per resource (from terrain archetypes). */
  resourceMaxima: ResourcePool;
  /** Importance of each primary resource in the blend. */
  resourceWeights: Record<PrimaryResource, number>;
  /** Share of the primary blend in the resource score; the rest is treasury. */
  primaryResourceShare: number;
  /** Treasury normalisation is divided by this before blending. */
  treasuryDivisor: number;
  scoreWeights: ScoreWeights;
  ownershipScores: OwnershipScores;
  /** Half-width of per-army jitter, in base-score points (0-100 scale). */
  jitterAmplitude: number;
  /** Candidate horizon in MP. null = the mover's current MP. */
  defaultHorizon: number | null;
  /** Base enter cost per terrain. Absent or impassable terrain cannot be entered. */
  terrainCosts: Partial<Record<WorldTerrain, number>>;
  impassableTerrains: WorldTerrain[];
  /** Queue pops before reachableRegions gives up. */
  reachableIterationCap: number;
  /** Queue pops before shortestPath gives up. */
  pathIterationCap: number;
  /** Parent-chain length that marks a path as malformed. */
  maxPathLength: number;
  /** Strength ratio below which an army needs reinforcement. */
  reinforcementThreshold: number;
}

function terrainCostsFromArchetypes(): Partial<Record<WorldTerrain, number>> {
  return Object.fromEntries(getTerrainArchetypes().map(t => [t.key, t.moveCost]));
}

export const DEFAULT_PLANNING_CONFIG: PlanningConfig = {
  populationBands: {
    hamlet:  { min: 100,    max: 2_000 },
    village: { min: 500,    max: 5_000 },
    town:    { min: 2_000,  max: 15_000 },
    city:    { min: 10_000, max: 50_000 },
    capital: { min: 30_000, max: 120_000 },
  },
  resourceMaxima: computeResourceMaxima(),
  resourceWeights: { food: 0.35, wood: 0.25, stone: 0.2, iron: 0.2 },
  primaryResourceShare: 0.8,
  treasuryDivisor: 3,
  scoreWeights: { population: 0.30, resources: 0.40, level: 0.20, ownership: 0.10 },
  ownershipScores: { neutral: 0.8, self: 0.1, rival: 1.0 },
  jitterAmplitude: 5,
  defaultHorizon: null,
  terrainCosts: terrainCostsFromArchetypes(),
  impassableTerrains: getTerrainArchetypes().filter(t => !t.passable).map(t => t.key),
  reachableIterationCap: 10_000,
  pathIterationCap: 50_000,
  maxPathLength: 1_024,
  reinforcementThreshold: 0.5,
};

export function createPlanningConfig(overrides: Partial<PlanningConfig> = {}): PlanningConfig {
  return { ...DEFAULT_PLANNING_CONFIG, ...overrides };
}
