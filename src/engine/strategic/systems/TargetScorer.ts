// ─────────────────────────────────────────────
//  Target Scorer — how desirable is a region?
//  Four normalised sub-scores blended by fixed weights,
//  plus per-army jitter and path cost for army-specific ranking.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import { REGION_TIERS } from '../data/types/World';
import { PRIMARY_RESOURCES } from '../data/types/Territory';
import type { ResourcePool } from '../data/types/Territory';
import type { ArmyScore, ScoreRecord } from '../data/types/Planning';
import type { ITerritoryService, RegionInfo } from '../services/ITerritoryService';
import type { IMover } from '../services/IMover';
import type { PlanningConfig } from '@/config';
import type { PathPlanner } from './PathPlanner';
import { MathUtils } from '@/engine/utils/MathUtils';

/** Golden-ratio multiplier; spreads consecutive region ids across the seed space. */
const REGION_SEED_MIX = 0x9E3779B1;

export class TargetScorer {
  constructor(
    private readonly territory: ITerritoryService,
    private readonly planner: PathPlanner,
    private readonly config: PlanningConfig,
  ) {}

  /** Full record for a region as seen by `forPlayer`. */
  scoreRegion(regionId: RegionId, forPlayer: string): ScoreRecord {
    const info = this.territory.regionInfo(regionId);
    const w = this.config.scoreWeights;

    const populationScore = this.populationScore(info);
    const resourceScore = this.resourceScore(info.resources);
    const levelScore = this.levelScore(info);
    const ownershipScore = this.ownershipScore(info, forPlayer);

    return {
      regionId,
      populationScore,
      resourceScore,
      levelScore,
      ownershipScore,
      overallScore:
        populationScore * w.population +
        resourceScore * w.resources +
        levelScore * w.level +
        ownershipScore * w.ownership,
    };
  }

  /**
   * Mover-independent desirability on a 0–100 scale: the weighted
   * population / resource / level blend, renormalised without ownership.
   */
  scoreRegionBase(regionId: RegionId): number {
    const info = this.territory.regionInfo(regionId);
    const w = this.config.scoreWeights;
    const weightSum = w.population + w.resources + w.level;
    if (weightSum <= 0) return 0;

    const blended =
      this.populationScore(info) * w.population +
      this.resourceScore(info.resources) * w.resources +
      this.levelScore(info) * w.level;

    return (blended / weightSum) * 100;
  }

  /** Descending by overall score; equal scores fall back to ascending region id. */
  rank(regionIds: readonly RegionId[], forPlayer: string): ScoreRecord[] {
    return regionIds
      .map(id => this.scoreRegion(id, forPlayer))
      .sort((a, b) => b.overallScore - a.overallScore || a.regionId - b.regionId);
  }

  /** Reproducible perturbation in [-amplitude, +amplitude] for one army/region pair. */
  jitter(armyId: string, regionId: RegionId): number {
    const amplitude = this.config.jitterAmplitude;
    if (amplitude <= 0) return 0;

    const seed = (MathUtils.hashString(armyId) ^ Math.imul(regionId + 1, REGION_SEED_MIX)) >>> 0;
    const rng = MathUtils.createSeededRandom(seed);
    return (rng() * 2 - 1) * amplitude;
  }

  scoreForArmy(mover: IMover, regionId: RegionId): ArmyScore {
    const route = this.planner.shortestPath(mover.currentRegion(), regionId, mover.playerId());
    if (!route.success) return { reachable: false };

    return {
      reachable: true,
      score: this.scoreRegionBase(regionId) + this.jitter(mover.armyId(), regionId) - route.cost,
      path: route.path,
      cost: route.cost,
    };
  }

  // ── Sub-scores (each in [0, 1]) ────────────

  /** Linear against the lowest tier's reference band. */
  populationScore(info: RegionInfo): number {
    const band = this.config.populationBands[REGION_TIERS[0]];
    return MathUtils.normalize(info.population, band.min, band.max);
  }

  resourceScore(resources: ResourcePool): number {
    const maxima = this.config.resourceMaxima;
    const weights = this.config.resourceWeights;

    let weighted = 0;
    let weightSum = 0;
    for (const key of PRIMARY_RESOURCES) {
      weighted += MathUtils.normalize(resources[key], 0, maxima[key]) * weights[key];
      weightSum += weights[key];
    }
    const primary = weightSum > 0 ? weighted / weightSum : 0;
    const treasury = MathUtils.normalize(resources.gold, 0, maxima.gold) / this.config.treasuryDivisor;

    const share = this.config.primaryResourceShare;
    return primary * share + treasury * (1 - share);
  }

  /** Tier ordinal 1..5 rescaled to [0, 1]. */
  levelScore(info: RegionInfo): number {
    const ordinal = REGION_TIERS.indexOf(info.tier) + 1;
    return MathUtils.normalize(ordinal, 1, REGION_TIERS.length);
  }

  ownershipScore(info: RegionInfo, forPlayer: string): number {
    const scores = this.config.ownershipScores;
    if (info.owner === null) return scores.neutral;
    if (info.owner === forPlayer) return scores.self;
    return scores.rival;
  }
}
