// ─────────────────────────────────────────────
//  Planning Types — results exchanged between
//  PathPlanner, TargetScorer and TurnOrchestrator.
//  All ephemeral: rebuilt per query or per loop pass.
// ─────────────────────────────────────────────

import type { RegionId } from './World';
import type { BattleVerdict } from './Battle';
import type { IMover } from '../../services/IMover';

export interface PathResult {
  success: boolean;
  path: RegionId[];               // start → target inclusive; [] on failure
  cost: number;
}

export interface ReachableRegion {
  regionId: RegionId;
  cost: number;
  parent: RegionId | null;        // null for the start region
}

export interface ScoreRecord {
  regionId: RegionId;
  populationScore: number;
  resourceScore: number;
  levelScore: number;
  ownershipScore: number;
  overallScore: number;
}

export type ArmyScore =
  | { reachable: true; score: number; path: RegionId[]; cost: number }
  | { reachable: false };

export type MoveGoal = 'normal' | 'reinforce';

export interface MoveCandidate {
  mover: IMover;
  targetRegionId: RegionId;
  path: RegionId[];
  mpCost: number;
  finalScore: number;             // +Infinity for forced reinforcement
  canReachNow: boolean;
  goal: MoveGoal;
}

/** Lives for exactly one player-turn. */
export interface TurnState {
  readonly playerId: string;
  readonly moved: Set<string>;
  readonly needsReinforcement: ReadonlyMap<string, boolean>;
  frontier: RegionId[];
  candidates: MoveCandidate[];
}

export interface ExecutedMove {
  armyId: string;
  goal: MoveGoal;
  targetRegionId: RegionId;
  traveled: RegionId[];           // trimmed path actually walked
  mpSpent: number;
  arrived: boolean;
  battle: BattleVerdict | null;
}

export interface TurnSummary {
  playerId: string;
  moves: ExecutedMove[];
  reinforced: string[];           // Army ids refilled in place
  passes: number;
}
