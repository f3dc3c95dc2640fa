// ─────────────────────────────────────────────
//  Turn Orchestrator — one AI player-turn
//  Loop: frontier → per-army best candidate → global best → execute.
//  Yields after every executed move so a host can render or single-step;
//  battle resolution is the only awaited call.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { BattleVerdict } from '../data/types/Battle';
import type { ExecutedMove, MoveCandidate, TurnState, TurnSummary } from '../data/types/Planning';
import type { ITerritoryService } from '../services/ITerritoryService';
import type { IArmyRoster, IMover } from '../services/IMover';
import type { IBattleService } from '../services/IBattleService';
import type { IReinforcementService, ITurnStartAllocator } from '../services/ITurnServices';
import type { PlanningConfig } from '@/config';
import type { PathPlanner } from './PathPlanner';
import type { TargetScorer } from './TargetScorer';
import { WorldEventBus } from '../WorldEventBus';
import { Logger } from '@/engine/utils/Logger';

export interface TurnOrchestratorDeps {
  territory: ITerritoryService;
  roster: IArmyRoster;
  battle: IBattleService;
  reinforcement: IReinforcementService;
  /** Turn-start resource / MP allocation, if the host delegates it. */
  allocator?: ITurnStartAllocator;
  planner: PathPlanner;
  scorer: TargetScorer;
  config: PlanningConfig;
  /** World turn counter for event payloads. */
  currentTurn?: () => number;
}

export class TurnOrchestrator {
  constructor(private readonly deps: TurnOrchestratorDeps) {}

  /** Play a whole turn for `playerId`. */
  async runTurn(playerId: string): Promise<TurnSummary> {
    const steps = this.steps(playerId);
    for (;;) {
      const next = await steps.next();
      if (next.done) return next.value;
    }
  }

  /**
   * Step-wise turn. Each `next()` executes at most one move.
   * Calling `return()` cancels: state stays as after the last executed move.
   */
  async *steps(playerId: string): AsyncGenerator<ExecutedMove, TurnSummary, void> {
    const state = this.beginTurn(playerId);
    const summary: TurnSummary = { playerId, moves: [], reinforced: [], passes: 0 };

    for (;;) {
      summary.passes++;

      state.frontier = this.deps.territory.frontierRegions(playerId);
      if (state.frontier.length === 0) {
        Logger.log(`[AI] ${playerId}: frontier empty, ending turn`, 'planner');
        break;
      }

      state.candidates = this.buildCandidates(state, summary);
      const best = pickBestCandidate(state.candidates);
      if (!best) {
        Logger.log(`[AI] ${playerId}: no candidate moves left`, 'planner');
        break;
      }

      const move = await this.execute(best, playerId);
      state.moved.add(best.mover.armyId());
      summary.moves.push(move);

      yield move;
    }

    WorldEventBus.emit('turnFinished', { playerId, turn: this.turn(), moves: summary.moves.length });
    return summary;
  }

  // ── Turn start ─────────────────────────────

  private beginTurn(playerId: string): TurnState {
    const needs = new Map<string, boolean>();
    for (const mover of this.deps.roster.moversOf(playerId)) {
      needs.set(mover.armyId(), this.deps.reinforcement.needsReinforcement(mover));
    }

    this.deps.allocator?.allocate(playerId);
    WorldEventBus.emit('turnStarted', { playerId, turn: this.turn() });

    return {
      playerId,
      moved: new Set<string>(),
      needsReinforcement: needs,
      frontier: [],
      candidates: [],
    };
  }

  // ── Candidate generation ───────────────────

  /** One candidate per eligible army. Refills happen here and consume the army's slot. */
  private buildCandidates(state: TurnState, summary: TurnSummary): MoveCandidate[] {
    const candidates: MoveCandidate[] = [];
    const baseScores = new Map<RegionId, number>();

    for (const mover of this.deps.roster.moversOf(state.playerId)) {
      const armyId = mover.armyId();
      if (state.moved.has(armyId)) continue;
      if (mover.movementPoints() <= 0) continue;

      if (state.needsReinforcement.get(armyId) === true) {
        if (this.tryRefillInPlace(mover, state)) {
          state.moved.add(armyId);
          summary.reinforced.push(armyId);
          continue;
        }
        const forced = this.reinforcementCandidate(mover, state.playerId);
        if (forced) {
          candidates.push(forced);
          continue;
        }
      }

      const candidate = this.frontierCandidate(mover, state, baseScores);
      if (candidate) candidates.push(candidate);
    }

    return candidates;
  }

  private tryRefillInPlace(mover: IMover, state: TurnState): boolean {
    const { territory, reinforcement } = this.deps;
    const here = mover.currentRegion();
    if (!territory.isStronghold(here)) return false;
    if (territory.regionOwner(here) !== state.playerId) return false;

    reinforcement.refill(mover, here);
    WorldEventBus.emit('armyReinforced', { armyId: mover.armyId(), regionId: here });
    Logger.log(`[AI] ${mover.armyId()} refilled at region ${here}`, 'move');
    return true;
  }

  /** Hard override toward the nearest owned stronghold; null if none is reachable. */
  private reinforcementCandidate(mover: IMover, playerId: string): MoveCandidate | null {
    const here = mover.currentRegion();
    const stronghold = this.deps.territory.nearestOwnedStronghold(here, playerId);
    if (stronghold === null || stronghold === here) return null;

    const route = this.deps.planner.shortestPath(here, stronghold, playerId);
    if (!route.success) return null;

    return {
      mover,
      targetRegionId: stronghold,
      path: route.path,
      mpCost: route.cost,
      finalScore: Infinity,
      canReachNow: route.cost <= mover.movementPoints(),
      goal: 'reinforce',
    };
  }

  /**
   * Best frontier target for one army. Targets reachable with the MP left
   * this turn always beat ones that are not.
   */
  private frontierCandidate(
    mover: IMover,
    state: TurnState,
    baseScores: Map<RegionId, number>,
  ): MoveCandidate | null {
    const { planner, scorer, config } = this.deps;
    const mp = mover.movementPoints();
    const horizon = config.defaultHorizon ?? mp;
    const reach = planner.reachableRegions(mover.currentRegion(), state.playerId, horizon);

    let bestNow: MoveCandidate | null = null;
    let bestLater: MoveCandidate | null = null;

    for (const regionId of state.frontier) {
      if (!reach.has(regionId)) continue;
      const path = reach.pathTo(regionId);
      if (path.length < 2) continue;

      let base = baseScores.get(regionId);
      if (base === undefined) {
        base = scorer.scoreRegionBase(regionId);
        baseScores.set(regionId, base);
      }

      const cost = reach.costOf(regionId);
      const candidate: MoveCandidate = {
        mover,
        targetRegionId: regionId,
        path,
        mpCost: cost,
        finalScore: base + scorer.jitter(mover.armyId(), regionId) - cost,
        canReachNow: cost <= mp,
        goal: 'normal',
      };

      if (candidate.canReachNow) {
        if (!bestNow || candidate.finalScore > bestNow.finalScore) bestNow = candidate;
      } else if (!bestLater || candidate.finalScore > bestLater.finalScore) {
        bestLater = candidate;
      }
    }

    return bestNow ?? bestLater;
  }

  // ── Execution ──────────────────────────────

  private async execute(candidate: MoveCandidate, playerId: string): Promise<ExecutedMove> {
    const { planner, battle, territory } = this.deps;
    const { mover, targetRegionId, goal } = candidate;
    const armyId = mover.armyId();

    WorldEventBus.emit('movePrepared', {
      armyId, targetRegionId, path: candidate.path, mpCost: candidate.mpCost, goal,
    });

    const budget = mover.movementPoints();
    const fullCost = planner.pathCost(candidate.path, playerId);
    const traveled = planner.trimPathToBudget(candidate.path, playerId, budget);
    const mpSpent = planner.pathCost(traveled, playerId);

    WorldEventBus.emit('moveStarted', { armyId, path: traveled, mpSpent });
    for (const regionId of traveled.slice(1)) {
      mover.relocateTo(regionId);
    }
    if (mpSpent > 0) mover.spendMovementPoints(mpSpent);

    const arrived = traveled[traveled.length - 1] === targetRegionId;
    Logger.log(
      `[AI] ${armyId} → ${targetRegionId} (${goal}): ${arrived ? 'arrived' : 'partial'}, spent ${mpSpent} MP`,
      'move',
    );

    // Partial movement never fights, even on a contested tile
    let verdict: BattleVerdict | null = null;
    if (arrived && fullCost <= budget && battle.shouldTriggerBattle(mover, targetRegionId)) {
      WorldEventBus.emit('battleStarted', { armyId, regionId: targetRegionId });
      verdict = await battle.startBattle(mover, targetRegionId);
      WorldEventBus.emit('battleEnded', { armyId, regionId: targetRegionId, verdict });
      Logger.log(`[AI] ${armyId} battle at ${targetRegionId}: ${verdict}`, 'battle');

      if (verdict === 'victory') {
        const oldOwner = territory.regionOwner(targetRegionId);
        territory.setRegionOwner(targetRegionId, playerId);
        WorldEventBus.emit('regionConquered', { regionId: targetRegionId, oldOwner, newOwner: playerId });
      }
    }

    return { armyId, goal, targetRegionId, traveled, mpSpent, arrived, battle: verdict };
  }

  private turn(): number {
    return this.deps.currentTurn?.() ?? 0;
  }
}

/** Highest finalScore; the first of equal scores wins, so +∞ beats any finite score. */
export function pickBestCandidate(candidates: readonly MoveCandidate[]): MoveCandidate | null {
  let best: MoveCandidate | null = null;
  for (const c of candidates) {
    if (!best || c.finalScore > best.finalScore) best = c;
  }
  return best;
}
