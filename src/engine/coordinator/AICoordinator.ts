// ─────────────────────────────────────────────
//  AICoordinator — Bridges WorldStore ↔ strategic AI
//  Builds the store-backed services, one PathPlanner / TargetScorer /
//  TurnOrchestrator set, and plays faction turns in order.
// ─────────────────────────────────────────────

import type { WorldMapData } from '@/engine/strategic/data/types/World';
import type { BattleResolver } from '@/engine/strategic/data/types/Battle';
import type { ExecutedMove, TurnSummary } from '@/engine/strategic/data/types/Planning';
import type { WorldStore } from '@/engine/strategic/state/WorldStore';
import type { IBattleService } from '@/engine/strategic/services/IBattleService';
import type { PlanningConfig } from '@/config';
import { DEFAULT_PLANNING_CONFIG } from '@/config';
import { WorldTerritoryService } from '@/engine/strategic/services/WorldTerritoryService';
import { WorldArmyRoster } from '@/engine/strategic/services/StoreArmyMover';
import { MovementAllocator, WorldReinforcementService } from '@/engine/strategic/services/WorldReinforcementService';
import { WorldBattleService } from '@/engine/strategic/services/WorldBattleService';
import { NullBattleService } from '@/engine/strategic/services/NullBattleService';
import { AdvanceTurnAction } from '@/engine/strategic/state/actions/AdvanceTurnAction';
import { PathPlanner } from '@/engine/strategic/systems/PathPlanner';
import { TargetScorer } from '@/engine/strategic/systems/TargetScorer';
import { TurnOrchestrator } from '@/engine/strategic/systems/TurnOrchestrator';
import { Logger } from '@/engine/utils/Logger';

export interface AICoordinatorOptions {
  config?: PlanningConfig;
  /** Fights contested arrivals. Omitted → nothing is ever contested. */
  resolveBattle?: BattleResolver;
}

export class AICoordinator {
  readonly territory: WorldTerritoryService;
  readonly planner: PathPlanner;
  readonly scorer: TargetScorer;
  readonly orchestrator: TurnOrchestrator;

  constructor(
    private readonly store: WorldStore,
    worldMap: WorldMapData,
    options: AICoordinatorOptions = {},
  ) {
    const config = options.config ?? DEFAULT_PLANNING_CONFIG;

    this.territory = new WorldTerritoryService(store, worldMap, config);
    this.planner = new PathPlanner(this.territory, config);
    this.scorer = new TargetScorer(this.territory, this.planner, config);

    const battle: IBattleService = options.resolveBattle
      ? new WorldBattleService(store, options.resolveBattle)
      : new NullBattleService();

    this.orchestrator = new TurnOrchestrator({
      territory: this.territory,
      roster: new WorldArmyRoster(store, this.territory.adjacency),
      battle,
      reinforcement: new WorldReinforcementService(store, worldMap, config),
      allocator: new MovementAllocator(store),
      planner: this.planner,
      scorer: this.scorer,
      config,
      currentTurn: () => store.getState().turn,
    });
  }

  /** One faction's full turn. */
  runFactionTurn(factionId: string): Promise<TurnSummary> {
    return this.orchestrator.runTurn(factionId);
  }

  /** Single-step driver: each next() executes one move. */
  stepFactionTurn(factionId: string): AsyncGenerator<ExecutedMove, TurnSummary, void> {
    return this.orchestrator.steps(factionId);
  }

  /** Every faction in turn order, then advance the world turn. */
  async runRound(): Promise<TurnSummary[]> {
    const summaries: TurnSummary[] = [];
    for (const factionId of this.store.getState().factions) {
      summaries.push(await this.runFactionTurn(factionId));
    }

    this.store.dispatch(new AdvanceTurnAction());
    Logger.log(`[AICoordinator] Round complete; turn ${this.store.getState().turn}`, 'system');
    return summaries;
  }
}
