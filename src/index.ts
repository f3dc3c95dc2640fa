export * from './config';
export * from './engine/strategic/data/types/World';
export * from './engine/strategic/data/types/Territory';
export type * from './engine/strategic/data/types/Army';
export type * from './engine/strategic/data/types/Battle';
export type * from './engine/strategic/data/types/Planning';
export * from './engine/strategic/data/TerrainTable';
export * from './engine/strategic/services/ITerritoryService';
export type * from './engine/strategic/services/IMover';
export type * from './engine/strategic/services/IBattleService';
export type * from './engine/strategic/services/ITurnServices';
export { WorldTerritoryService } from './engine/strategic/services/WorldTerritoryService';
export { StoreArmyMover, WorldArmyRoster } from './engine/strategic/services/StoreArmyMover';
export { WorldReinforcementService, MovementAllocator } from './engine/strategic/services/WorldReinforcementService';
export { WorldBattleService } from './engine/strategic/services/WorldBattleService';
export { NullBattleService } from './engine/strategic/services/NullBattleService';
export { WorldStore } from './engine/strategic/state/WorldStore';
export { WorldStateQuery } from './engine/strategic/state/WorldState';
export type { WorldState } from './engine/strategic/state/WorldState';
export { WorldEventBus } from './engine/strategic/WorldEventBus';
export type { WorldEventMap } from './engine/strategic/WorldEventBus';
export { PathPlanner, ReachabilitySet, reconstructPath } from './engine/strategic/systems/PathPlanner';
export { TargetScorer } from './engine/strategic/systems/TargetScorer';
export { TurnOrchestrator, pickBestCandidate } from './engine/strategic/systems/TurnOrchestrator';
export type { TurnOrchestratorDeps } from './engine/strategic/systems/TurnOrchestrator';
export { AICoordinator } from './engine/coordinator/AICoordinator';
export type { AICoordinatorOptions } from './engine/coordinator/AICoordinator';
export { PriorityQueue } from './engine/utils/PriorityQueue';
export { Logger } from './engine/utils/Logger';
