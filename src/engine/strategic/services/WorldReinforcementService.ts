// ─────────────────────────────────────────────
//  Reinforcement + turn-start allocation over WorldStore
// ─────────────────────────────────────────────

import type { RegionId, WorldMapData } from '../data/types/World';
import type { WorldStore } from '../state/WorldStore';
import type { PlanningConfig } from '@/config';
import type { IMover } from './IMover';
import type { IReinforcementService, ITurnStartAllocator } from './ITurnServices';
import { WorldStateQuery } from '../state/WorldState';
import { ReinforceArmyAction } from '../state/actions/ReinforceArmyAction';
import { ResetMovementAction } from '../state/actions/ResetMovementAction';
import { needsReinforcement } from '../systems/ArmySystem';
import { Logger } from '@/engine/utils/Logger';

export class WorldReinforcementService implements IReinforcementService {
  constructor(
    private readonly store: WorldStore,
    private readonly worldMap: WorldMapData,
    private readonly config: PlanningConfig,
  ) {}

  needsReinforcement(mover: IMover): boolean {
    const army = WorldStateQuery.army(this.store.getState(), mover.armyId());
    return army ? needsReinforcement(army, this.config.reinforcementThreshold) : false;
  }

  refill(mover: IMover, stronghold: RegionId): void {
    const accepted = this.store.dispatch(new ReinforceArmyAction(mover.armyId(), this.worldMap));
    if (!accepted) {
      Logger.warn(`[Reinforcement] ${mover.armyId()} cannot refill at region ${stronghold}`);
    }
  }
}

/** Gives every army of the player its full MP at turn start. */
export class MovementAllocator implements ITurnStartAllocator {
  constructor(private readonly store: WorldStore) {}

  allocate(playerId: string): void {
    this.store.dispatch(new ResetMovementAction(playerId));
  }
}
