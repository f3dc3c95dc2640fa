// ─────────────────────────────────────────────
//  StoreArmyMover — IMover for one army in WorldStore
//  Reads through to the store on every call; never caches army state.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { ArmyState } from '../data/types/Army';
import type { WorldStore } from '../state/WorldStore';
import type { IArmyRoster, IMover } from './IMover';
import { WorldStateQuery } from '../state/WorldState';
import { MoveArmyAction } from '../state/actions/MoveArmyAction';
import { SpendMovementAction } from '../state/actions/SpendMovementAction';

export class StoreArmyMover implements IMover {
  constructor(
    private readonly store: WorldStore,
    private readonly id: string,
    private readonly adjacency: readonly RegionId[][],
  ) {}

  armyId(): string {
    return this.id;
  }

  playerId(): string {
    return this.army().factionId;
  }

  currentRegion(): RegionId {
    return this.army().locationRegionId;
  }

  movementPoints(): number {
    return this.army().movementPoints;
  }

  spendMovementPoints(cost: number): void {
    if (!this.store.dispatch(new SpendMovementAction(this.id, cost))) {
      throw new Error(`[StoreArmyMover] ${this.id} cannot spend ${cost} MP`);
    }
  }

  relocateTo(id: RegionId): void {
    if (!this.store.dispatch(new MoveArmyAction(this.id, id, this.adjacency))) {
      throw new Error(`[StoreArmyMover] ${this.id} cannot move to region ${id}`);
    }
  }

  private army(): ArmyState {
    const army = WorldStateQuery.army(this.store.getState(), this.id);
    if (!army) throw new Error(`[StoreArmyMover] Army ${this.id} no longer exists`);
    return army;
  }
}

export class WorldArmyRoster implements IArmyRoster {
  constructor(
    private readonly store: WorldStore,
    private readonly adjacency: readonly RegionId[][],
  ) {}

  moversOf(playerId: string): IMover[] {
    return WorldStateQuery.armiesOfFaction(this.store.getState(), playerId)
      .map(a => new StoreArmyMover(this.store, a.id, this.adjacency));
  }
}
