// ─────────────────────────────────────────────
//  Move Army Action — Step an army into an adjacent region
// ─────────────────────────────────────────────

import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';
import type { RegionId } from '../../data/types/World';
import { relocateArmy } from '../../systems/ArmySystem';

export class MoveArmyAction implements WorldAction {
  readonly type = 'MOVE_ARMY';

  constructor(
    private readonly armyId: string,
    private readonly toRegion: RegionId,
    private readonly adjacency: readonly RegionId[][],
  ) {}

  validate(state: WorldState): boolean {
    const army = state.armies[this.armyId];
    if (!army) return false;
    if (!state.territories[this.toRegion]) return false;
    // Destination must border the army's current region
    return this.adjacency[army.locationRegionId]?.includes(this.toRegion) ?? false;
  }

  execute(state: WorldState): WorldState {
    return relocateArmy(state, this.armyId, this.toRegion);
  }
}
