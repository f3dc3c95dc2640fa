// ─────────────────────────────────────────────
//  Reinforce Army Action — Refill troops at an owned stronghold
// ─────────────────────────────────────────────

import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';
import type { WorldMapData } from '../../data/types/World';
import { refillArmy } from '../../systems/ArmySystem';

export class ReinforceArmyAction implements WorldAction {
  readonly type = 'REINFORCE_ARMY';

  constructor(
    private readonly armyId: string,
    private readonly worldMap: WorldMapData,
  ) {}

  validate(state: WorldState): boolean {
    const army = state.armies[this.armyId];
    if (!army) return false;
    const region = this.worldMap.regions[army.locationRegionId];
    if (!region?.stronghold) return false;
    return state.territories[army.locationRegionId]?.owner === army.factionId;
  }

  execute(state: WorldState): WorldState {
    return refillArmy(state, this.armyId);
  }
}
