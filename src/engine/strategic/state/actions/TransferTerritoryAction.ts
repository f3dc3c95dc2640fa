// ─────────────────────────────────────────────
//  Transfer Territory Action
//  Announcing the conquest is the caller's job (TurnOrchestrator).
// ─────────────────────────────────────────────

import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';
import type { RegionId } from '../../data/types/World';
import { transferTerritory } from '../../systems/TerritorySystem';

export class TransferTerritoryAction implements WorldAction {
  readonly type = 'TRANSFER_TERRITORY';

  constructor(
    private readonly regionId: RegionId,
    private readonly newOwner: string,
  ) {}

  validate(state: WorldState): boolean {
    const territory = state.territories[this.regionId];
    if (!territory) return false;
    if (territory.owner === this.newOwner) return false;
    return state.factions.includes(this.newOwner);
  }

  execute(state: WorldState): WorldState {
    return transferTerritory(state, this.regionId, this.newOwner);
  }
}
