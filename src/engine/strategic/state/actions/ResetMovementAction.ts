// ─────────────────────────────────────────────
//  Reset Movement Action — Turn-start MP allocation for one faction
// ─────────────────────────────────────────────

import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';
import { resetMovementPoints } from '../../systems/ArmySystem';

export class ResetMovementAction implements WorldAction {
  readonly type = 'RESET_MOVEMENT';

  constructor(private readonly factionId: string) {}

  validate(state: WorldState): boolean {
    return state.factions.includes(this.factionId);
  }

  execute(state: WorldState): WorldState {
    return resetMovementPoints(state, this.factionId);
  }
}
