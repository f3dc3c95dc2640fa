// ─────────────────────────────────────────────
//  Spend Movement Action — Deduct MP after a move
// ─────────────────────────────────────────────

import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';
import { spendMovementPoints } from '../../systems/ArmySystem';

export class SpendMovementAction implements WorldAction {
  readonly type = 'SPEND_MOVEMENT';

  constructor(
    private readonly armyId: string,
    private readonly cost: number,
  ) {}

  validate(state: WorldState): boolean {
    const army = state.armies[this.armyId];
    if (!army) return false;
    if (!Number.isFinite(this.cost) || this.cost < 0) return false;
    return this.cost <= army.movementPoints;
  }

  execute(state: WorldState): WorldState {
    return spendMovementPoints(state, this.armyId, this.cost);
  }
}
