// ─────────────────────────────────────────────
//  Advance Turn Action — Increment world turn counter
//  Called once every faction has played its turn.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WorldAction } from '../WorldAction';
import type { WorldState } from '../WorldState';

export class AdvanceTurnAction implements WorldAction {
  readonly type = 'ADVANCE_TURN';

  validate(state: WorldState): boolean {
    return state.factions.length > 0;
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      draft.turn += 1;
    });
  }
}
