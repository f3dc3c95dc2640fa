// ─────────────────────────────────────────────
//  World Action — Command pattern for strategic layer
// ─────────────────────────────────────────────

import type { WorldState } from './WorldState';

export interface WorldAction {
  readonly type: string;
  execute(state: WorldState): WorldState;
  validate(state: WorldState): boolean;
}
