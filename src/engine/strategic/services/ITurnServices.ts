// ─────────────────────────────────────────────
//  Turn-start collaborators
//  The orchestrator only asks; policy lives in the implementations.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { IMover } from './IMover';

export interface IReinforcementService {
  needsReinforcement(mover: IMover): boolean;
  /** Refill the army in place. Only called while it stands on an owned stronghold. */
  refill(mover: IMover, stronghold: RegionId): void;
}

/** Turn-start resource / movement budget allocation. */
export interface ITurnStartAllocator {
  allocate(playerId: string): void;
}
