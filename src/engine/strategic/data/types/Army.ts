// ─────────────────────────────────────────────
//  Army State
//  id is stable for the whole session and seeds AI jitter;
//  name is display-only and may change.
// ─────────────────────────────────────────────

import type { RegionId } from './World';

export interface ArmyState {
  id: string;
  name: string;
  factionId: string;
  locationRegionId: RegionId;
  movementPoints: number;         // MP left this turn
  maxMovementPoints: number;      // MP granted at turn start
  strength: number;               // Current troops
  maxStrength: number;
}
