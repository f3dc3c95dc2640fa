// ─────────────────────────────────────────────
//  IMover — One army as seen by the planner
//  Implementations: StoreArmyMover (store-backed)
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';

export interface IMover {
  /** Stable identifier. Seeds jitter, so it must not change between turns. */
  armyId(): string;
  playerId(): string;
  currentRegion(): RegionId;
  movementPoints(): number;
  /** Throws when cost exceeds the MP left. */
  spendMovementPoints(cost: number): void;
  /** Step into an adjacent region; throws for any other. Does not touch ownership. */
  relocateTo(id: RegionId): void;
}

export interface IArmyRoster {
  /** Armies of a player in a stable order (the order candidates are built in). */
  moversOf(playerId: string): IMover[];
}
