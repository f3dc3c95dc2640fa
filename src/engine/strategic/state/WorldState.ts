// ─────────────────────────────────────────────
//  World State — Immutable strategic layer state
//  territories is dense: territories[regionId].id === regionId
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { TerritoryState } from '../data/types/Territory';
import type { ArmyState } from '../data/types/Army';

export interface WorldState {
  readonly turn: number;
  readonly factions: readonly string[];     // Turn order
  readonly territories: readonly TerritoryState[];
  readonly armies: Readonly<Record<string, ArmyState>>;
}

// --- Query Utilities ---

export const WorldStateQuery = {
  army(state: WorldState, id: string): ArmyState | undefined {
    return state.armies[id];
  },

  /** Armies of a faction, sorted by id so iteration order is reproducible. */
  armiesOfFaction(state: WorldState, factionId: string): ArmyState[] {
    return Object.values(state.armies)
      .filter(a => a.factionId === factionId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  },

  regionsOwnedBy(state: WorldState, factionId: string): RegionId[] {
    return state.territories.filter(t => t.owner === factionId).map(t => t.id);
  },
};
