// ─────────────────────────────────────────────
//  Army System — Movement points, relocation, refill
//  Pure functions, no side effects beyond event emission.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { RegionId } from '../data/types/World';
import type { ArmyState } from '../data/types/Army';
import type { WorldState } from '../state/WorldState';
import { WorldEventBus } from '../WorldEventBus';

// --- Movement ---

/** Move an army one step. Ownership is untouched; capture is a battle outcome. */
export function relocateArmy(state: WorldState, armyId: string, toRegion: RegionId): WorldState {
  const army = state.armies[armyId];
  if (!army) return state;
  if (army.locationRegionId === toRegion) return state;

  const fromRegion = army.locationRegionId;
  const newState = produce(state, draft => {
    const a = draft.armies[armyId];
    if (a) a.locationRegionId = toRegion;
  });

  WorldEventBus.emit('armyMoved', { armyId, fromRegion, toRegion });
  return newState;
}

export function spendMovementPoints(state: WorldState, armyId: string, cost: number): WorldState {
  const army = state.armies[armyId];
  if (!army || cost <= 0) return state;

  return produce(state, draft => {
    const a = draft.armies[armyId];
    if (a) a.movementPoints = Math.max(0, a.movementPoints - cost);
  });
}

/** Turn-start allocation: every army of the faction gets its full MP back. */
export function resetMovementPoints(state: WorldState, factionId: string): WorldState {
  const stale = Object.values(state.armies).some(
    a => a.factionId === factionId && a.movementPoints !== a.maxMovementPoints,
  );
  if (!stale) return state;

  return produce(state, draft => {
    for (const a of Object.values(draft.armies)) {
      if (a.factionId === factionId) a.movementPoints = a.maxMovementPoints;
    }
  });
}

// --- Reinforcement ---

export function needsReinforcement(army: ArmyState, threshold: number): boolean {
  if (army.maxStrength <= 0) return false;
  return army.strength / army.maxStrength < threshold;
}

export function refillArmy(state: WorldState, armyId: string): WorldState {
  const army = state.armies[armyId];
  if (!army || army.strength >= army.maxStrength) return state;

  return produce(state, draft => {
    const a = draft.armies[armyId];
    if (a) a.strength = a.maxStrength;
  });
}
