// ─────────────────────────────────────────────
//  World Store — Strategic layer state management
//  Validated dispatch + subscribers
// ─────────────────────────────────────────────

import type { WorldState } from './WorldState';
import type { WorldAction } from './WorldAction';
import type { TerritoryState } from '../data/types/Territory';
import type { ArmyState } from '../data/types/Army';

type StoreListener = (state: WorldState) => void;

export class WorldStore {
  private state: WorldState = { turn: 1, factions: [], territories: [], armies: {} };
  private listeners: StoreListener[] = [];

  init(
    factions: string[],
    territories: TerritoryState[],
    armies: ArmyState[],
  ): void {
    const sorted = [...territories].sort((a, b) => a.id - b.id);
    sorted.forEach((t, i) => {
      if (t.id !== i) throw new Error(`[WorldStore] Region ids must be dense; expected ${i}, got ${t.id}`);
    });

    this.state = {
      turn: 1,
      factions: [...factions],
      territories: sorted,
      armies: Object.fromEntries(armies.map(a => [a.id, a])),
    };
    this.notify();
  }

  getState(): WorldState {
    return this.state;
  }

  /** Returns false when the action was rejected by validate(). */
  dispatch(action: WorldAction): boolean {
    if (!action.validate(this.state)) return false;

    const nextState = action.execute(this.state);
    if (nextState !== this.state) {
      this.state = nextState;
      this.notify();
    }
    return true;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
