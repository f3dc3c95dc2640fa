// ─────────────────────────────────────────────
//  World Event Bus — Strategic layer events
//  Observers (renderers, replays, tests) subscribe here;
//  the AI never reads back from it.
// ─────────────────────────────────────────────

import type { RegionId } from './data/types/World';
import type { BattleVerdict } from './data/types/Battle';
import type { MoveGoal } from './data/types/Planning';

export interface WorldEventMap {
  turnStarted:      { playerId: string; turn: number };
  movePrepared:     { armyId: string; targetRegionId: RegionId; path: RegionId[]; mpCost: number; goal: MoveGoal };
  moveStarted:      { armyId: string; path: RegionId[]; mpSpent: number };
  armyMoved:        { armyId: string; fromRegion: RegionId; toRegion: RegionId };
  armyReinforced:   { armyId: string; regionId: RegionId };
  battleStarted:    { armyId: string; regionId: RegionId };
  battleEnded:      { armyId: string; regionId: RegionId; verdict: BattleVerdict };
  regionConquered:  { regionId: RegionId; oldOwner: string | null; newOwner: string };
  turnFinished:     { playerId: string; turn: number; moves: number };
  logMessage:       { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerTable = { [K in keyof WorldEventMap]?: Listener<WorldEventMap[K]>[] };

class TypedWorldEventBus {
  private listeners: ListenerTable = {};

  on<K extends keyof WorldEventMap>(
    event: K,
    listener: Listener<WorldEventMap[K]>,
  ): void {
    const arr: NonNullable<ListenerTable[K]> = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof WorldEventMap>(
    event: K,
    listener: Listener<WorldEventMap[K]>,
  ): void {
    const arr: Listener<WorldEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof WorldEventMap>(event: K, payload: WorldEventMap[K]): void {
    const arr: Listener<WorldEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  clear(): void {
    this.listeners = {};
  }
}

export const WorldEventBus = new TypedWorldEventBus();
