// ─────────────────────────────────────────────
//  Path Planner — Dijkstra over the region graph
//  reachableRegions: every region within an MP horizon (exhaustive)
//  shortestPath:     one target, stops on first pop of the target
//  Edge weight a→b = territory.enterCost(b, player).
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { PathResult, ReachableRegion } from '../data/types/Planning';
import type { ITerritoryService } from '../services/ITerritoryService';
import { IMPASSABLE } from '../services/ITerritoryService';
import type { PlanningConfig } from '@/config';
import { PriorityQueue } from '@/engine/utils/PriorityQueue';
import { Logger } from '@/engine/utils/Logger';

interface QueueEntry {
  regionId: RegionId;
  cost: number;
}

const NO_PARENT = -1;

/** Dense search tables indexed by region id. */
interface SearchTables {
  cost: Float64Array;
  parent: Int32Array;
  finalized: Uint8Array;
}

/**
 * Regions reachable within a horizon. Backed by dense arrays, so lookups
 * never need an existence check beyond the cost sentinel.
 */
export class ReachabilitySet {
  constructor(
    readonly start: RegionId,
    readonly horizon: number,
    private readonly costs: Float64Array,
    private readonly parents: Int32Array,
    private readonly maxPathLength: number,
    /** True when the iteration cap cut the search short. */
    readonly partial: boolean,
  ) {}

  has(id: RegionId): boolean {
    const cost = this.costs[id];
    return cost !== undefined && Number.isFinite(cost) && cost <= this.horizon;
  }

  get(id: RegionId): ReachableRegion | undefined {
    if (!this.has(id)) return undefined;
    const parent = this.parents[id] ?? NO_PARENT;
    return {
      regionId: id,
      cost: this.costs[id] ?? IMPASSABLE,
      parent: parent === NO_PARENT ? null : parent,
    };
  }

  costOf(id: RegionId): number {
    return this.has(id) ? (this.costs[id] ?? IMPASSABLE) : IMPASSABLE;
  }

  /** start → id inclusive, or [] if id is not in the set. */
  pathTo(id: RegionId): RegionId[] {
    if (!this.has(id)) return [];
    return reconstructPath(this.parents, this.start, id, this.maxPathLength);
  }

  /** All entries, ascending region id. */
  entries(): ReachableRegion[] {
    const out: ReachableRegion[] = [];
    for (let id = 0; id < this.costs.length; id++) {
      const entry = this.get(id);
      if (entry) out.push(entry);
    }
    return out;
  }

  get size(): number {
    let n = 0;
    for (let id = 0; id < this.costs.length; id++) {
      if (this.has(id)) n++;
    }
    return n;
  }
}

/**
 * Walk parent pointers from target back to start, then reverse.
 * A chain longer than maxLength means the parents are cyclic or corrupt:
 * abort with an empty path.
 */
export function reconstructPath(
  parents: Int32Array,
  start: RegionId,
  target: RegionId,
  maxLength: number,
): RegionId[] {
  const path: RegionId[] = [];
  let current = target;

  while (current !== NO_PARENT) {
    if (path.length >= maxLength) {
      Logger.warn(`[PathPlanner] Malformed parent chain ${start} → ${target}; path discarded`);
      return [];
    }
    path.push(current);
    if (current === start) break;
    current = parents[current] ?? NO_PARENT;
  }

  if (path[path.length - 1] !== start) return [];
  return path.reverse();
}

export class PathPlanner {
  /** Reused across searches; cleared at the start of each. */
  private readonly queue = new PriorityQueue<QueueEntry>(e => e.cost);

  constructor(
    private readonly territory: ITerritoryService,
    private readonly config: PlanningConfig,
  ) {}

  /**
   * Every region whose optimal cost from `start` is ≤ horizon.
   * Must run to exhaustion: the caller wants all of them.
   */
  reachableRegions(start: RegionId, playerId: string, horizon: number): ReachabilitySet {
    const tables = this.newTables();
    this.assertRegion(start, tables);

    const partial = !this.search(start, playerId, horizon, null, this.config.reachableIterationCap, tables);
    if (partial) {
      Logger.warn(
        `[PathPlanner] reachableRegions(${start}, ${playerId}, ${horizon}) hit the iteration cap; returning partial set`,
      );
    }

    return new ReachabilitySet(
      start, horizon, tables.cost, tables.parent, this.config.maxPathLength, partial,
    );
  }

  /**
   * Cheapest route start → target. Returns on the first pop of target:
   * with non-negative weights that pop is already optimal.
   */
  shortestPath(start: RegionId, target: RegionId, playerId: string): PathResult {
    if (start === target) return { success: true, path: [start], cost: 0 };

    const tables = this.newTables();
    this.assertRegion(start, tables);
    if (target < 0 || target >= tables.cost.length) return { success: false, path: [], cost: IMPASSABLE };

    const completed = this.search(start, playerId, Infinity, target, this.config.pathIterationCap, tables);
    if (!completed) {
      Logger.warn(`[PathPlanner] shortestPath(${start} → ${target}) hit the iteration cap`);
    }

    if (tables.finalized[target] !== 1) return { success: false, path: [], cost: IMPASSABLE };

    const path = reconstructPath(tables.parent, start, target, this.config.maxPathLength);
    if (path.length === 0) return { success: false, path: [], cost: IMPASSABLE };

    return { success: true, path, cost: tables.cost[target] ?? IMPASSABLE };
  }

  /**
   * Longest prefix of `path` whose cumulative enter cost fits the budget.
   * Costs are re-read: ownership or terrain may have changed since planning.
   */
  trimPathToBudget(path: readonly RegionId[], playerId: string, budget: number): RegionId[] {
    const first = path[0];
    if (first === undefined) return [];

    const trimmed: RegionId[] = [first];
    let spent = 0;

    for (let i = 1; i < path.length; i++) {
      const step = path[i];
      if (step === undefined) break;
      const cost = this.territory.enterCost(step, playerId);
      if (cost === IMPASSABLE || spent + cost > budget) break;
      spent += cost;
      trimmed.push(step);
    }

    return trimmed;
  }

  /** Current total enter cost of a path; IMPASSABLE if any step is blocked. */
  pathCost(path: readonly RegionId[], playerId: string): number {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
      const step = path[i];
      if (step === undefined) return IMPASSABLE;
      const cost = this.territory.enterCost(step, playerId);
      if (cost === IMPASSABLE) return IMPASSABLE;
      total += cost;
    }
    return total;
  }

  // ── Internals ──────────────────────────────

  private newTables(): SearchTables {
    const n = this.territory.regionCount();
    return {
      cost: new Float64Array(n).fill(Infinity),
      parent: new Int32Array(n).fill(NO_PARENT),
      finalized: new Uint8Array(n),
    };
  }

  private assertRegion(id: RegionId, tables: SearchTables): void {
    if (!Number.isInteger(id) || id < 0 || id >= tables.cost.length) {
      throw new Error(`[PathPlanner] Unknown region id ${id}`);
    }
  }

  /**
   * Shared Dijkstra loop. Fills `tables` in place.
   * Returns false when the iteration cap stopped it early.
   */
  private search(
    start: RegionId,
    playerId: string,
    horizon: number,
    target: RegionId | null,
    iterationCap: number,
    tables: SearchTables,
  ): boolean {
    const { cost, parent, finalized } = tables;
    const queue = this.queue;
    queue.clear();

    cost[start] = 0;
    queue.insert({ regionId: start, cost: 0 });

    let iterations = 0;

    while (!queue.isEmpty()) {
      if (iterations >= iterationCap) return false;
      iterations++;

      const entry = queue.extractMin();
      if (!entry) break;
      const current = entry.regionId;

      // Lazy deletion: stale duplicates of finalized regions are skipped
      if (finalized[current] === 1) continue;
      finalized[current] = 1;

      if (current === target) return true;

      const currentCost = cost[current] ?? Infinity;

      for (const neighbor of this.territory.neighborRegions(current)) {
        if (finalized[neighbor] === 1) continue;

        const step = this.territory.enterCost(neighbor, playerId);
        if (step === IMPASSABLE || step < 0) continue;

        const next = currentCost + step;
        if (next > horizon) continue;
        // cost[] holds the cheapest queued entry, so anything not strictly better is dropped
        if (next >= (cost[neighbor] ?? Infinity)) continue;

        cost[neighbor] = next;
        parent[neighbor] = current;
        queue.insert({ regionId: neighbor, cost: next });
      }
    }

    return true;
  }
}
