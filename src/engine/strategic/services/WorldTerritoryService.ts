// ─────────────────────────────────────────────
//  WorldTerritoryService — ITerritoryService over WorldStore
//  The map is static, so adjacency is built once.
// ─────────────────────────────────────────────

import type { RegionId, WorldMapData } from '../data/types/World';
import type { WorldStore } from '../state/WorldStore';
import type { PlanningConfig } from '@/config';
import type { ITerritoryService, RegionInfo } from './ITerritoryService';
import { TransferTerritoryAction } from '../state/actions/TransferTerritoryAction';
import {
  buildAdjacencyMap,
  findNearestOwnedStronghold,
  getEnterCost,
  getFrontierRegions,
} from '../systems/TerritorySystem';

export class WorldTerritoryService implements ITerritoryService {
  readonly adjacency: RegionId[][];

  constructor(
    private readonly store: WorldStore,
    private readonly worldMap: WorldMapData,
    private readonly config: PlanningConfig,
  ) {
    this.adjacency = buildAdjacencyMap(worldMap);
  }

  regionCount(): number {
    return this.worldMap.regions.length;
  }

  neighborRegions(id: RegionId): RegionId[] {
    return this.adjacency[id] ?? [];
  }

  regionOwner(id: RegionId): string | null {
    return this.store.getState().territories[id]?.owner ?? null;
  }

  frontierRegions(playerId: string): RegionId[] {
    return getFrontierRegions(this.adjacency, this.store.getState(), playerId);
  }

  enterCost(id: RegionId, playerId: string): number {
    return getEnterCost(this.worldMap, this.store.getState(), this.config, id, playerId);
  }

  nearestOwnedStronghold(from: RegionId, playerId: string): RegionId | null {
    return findNearestOwnedStronghold(
      this.worldMap, this.adjacency, this.store.getState(), this.config, from, playerId,
    );
  }

  isStronghold(id: RegionId): boolean {
    return this.worldMap.regions[id]?.stronghold === true;
  }

  regionInfo(id: RegionId): RegionInfo {
    const region = this.worldMap.regions[id];
    const territory = this.store.getState().territories[id];
    if (!region || !territory) throw new Error(`[WorldTerritoryService] Unknown region id ${id}`);

    return {
      id,
      tier: region.tier,
      population: territory.population,
      resources: territory.resources,
      owner: territory.owner,
      defenders: territory.defenders,
      stronghold: region.stronghold,
    };
  }

  setRegionOwner(id: RegionId, playerId: string): void {
    this.store.dispatch(new TransferTerritoryAction(id, playerId));
  }
}
