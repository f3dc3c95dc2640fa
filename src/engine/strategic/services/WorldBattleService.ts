// ─────────────────────────────────────────────
//  WorldBattleService — decides when an arrival is contested
//  and hands the fight to an injected resolver.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { BattleResolver, BattleVerdict } from '../data/types/Battle';
import type { WorldStore } from '../state/WorldStore';
import type { IBattleService } from './IBattleService';
import type { IMover } from './IMover';

export class WorldBattleService implements IBattleService {
  constructor(
    private readonly store: WorldStore,
    private readonly resolver: BattleResolver,
  ) {}

  /** Rival-owned, or neutral with a garrison. */
  shouldTriggerBattle(mover: IMover, region: RegionId): boolean {
    const territory = this.store.getState().territories[region];
    if (!territory) return false;
    if (territory.owner === null) return territory.defenders > 0;
    return territory.owner !== mover.playerId();
  }

  startBattle(mover: IMover, region: RegionId): Promise<BattleVerdict> {
    const territory = this.store.getState().territories[region];
    return this.resolver({
      armyId: mover.armyId(),
      attackerId: mover.playerId(),
      defenderId: territory?.owner ?? null,
      regionId: region,
      defenders: territory?.defenders ?? 0,
    });
  }
}
