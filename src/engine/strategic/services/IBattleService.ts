// ─────────────────────────────────────────────
//  IBattleService — Combat hand-off
//  Implementations: WorldBattleService, NullBattleService (headless)
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { BattleVerdict } from '../data/types/Battle';
import type { IMover } from './IMover';

export interface IBattleService {
  shouldTriggerBattle(mover: IMover, region: RegionId): boolean;
  startBattle(mover: IMover, region: RegionId): Promise<BattleVerdict>;
}
