// ─────────────────────────────────────────────
//  NullBattleService — Headless no-op IBattleService
//  Nothing is ever contested; used for planning previews and dry runs.
// ─────────────────────────────────────────────

import type { RegionId } from '../data/types/World';
import type { BattleVerdict } from '../data/types/Battle';
import type { IBattleService } from './IBattleService';
import type { IMover } from './IMover';

export class NullBattleService implements IBattleService {
  shouldTriggerBattle(_mover: IMover, _region: RegionId): boolean {
    return false;
  }

  async startBattle(_mover: IMover, _region: RegionId): Promise<BattleVerdict> {
    return 'draw';
  }
}
