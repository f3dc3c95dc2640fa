// ─────────────────────────────────────────────
//  Battle Types — what the AI hands to, and gets back from, the battle layer
// ─────────────────────────────────────────────

import type { RegionId } from './World';

export type BattleVerdict = 'victory' | 'defeat' | 'draw';

export interface BattleContext {
  armyId: string;
  attackerId: string;             // Faction id
  defenderId: string | null;      // Region owner, null for neutral
  regionId: RegionId;
  defenders: number;
}

/** Resolves one battle; the orchestrator awaits exactly one at a time. */
export type BattleResolver = (battle: BattleContext) => Promise<BattleVerdict>;
