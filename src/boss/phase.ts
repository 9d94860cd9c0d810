/**
 * Progression of the recurring boss. The phase counts how many times the boss
 * has been defeated across levels; each defeat toughens the next incarnation
 * until the final phase, after which it no longer appears.
 */

export type BossPhase = 0 | 1 | 2 | 3;

export const BOSS_MAX_PHASE: BossPhase = 3;
export const BOSS_FIRST_LEVEL = 2;
export const BOSS_GLYPH = 'N';
export const BOSS_NAME = 'Nezha';

export function advanceBossPhase(phase: BossPhase): BossPhase {
  switch (phase) {
    case 0:
      return 1;
    case 1:
      return 2;
    default:
      return BOSS_MAX_PHASE;
  }
}

export function shouldSpawnBoss(level: number, phase: BossPhase): boolean {
  return level >= BOSS_FIRST_LEVEL && phase < BOSS_MAX_PHASE;
}

export function bossHitPoints(phase: BossPhase): number {
  return 8 + phase * 5;
}

export function bossDamageBonus(phase: BossPhase): number {
  return 1 + phase;
}
