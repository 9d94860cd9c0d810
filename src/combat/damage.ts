import { bossDamageBonus, type BossPhase } from '../boss/phase.ts';
import { isBoss, type Entity, type Item } from '../entities/types.ts';
import { levelBonus } from '../items/weapons.ts';
import { randomInt, type RandomSource } from '../rng.ts';

export interface PlayerAttackContext {
  readonly weapon: Item | null;
  readonly level: number;
  readonly random: RandomSource;
}

export interface MonsterAttackContext {
  readonly level: number;
  readonly bossPhase: BossPhase;
  readonly random: RandomSource;
}

/** d4 + equipped weapon power + level bonus. */
export function rollPlayerDamage({ weapon, level, random }: PlayerAttackContext): number {
  return randomInt(random, 1, 4) + (weapon?.power ?? 0) + levelBonus(level);
}

/** d3 + level bonus, and the phase bonus when the attacker is the boss. */
export function rollMonsterDamage(attacker: Entity, { level, bossPhase, random }: MonsterAttackContext): number {
  const base = randomInt(random, 1, 3) + levelBonus(level);
  return isBoss(attacker) ? base + bossDamageBonus(bossPhase) : base;
}
