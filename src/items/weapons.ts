import { pickOne, type RandomSource } from '../rng.ts';
import type { Item, Position } from '../entities/types.ts';

export interface WeaponBlueprint {
  readonly glyph: string;
  readonly name: string;
  readonly basePower: number;
}

export const WEAPON_TABLE: readonly WeaponBlueprint[] = Object.freeze([
  { glyph: '/', name: 'Rusty Dagger', basePower: 1 },
  { glyph: '/', name: 'Short Sword', basePower: 2 },
  { glyph: ')', name: 'War Axe', basePower: 3 },
  { glyph: ')', name: 'Crystal Blade', basePower: 4 }
]);

export const WEAPON_DROP_CHANCE = 2 / 3;

export const POTION_GLYPH = '!';
export const POTION_NAME = 'Healing Potion';

/** Bonus shared by weapon drops and both attack formulas: +1 every two levels past the first. */
export function levelBonus(level: number): number {
  return Math.floor(Math.max(0, level - 1) / 2);
}

export function potionPower(level: number): number {
  return 4 + level;
}

export function createWeapon(blueprint: WeaponBlueprint, level: number, at: Position): Item {
  return {
    x: at.x,
    y: at.y,
    glyph: blueprint.glyph,
    name: blueprint.name,
    kind: 'weapon',
    power: blueprint.basePower + levelBonus(level)
  };
}

export function createPotion(level: number, at: Position): Item {
  return {
    x: at.x,
    y: at.y,
    glyph: POTION_GLYPH,
    name: POTION_NAME,
    kind: 'potion',
    power: potionPower(level)
  };
}

/**
 * Rolls one ground item for the given level. The first roll decides the kind;
 * weapons consume a second roll against {@link WEAPON_TABLE}.
 */
export function rollItem(random: RandomSource, level: number, at: Position): Item {
  if (random() < WEAPON_DROP_CHANCE) {
    return createWeapon(pickOne(random, WEAPON_TABLE), level, at);
  }
  return createPotion(level, at);
}
