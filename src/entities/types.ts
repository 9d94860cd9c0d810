export interface Position {
  x: number;
  y: number;
}

export type EntityRole = 'player' | 'monster' | 'boss';

export interface Entity extends Position {
  readonly role: EntityRole;
  readonly glyph: string;
  readonly name: string;
  hp: number;
}

export type ItemKind = 'weapon' | 'potion';

/** Ground item. `power` is the damage bonus for weapons and the heal amount for potions. */
export interface Item extends Position {
  readonly glyph: string;
  readonly name: string;
  readonly kind: ItemKind;
  readonly power: number;
}

export function isAlive(entity: Entity): boolean {
  return entity.hp > 0;
}

export function isBoss(entity: Entity): boolean {
  return entity.role === 'boss';
}

export function positionKey(x: number, y: number): string {
  return `${x},${y}`;
}
