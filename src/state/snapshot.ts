import { isGameOver, type GameState } from '../core/GameState.ts';
import { isAlive, type ItemKind } from '../entities/types.ts';
import { renderRows } from '../world/tiles.ts';

export const SNAPSHOT_MESSAGE_LIMIT = 10;

export interface PlayerView {
  readonly x: number;
  readonly y: number;
  readonly glyph: string;
  readonly hp: number;
  readonly maxHp: number;
}

export interface MonsterView {
  readonly x: number;
  readonly y: number;
  readonly glyph: string;
  readonly name: string;
  readonly hp: number;
}

export interface GroundItemView {
  readonly x: number;
  readonly y: number;
  readonly glyph: string;
  readonly name: string;
  readonly kind: ItemKind;
  readonly power: number;
}

export interface InventoryEntryView {
  readonly name: string;
  readonly kind: ItemKind;
  readonly power: number;
}

/**
 * Field names are camelCase throughout: a web layer serving the older
 * snake_case payload maps `gameOver` to `game_over` and `maxHp` to `max_hp`.
 */
export interface StateSnapshot {
  readonly tiles: readonly string[];
  readonly player: PlayerView;
  readonly monsters: readonly MonsterView[];
  readonly items: readonly GroundItemView[];
  readonly messages: readonly string[];
  readonly gameOver: boolean;
  readonly level: number;
  readonly bossPhase: number;
  readonly weapon: { readonly name: string; readonly power: number } | null;
  readonly inventory: readonly InventoryEntryView[];
}

/** Read-only projection for the web layer. Nothing in it aliases the live state. */
export function snapshot(state: GameState): StateSnapshot {
  const { player, equippedWeapon } = state;
  return {
    tiles: renderRows(state.tiles),
    player: { x: player.x, y: player.y, glyph: player.glyph, hp: player.hp, maxHp: state.config.maxHp },
    monsters: state.monsters.filter(isAlive).map((monster) => ({
      x: monster.x,
      y: monster.y,
      glyph: monster.glyph,
      name: monster.name,
      hp: monster.hp
    })),
    items: state.items.map((item) => ({
      x: item.x,
      y: item.y,
      glyph: item.glyph,
      name: item.name,
      kind: item.kind,
      power: item.power
    })),
    messages: state.messages.slice(-SNAPSHOT_MESSAGE_LIMIT),
    gameOver: isGameOver(state),
    level: state.level,
    bossPhase: state.bossPhase,
    weapon: equippedWeapon ? { name: equippedWeapon.name, power: equippedWeapon.power } : null,
    inventory: state.inventory.map((item) => ({ name: item.name, kind: item.kind, power: item.power }))
  };
}
