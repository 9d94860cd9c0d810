import { itemAt, type GameState } from '../core/GameState.ts';
import type { Item } from '../entities/types.ts';
import { queueStateTelemetry } from '../telemetry/stateTelemetry.ts';

/** Equips `weapon` when it strictly beats the current one. Returns whether it was equipped. */
export function autoEquipWeapon(state: GameState, weapon: Item): boolean {
  const current = state.equippedWeapon;
  if (current && weapon.power <= current.power) {
    return false;
  }
  state.equippedWeapon = weapon;
  state.messages.push(`You wield the ${weapon.name}.`);
  return true;
}

/** Amount a potion of `power` would restore without exceeding max hit points. */
export function healAmount(state: GameState, power: number): number {
  return Math.min(state.config.maxHp - state.player.hp, power);
}

/**
 * Collects whatever lies under the player. Weapons go to the inventory and may
 * be wielded; potions are drunk on the spot.
 */
export function resolvePickup(state: GameState): void {
  const { player } = state;
  const item = itemAt(state, player.x, player.y);
  if (!item) {
    return;
  }
  state.items = state.items.filter((candidate) => candidate !== item);

  if (item.kind === 'weapon') {
    state.inventory.push(item);
    state.messages.push(`You pick up a ${item.name}.`);
    autoEquipWeapon(state, item);
    queueStateTelemetry(state, 'pickup_weapon');
    return;
  }

  const healed = healAmount(state, item.power);
  if (healed > 0) {
    player.hp += healed;
    state.messages.push(`Concrete dust washes from your lungs. (+${healed} HP)`);
  } else {
    state.messages.push('You drink, but feel no different.');
  }
  queueStateTelemetry(state, 'pickup_potion');
}
