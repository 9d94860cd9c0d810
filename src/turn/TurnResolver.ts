import { runMonsterTurns } from '../ai/MonsterScheduler.ts';
import { advanceBossPhase } from '../boss/phase.ts';
import { rollPlayerDamage } from '../combat/damage.ts';
import { isGameOver, monsterAt, type GameState } from '../core/GameState.ts';
import { isBoss, type Entity } from '../entities/types.ts';
import { queueEvent, queueStateTelemetry } from '../telemetry/stateTelemetry.ts';
import { descend } from '../world/LevelGenerator.ts';
import { isWithinGrid, tileAt } from '../world/tiles.ts';
import { resolvePickup } from './pickup.ts';

export type TurnAction =
  | { readonly type: 'move'; readonly dx: number; readonly dy: number }
  | { readonly type: 'wait' }
  | { readonly type: 'restart' };

export const EDGE_BUMP_MESSAGE = 'You bump into the edge of the concrete grid.';
export const WALL_BUMP_MESSAGE = 'Your shoulder hits raw concrete.';
export const DESCEND_MESSAGE = 'You step onto the stairwell and descend.';
export const WAIT_MESSAGE = 'You wait and feel the structure hum.';
export const BOSS_DEFEAT_MESSAGE = 'Nezha discards this concrete body. The pattern sinks deeper.';

export function isCardinalStep(dx: number, dy: number): boolean {
  return (Math.abs(dx) === 1 && dy === 0) || (dx === 0 && Math.abs(dy) === 1);
}

function attackMonster(state: GameState, target: Entity): void {
  const damage = rollPlayerDamage({
    weapon: state.equippedWeapon,
    level: state.level,
    random: state.deps.random
  });
  target.hp -= damage;
  state.messages.push(`You hit the ${target.name} for ${damage} damage!`);

  if (target.hp <= 0) {
    if (isBoss(target)) {
      state.messages.push(BOSS_DEFEAT_MESSAGE);
      state.bossPhase = advanceBossPhase(state.bossPhase);
      queueEvent(state, 'nezha_phase_end');
    } else {
      state.messages.push(`The ${target.name} dies.`);
    }
  }

  runMonsterTurns(state);
  queueStateTelemetry(state, 'player_attack');
}

/**
 * Resolves a step in one cardinal direction. Checked in order: the grid edge,
 * a living monster (attack), stairs (descend), floor (move and pick up), and
 * anything else as a wall. Bumps and descents do not give monsters a turn.
 */
export function movePlayer(state: GameState, dx: number, dy: number): void {
  const { player } = state;
  const nx = player.x + dx;
  const ny = player.y + dy;

  if (!isWithinGrid(state.tiles, nx, ny)) {
    state.messages.push(EDGE_BUMP_MESSAGE);
    queueStateTelemetry(state, 'bump_edge');
    return;
  }

  const target = monsterAt(state, nx, ny);
  if (target) {
    attackMonster(state, target);
    return;
  }

  const tile = tileAt(state.tiles, nx, ny);
  if (tile === 'stairs') {
    state.messages.push(DESCEND_MESSAGE);
    descend(state);
    return;
  }

  if (tile === 'floor') {
    player.x = nx;
    player.y = ny;
    resolvePickup(state);
    runMonsterTurns(state);
    queueStateTelemetry(state, 'player_move');
    return;
  }

  state.messages.push(WALL_BUMP_MESSAGE);
  queueStateTelemetry(state, 'bump_wall');
}

export function waitTurn(state: GameState): void {
  state.messages.push(WAIT_MESSAGE);
  runMonsterTurns(state);
  queueStateTelemetry(state, 'wait');
}

/**
 * Applies one player action. Restarts belong to the caller, and nothing
 * happens once the player is dead or for a step that is not a unit cardinal.
 */
export function resolveAction(state: GameState, action: TurnAction): void {
  if (isGameOver(state)) {
    return;
  }
  switch (action.type) {
    case 'move':
      if (isCardinalStep(action.dx, action.dy)) {
        movePlayer(state, action.dx, action.dy);
      }
      return;
    case 'wait':
      waitTurn(state);
      return;
    case 'restart':
      return;
  }
}
