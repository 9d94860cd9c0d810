import { rollMonsterDamage } from '../combat/damage.ts';
import { monsterAt, type GameState } from '../core/GameState.ts';
import { isAlive, isBoss, type Entity, type Position } from '../entities/types.ts';
import { chance, pickOne } from '../rng.ts';
import { queueStateTelemetry } from '../telemetry/stateTelemetry.ts';
import { isWalkableTile, tileAt } from '../world/tiles.ts';

export const BOSS_CHASE_BIAS = 0.9;
export const MONSTER_CHASE_BIAS = 0.75;

export const GAME_OVER_MESSAGE = 'You fall between slabs of concrete. Game over.';

/** Random fallback steps: the four cardinals plus standing still. */
const WANDER_STEPS: readonly Position[] = Object.freeze([
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
  { x: 0, y: 0 }
]);

export function chaseBias(monster: Entity): number {
  return isBoss(monster) ? BOSS_CHASE_BIAS : MONSTER_CHASE_BIAS;
}

/**
 * Monsters move on every second invocation. Returns whether this invocation
 * is an acting one and advances the counter.
 */
export function advanceMonsterClock(state: GameState): boolean {
  state.monsterTurnCounter += 1;
  return state.monsterTurnCounter % 2 === 0;
}

export function isWalkableForMonster(state: GameState, x: number, y: number): boolean {
  if (!isWalkableTile(tileAt(state.tiles, x, y))) {
    return false;
  }
  if (monsterAt(state, x, y)) {
    return false;
  }
  return !(state.player.x === x && state.player.y === y);
}

/** Greedy step toward the player with probability {@link chaseBias}, otherwise a random one. */
export function chooseStep(state: GameState, monster: Entity): Position {
  const { random } = state.deps;
  if (chance(random, chaseBias(monster))) {
    return {
      x: Math.sign(state.player.x - monster.x),
      y: Math.sign(state.player.y - monster.y)
    };
  }
  return pickOne(random, WANDER_STEPS);
}

function attackPlayer(state: GameState, monster: Entity): void {
  const damage = rollMonsterDamage(monster, {
    level: state.level,
    bossPhase: state.bossPhase,
    random: state.deps.random
  });
  state.player.hp -= damage;
  state.messages.push(`The ${monster.name} hits you for ${damage} damage!`);
  if (state.player.hp <= 0) {
    state.messages.push(GAME_OVER_MESSAGE);
    queueStateTelemetry(state, 'player_die');
  } else {
    queueStateTelemetry(state, 'player_hit');
  }
}

/**
 * One scheduler invocation. On acting invocations every living monster either
 * attacks the player (when its step lands on them), moves, or stays put; dead
 * monsters are then dropped from the level.
 */
export function runMonsterTurns(state: GameState): void {
  if (!advanceMonsterClock(state)) {
    return;
  }

  for (const monster of state.monsters) {
    if (!isAlive(monster)) {
      continue;
    }

    const step = chooseStep(state, monster);
    const nx = monster.x + step.x;
    const ny = monster.y + step.y;

    if (nx === state.player.x && ny === state.player.y) {
      attackPlayer(state, monster);
      continue;
    }

    if (isWalkableForMonster(state, nx, ny)) {
      monster.x = nx;
      monster.y = ny;
    }
  }

  state.monsters = state.monsters.filter(isAlive);
}
