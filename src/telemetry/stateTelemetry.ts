import type { GameState } from '../core/GameState.ts';
import { isAlive } from '../entities/types.ts';
import { intArg, stringArg, type TelemetryMessage } from './osc.ts';

export type TelemetryEvent =
  | 'game_start'
  | 'new_level'
  | 'bump_edge'
  | 'bump_wall'
  | 'player_attack'
  | 'player_move'
  | 'pickup_weapon'
  | 'pickup_potion'
  | 'wait'
  | 'player_hit'
  | 'player_die'
  | 'nezha_spawn'
  | 'nezha_phase_end';

/**
 * The burst describing the current state: player, level, living monster
 * count, the triggering event and the latest log line. Values are captured
 * now, so a later flush still reports the state as it was at queue time.
 */
export function buildStateMessages(state: GameState, event?: TelemetryEvent): TelemetryMessage[] {
  const { player } = state;
  const messages: TelemetryMessage[] = [
    { address: '/player', args: [intArg(player.x), intArg(player.y), intArg(player.hp)] },
    { address: '/level', args: [intArg(state.level)] },
    { address: '/monsters', args: [intArg(state.monsters.filter(isAlive).length)] }
  ];
  if (event) {
    messages.push({ address: '/event', args: [stringArg(event)] });
  }
  const latest = state.messages[state.messages.length - 1];
  if (latest !== undefined) {
    messages.push({ address: '/message', args: [stringArg(latest)] });
  }
  return messages;
}

export function queueStateTelemetry(state: GameState, event?: TelemetryEvent): void {
  state.telemetryOutbox.push(...buildStateMessages(state, event));
}

/** Queues a lone `/event` message with no state burst around it. */
export function queueEvent(state: GameState, event: TelemetryEvent): void {
  state.telemetryOutbox.push({ address: '/event', args: [stringArg(event)] });
}

/**
 * Hands everything queued during the current operation to the sink and empties
 * the outbox. Sink errors never reach the caller.
 */
export function flushTelemetry(state: GameState): void {
  const pending = state.telemetryOutbox.splice(0, state.telemetryOutbox.length);
  for (const message of pending) {
    try {
      state.deps.telemetry.send(message);
    } catch (error) {
      console.warn(`Dropped telemetry message ${message.address}`, error);
    }
  }
}
