import { resolveGameConfig, type GameConfig, type GameConfigOverrides } from './core/config.ts';
import { createGameState, type GameDependencies, type GameState } from './core/GameState.ts';
import type { Position } from './entities/types.ts';
import { flushTelemetry, queueStateTelemetry } from './telemetry/stateTelemetry.ts';
import { NullTelemetrySink, UdpTelemetrySink, type TelemetrySink } from './telemetry/TelemetrySink.ts';
import { resolveAction } from './turn/TurnResolver.ts';

export type Direction = 'up' | 'down' | 'left' | 'right';

export type PlayerAction =
  | { readonly type: 'move'; readonly direction: Direction }
  | { readonly type: 'wait' }
  | { readonly type: 'restart' };

export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = Object.freeze({
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 }
});

function isDirection(value: string): value is Direction {
  return Object.prototype.hasOwnProperty.call(DIRECTION_VECTORS, value);
}

/** Maps a raw command string (`up`, `wait`, `restart`, ...) to an action, or `null`. */
export function parseCommand(input: unknown): PlayerAction | null {
  if (typeof input !== 'string') {
    return null;
  }
  const command = input.trim().toLowerCase();
  if (isDirection(command)) {
    return { type: 'move', direction: command };
  }
  if (command === 'wait' || command === 'restart') {
    return { type: command };
  }
  return null;
}

/**
 * Sink selected by the telemetry section of the config. Each UDP sink owns a
 * socket; callers that create many games should share one sink.
 */
export function createTelemetrySink(config: GameConfig): TelemetrySink {
  if (!config.telemetry.enabled) {
    return new NullTelemetrySink();
  }
  return new UdpTelemetrySink({ host: config.telemetry.host, port: config.telemetry.port });
}

export function newGame(
  overrides: GameConfigOverrides = {},
  deps: Partial<GameDependencies> = {}
): GameState {
  const config = resolveGameConfig(overrides);
  const state = createGameState(config, {
    random: deps.random ?? Math.random,
    telemetry: deps.telemetry ?? createTelemetrySink(config)
  });
  queueStateTelemetry(state, 'game_start');
  flushTelemetry(state);
  return state;
}

/** Applies one action and flushes the telemetry it produced. Unknown actions are ignored. */
export function applyAction(state: GameState, action: PlayerAction): void {
  switch (action.type) {
    case 'move': {
      const vector: Position | undefined = DIRECTION_VECTORS[action.direction];
      if (vector) {
        resolveAction(state, { type: 'move', dx: vector.x, dy: vector.y });
      }
      break;
    }
    case 'wait':
      resolveAction(state, { type: 'wait' });
      break;
    case 'restart':
      break;
  }
  flushTelemetry(state);
}

export { snapshot, type StateSnapshot } from './state/snapshot.ts';
