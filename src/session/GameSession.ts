import { resolveGameConfig, type GameConfigOverrides } from '../core/config.ts';
import { isGameOver, type GameState } from '../core/GameState.ts';
import { applyAction, createTelemetrySink, newGame, parseCommand } from '../game.ts';
import type { RandomSource } from '../rng.ts';
import { snapshot, type StateSnapshot } from '../state/snapshot.ts';
import type { TelemetrySink } from '../telemetry/TelemetrySink.ts';

export interface GameSessionOptions {
  readonly config?: GameConfigOverrides;
  readonly random?: RandomSource;
  readonly telemetry?: TelemetrySink;
}

/**
 * The one running game behind the web layer. A command sent after the player
 * died, or an explicit `restart`, replaces the game with a fresh one; every
 * game in the session shares a single telemetry sink.
 */
export class GameSession {
  private game: GameState;
  private readonly overrides: GameConfigOverrides;
  private readonly random: RandomSource | undefined;
  private readonly telemetry: TelemetrySink;

  constructor(options: GameSessionOptions = {}) {
    this.overrides = options.config ?? {};
    this.random = options.random;
    this.telemetry = options.telemetry ?? createTelemetrySink(resolveGameConfig(this.overrides));
    this.game = this.startGame();
  }

  get state(): GameState {
    return this.game;
  }

  snapshot(): StateSnapshot {
    return snapshot(this.game);
  }

  restart(): StateSnapshot {
    this.game = this.startGame();
    return this.snapshot();
  }

  /** Handles one raw command and returns the resulting snapshot. Unknown commands change nothing. */
  handleCommand(input: unknown): StateSnapshot {
    if (isGameOver(this.game)) {
      return this.restart();
    }
    const action = parseCommand(input);
    if (!action) {
      return this.snapshot();
    }
    if (action.type === 'restart') {
      return this.restart();
    }
    applyAction(this.game, action);
    return this.snapshot();
  }

  close(): void {
    this.telemetry.close();
  }

  private startGame(): GameState {
    return newGame(this.overrides, { random: this.random, telemetry: this.telemetry });
  }
}
