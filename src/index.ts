export {
  applyAction,
  createTelemetrySink,
  DIRECTION_VECTORS,
  newGame,
  parseCommand,
  snapshot,
  type Direction,
  type PlayerAction,
  type StateSnapshot
} from './game.ts';
export {
  DEFAULT_GAME_CONFIG,
  GameConfigError,
  resolveGameConfig,
  type GameConfig,
  type GameConfigOverrides,
  type TelemetryConfig
} from './core/config.ts';
export { isGameOver, type GameDependencies, type GameState } from './core/GameState.ts';
export type { Entity, EntityRole, Item, ItemKind, Position } from './entities/types.ts';
export { BOSS_MAX_PHASE, type BossPhase } from './boss/phase.ts';
export { generateLevel, LevelGenerationError, type GeneratedLevel } from './world/LevelGenerator.ts';
export type { TileGrid, TileType } from './world/tiles.ts';
export { resolveAction, type TurnAction } from './turn/TurnResolver.ts';
export { runMonsterTurns } from './ai/MonsterScheduler.ts';
export {
  encodeOscMessage,
  floatArg,
  intArg,
  stringArg,
  type OscArgument,
  type TelemetryMessage
} from './telemetry/osc.ts';
export {
  NullTelemetrySink,
  RecordingTelemetrySink,
  UdpTelemetrySink,
  type TelemetrySink
} from './telemetry/TelemetrySink.ts';
export { GameSession, type GameSessionOptions } from './session/GameSession.ts';
export { createSeededRandom, type RandomSource } from './rng.ts';
