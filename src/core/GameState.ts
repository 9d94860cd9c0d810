/**
 * The single mutable root of a game. Every operation receives the state by
 * reference; nothing else holds copies of entity data.
 */
import type { BossPhase } from '../boss/phase.ts';
import { createPlayer } from '../entities/factories.ts';
import type { Entity, Item } from '../entities/types.ts';
import type { RandomSource } from '../rng.ts';
import type { TelemetryMessage } from '../telemetry/osc.ts';
import type { TelemetrySink } from '../telemetry/TelemetrySink.ts';
import { announceLevel, generateLevelFor } from '../world/LevelGenerator.ts';
import type { TileGrid } from '../world/tiles.ts';
import type { GameConfig } from './config.ts';

export interface GameDependencies {
  readonly random: RandomSource;
  readonly telemetry: TelemetrySink;
}

export interface GameState {
  readonly config: GameConfig;
  readonly deps: GameDependencies;
  tiles: TileGrid;
  readonly player: Entity;
  monsters: Entity[];
  items: Item[];
  /** Append-only log, oldest first. */
  readonly messages: string[];
  level: number;
  /** Weapons in pickup order. */
  readonly inventory: Item[];
  /** Always an element of {@link inventory} when set. */
  equippedWeapon: Item | null;
  monsterTurnCounter: number;
  bossPhase: BossPhase;
  /** Messages waiting for the end-of-action flush. */
  readonly telemetryOutbox: TelemetryMessage[];
}

/** Builds level one. Telemetry for it is queued, not sent. */
export function createGameState(config: GameConfig, deps: GameDependencies): GameState {
  const generated = generateLevelFor({ config, deps, level: 1, bossPhase: 0 });
  const state: GameState = {
    config,
    deps,
    tiles: generated.tiles,
    player: createPlayer(generated.playerStart, config.maxHp),
    monsters: generated.monsters,
    items: generated.items,
    messages: [],
    level: 1,
    inventory: [],
    equippedWeapon: null,
    monsterTurnCounter: 0,
    bossPhase: 0,
    telemetryOutbox: []
  };
  announceLevel(state, generated, true);
  return state;
}

export function isGameOver(state: GameState): boolean {
  return state.player.hp <= 0;
}

export function monsterAt(state: GameState, x: number, y: number): Entity | null {
  return state.monsters.find((monster) => monster.hp > 0 && monster.x === x && monster.y === y) ?? null;
}

export function itemAt(state: GameState, x: number, y: number): Item | null {
  return state.items.find((item) => item.x === x && item.y === y) ?? null;
}
