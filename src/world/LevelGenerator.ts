import type { GameState } from '../core/GameState.ts';
import { createBoss, createGoblin } from '../entities/factories.ts';
import type { Entity, Item, Position } from '../entities/types.ts';
import { shouldSpawnBoss, type BossPhase } from '../boss/phase.ts';
import { rollItem } from '../items/weapons.ts';
import { pickOne, type RandomSource } from '../rng.ts';
import { queueEvent, queueStateTelemetry } from '../telemetry/stateTelemetry.ts';
import { findFreeFloor, OccupancySet } from './placement.ts';
import { createWallGrid, findTiles, gridHeight, gridWidth, type TileGrid } from './tiles.ts';

export const WELCOME_MESSAGE = 'Welcome to the concrete caverns.';
export const LEVEL_SHIFT_MESSAGE = 'Concrete corridors shift below...';

const CARDINALS: readonly Position[] = Object.freeze([
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 }
]);

export interface LevelGenerationOptions {
  readonly width: number;
  readonly height: number;
  readonly level: number;
  readonly bossPhase: BossPhase;
  readonly monsterCount: number;
  readonly itemCount: number;
  readonly random: RandomSource;
}

export interface GeneratedLevel {
  readonly tiles: TileGrid;
  readonly playerStart: Position;
  readonly monsters: Entity[];
  readonly items: Item[];
  readonly stairs: Position;
  readonly bossSpawned: boolean;
}

export class LevelGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LevelGenerationError';
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Carves floor with a single random walk from the grid centre. The walker is
 * clamped to the interior, so the outer ring always stays wall and every
 * carved cell is connected to the start. When the walk leaves fewer than
 * `minFloor` floor cells, the cavern is grown outward until it has them or the
 * interior is exhausted.
 */
export function carveCavern(width: number, height: number, random: RandomSource, minFloor = 0): TileGrid {
  const tiles = createWallGrid(width, height);
  let x = Math.floor(width / 2);
  let y = Math.floor(height / 2);
  const steps = width * height * 4;

  for (let step = 0; step < steps; step += 1) {
    tiles[y][x] = 'floor';
    const direction = pickOne(random, CARDINALS);
    x = clamp(x + direction.x, 1, width - 2);
    y = clamp(y + direction.y, 1, height - 2);
  }

  growCavern(tiles, minFloor, random);
  return tiles;
}

function touchesFloor(tiles: TileGrid, x: number, y: number): boolean {
  return CARDINALS.some((direction) => tiles[y + direction.y]?.[x + direction.x] === 'floor');
}

/** Carves random interior walls bordering the cavern until `minFloor` cells are floor. */
export function growCavern(tiles: TileGrid, minFloor: number, random: RandomSource): void {
  const width = gridWidth(tiles);
  const height = gridHeight(tiles);
  let floor = findTiles(tiles, 'floor').length;

  while (floor < minFloor) {
    const frontier: Position[] = [];
    for (let y = 1; y < height - 1; y += 1) {
      for (let x = 1; x < width - 1; x += 1) {
        if (tiles[y][x] === 'wall' && touchesFloor(tiles, x, y)) {
          frontier.push({ x, y });
        }
      }
    }
    if (frontier.length === 0) {
      return;
    }
    const cell = pickOne(random, frontier);
    tiles[cell.y][cell.x] = 'floor';
    floor += 1;
  }
}

function requireCell(cell: Position | null, what: string): Position {
  if (!cell) {
    throw new LevelGenerationError(`No free floor left for the ${what}.`);
  }
  return cell;
}

export function generateLevel(options: LevelGenerationOptions): GeneratedLevel {
  const { width, height, level, bossPhase, random } = options;
  const bossSlots = shouldSpawnBoss(level, bossPhase) ? 1 : 0;
  // Player, monsters, boss, items and stairs each need their own floor cell.
  const needed = 1 + options.monsterCount + bossSlots + options.itemCount + 1;
  const tiles = carveCavern(width, height, random, needed);
  const occupied = new OccupancySet();

  const place = (): Position | null => {
    const cell = findFreeFloor(tiles, occupied, random);
    if (cell) {
      occupied.claim(cell);
    }
    return cell;
  };

  const playerStart = requireCell(place(), 'player');

  const monsters: Entity[] = [];
  for (let index = 0; index < options.monsterCount; index += 1) {
    const cell = place();
    if (!cell) {
      console.warn(`Level ${level}: no floor left for monster ${index + 1}, skipping`);
      continue;
    }
    monsters.push(createGoblin(cell, level));
  }

  let bossSpawned = false;
  if (shouldSpawnBoss(level, bossPhase)) {
    const cell = place();
    if (cell) {
      monsters.push(createBoss(cell, bossPhase));
      bossSpawned = true;
    } else {
      console.warn(`Level ${level}: no floor left for the boss, skipping`);
    }
  }

  const items: Item[] = [];
  for (let index = 0; index < options.itemCount; index += 1) {
    const cell = place();
    if (!cell) {
      console.warn(`Level ${level}: no floor left for item ${index + 1}, skipping`);
      continue;
    }
    items.push(rollItem(random, level, cell));
  }

  const stairs = requireCell(place(), 'stairs');
  tiles[stairs.y][stairs.x] = 'stairs';

  return { tiles, playerStart, monsters, items, stairs, bossSpawned };
}

export function generateLevelFor(
  state: Pick<GameState, 'config' | 'deps' | 'level' | 'bossPhase'>
): GeneratedLevel {
  return generateLevel({
    width: state.config.width,
    height: state.config.height,
    level: state.level,
    bossPhase: state.bossPhase,
    monsterCount: state.config.monsterCount,
    itemCount: state.config.itemCount,
    random: state.deps.random
  });
}

/** Logs the arrival messages for a freshly applied level and queues its telemetry. */
export function announceLevel(state: GameState, generated: GeneratedLevel, first: boolean): void {
  if (generated.bossSpawned) {
    state.messages.push(`NEZHA PROTOCOL phase ${state.bossPhase + 1} detected in this cavern.`);
    queueEvent(state, 'nezha_spawn');
  }
  state.messages.push(first ? WELCOME_MESSAGE : LEVEL_SHIFT_MESSAGE);
  queueStateTelemetry(state, 'new_level');
}

/**
 * Moves the game one level deeper. Tiles, monsters and items are replaced;
 * the player keeps hit points and inventory and is relocated. The next level
 * is generated before anything is touched, so a failure leaves the state as
 * it was.
 */
export function descend(state: GameState): void {
  const nextLevel = state.level + 1;
  const generated = generateLevelFor({
    config: state.config,
    deps: state.deps,
    level: nextLevel,
    bossPhase: state.bossPhase
  });

  state.level = nextLevel;
  state.messages.push(`You descend to cavern level ${state.level}.`);
  state.tiles = generated.tiles;
  state.monsters = generated.monsters;
  state.items = generated.items;
  state.player.x = generated.playerStart.x;
  state.player.y = generated.playerStart.y;

  announceLevel(state, generated, false);
}
