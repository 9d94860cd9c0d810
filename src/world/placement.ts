import { pickOne, randomInt, type RandomSource } from '../rng.ts';
import { positionKey, type Position } from '../entities/types.ts';
import { gridHeight, gridWidth, type TileGrid } from './tiles.ts';

export const MAX_PLACEMENT_ATTEMPTS = 512;

/** Tracks cells claimed by entities and items while a level is being populated. */
export class OccupancySet {
  private readonly cells = new Set<string>();

  claim(position: Position): void {
    this.cells.add(positionKey(position.x, position.y));
  }

  has(x: number, y: number): boolean {
    return this.cells.has(positionKey(x, y));
  }
}

function isEligible(tiles: TileGrid, occupied: OccupancySet, x: number, y: number): boolean {
  return tiles[y]?.[x] === 'floor' && !occupied.has(x, y);
}

/**
 * Picks a random floor cell that nothing occupies yet.
 *
 * Samples interior cells up to `maxAttempts` times, then falls back to a full
 * scan and a uniform pick among whatever is left. Returns `null` only when no
 * eligible cell exists at all.
 */
export function findFreeFloor(
  tiles: TileGrid,
  occupied: OccupancySet,
  random: RandomSource,
  maxAttempts = MAX_PLACEMENT_ATTEMPTS
): Position | null {
  const width = gridWidth(tiles);
  const height = gridHeight(tiles);

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const x = randomInt(random, 1, width - 2);
    const y = randomInt(random, 1, height - 2);
    if (isEligible(tiles, occupied, x, y)) {
      return { x, y };
    }
  }

  const candidates: Position[] = [];
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (isEligible(tiles, occupied, x, y)) {
        candidates.push({ x, y });
      }
    }
  }
  if (candidates.length === 0) {
    return null;
  }
  return pickOne(random, candidates);
}
