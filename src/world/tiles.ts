import type { Position } from '../entities/types.ts';

export type TileType = 'wall' | 'floor' | 'stairs';

export type TileGrid = TileType[][];

export const TILE_GLYPHS: Readonly<Record<TileType, string>> = Object.freeze({
  wall: '#',
  floor: '.',
  stairs: '>'
});

export function createWallGrid(width: number, height: number): TileGrid {
  return Array.from({ length: height }, () => Array.from({ length: width }, (): TileType => 'wall'));
}

export function gridWidth(tiles: TileGrid): number {
  return tiles[0]?.length ?? 0;
}

export function gridHeight(tiles: TileGrid): number {
  return tiles.length;
}

export function isWithinGrid(tiles: TileGrid, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && y < gridHeight(tiles) && x < gridWidth(tiles);
}

/** Tile at `(x, y)`, or `null` outside the grid. */
export function tileAt(tiles: TileGrid, x: number, y: number): TileType | null {
  if (!isWithinGrid(tiles, x, y)) {
    return null;
  }
  return tiles[y][x];
}

export function isWalkableTile(tile: TileType | null): boolean {
  return tile === 'floor' || tile === 'stairs';
}

export function findTiles(tiles: TileGrid, type: TileType): Position[] {
  const found: Position[] = [];
  for (let y = 0; y < tiles.length; y += 1) {
    for (let x = 0; x < tiles[y].length; x += 1) {
      if (tiles[y][x] === type) {
        found.push({ x, y });
      }
    }
  }
  return found;
}

export function renderRows(tiles: TileGrid): string[] {
  return tiles.map((row) => row.map((tile) => TILE_GLYPHS[tile]).join(''));
}
