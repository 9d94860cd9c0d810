import { describe, expect, it, vi } from 'vitest';
import { createSeededRandom } from '../rng.ts';
import { positionKey } from '../entities/types.ts';
import { createTestState, queuedEvents } from '../../tests/support/gameState.ts';
import {
  carveCavern,
  descend,
  generateLevel,
  growCavern,
  LevelGenerationError,
  type LevelGenerationOptions
} from './LevelGenerator.ts';
import { findTiles, renderRows } from './tiles.ts';

function options(overrides: Partial<LevelGenerationOptions> = {}): LevelGenerationOptions {
  return {
    width: 40,
    height: 20,
    level: 1,
    bossPhase: 0,
    monsterCount: 8,
    itemCount: 6,
    random: createSeededRandom(11),
    ...overrides
  };
}

describe('carveCavern', () => {
  it('keeps the outer ring solid and carves the centre', () => {
    const tiles = carveCavern(12, 8, createSeededRandom(3));

    for (let x = 0; x < 12; x += 1) {
      expect(tiles[0][x]).toBe('wall');
      expect(tiles[7][x]).toBe('wall');
    }
    for (let y = 0; y < 8; y += 1) {
      expect(tiles[y][0]).toBe('wall');
      expect(tiles[y][11]).toBe('wall');
    }
    expect(tiles[4][6]).toBe('floor');
  });

  it('walks a straight line when every roll picks east', () => {
    const tiles = carveCavern(7, 5, () => 0);
    expect(renderRows(tiles)).toEqual([
      '#######',
      '#######',
      '###...#',
      '#######',
      '#######'
    ]);
  });
});

describe('generateLevel', () => {
  it('populates the first level without a boss', () => {
    const level = generateLevel(options());

    expect(level.bossSpawned).toBe(false);
    expect(level.monsters).toHaveLength(8);
    expect(level.monsters.every((monster) => monster.role === 'monster' && monster.hp === 3)).toBe(true);
    expect(level.items).toHaveLength(6);
  });

  it('adds one boss from level two with phase-scaled hit points', () => {
    const level = generateLevel(options({ level: 3, bossPhase: 2 }));

    const bosses = level.monsters.filter((monster) => monster.role === 'boss');
    expect(level.bossSpawned).toBe(true);
    expect(bosses).toHaveLength(1);
    expect(bosses[0]).toMatchObject({ name: 'Nezha', glyph: 'N', hp: 18 });
    expect(level.monsters.filter((monster) => monster.role === 'monster').every((m) => m.hp === 5)).toBe(true);
  });

  it('stops spawning the boss after its final phase', () => {
    const level = generateLevel(options({ level: 6, bossPhase: 3 }));

    expect(level.bossSpawned).toBe(false);
    expect(level.monsters.some((monster) => monster.role === 'boss')).toBe(false);
  });

  it('scales item power with the level', () => {
    const level = generateLevel(options({ level: 5, itemCount: 30, random: createSeededRandom(5) }));

    for (const item of level.items) {
      if (item.kind === 'potion') {
        expect(item.power).toBe(9);
      } else {
        // Base 1-4 plus floor(4 / 2).
        expect(item.power).toBeGreaterThanOrEqual(3);
        expect(item.power).toBeLessThanOrEqual(6);
      }
    }
  });

  it('places exactly one stairs cell and never stacks occupants', () => {
    const level = generateLevel(options({ level: 2 }));

    expect(findTiles(level.tiles, 'stairs')).toEqual([level.stairs]);
    const cells = [
      level.playerStart,
      ...level.monsters,
      ...level.items,
      level.stairs
    ].map((position) => positionKey(position.x, position.y));
    expect(new Set(cells).size).toBe(cells.length);
    for (const occupant of [level.playerStart, ...level.monsters, ...level.items]) {
      expect(level.tiles[occupant.y][occupant.x]).toBe('floor');
    }
  });

  it('fills the last free cells in scan order once sampling gives up', () => {
    // Every roll picks east, so the 7x5 walk carves only (3,2), (4,2) and (5,2).
    const level = generateLevel(options({ width: 7, height: 5, monsterCount: 1, itemCount: 0, random: () => 0 }));

    expect(level.playerStart).toEqual({ x: 3, y: 2 });
    expect(level.monsters[0]).toMatchObject({ x: 4, y: 2 });
    expect(level.stairs).toEqual({ x: 5, y: 2 });
  });

  it('grows the cavern when the walk leaves too little floor for everyone', () => {
    // The walk carves (3,2)-(5,2); growth then takes the first bordering walls in scan order.
    const level = generateLevel(options({ width: 7, height: 5, monsterCount: 3, itemCount: 0, random: () => 0 }));

    expect(renderRows(level.tiles)).toEqual([
      '#######',
      '##..###',
      '###..>#',
      '#######',
      '#######'
    ]);
    expect(level.playerStart).toEqual({ x: 2, y: 1 });
    expect(level.monsters.map((monster) => ({ x: monster.x, y: monster.y }))).toEqual([
      { x: 3, y: 1 },
      { x: 3, y: 2 },
      { x: 4, y: 2 }
    ]);
    expect(level.stairs).toEqual({ x: 5, y: 2 });
  });

  it('skips monsters it cannot place and fails when even the whole interior is too small', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(() =>
      generateLevel(options({ width: 7, height: 5, monsterCount: 20, itemCount: 0, random: () => 0 }))
    ).toThrow(LevelGenerationError);
    expect(warn).toHaveBeenCalledWith('Level 1: no floor left for monster 15, skipping');
    warn.mockRestore();
  });

  it('fits a full population into a long, thin cavern', () => {
    for (let seed = 0; seed < 10; seed += 1) {
      const level = generateLevel(
        options({ width: 5, height: 200, monsterCount: 294, itemCount: 0, random: createSeededRandom(seed) })
      );

      expect(level.monsters).toHaveLength(294);
      expect(findTiles(level.tiles, 'stairs')).toHaveLength(1);
    }
  });
});

describe('growCavern', () => {
  it('leaves a cavern with enough floor untouched', () => {
    const tiles = carveCavern(7, 5, () => 0);
    growCavern(tiles, 3, () => 0);

    expect(findTiles(tiles, 'floor')).toHaveLength(3);
  });

  it('stops once the interior is all floor', () => {
    const tiles = carveCavern(5, 5, () => 0, 100);

    expect(renderRows(tiles)).toEqual(['#####', '#...#', '#...#', '#...#', '#####']);
  });
});

describe('descend', () => {
  it('keeps the player and inventory while replacing the level', () => {
    const { state } = createTestState({
      rows: ['#######', '#.....#', '#.....#', '#..>..#', '#######'],
      player: { x: 1, y: 1 },
      playerHp: 4,
      config: { monsterCount: 1, itemCount: 0 }
    });
    const player = state.player;
    const oldTiles = state.tiles;

    descend(state);

    expect(state.player).toBe(player);
    expect(state.player.hp).toBe(4);
    expect(state.tiles).not.toBe(oldTiles);
    expect(state.level).toBe(2);
    expect(state.tiles[state.player.y][state.player.x]).toBe('floor');
    expect(queuedEvents(state)).toEqual(['nezha_spawn', 'new_level']);
  });

  it('leaves the state untouched when the next level cannot be built', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { state } = createTestState({
      rows: ['#######', '#.....#', '#.....#', '#..>..#', '#######'],
      player: { x: 1, y: 1 },
      // More occupants than the 5x3 interior holds; only reachable by skipping validation.
      config: { monsterCount: 20, itemCount: 0 }
    });
    const oldTiles = state.tiles;

    expect(() => descend(state)).toThrow(LevelGenerationError);

    expect(state.level).toBe(1);
    expect(state.tiles).toBe(oldTiles);
    expect(state.monsters).toEqual([]);
    expect(state.player).toMatchObject({ x: 1, y: 1 });
    expect(state.messages).toEqual([]);
    expect(state.telemetryOutbox).toEqual([]);
    warn.mockRestore();
  });
});
