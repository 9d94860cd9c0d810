import { BOSS_GLYPH, BOSS_NAME, bossHitPoints, type BossPhase } from '../boss/phase.ts';
import type { Entity, Position } from './types.ts';

export const PLAYER_GLYPH = '@';
export const GOBLIN_GLYPH = 'g';
export const GOBLIN_NAME = 'Goblin';

export function goblinHitPoints(level: number): number {
  return 3 + Math.max(0, level - 1);
}

export function createPlayer(at: Position, hp: number): Entity {
  return { x: at.x, y: at.y, role: 'player', glyph: PLAYER_GLYPH, name: 'Player', hp };
}

export function createGoblin(at: Position, level: number): Entity {
  return {
    x: at.x,
    y: at.y,
    role: 'monster',
    glyph: GOBLIN_GLYPH,
    name: GOBLIN_NAME,
    hp: goblinHitPoints(level)
  };
}

export function createBoss(at: Position, phase: BossPhase): Entity {
  return {
    x: at.x,
    y: at.y,
    role: 'boss',
    glyph: BOSS_GLYPH,
    name: BOSS_NAME,
    hp: bossHitPoints(phase)
  };
}
