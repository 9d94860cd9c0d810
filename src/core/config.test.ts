import { describe, expect, it } from 'vitest';
import { DEFAULT_GAME_CONFIG, GameConfigError, resolveGameConfig } from './config.ts';

describe('resolveGameConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(resolveGameConfig({}, {})).toEqual(DEFAULT_GAME_CONFIG);
  });

  it('layers environment values under explicit overrides', () => {
    const config = resolveGameConfig(
      { monsterCount: 2, telemetry: { port: 7000 } },
      {
        CAVERN_WIDTH: '30',
        CAVERN_MONSTERS: '5',
        CAVERN_TELEMETRY_HOST: 'telemetry.local',
        CAVERN_TELEMETRY_PORT: '9100',
        CAVERN_TELEMETRY: 'off'
      }
    );

    expect(config.width).toBe(30);
    expect(config.height).toBe(20);
    expect(config.monsterCount).toBe(2);
    expect(config.telemetry).toEqual({ enabled: false, host: 'telemetry.local', port: 7000 });
  });

  it('ignores environment values that do not parse', () => {
    const config = resolveGameConfig({}, { CAVERN_HEIGHT: 'tall', CAVERN_TELEMETRY: 'maybe' });
    expect(config.height).toBe(20);
    expect(config.telemetry.enabled).toBe(true);
  });

  it('rejects grids below the minimum size', () => {
    expect(() => resolveGameConfig({ width: 4 }, {})).toThrow(GameConfigError);
  });

  it('rejects out-of-range ports and bad counts', () => {
    expect(() => resolveGameConfig({ telemetry: { port: 70000 } }, {})).toThrow(
      'Telemetry port must be within 1-65535 (got 70000).'
    );
    expect(() => resolveGameConfig({ itemCount: -1 }, {})).toThrow(GameConfigError);
    expect(() => resolveGameConfig({ maxHp: 0 }, {})).toThrow(GameConfigError);
  });

  it('rejects caverns too small for their occupants', () => {
    // 6x6 has 16 interior cells, room for 8; 1 + 4 + 1 + 2 + 1 = 9 requested.
    expect(() => resolveGameConfig({ width: 6, height: 6, monsterCount: 4, itemCount: 2 }, {})).toThrow(
      'A 6x6 cavern fits at most 8 occupants; 9 requested.'
    );
    expect(resolveGameConfig({ width: 6, height: 6, monsterCount: 3, itemCount: 2 }, {}).monsterCount).toBe(3);
  });
});
