export interface TelemetryConfig {
  readonly enabled: boolean;
  readonly host: string;
  readonly port: number;
}

export interface GameConfig {
  readonly width: number;
  readonly height: number;
  readonly monsterCount: number;
  readonly itemCount: number;
  readonly maxHp: number;
  readonly telemetry: TelemetryConfig;
}

export type GameConfigOverrides = Partial<Omit<GameConfig, 'telemetry'>> & {
  readonly telemetry?: Partial<TelemetryConfig>;
};

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_GAME_CONFIG: GameConfig = Object.freeze({
  width: 40,
  height: 20,
  monsterCount: 8,
  itemCount: 6,
  maxHp: 10,
  telemetry: Object.freeze({
    enabled: true,
    host: '127.0.0.1',
    port: 9001
  })
});

const MIN_DIMENSION = 5;

export class GameConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameConfigError';
  }
}

function readInteger(env: EnvironmentSource, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function readString(env: EnvironmentSource, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function readSwitch(env: EnvironmentSource, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (raw === 'off' || raw === '0' || raw === 'false' || raw === 'no') {
    return false;
  }
  if (raw === 'on' || raw === '1' || raw === 'true' || raw === 'yes') {
    return true;
  }
  return undefined;
}

function fromEnvironment(env: EnvironmentSource): GameConfigOverrides {
  return {
    width: readInteger(env, 'CAVERN_WIDTH'),
    height: readInteger(env, 'CAVERN_HEIGHT'),
    monsterCount: readInteger(env, 'CAVERN_MONSTERS'),
    itemCount: readInteger(env, 'CAVERN_ITEMS'),
    maxHp: readInteger(env, 'CAVERN_MAX_HP'),
    telemetry: {
      enabled: readSwitch(env, 'CAVERN_TELEMETRY'),
      host: readString(env, 'CAVERN_TELEMETRY_HOST'),
      port: readInteger(env, 'CAVERN_TELEMETRY_PORT')
    }
  };
}

function layer(base: GameConfig, overrides: GameConfigOverrides): GameConfig {
  return {
    width: overrides.width ?? base.width,
    height: overrides.height ?? base.height,
    monsterCount: overrides.monsterCount ?? base.monsterCount,
    itemCount: overrides.itemCount ?? base.itemCount,
    maxHp: overrides.maxHp ?? base.maxHp,
    telemetry: {
      enabled: overrides.telemetry?.enabled ?? base.telemetry.enabled,
      host: overrides.telemetry?.host ?? base.telemetry.host,
      port: overrides.telemetry?.port ?? base.telemetry.port
    }
  };
}

/** Upper bound on everything a level places: player, monsters, boss, items and stairs. */
export function occupantCount(config: Pick<GameConfig, 'monsterCount' | 'itemCount'>): number {
  return 1 + config.monsterCount + 1 + config.itemCount + 1;
}

export function validateGameConfig(config: GameConfig): GameConfig {
  const { width, height, monsterCount, itemCount, maxHp, telemetry } = config;
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new GameConfigError(`Grid dimensions must be integers (got ${width}x${height}).`);
  }
  if (width < MIN_DIMENSION || height < MIN_DIMENSION) {
    throw new GameConfigError(
      `Grid must be at least ${MIN_DIMENSION}x${MIN_DIMENSION} (got ${width}x${height}).`
    );
  }
  if (!Number.isInteger(monsterCount) || monsterCount < 0) {
    throw new GameConfigError(`Monster count must be a non-negative integer (got ${monsterCount}).`);
  }
  if (!Number.isInteger(itemCount) || itemCount < 0) {
    throw new GameConfigError(`Item count must be a non-negative integer (got ${itemCount}).`);
  }
  if (!Number.isInteger(maxHp) || maxHp < 1) {
    throw new GameConfigError(`Max hit points must be a positive integer (got ${maxHp}).`);
  }
  if (!Number.isInteger(telemetry.port) || telemetry.port < 1 || telemetry.port > 65535) {
    throw new GameConfigError(`Telemetry port must be within 1-65535 (got ${telemetry.port}).`);
  }
  if (telemetry.host.trim() === '') {
    throw new GameConfigError('Telemetry host must not be empty.');
  }
  const capacity = Math.floor(((width - 2) * (height - 2)) / 2);
  const needed = occupantCount(config);
  if (needed > capacity) {
    throw new GameConfigError(
      `A ${width}x${height} cavern fits at most ${capacity} occupants; ${needed} requested.`
    );
  }
  return config;
}

/**
 * Builds the effective configuration: defaults, then `CAVERN_*` environment
 * variables, then explicit overrides. Environment values that fail to parse
 * are ignored; the merged result is validated.
 */
export function resolveGameConfig(
  overrides: GameConfigOverrides = {},
  env: EnvironmentSource = process.env
): GameConfig {
  const merged = layer(layer(DEFAULT_GAME_CONFIG, fromEnvironment(env)), overrides);
  return validateGameConfig(merged);
}
