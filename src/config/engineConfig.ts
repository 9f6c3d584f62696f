/**
 * Engine configuration
 *
 * Resolves graph engine policies from the environment. Values left unset
 * fall back to the defaults below; callers may still override per engine.
 */

export type MalformedOutputPolicy = 'warn' | 'fail';

/**
 * `once`: a user-input record satisfies one blocking edge, a revisit of the
 * same node asks again. `always`: a record satisfies every later evaluation.
 */
export type UserInputReuse = 'once' | 'always';

export interface EngineConfig {
  maxSteps?: number;
  nodeTimeoutMs: number;
  malformedOutput: MalformedOutputPolicy;
  userInputReuse: UserInputReuse;
}

export interface ServerConfig {
  port: number;
  databaseUrl?: string;
  sessionTable: string;
  sessionTtlSeconds?: number;
}

export const ENGINE_DEFAULTS: EngineConfig = {
  maxSteps: undefined,
  nodeTimeoutMs: 0,
  malformedOutput: 'warn',
  userInputReuse: 'once',
};

type Env = Record<string, string | undefined>;

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
  name: string,
): T {
  if (value === undefined || value.trim() === '') return fallback;
  const match = choices.find((choice) => choice === value.trim());
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

const ENGINE_READERS: { [K in keyof Required<EngineConfig>]: (env: Env) => EngineConfig[K] } = {
  maxSteps: (env) => {
    const maxSteps = parsePositiveInt(env.STATEGRAPH_MAX_STEPS, 'STATEGRAPH_MAX_STEPS');
    return maxSteps === 0 ? undefined : maxSteps;
  },
  nodeTimeoutMs: (env) =>
    parsePositiveInt(env.STATEGRAPH_NODE_TIMEOUT_MS, 'STATEGRAPH_NODE_TIMEOUT_MS') ??
    ENGINE_DEFAULTS.nodeTimeoutMs,
  malformedOutput: (env) =>
    parseChoice(
      env.STATEGRAPH_MALFORMED_OUTPUT,
      ['warn', 'fail'] as const,
      ENGINE_DEFAULTS.malformedOutput,
      'STATEGRAPH_MALFORMED_OUTPUT',
    ),
  userInputReuse: (env) =>
    parseChoice(
      env.STATEGRAPH_USER_INPUT_REUSE,
      ['once', 'always'] as const,
      ENGINE_DEFAULTS.userInputReuse,
      'STATEGRAPH_USER_INPUT_REUSE',
    ),
};

/** One engine policy from the environment; other variables are not read. */
export function readEngineSetting<K extends keyof EngineConfig>(
  key: K,
  env: Env = process.env,
): EngineConfig[K] {
  const read: (env: Env) => EngineConfig[K] = ENGINE_READERS[key];
  return read(env);
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    maxSteps: readEngineSetting('maxSteps', env),
    nodeTimeoutMs: readEngineSetting('nodeTimeoutMs', env),
    malformedOutput: readEngineSetting('malformedOutput', env),
    userInputReuse: readEngineSetting('userInputReuse', env),
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePositiveInt(env.PORT, 'PORT') ?? 3000,
    databaseUrl: env.DATABASE_URL || undefined,
    sessionTable: env.SESSION_TABLE || 'graph_sessions',
    sessionTtlSeconds: parsePositiveInt(env.SESSION_TTL_SECONDS, 'SESSION_TTL_SECONDS'),
  };
}
