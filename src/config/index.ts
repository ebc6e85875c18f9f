import pino, { type LevelWithSilent } from "pino";
import { ConfigurationError } from "../errors";
import type { ActorSystemConfig, AnyActorDefinition } from "../types/public";
import { type Clock, WallClock } from "../utils/clock";

export const DEFAULT_LOG_LEVEL: LevelWithSilent = "info";
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

const isLevel = (value: string): value is LevelWithSilent =>
  value === "silent" || value in pino.levels.values;

/**
 * Log level from the environment. Tests run silent unless LOG_LEVEL asks
 * for output explicitly.
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LevelWithSilent {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested) {
    if (!isLevel(requested)) {
      throw new ConfigurationError(`Unknown LOG_LEVEL "${env.LOG_LEVEL}"`);
    }
    return requested;
  }
  return defaultLogLevel(env);
}

const defaultLogLevel = (env: NodeJS.ProcessEnv): LevelWithSilent =>
  env.NODE_ENV === "test" ? "silent" : DEFAULT_LOG_LEVEL;

/**
 * Like `resolveLogLevel`, but an unknown LOG_LEVEL falls back to the default
 * and is handed back as `rejected` so the caller can warn about it.
 */
export function resolveLogLevelOrDefault(
  env: NodeJS.ProcessEnv = process.env,
): { level: LevelWithSilent; rejected?: string } {
  try {
    return { level: resolveLogLevel(env) };
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    return { level: defaultLogLevel(env), rejected: env.LOG_LEVEL };
  }
}

export interface ResolvedPassivation {
  idleAfter: number;
  sweepInterval: number;
}

export interface ResolvedConfig<TDef extends AnyActorDefinition>
  extends Omit<ActorSystemConfig<TDef>, "passivation" | "clock"> {
  passivation?: ResolvedPassivation;
  clock: Clock;
}

export function resolveConfig<TDef extends AnyActorDefinition>(
  config: ActorSystemConfig<TDef>,
): ResolvedConfig<TDef> {
  const { passivation, clock, ...rest } = config;
  if (passivation && !(passivation.idleAfter > 0)) {
    throw new ConfigurationError(
      `passivation.idleAfter must be a positive number of milliseconds, got ${passivation.idleAfter}`,
    );
  }
  return {
    ...rest,
    clock: clock ?? WallClock,
    ...(passivation && {
      passivation: {
        idleAfter: passivation.idleAfter,
        sweepInterval: passivation.sweepInterval ?? DEFAULT_SWEEP_INTERVAL_MS,
      },
    }),
  };
}
