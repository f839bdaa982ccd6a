/**
 * Session configuration.
 */

import { DECISIONS, Decision, EFFECTS, Effect, MODES, Mode } from "./comptime/capability";

export type SessionConfig = {
  mode: Mode;
  /** Interpreter steps allowed per evaluation. */
  maxSteps: number;
  /** Wall-clock budget per evaluation, unbounded when absent. */
  timeBudgetMs?: number;
  maxInsertionPasses: number;
  /** Concurrent evaluations within one wave of call sites. */
  workers: number;
  /** Directory of the on-disk cache store, in-memory only when absent. */
  cacheDir?: string;
  /** Per-effect overrides of the mode's policy table. */
  policy: Partial<Record<Effect, Decision>>;
};

export const DEFAULT_CONFIG: Readonly<SessionConfig> = {
  mode: "build",
  maxSteps: 1_000_000,
  maxInsertionPasses: 16,
  workers: 1,
  policy: {},
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Fill in defaults and validate.
 */
export function resolveConfig(partial: Partial<SessionConfig> = {}): SessionConfig {
  const config: SessionConfig = {
    ...DEFAULT_CONFIG,
    ...definedOnly(partial),
    policy: { ...(partial.policy ?? {}) },
  };

  if (!MODES.includes(config.mode)) {
    throw new ConfigError(`unknown mode '${config.mode}', expected one of ${MODES.join(", ")}`);
  }
  positiveInteger("maxSteps", config.maxSteps);
  positiveInteger("maxInsertionPasses", config.maxInsertionPasses);
  positiveInteger("workers", config.workers);
  if (config.timeBudgetMs !== undefined) positiveInteger("timeBudgetMs", config.timeBudgetMs);
  if (config.cacheDir !== undefined && config.cacheDir.length === 0) {
    throw new ConfigError("cacheDir must not be empty");
  }
  for (const [effect, decision] of Object.entries(config.policy)) {
    if (!isEffect(effect)) throw new ConfigError(`unknown effect '${effect}', expected one of ${EFFECTS.join(", ")}`);
    if (!isDecision(decision)) {
      throw new ConfigError(`unknown decision '${String(decision)}' for ${effect}, expected one of ${DECISIONS.join(", ")}`);
    }
  }
  return config;
}

export function isEffect(name: string): name is Effect {
  return EFFECTS.some((e) => e === name);
}

export function isDecision(name: unknown): name is Decision {
  return DECISIONS.some((d) => d === name);
}

export function isMode(name: string): name is Mode {
  return MODES.some((m) => m === name);
}

function positiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

function definedOnly(partial: Partial<SessionConfig>): Partial<SessionConfig> {
  const out: Partial<SessionConfig> = {};
  if (partial.mode !== undefined) out.mode = partial.mode;
  if (partial.maxSteps !== undefined) out.maxSteps = partial.maxSteps;
  if (partial.timeBudgetMs !== undefined) out.timeBudgetMs = partial.timeBudgetMs;
  if (partial.maxInsertionPasses !== undefined) out.maxInsertionPasses = partial.maxInsertionPasses;
  if (partial.workers !== undefined) out.workers = partial.workers;
  if (partial.cacheDir !== undefined) out.cacheDir = partial.cacheDir;
  return out;
}
