import { readFile } from "node:fs/promises";
import { ConfigError } from "./errors.js";
import { ConfigOverridesSchema, parseOrThrow } from "./schemas.js";
import { setLogLevel, type LogLevel } from "./utils/logger.js";

export type SchedulerConfig = {
  faults: {
    /** A failed child fails its parent. */
    propagate: boolean;
    /** `Commander.run` rejects when any node failed. */
    rejectOnFailure: boolean;
  };
  timeouts: {
    job: number;
    handler: number;
  };
  handlers: {
    reusable: boolean;
    retries: number;
    /** Cycle outcomes a reusable handler keeps; 0 keeps all. */
    historyLimit: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  logging: {
    level: LogLevel;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: SchedulerConfig = {
  faults: {
    propagate: false,
    rejectOnFailure: false,
  },
  timeouts: {
    job: 0,
    handler: 0,
  },
  handlers: {
    reusable: false,
    retries: 0,
    historyLimit: 100,
  },
  retry: {
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  logging: {
    level: "info",
  },
};

let current: SchedulerConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

function deepMerge(base: SchedulerConfig, overrides: DeepPartial<SchedulerConfig>): SchedulerConfig {
  return {
    faults: mergeSection(base.faults, overrides.faults),
    timeouts: mergeSection(base.timeouts, overrides.timeouts),
    handlers: mergeSection(base.handlers, overrides.handlers),
    retry: mergeSection(base.retry, overrides.retry),
    logging: mergeSection(base.logging, overrides.logging),
  };
}

/** Override config values. Merges deeply with defaults; invalid overrides throw `ConfigError`. */
export function configure(overrides: DeepPartial<SchedulerConfig>): void {
  const parsed = parseOrThrow(ConfigOverridesSchema, overrides, "config", (msg) => new ConfigError(msg));
  current = deepMerge(DEFAULTS, parsed);
  if (parsed.logging?.level) setLogLevel(parsed.logging.level);
}

/** Read JSON overrides from `path` and apply them. */
export async function loadConfigFile(path: string): Promise<void> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  configure(parseOrThrow(ConfigOverridesSchema, raw, `config file ${path}`, (msg) => new ConfigError(msg)));
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SchedulerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<SchedulerConfig> = Object.freeze(DEFAULTS);
