/**
 * Run configuration, read once from the environment at startup.
 *
 * The CLI builds a config with {@link loadConfig} (or one of the narrower
 * loaders for commands that only talk to CZDS or only to the database) and
 * passes it down explicitly; nothing below the CLI reads `process.env`.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

export const DEFAULT_MAX_ZONES = 10;
export const DEFAULT_BATCH_SIZE = 5000;
// 6 bind parameters per row must stay under PostgreSQL's 65535 limit
export const MAX_BATCH_SIZE = 10_000;
export const DEFAULT_AUTH_URL = "https://account-api.icann.org";
export const DEFAULT_API_URL = "https://czds-api.icann.org";

// ============================================================================
// Schema
// ============================================================================

export const ConfigEnvSchema = Type.Object({
  CZDS_USERNAME: Type.Optional(Type.String({ minLength: 1 })),
  CZDS_PASSWORD: Type.Optional(Type.String({ minLength: 1 })),
  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  MAX_TLDS: Type.Integer({ minimum: 0, default: DEFAULT_MAX_ZONES }),
  BATCH_SIZE: Type.Integer({
    minimum: 1,
    maximum: MAX_BATCH_SIZE,
    default: DEFAULT_BATCH_SIZE,
  }),
  TLD_WHITELIST: Type.Optional(Type.String()),
  CZDS_AUTH_URL: Type.String({ minLength: 1, default: DEFAULT_AUTH_URL }),
  CZDS_API_URL: Type.String({ minLength: 1, default: DEFAULT_API_URL }),
});

export type ConfigEnv = Static<typeof ConfigEnvSchema>;

// ============================================================================
// Types
// ============================================================================

export interface CzdsCredentials {
  username: string;
  password: string;
}

export interface CzdsConfig {
  credentials: CzdsCredentials;
  authUrl: string;
  apiUrl: string;
}

export interface SyncConfig extends CzdsConfig {
  databaseUrl: string;
  maxZones: number;
  batchSize: number;
  /** Lower-cased zone keys; null when no allow-list is configured */
  allowList: string[] | null;
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate the recognized variables, applying defaults and number
 * conversion. Blank values count as unset.
 */
export function parseEnv(env: Env): ConfigEnv {
  const raw: Record<string, string> = {};
  for (const name of Object.keys(ConfigEnvSchema.properties)) {
    const value = env[name]?.trim();
    if (value !== undefined && value !== "") {
      raw[name] = value;
    }
  }

  const value = Value.Convert(
    ConfigEnvSchema,
    Value.Default(ConfigEnvSchema, raw)
  );

  if (!Value.Check(ConfigEnvSchema, value)) {
    const details = [...Value.Errors(ConfigEnvSchema, value)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigError(`Invalid configuration: ${details.join("; ")}`);
  }

  return value;
}

/**
 * Split a comma-separated allow-list into lower-cased keys.
 * Returns null when the list has no usable entries.
 */
export function parseAllowList(text: string | undefined): string[] | null {
  if (text === undefined) {
    return null;
  }
  const keys = text
    .split(",")
    .map((key) => key.trim().toLowerCase())
    .filter((key) => key !== "");
  return keys.length > 0 ? keys : null;
}

function assertPresent(
  parsed: ConfigEnv,
  names: readonly (keyof ConfigEnv)[]
): void {
  const missing = names.filter((name) => parsed[name] === undefined);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration: ${missing.join(", ")}`,
      missing
    );
  }
}

function toCzdsConfig(parsed: ConfigEnv): CzdsConfig {
  return {
    credentials: {
      username: parsed.CZDS_USERNAME ?? "",
      password: parsed.CZDS_PASSWORD ?? "",
    },
    authUrl: parsed.CZDS_AUTH_URL.replace(/\/+$/, ""),
    apiUrl: parsed.CZDS_API_URL.replace(/\/+$/, ""),
  };
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Full configuration for a sync run: credentials and database URL are both
 * required, and every missing variable is reported at once.
 */
export function loadConfig(env: Env = process.env): SyncConfig {
  const parsed = parseEnv(env);
  assertPresent(parsed, ["CZDS_USERNAME", "CZDS_PASSWORD", "DATABASE_URL"]);

  return {
    ...toCzdsConfig(parsed),
    databaseUrl: parsed.DATABASE_URL ?? "",
    maxZones: parsed.MAX_TLDS,
    batchSize: parsed.BATCH_SIZE,
    allowList: parseAllowList(parsed.TLD_WHITELIST),
  };
}

/**
 * Configuration for commands that only talk to CZDS
 */
export function loadCzdsConfig(env: Env = process.env): CzdsConfig {
  const parsed = parseEnv(env);
  assertPresent(parsed, ["CZDS_USERNAME", "CZDS_PASSWORD"]);
  return toCzdsConfig(parsed);
}

/**
 * Database URL for commands that only touch the store
 */
export function loadDatabaseUrl(env: Env = process.env): string {
  const parsed = parseEnv(env);
  assertPresent(parsed, ["DATABASE_URL"]);
  return parsed.DATABASE_URL ?? "";
}

// ============================================================================
// Overrides
// ============================================================================

export interface SyncOverrides {
  tlds?: string;
  maxZones?: number;
  batchSize?: number;
}

/**
 * Apply command-line overrides on top of the environment configuration
 */
export function applyOverrides(
  config: SyncConfig,
  overrides: SyncOverrides
): SyncConfig {
  return {
    ...config,
    allowList:
      overrides.tlds !== undefined
        ? parseAllowList(overrides.tlds)
        : config.allowList,
    maxZones: overrides.maxZones ?? config.maxZones,
    batchSize: overrides.batchSize ?? config.batchSize,
  };
}
