import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { ConfigError } from "../errors.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Row counts and serials are well inside the safe integer range
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));

// ============================================================================
// Types
// ============================================================================

export type StoreDialect = "postgres" | "sqlite";

/**
 * A Kysely instance together with the dialect it speaks, which the schema
 * initializer needs to pick column types.
 */
export interface Store {
  db: Kysely<Database>;
  dialect: StoreDialect;
}

// ============================================================================
// URL Handling
// ============================================================================

const SQLITE_PREFIX = "sqlite:";

/**
 * Work out the dialect from a connection string:
 * `postgres://` / `postgresql://` or `sqlite:<path>` (`sqlite::memory:`).
 */
export function resolveDialect(url: string): StoreDialect {
  if (/^postgres(ql)?:\/\//i.test(url)) {
    return "postgres";
  }
  if (url.startsWith(SQLITE_PREFIX)) {
    return "sqlite";
  }
  throw new ConfigError(
    `Unsupported DATABASE_URL (expected postgresql:// or sqlite:): ${maskDatabaseUrl(url)}`
  );
}

function sqlitePath(url: string): string {
  const path = url.slice(SQLITE_PREFIX.length);
  return path === "" ? ":memory:" : path;
}

/**
 * Connection string for display, with any password masked
 */
export function maskDatabaseUrl(url: string): string {
  if (!URL.canParse(url)) {
    return url;
  }
  const parsed = new URL(url);
  if (parsed.password !== "") {
    parsed.password = "****";
  }
  return parsed.toString();
}

// ============================================================================
// Store Lifecycle
// ============================================================================

/**
 * Open a store for one CLI invocation. Units of work reserve their own
 * connection from it with `db.connection()`.
 */
export function openStore(url: string): Store {
  const dialect = resolveDialect(url);

  if (dialect === "sqlite") {
    const path = sqlitePath(url);
    if (path !== ":memory:") {
      const dataDir = dirname(path);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
    }

    dbLogger.debug({ path }, "Opening SQLite store");
    return {
      dialect,
      db: new Kysely<Database>({
        dialect: new SqliteDialect({ database: new SQLite(path) }),
      }),
    };
  }

  const pool = new Pool({
    connectionString: url,
    max: 4, // units run one after another
    idleTimeoutMillis: 30_000,
  });

  dbLogger.debug({ url: maskDatabaseUrl(url) }, "Opening PostgreSQL store");
  return {
    dialect,
    db: new Kysely<Database>({
      dialect: new PostgresDialect({ pool }),
    }),
  };
}

/**
 * Check if the store answers a trivial query
 */
export async function checkConnection(store: Store): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(store.db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database connection check failed");
    return false;
  }
}

/**
 * Gracefully close the store (and its pool)
 */
export async function closeStore(store: Store): Promise<void> {
  try {
    await store.db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}
