import { sql, type Kysely } from "kysely";

import { SchemaError, errorMessage } from "../errors.js";
import { dbLogger } from "../logger.js";

import type { Store, StoreDialect } from "./connection.js";
import type { Database } from "./types.js";

// ============================================================================
// Schema Initialization
// ============================================================================

interface DialectColumns {
  id: "bigserial" | "integer";
  timestamp: "timestamptz" | "text";
}

const COLUMNS: Record<StoreDialect, DialectColumns> = {
  postgres: { id: "bigserial", timestamp: "timestamptz" },
  sqlite: { id: "integer", timestamp: "text" },
};

/**
 * Create the zones and records tables and their indexes if they are
 * missing. Runs in one transaction on its own connection; safe to call on
 * every run.
 *
 * @throws SchemaError when any statement fails
 */
export async function ensureSchema(store: Store): Promise<void> {
  const columns = COLUMNS[store.dialect];
  const autoIncrement = store.dialect === "sqlite";

  try {
    await store.db.transaction().execute(async (trx) => {
      await trx.schema
        .createTable("zones")
        .ifNotExists()
        .addColumn("id", columns.id, (col) =>
          autoIncrement ? col.primaryKey().autoIncrement() : col.primaryKey()
        )
        .addColumn("tld", "text", (col) => col.notNull().unique())
        .addColumn("serial", "bigint")
        .addColumn("synced_at", columns.timestamp, (col) =>
          col.defaultTo(sql`CURRENT_TIMESTAMP`)
        )
        .execute();

      await trx.schema
        .createTable("records")
        .ifNotExists()
        .addColumn("id", columns.id, (col) =>
          autoIncrement ? col.primaryKey().autoIncrement() : col.primaryKey()
        )
        .addColumn("tld", "text", (col) => col.notNull())
        .addColumn("owner", "text", (col) => col.notNull())
        .addColumn("ttl", "integer")
        .addColumn("class", "text")
        .addColumn("type", "text")
        .addColumn("rdata", "text")
        .addColumn("synced_at", columns.timestamp, (col) =>
          col.defaultTo(sql`CURRENT_TIMESTAMP`)
        )
        .execute();

      await trx.schema
        .createIndex("idx_records_tld")
        .ifNotExists()
        .on("records")
        .column("tld")
        .execute();

      await trx.schema
        .createIndex("idx_records_tld_type")
        .ifNotExists()
        .on("records")
        .columns(["tld", "type"])
        .execute();
    });
  } catch (error) {
    dbLogger.error({ error }, "Schema initialization failed");
    throw new SchemaError(
      `Schema initialization failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  dbLogger.info({ dialect: store.dialect }, "Schema is up to date");
}

/**
 * Check whether both sync tables exist
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const tables = await db.introspection.getTables();
  const names = new Set(tables.map((table) => table.name));
  return names.has("zones") && names.has("records");
}

// ============================================================================
// Table Statistics
// ============================================================================

export interface TableStat {
  table_name: keyof Database;
  row_count: number;
}

/**
 * Exact row counts of the sync tables
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const records = await db
    .selectFrom("records")
    .select((eb) => eb.fn.countAll<number>().as("count"))
    .executeTakeFirstOrThrow();
  const zones = await db
    .selectFrom("zones")
    .select((eb) => eb.fn.countAll<number>().as("count"))
    .executeTakeFirstOrThrow();

  return [
    { table_name: "records", row_count: Number(records.count) },
    { table_name: "zones", row_count: Number(zones.count) },
  ];
}
