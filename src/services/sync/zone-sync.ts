/**
 * Zone Sync Service - Replaces one zone's records with a fresh parse
 *
 * Flow for a zone key:
 * 1. Delete the key's existing records and commit
 * 2. Stream records out of the downloaded zone file
 * 3. Insert them in batches of `batchSize`, each batch committing on its own
 * 4. Upsert the zone row (sync timestamp, SOA serial when found)
 *
 * A failure part-way leaves the batches already inserted in place; the
 * caller reports the zone as failed and moves on.
 */

import { sql, type Kysely } from "kysely";

import { syncLogger } from "../../logger.js";
import { parseSoaSerial, readZoneRecords } from "./zone-file.js";

import type { Database, NewZoneRecord } from "../../db/types.js";

// SQLite binds at most 32766 variables per statement, 6 per record row.
// Larger batches are split into several inserts that commit together.
export const MAX_ROWS_PER_INSERT = Math.floor(32_766 / 6);

// ============================================================================
// Types
// ============================================================================

export interface ZoneSyncResult {
  inserted: number;
  deleted: number;
  serial: number | null;
  durationMs: number;
}

export interface ZoneStatus {
  tld: string;
  serial: number | null;
  syncedAt: Date | null;
  recordCount: number;
}

function toDate(value: Date | string | null): Date | null {
  if (value === null || value instanceof Date) {
    return value;
  }
  // SQLite CURRENT_TIMESTAMP is UTC without a zone designator
  return new Date(value.includes("T") ? value : `${value.replace(" ", "T")}Z`);
}

// ============================================================================
// Zone Sync Service
// ============================================================================

export class ZoneSyncService {
  constructor(private db: Kysely<Database>) {}

  /**
   * Replace all records of `tld` with the records parsed from `path`.
   *
   * @returns counts for this run; `inserted` is the sum over all batches
   */
  async sync(
    tld: string,
    path: string,
    batchSize: number
  ): Promise<ZoneSyncResult> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(
        `Batch size must be a positive integer, got ${String(batchSize)}`
      );
    }

    const startTime = Date.now();
    syncLogger.info({ tld, path, batchSize }, "Starting zone sync");

    return this.db.connection().execute(async (conn) => {
      const deleted = await conn
        .transaction()
        .execute(async (trx) =>
          trx.deleteFrom("records").where("tld", "=", tld).executeTakeFirst()
        );
      const deletedCount = Number(deleted.numDeletedRows);
      syncLogger.debug({ tld, deleted: deletedCount }, "Deleted old records");

      let inserted = 0;
      let serial: number | null = null;
      let batch: NewZoneRecord[] = [];

      const flush = async (): Promise<void> => {
        if (batch.length === 0) {
          return;
        }
        const rows = batch;
        if (rows.length <= MAX_ROWS_PER_INSERT) {
          await conn.insertInto("records").values(rows).execute();
        } else {
          await conn.transaction().execute(async (trx) => {
            for (let i = 0; i < rows.length; i += MAX_ROWS_PER_INSERT) {
              await trx
                .insertInto("records")
                .values(rows.slice(i, i + MAX_ROWS_PER_INSERT))
                .execute();
            }
          });
        }
        inserted += rows.length;
        syncLogger.debug({ tld, inserted }, "Inserted batch");
        batch = [];
      };

      for await (const record of readZoneRecords(path)) {
        if (serial === null && record.type?.toUpperCase() === "SOA") {
          serial = parseSoaSerial(record.rdata);
        }

        batch.push({
          tld,
          owner: record.owner,
          ttl: record.ttl,
          class: record.class,
          type: record.type,
          rdata: record.rdata,
        });

        if (batch.length >= batchSize) {
          await flush();
        }
      }
      await flush();

      await conn
        .insertInto("zones")
        .values({ tld, serial })
        .onConflict((oc) =>
          oc.column("tld").doUpdateSet((eb) => ({
            synced_at: sql<Date>`CURRENT_TIMESTAMP`,
            serial: eb.fn.coalesce(
              eb.ref("excluded.serial"),
              eb.ref("zones.serial")
            ),
          }))
        )
        .execute();

      const durationMs = Date.now() - startTime;
      syncLogger.info(
        { tld, inserted, deleted: deletedCount, serial, durationMs },
        "Zone sync completed"
      );

      return { inserted, deleted: deletedCount, serial, durationMs };
    });
  }

  /**
   * Every synced zone with its current record count
   */
  async getZoneStatus(): Promise<ZoneStatus[]> {
    const rows = await this.db
      .selectFrom("zones")
      .select((eb) => [
        "zones.tld",
        "zones.serial",
        "zones.synced_at",
        eb
          .selectFrom("records")
          .select((sub) => sub.fn.countAll<number>().as("count"))
          .whereRef("records.tld", "=", "zones.tld")
          .as("record_count"),
      ])
      .orderBy("zones.tld")
      .execute();

    return rows.map((row) => ({
      tld: row.tld,
      serial: row.serial,
      syncedAt: toDate(row.synced_at),
      recordCount: Number(row.record_count ?? 0),
    }));
  }
}
