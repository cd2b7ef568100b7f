import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
} from "kysely";

// ============================================================================
// Column Types
// ============================================================================

/**
 * bigserial/bigint; pg is configured to parse INT8 as a number
 */
export type BigIntId = Generated<number>;

export type BigIntColumn = ColumnType<
  number | null,
  number | null | undefined,
  number | null
>;

/**
 * Defaults to CURRENT_TIMESTAMP. pg returns a Date, SQLite a text value.
 */
export type Timestamp = Generated<Date | string>;

// ============================================================================
// Table Types
// ============================================================================

export interface ZonesTable {
  id: BigIntId;
  tld: string;
  serial: BigIntColumn;
  synced_at: Timestamp;
}

export interface RecordsTable {
  id: BigIntId;
  tld: string;
  owner: string;
  ttl: number | null;
  class: string | null;
  type: string | null;
  rdata: string | null;
  synced_at: Timestamp;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  zones: ZonesTable;
  records: RecordsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type Zone = Selectable<ZonesTable>;
export type NewZone = Insertable<ZonesTable>;

export type ZoneRecordRow = Selectable<RecordsTable>;
export type NewZoneRecord = Insertable<RecordsTable>;
