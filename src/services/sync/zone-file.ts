/**
 * Zone File Parsing
 *
 * CZDS zone files are tab-separated, one resource record per line:
 *
 *   owner <TAB> ttl <TAB> class <TAB> type <TAB> rdata...
 *
 * Lines starting with ";" are comments and lines starting with "$" are
 * directives; both are skipped. The rdata part may itself contain tabs and
 * is kept verbatim apart from surrounding whitespace.
 */

import { createReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { createGunzip } from "node:zlib";

import type { Readable } from "node:stream";

// ============================================================================
// Types
// ============================================================================

export interface ParsedRecord {
  owner: string;
  ttl: number | null;
  class: string | null;
  type: string | null;
  rdata: string | null;
}

const ZONE_SUFFIX = ".zone";
const GZIP_SUFFIX = ".gz";
// Preference order when locating a downloaded file
const ZONE_FILE_EXTENSIONS = [GZIP_SUFFIX, ZONE_SUFFIX, ".txt"] as const;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
// SOA serials are unsigned 32-bit
const SOA_SERIAL_MAX = 4_294_967_295;

// ============================================================================
// Line Parsing
// ============================================================================

function parseTtl(text: string): number | null {
  if (!/^\s*[+-]?\d+\s*$/.test(text)) {
    return null;
  }
  const ttl = Number.parseInt(text, 10);
  return ttl >= INT32_MIN && ttl <= INT32_MAX ? ttl : null;
}

/**
 * Parse one zone file line. Returns null for blank, comment, directive and
 * malformed lines; never throws.
 */
export function parseZoneLine(line: string): ParsedRecord | null {
  const text = line.replace(/\n+$/, "");
  if (text === "" || text.startsWith(";") || text.startsWith("$")) {
    return null;
  }

  const fields = text.split("\t");
  const [owner, ttl, rrClass, type] = fields;
  if (
    owner === undefined ||
    ttl === undefined ||
    rrClass === undefined ||
    type === undefined
  ) {
    return null;
  }

  const rdata = fields.slice(4).join("\t").trim();

  return {
    owner,
    ttl: parseTtl(ttl),
    class: rrClass !== "" ? rrClass : null,
    type: type !== "" ? type : null,
    rdata: rdata !== "" ? rdata : null,
  };
}

/**
 * Serial number from an SOA payload
 * ("mname rname serial refresh retry expire minimum"), or null when it is
 * missing or outside the unsigned 32-bit range.
 */
export function parseSoaSerial(rdata: string | null): number | null {
  if (rdata === null) {
    return null;
  }
  const serial = rdata.trim().split(/\s+/)[2];
  if (serial === undefined || !/^\d+$/.test(serial)) {
    return null;
  }
  const value = Number(serial);
  return value <= SOA_SERIAL_MAX ? value : null;
}

// ============================================================================
// Zone Keys
// ============================================================================

/**
 * Zone key from a zone file URL: the last path segment without its
 * ".zone" suffix (".../com.zone" -> "com"). Other suffixes are kept.
 */
export function zoneKeyFromUrl(url: string): string {
  const segment = url.replace(/\/+$/, "").split("/").pop() ?? "";
  return segment.endsWith(ZONE_SUFFIX)
    ? segment.slice(0, -ZONE_SUFFIX.length)
    : segment;
}

// ============================================================================
// File Access
// ============================================================================

/**
 * Find the downloaded zone file in a scratch directory,
 * preferring .gz, then .zone, then .txt.
 */
export async function findZoneFile(dir: string): Promise<string | null> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const extension of ZONE_FILE_EXTENSIONS) {
    const match = files.find((name) => name.endsWith(extension));
    if (match !== undefined) {
      return join(dir, match);
    }
  }
  return null;
}

async function* readLines(input: Readable): AsyncGenerator<string> {
  input.setEncoding("utf8");
  let pending = "";
  for await (const chunk of input) {
    const lines = (pending + String(chunk)).split("\n");
    pending = lines.pop() ?? "";
    for (const line of lines) {
      yield line.endsWith("\r") ? line.slice(0, -1) : line;
    }
  }
  if (pending !== "") {
    yield pending;
  }
}

/**
 * Lazily read parsed records from a zone file, gunzipping ".gz" files.
 * Invalid UTF-8 is replaced rather than rejected.
 */
export async function* readZoneRecords(
  path: string
): AsyncGenerator<ParsedRecord> {
  const file = createReadStream(path);
  let input: Readable = file;
  if (path.endsWith(GZIP_SUFFIX)) {
    const gunzip = createGunzip();
    // Read errors surface through the gunzip stream
    file.on("error", (error) => gunzip.destroy(error));
    input = file.pipe(gunzip);
  }

  try {
    for await (const line of readLines(input)) {
      const record = parseZoneLine(line);
      if (record !== null) {
        yield record;
      }
    }
  } finally {
    input.destroy();
    file.destroy();
  }
}
