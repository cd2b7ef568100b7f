import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  findZoneFile,
  parseSoaSerial,
  parseZoneLine,
  readZoneRecords,
  zoneKeyFromUrl,
  type ParsedRecord,
} from "../../../../src/services/sync/zone-file.js";
import {
  EXAMPLE_RECORDS,
  EXAMPLE_SOA,
  EXAMPLE_ZONE_TEXT,
} from "../../../fixtures/zones.js";

async function collect(path: string): Promise<ParsedRecord[]> {
  const records: ParsedRecord[] = [];
  for await (const record of readZoneRecords(path)) {
    records.push(record);
  }
  return records;
}

describe("services/sync/zone-file", () => {
  describe("parseZoneLine", () => {
    it("should parse a five-field record", () => {
      expect(parseZoneLine("a\t1\tIN\tA\t1.2.3.4")).toEqual({
        owner: "a",
        ttl: 1,
        class: "IN",
        type: "A",
        rdata: "1.2.3.4",
      });
    });

    it("should return null for lines with fewer than four fields", () => {
      expect(parseZoneLine("a\tb")).toBeNull();
      expect(parseZoneLine("a\t1\tIN")).toBeNull();
      expect(parseZoneLine("single")).toBeNull();
    });

    it("should skip comments, directives and blank lines", () => {
      expect(parseZoneLine(";comment")).toBeNull();
      expect(parseZoneLine("; a\t1\tIN\tA\t1.2.3.4")).toBeNull();
      expect(parseZoneLine("$TTL 3600")).toBeNull();
      expect(parseZoneLine("$ORIGIN com.")).toBeNull();
      expect(parseZoneLine("")).toBeNull();
      expect(parseZoneLine("\n")).toBeNull();
    });

    it("should strip the trailing newline", () => {
      expect(parseZoneLine("a\t3600\tIN\tA\t1.1.1.1\n")).toEqual({
        owner: "a",
        ttl: 3600,
        class: "IN",
        type: "A",
        rdata: "1.1.1.1",
      });
    });

    it("should keep tabs inside rdata and trim its ends", () => {
      expect(parseZoneLine("a\t1\tIN\tTXT\t  x\ty  ")?.rdata).toBe("x\ty");
      expect(parseZoneLine('t.\t300\tin\ttxt\t"v=spf1"\t"-all"')?.rdata).toBe(
        '"v=spf1"\t"-all"'
      );
    });

    it("should set rdata to null when missing or blank", () => {
      expect(parseZoneLine("a\t60\tIN\tA")?.rdata).toBeNull();
      expect(parseZoneLine("a\t60\tIN\tA\t   ")?.rdata).toBeNull();
    });

    it("should set ttl to null when not an integer", () => {
      expect(parseZoneLine("a\t\tIN\tA\tx")?.ttl).toBeNull();
      expect(parseZoneLine("a\tabc\tIN\tA\tx")?.ttl).toBeNull();
      expect(parseZoneLine("a\t1.5\tIN\tA\tx")?.ttl).toBeNull();
    });

    it("should set ttl to null outside the 32-bit range", () => {
      expect(parseZoneLine("a\t99999999999\tIN\tA\tx")?.ttl).toBeNull();
      expect(parseZoneLine("a\t2147483647\tIN\tA\tx")?.ttl).toBe(2147483647);
    });

    it("should accept signed and padded ttl values", () => {
      expect(parseZoneLine("a\t 42 \tIN\tA\tx")?.ttl).toBe(42);
      expect(parseZoneLine("a\t-1\tIN\tA\tx")?.ttl).toBe(-1);
    });

    it("should map empty class and type to null", () => {
      expect(parseZoneLine("a\t1\t\t\tdata")).toEqual({
        owner: "a",
        ttl: 1,
        class: null,
        type: null,
        rdata: "data",
      });
    });

    it("should keep an empty owner field", () => {
      expect(parseZoneLine("\t\t\t")).toEqual({
        owner: "",
        ttl: null,
        class: null,
        type: null,
        rdata: null,
      });
    });
  });

  describe("parseSoaSerial", () => {
    it("should read the third field of an SOA payload", () => {
      expect(parseSoaSerial(EXAMPLE_SOA)).toBe(2024061801);
    });

    it("should accept serials up to the unsigned 32-bit maximum", () => {
      expect(parseSoaSerial("a. b. 4294967295 1800 900")).toBe(4294967295);
    });

    it("should return null for serials above the unsigned 32-bit range", () => {
      expect(parseSoaSerial("a. b. 4294967296 1800 900")).toBeNull();
      expect(parseSoaSerial("a. b. 99999999999999999999 1800 900")).toBeNull();
    });

    it("should return null when the serial is missing or not numeric", () => {
      expect(parseSoaSerial(null)).toBeNull();
      expect(parseSoaSerial("a. b.")).toBeNull();
      expect(parseSoaSerial("a. b. c 1800")).toBeNull();
    });
  });

  describe("zoneKeyFromUrl", () => {
    it("should strip the .zone suffix from the last segment", () => {
      expect(zoneKeyFromUrl("https://host/czds/downloads/example.zone")).toBe(
        "example"
      );
      expect(zoneKeyFromUrl("https://host/czds/downloads/xn--p1ai.zone")).toBe(
        "xn--p1ai"
      );
    });

    it("should keep other suffixes", () => {
      expect(zoneKeyFromUrl("https://host/czds/downloads/example.gz")).toBe(
        "example.gz"
      );
    });

    it("should ignore trailing slashes", () => {
      expect(zoneKeyFromUrl("https://host/downloads/com.zone/")).toBe("com");
    });

    it("should return a bare value unchanged", () => {
      expect(zoneKeyFromUrl("plain")).toBe("plain");
    });
  });

  describe("with files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "zone-file-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    describe("findZoneFile", () => {
      it("should prefer .gz over .zone and .txt", async () => {
        await writeFile(join(dir, "notes.md"), "");
        await writeFile(join(dir, "example.txt"), "");
        await writeFile(join(dir, "example.zone"), "");
        await writeFile(join(dir, "example.txt.gz"), "");

        expect(await findZoneFile(dir)).toBe(join(dir, "example.txt.gz"));
      });

      it("should prefer .zone over .txt", async () => {
        await writeFile(join(dir, "a.txt"), "");
        await writeFile(join(dir, "a.zone"), "");

        expect(await findZoneFile(dir)).toBe(join(dir, "a.zone"));
      });

      it("should return null without a recognized file", async () => {
        await writeFile(join(dir, "readme.md"), "");

        expect(await findZoneFile(dir)).toBeNull();
      });
    });

    describe("readZoneRecords", () => {
      it("should read records from a plain file", async () => {
        const path = join(dir, "example.txt");
        await writeFile(path, EXAMPLE_ZONE_TEXT);

        expect(await collect(path)).toEqual(EXAMPLE_RECORDS);
      });

      it("should gunzip .gz files", async () => {
        const path = join(dir, "example.txt.gz");
        await writeFile(path, gzipSync(Buffer.from(EXAMPLE_ZONE_TEXT)));

        expect(await collect(path)).toEqual(EXAMPLE_RECORDS);
      });

      it("should handle CRLF endings and a missing final newline", async () => {
        const path = join(dir, "crlf.zone");
        await writeFile(path, "a\t1\tIN\tA\t1.1.1.1\r\nb\t2\tIN\tA\t2.2.2.2");

        expect(await collect(path)).toEqual([
          { owner: "a", ttl: 1, class: "IN", type: "A", rdata: "1.1.1.1" },
          { owner: "b", ttl: 2, class: "IN", type: "A", rdata: "2.2.2.2" },
        ]);
      });

      it("should replace invalid UTF-8 bytes", async () => {
        const path = join(dir, "bytes.zone");
        await writeFile(
          path,
          Buffer.concat([
            Buffer.from("a\t1\tIN\tTXT\t"),
            Buffer.from([0xff, 0x0a]),
          ])
        );

        expect(await collect(path)).toEqual([
          { owner: "a", ttl: 1, class: "IN", type: "TXT", rdata: "\uFFFD" },
        ]);
      });

      it("should reject when the file does not exist", async () => {
        await expect(collect(join(dir, "missing.zone"))).rejects.toThrow();
        await expect(collect(join(dir, "missing.gz"))).rejects.toThrow();
      });

      it("should reject a truncated gzip file", async () => {
        const lines = Array.from(
          { length: 500 },
          (_, i) => `host${String(i)}.example.\t3600\tin\ta\t192.0.2.1`
        ).join("\n");
        const compressed = gzipSync(Buffer.from(lines));
        const path = join(dir, "truncated.gz");
        await writeFile(
          path,
          compressed.subarray(0, Math.floor(compressed.length / 2))
        );

        await expect(collect(path)).rejects.toThrow();
      });

      it("should reject a .gz file that is not gzip data", async () => {
        const path = join(dir, "plain.gz");
        await writeFile(path, EXAMPLE_ZONE_TEXT);

        await expect(collect(path)).rejects.toThrow();
      });
    });
  });
});
