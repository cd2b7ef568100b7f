import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { closeStore, type Store } from "../../../../src/db/connection.js";
import {
  MAX_ROWS_PER_INSERT,
  ZoneSyncService,
} from "../../../../src/services/sync/zone-sync.js";
import {
  EXAMPLE_RECORDS,
  EXAMPLE_SERIAL,
  EXAMPLE_ZONE_TEXT,
  NO_SOA_ZONE_TEXT,
  OLD_SYNCED_AT,
  generateZoneText,
} from "../../../fixtures/zones.js";
import {
  countRecords,
  createTestStore,
  selectRecords,
  selectSyncedAt,
  selectZone,
} from "../../../mocks/store.js";

describe("services/sync/zone-sync", () => {
  let dir: string;
  let store: Store;
  let service: ZoneSyncService;

  async function zoneFile(
    name: string,
    content: string | Buffer
  ): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "zone-sync-test-"));
    store = await createTestStore();
    service = new ZoneSyncService(store.db);
  });

  afterEach(async () => {
    await closeStore(store);
    await rm(dir, { recursive: true, force: true });
  });

  describe("sync", () => {
    it("should insert every parsed record under the zone key", async () => {
      const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

      const result = await service.sync("example", path, 5000);

      expect(result.inserted).toBe(5);
      expect(result.deleted).toBe(0);
      expect(result.serial).toBe(EXAMPLE_SERIAL);
      expect(await selectRecords(store, "example")).toEqual(EXAMPLE_RECORDS);
    });

    it.each([1, 2, 4, 5, 6, 100])(
      "should insert the same rows with batch size %i",
      async (batchSize) => {
        const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

        const result = await service.sync("example", path, batchSize);

        expect(result.inserted).toBe(5);
        expect(await selectRecords(store, "example")).toEqual(EXAMPLE_RECORDS);
      }
    );

    it("should replace records on a repeated sync", async () => {
      const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

      await service.sync("example", path, 2);
      const second = await service.sync("example", path, 3);

      expect(second.deleted).toBe(5);
      expect(second.inserted).toBe(5);
      expect(await selectRecords(store, "example")).toEqual(EXAMPLE_RECORDS);
    });

    it("should keep duplicate lines as separate rows", async () => {
      const line = "a.example.\t60\tin\ta\t192.0.2.1";
      const path = await zoneFile("dup.zone", `${line}\n${line}\n`);

      const result = await service.sync("example", path, 10);

      expect(result.inserted).toBe(2);
      expect(await selectRecords(store, "example")).toHaveLength(2);
    });

    it("should leave other zones untouched", async () => {
      const other = await zoneFile("other.zone", NO_SOA_ZONE_TEXT);
      const example = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

      await service.sync("other", other, 10);
      await service.sync("example", example, 10);
      await service.sync("example", example, 10);

      expect(await selectRecords(store, "other")).toHaveLength(2);
    });

    it("should keep one zone row per key", async () => {
      const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

      await service.sync("example", path, 10);
      await service.sync("example", path, 10);

      const zones = await store.db
        .selectFrom("zones")
        .select("tld")
        .where("tld", "=", "example")
        .execute();
      expect(zones).toEqual([{ tld: "example" }]);
    });

    it("should keep the stored serial when a file has no SOA record", async () => {
      const withSoa = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);
      const withoutSoa = await zoneFile("next.zone", NO_SOA_ZONE_TEXT);

      await service.sync("example", withSoa, 10);
      const result = await service.sync("example", withoutSoa, 10);

      expect(result.serial).toBeNull();
      expect(await selectZone(store, "example")).toEqual({
        tld: "example",
        serial: EXAMPLE_SERIAL,
      });
    });

    it("should record an empty zone", async () => {
      const path = await zoneFile("empty.zone", "; nothing here\n");

      const result = await service.sync("empty", path, 10);

      expect(result.inserted).toBe(0);
      expect(await selectZone(store, "empty")).toEqual({
        tld: "empty",
        serial: null,
      });
    });

    it("should reject when the file cannot be read, after deleting", async () => {
      const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);
      await service.sync("example", path, 10);

      await expect(
        service.sync("example", join(dir, "missing.zone"), 10)
      ).rejects.toThrow();

      expect(await selectRecords(store, "example")).toEqual([]);
      expect(await selectZone(store, "example")).toEqual({
        tld: "example",
        serial: EXAMPLE_SERIAL,
      });
    });

    it("should not create a zone row when the first sync fails", async () => {
      await expect(
        service.sync("example", join(dir, "missing.zone"), 10)
      ).rejects.toThrow();

      expect(await selectZone(store, "example")).toBeUndefined();
    });

    it("should split batches larger than one SQLite insert allows", async () => {
      const path = await zoneFile("large.zone", generateZoneText(10000));

      const result = await service.sync("example", path, 10000);

      expect(MAX_ROWS_PER_INSERT).toBe(5461);
      expect(result.inserted).toBe(10000);
      expect(await countRecords(store, "example")).toBe(10000);
      const rows = await selectRecords(store, "example");
      expect(rows[0]?.owner).toBe("host0.example.");
      expect(rows[9999]?.owner).toBe("host9999.example.");
    });

    it("should keep committed batches when the file fails part-way", async () => {
      const first = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);
      await service.sync("example", first, 10);
      await store.db
        .updateTable("zones")
        .set({ synced_at: OLD_SYNCED_AT })
        .where("tld", "=", "example")
        .execute();

      const compressed = gzipSync(Buffer.from(generateZoneText(2000)));
      const truncated = await zoneFile(
        "truncated.gz",
        compressed.subarray(0, Math.floor(compressed.length * 0.8))
      );

      await expect(service.sync("example", truncated, 10)).rejects.toThrow();

      const remaining = await countRecords(store, "example");
      expect(remaining).toBeGreaterThan(0);
      expect(remaining).toBeLessThan(2000);
      expect(await selectZone(store, "example")).toEqual({
        tld: "example",
        serial: EXAMPLE_SERIAL,
      });
      expect(await selectSyncedAt(store, "example")).toBe(OLD_SYNCED_AT);
    });

    it("should reject a batch size that is not a positive integer", async () => {
      const path = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);

      await expect(service.sync("example", path, 0)).rejects.toThrow(
        RangeError
      );
      await expect(service.sync("example", path, 1.5)).rejects.toThrow(
        "Batch size must be a positive integer, got 1.5"
      );
      expect(await selectRecords(store, "example")).toEqual([]);
    });
  });

  describe("getZoneStatus", () => {
    it("should return an empty list before any sync", async () => {
      expect(await service.getZoneStatus()).toEqual([]);
    });

    it("should list synced zones ordered by key with record counts", async () => {
      const example = await zoneFile("example.zone", EXAMPLE_ZONE_TEXT);
      const other = await zoneFile("other.zone", NO_SOA_ZONE_TEXT);

      await service.sync("other", other, 10);
      await service.sync("example", example, 10);

      const status = await service.getZoneStatus();

      expect(
        status.map(({ tld, serial, recordCount }) => ({
          tld,
          serial,
          recordCount,
        }))
      ).toEqual([
        { tld: "example", serial: EXAMPLE_SERIAL, recordCount: 5 },
        { tld: "other", serial: null, recordCount: 2 },
      ]);
      for (const zone of status) {
        expect(zone.syncedAt).toBeInstanceOf(Date);
        expect(Number.isNaN(zone.syncedAt?.getTime())).toBe(false);
      }
    });
  });
});
