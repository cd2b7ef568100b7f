import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ensureSchema } from "../../db/migrate.js";
import { DownloadError, ListingError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { findZoneFile, zoneKeyFromUrl } from "./zone-file.js";
import { ZoneSyncService } from "./zone-sync.js";

import type { Store } from "../../db/connection.js";
import type { ZoneFileSource } from "../../czds/types.js";

// ============================================================================
// Types
// ============================================================================

export interface ZoneSelection {
  url: string;
  key: string;
}

export interface SelectionOptions {
  /** Lower-cased keys; when non-empty, `maxZones` is ignored */
  allowList: string[] | null;
  maxZones: number;
}

export interface OrchestratorOptions extends SelectionOptions {
  batchSize: number;
  /** Parent for the run's scratch directory; defaults to the OS temp dir */
  workDir?: string;
}

export type ZoneOutcome =
  | (ZoneSelection & {
      status: "synced";
      inserted: number;
      deleted: number;
      serial: number | null;
    })
  | (ZoneSelection & { status: "download_failed"; error: string })
  | (ZoneSelection & { status: "sync_failed"; error: string });

export interface SyncRunResult {
  listed: number;
  selected: number;
  outcomes: ZoneOutcome[];
}

export interface SyncProgress {
  phase: "download" | "sync" | "complete";
  current: number;
  total: number;
  currentItem: string;
  outcome?: ZoneOutcome;
}

type ProgressCallback = (progress: SyncProgress) => void;

// ============================================================================
// Selection
// ============================================================================

/**
 * Pair each listed URL with its zone key, in listing order, then apply the
 * allow-list (case-insensitive) or, without one, the count limit.
 */
export function selectZones(
  urls: string[],
  options: SelectionOptions
): ZoneSelection[] {
  const zones = urls.map((url) => ({ url, key: zoneKeyFromUrl(url) }));

  if (options.allowList !== null && options.allowList.length > 0) {
    const allowed = new Set(options.allowList.map((key) => key.toLowerCase()));
    return zones.filter((zone) => allowed.has(zone.key.toLowerCase()));
  }

  return zones.slice(0, Math.max(0, options.maxZones));
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private onProgress?: ProgressCallback;

  constructor(
    private store: Store,
    private source: ZoneFileSource,
    private options: OrchestratorOptions
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run one end-to-end sync.
   *
   * Listing and schema failures throw (ListingError, SchemaError); a zone
   * that fails to download or sync is reported in `outcomes` and the run
   * carries on with the next one.
   */
  async run(): Promise<SyncRunResult> {
    let urls: string[];
    try {
      urls = await this.source.listApproved();
    } catch (error) {
      syncLogger.error({ error }, "Failed to list approved zone files");
      throw new ListingError(
        `Failed to list approved zone files: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (urls.length === 0) {
      syncLogger.info("No zone files approved for this account");
      return { listed: 0, selected: 0, outcomes: [] };
    }

    const zones = selectZones(urls, this.options);
    if (zones.length === 0) {
      syncLogger.info({ listed: urls.length }, "No zones to process");
      return { listed: urls.length, selected: 0, outcomes: [] };
    }

    syncLogger.info(
      { listed: urls.length, selected: zones.length },
      "Selected zones for sync"
    );

    await ensureSchema(this.store);

    const scratchRoot = await mkdtemp(
      join(this.options.workDir ?? tmpdir(), "zone-sync-")
    );
    const outcomes: ZoneOutcome[] = [];

    try {
      for (const [index, zone] of zones.entries()) {
        const outcome = await this.syncZone(
          zone,
          join(scratchRoot, String(index)),
          index + 1,
          zones.length
        );
        outcomes.push(outcome);
        this.onProgress?.({
          phase: "complete",
          current: index + 1,
          total: zones.length,
          currentItem: zone.key,
          outcome,
        });
      }
    } finally {
      await rm(scratchRoot, { recursive: true, force: true });
    }

    const synced = outcomes.filter((o) => o.status === "synced").length;
    syncLogger.info(
      { synced, failed: outcomes.length - synced },
      "Sync run completed"
    );

    return { listed: urls.length, selected: zones.length, outcomes };
  }

  private async syncZone(
    zone: ZoneSelection,
    zoneDir: string,
    current: number,
    total: number
  ): Promise<ZoneOutcome> {
    await mkdir(zoneDir, { recursive: true });

    try {
      this.onProgress?.({
        phase: "download",
        current,
        total,
        currentItem: zone.key,
      });

      let path: string;
      try {
        path = await this.download(zone, zoneDir);
      } catch (error) {
        syncLogger.warn(
          { key: zone.key, url: zone.url, error: errorMessage(error) },
          "Zone download failed, skipping"
        );
        return {
          ...zone,
          status: "download_failed",
          error: errorMessage(error),
        };
      }

      this.onProgress?.({
        phase: "sync",
        current,
        total,
        currentItem: zone.key,
      });

      try {
        const result = await new ZoneSyncService(this.store.db).sync(
          zone.key,
          path,
          this.options.batchSize
        );
        return {
          ...zone,
          status: "synced",
          inserted: result.inserted,
          deleted: result.deleted,
          serial: result.serial,
        };
      } catch (error) {
        syncLogger.error(
          { key: zone.key, error: errorMessage(error) },
          "Zone sync failed, skipping"
        );
        return { ...zone, status: "sync_failed", error: errorMessage(error) };
      }
    } finally {
      await rm(zoneDir, { recursive: true, force: true });
    }
  }

  private async download(
    zone: ZoneSelection,
    zoneDir: string
  ): Promise<string> {
    await this.source.download(zone.url, zoneDir);
    const path = await findZoneFile(zoneDir);
    if (path === null) {
      throw new DownloadError(
        `No zone file found after downloading ${zone.url}`
      );
    }
    return path;
  }
}
