import { InvalidArgumentError } from "commander";
import ora from "ora";

import {
  MAX_BATCH_SIZE,
  applyOverrides,
  loadConfig,
  type SyncConfig,
} from "../../config.js";
import { CzdsClient } from "../../czds/client.js";
import { closeStore, openStore, type Store } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { SyncOrchestrator } from "../../services/sync/index.js";
import {
  displayRunSummary,
  formatOutcome,
  formatProgress,
  printError,
} from "../utils/display.js";

import type { Command } from "commander";

interface SyncCommandOptions {
  tlds?: string;
  max?: number;
  batchSize?: number;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function parseBatchSize(value: string): number {
  const size = parseCount(value);
  if (size < 1 || size > MAX_BATCH_SIZE) {
    throw new InvalidArgumentError(
      `Expected an integer between 1 and ${String(MAX_BATCH_SIZE)}.`
    );
  }
  return size;
}

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Download approved zone files and sync their records")
    .option(
      "--tlds <list>",
      "Comma-separated zones to sync (overrides TLD_WHITELIST and --max)"
    )
    .option("--max <n>", "Maximum number of zones to sync", parseCount)
    .option("--batch-size <n>", "Rows per insert batch", parseBatchSize)
    .addHelpText(
      "after",
      `
ENVIRONMENT:
  CZDS_USERNAME, CZDS_PASSWORD   CZDS account credentials (required)
  DATABASE_URL                   postgresql://... or sqlite:<path> (required)
  MAX_TLDS                       zones per run when no allow-list (default 10)
  BATCH_SIZE                     rows per insert batch (default 5000)
  TLD_WHITELIST                  comma-separated zones to sync, e.g. com,net
`
    )
    .action(async (options: SyncCommandOptions) => {
      let config: SyncConfig;
      try {
        config = applyOverrides(loadConfig(), {
          tlds: options.tlds,
          maxZones: options.max,
          batchSize: options.batchSize,
        });
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      const spinner = ora();
      let store: Store | undefined;

      try {
        store = openStore(config.databaseUrl);

        const orchestrator = new SyncOrchestrator(
          store,
          new CzdsClient(config),
          {
            allowList: config.allowList,
            maxZones: config.maxZones,
            batchSize: config.batchSize,
          }
        );

        orchestrator.setProgressCallback((progress) => {
          const label = formatProgress(
            progress.current,
            progress.total,
            progress.currentItem
          );

          if (progress.phase === "download") {
            spinner.start(`${label} ...`);
          } else if (progress.phase === "sync") {
            spinner.text = `${label} syncing records...`;
          } else if (progress.outcome !== undefined) {
            const line = `${label} ${formatOutcome(progress.outcome)}`;
            if (progress.outcome.status === "synced") {
              spinner.succeed(line);
            } else {
              spinner.fail(line);
            }
          }
        });

        const result = await orchestrator.run();

        if (result.listed === 0) {
          console.log("No zone files approved for this account.");
        } else if (result.selected === 0) {
          console.log("No TLDs to process.");
        } else {
          displayRunSummary(result);
        }
        console.log("Done.");
      } catch (error) {
        if (spinner.isSpinning) {
          spinner.stop();
        }
        printError(errorMessage(error));
        process.exitCode = 1;
      } finally {
        if (store !== undefined) {
          await closeStore(store);
        }
      }
    });
}
