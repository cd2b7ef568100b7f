/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type {
  SyncRunResult,
  ZoneOutcome,
  ZoneSelection,
  ZoneStatus,
} from "../../services/sync/index.js";

/**
 * One-line result for a zone, shown after its progress line
 */
export function formatOutcome(outcome: ZoneOutcome): string {
  switch (outcome.status) {
    case "synced":
      return `-> ${String(outcome.inserted)} records`;
    case "download_failed":
      return `download failed: ${outcome.error}`;
    case "sync_failed":
      return `sync failed: ${outcome.error}`;
  }
}

/**
 * Progress prefix, e.g. "[2/10] com"
 */
export function formatProgress(
  current: number,
  total: number,
  key: string
): string {
  return `[${String(current)}/${String(total)}] ${key}`;
}

/**
 * Display approved zone files with their keys
 */
export function displayZoneLinks(zones: ZoneSelection[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Zone"), chalk.cyan("URL")],
    colWidths: [6, 24, 70],
    wordWrap: true,
  });

  for (const [index, zone] of zones.entries()) {
    table.push([String(index + 1), chalk.green(zone.key), zone.url]);
  }

  console.log(table.toString());
}

/**
 * Display synced zones with their serial and record count
 */
export function displayZoneStatus(zones: ZoneStatus[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Zone"),
      chalk.cyan("Serial"),
      chalk.cyan("Last Sync"),
      chalk.cyan("Records"),
    ],
    colWidths: [24, 14, 26, 14],
  });

  for (const zone of zones) {
    table.push([
      chalk.green(zone.tld),
      zone.serial !== null ? String(zone.serial) : chalk.gray("N/A"),
      zone.syncedAt !== null ? zone.syncedAt.toISOString() : "Never",
      String(zone.recordCount),
    ]);
  }

  console.log(table.toString());
}

export function displayTableStats(stats: TableStat[]): void {
  for (const row of stats) {
    console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
  }
}

/**
 * Final summary of a sync run, listing failed zones
 */
export function displayRunSummary(result: SyncRunResult): void {
  const synced = result.outcomes.filter((o) => o.status === "synced");
  const failed = result.outcomes.filter((o) => o.status !== "synced");
  const records = synced.reduce(
    (sum, o) => sum + (o.status === "synced" ? o.inserted : 0),
    0
  );

  console.log("\n" + "═".repeat(60));
  console.log("SYNC SUMMARY");
  console.log("═".repeat(60));
  console.log(`  Approved zones: ${String(result.listed)}`);
  console.log(`  Selected:       ${String(result.selected)}`);
  console.log(`  ${chalk.green("✓")} Synced:       ${String(synced.length)}`);
  console.log(`  Records:        ${String(records)}`);

  if (failed.length > 0) {
    console.log(`  ${chalk.red("✗")} Failed:       ${String(failed.length)}`);
    console.log("\n" + "─".repeat(60));
    for (const outcome of failed) {
      console.log(`  ${outcome.key}: ${formatOutcome(outcome)}`);
    }
    console.log("─".repeat(60));
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
