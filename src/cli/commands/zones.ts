/**
 * Zones command - List zone files approved for the CZDS account
 */

import ora from "ora";

import { loadCzdsConfig, parseAllowList } from "../../config.js";
import { CzdsClient } from "../../czds/client.js";
import { errorMessage } from "../../errors.js";
import { selectZones } from "../../services/sync/index.js";
import {
  displayZoneLinks,
  printError,
  printWarning,
} from "../utils/display.js";

import type { Command } from "commander";

export function registerZonesCommand(program: Command): void {
  program
    .command("zones")
    .description("List zone files approved for this CZDS account")
    .option("--tlds <list>", "Only show these comma-separated zones")
    .action(async (options: { tlds?: string }) => {
      let client: CzdsClient;
      try {
        client = new CzdsClient(loadCzdsConfig());
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Fetching approved zone files...").start();

      try {
        const urls = await client.listApproved();
        const allowList = parseAllowList(options.tlds);
        const zones = selectZones(urls, {
          allowList,
          maxZones: urls.length,
        });
        spinner.succeed(`${String(urls.length)} zone files approved`);

        const found = new Set(zones.map((zone) => zone.key.toLowerCase()));
        const unknown = (allowList ?? []).filter((key) => !found.has(key));
        if (unknown.length > 0) {
          printWarning(`Not approved for this account: ${unknown.join(", ")}`);
        }

        if (zones.length === 0) {
          console.log("No zones match.");
          return;
        }
        displayZoneLinks(zones);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
