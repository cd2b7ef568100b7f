import { loadDatabaseUrl } from "../../config.js";
import { closeStore, openStore, type Store } from "../../db/connection.js";
import { hasSchema } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { ZoneSyncService } from "../../services/sync/index.js";
import { displayZoneStatus, printError } from "../utils/display.js";

import type { Command } from "commander";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show synced zones with serial, last sync and record count")
    .action(async () => {
      let store: Store | undefined;

      try {
        store = openStore(loadDatabaseUrl());

        if (!(await hasSchema(store.db))) {
          console.log("Schema not initialized (run 'db migrate' or 'sync')");
          return;
        }

        const zones = await new ZoneSyncService(store.db).getZoneStatus();
        if (zones.length === 0) {
          console.log("No zones synced yet");
          return;
        }

        console.log("\nSync Status:");
        displayZoneStatus(zones);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      } finally {
        if (store !== undefined) {
          await closeStore(store);
        }
      }
    });
}
