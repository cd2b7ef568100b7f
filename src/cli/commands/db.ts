import ora from "ora";

import { loadDatabaseUrl } from "../../config.js";
import {
  checkConnection,
  closeStore,
  maskDatabaseUrl,
  openStore,
  type Store,
} from "../../db/connection.js";
import {
  ensureSchema,
  getTableStats,
  hasSchema,
} from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { displayTableStats, printError } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the zones and records tables if they are missing")
    .action(async () => {
      const spinner = ora("Initializing schema...").start();
      let store: Store | undefined;

      try {
        store = openStore(loadDatabaseUrl());
        await ensureSchema(store);
        spinner.succeed("Schema is up to date");

        console.log("\nTables:");
        displayTableStats(await getTableStats(store.db));
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        if (store !== undefined) {
          await closeStore(store);
        }
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show table statistics")
    .action(async () => {
      let url: string;
      try {
        url = loadDatabaseUrl();
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Checking database connection...").start();
      let store: Store | undefined;

      try {
        store = openStore(url);
        const connected = await checkConnection(store);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${maskDatabaseUrl(url)}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${maskDatabaseUrl(url)}`);
        console.log(`Dialect: ${store.dialect}`);

        if (!(await hasSchema(store.db))) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          console.log("\nTable statistics:");
          displayTableStats(await getTableStats(store.db));
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        if (store !== undefined) {
          await closeStore(store);
        }
      }
    });
}
