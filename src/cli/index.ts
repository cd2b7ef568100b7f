#!/usr/bin/env node

/**
 * Zone File Sync CLI
 *
 * Downloads approved CZDS zone files and syncs their records into
 * PostgreSQL (or SQLite).
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerZonesCommand } from "./commands/zones.js";

const program = new Command();

program
  .name("zone-sync")
  .description("Sync CZDS zone files into a relational database")
  .version("0.1.0");

registerSyncCommand(program);
registerZonesCommand(program);
registerStatusCommand(program);
registerDbCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
