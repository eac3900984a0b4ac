#!/usr/bin/env node

/**
 * FBW Supplies Sync CLI
 *
 * Pulls FBW supplies from the Wildberries supplies API and replaces the
 * destination table with the deduplicated snapshot.
 */

import { Command } from "commander";

import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("fbw-sync")
  .description("Full-refresh sync of Wildberries FBW supplies into PostgreSQL")
  .version("0.1.0");

// `sync` is the default command, so a bare invocation runs the sync
registerSyncCommand(program);

await program.parseAsync();
