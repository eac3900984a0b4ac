import ora from "ora";

import { SuppliesApiClient } from "../../api/client.js";
import { loadConfig, type ConfigOverrides } from "../../config.js";
import { createDatabase, type DatabaseHandle } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { logger } from "../../logger.js";
import {
  planSync,
  SupplySyncOrchestrator,
  SupplyTableReconciler,
} from "../../services/sync/index.js";
import { displayPlan, summaryLines } from "../utils/display.js";

import type { Command } from "commander";

type SyncCommandOptions = {
  days?: string;
  statuses?: string;
  axes?: string;
  dryRun?: boolean;
  nonAtomic?: boolean;
};

function toOverrides(options: SyncCommandOptions): ConfigOverrides {
  return {
    days: options.days,
    statuses: options.statuses,
    axes: options.axes,
    atomicRefresh: options.nonAtomic === true ? false : undefined,
  };
}

function reportFailure(error: unknown): void {
  logger.error({ error }, "Supplies sync failed");
  console.error(`ERROR: ${errorMessage(error)}`);
  process.exitCode = 1;
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync", { isDefault: true })
    .description(
      "Fetch all FBW supplies in the window and replace the table contents"
    )
    .option("--days <n>", "Lookback window in days (SUPPLIES_DAYS)")
    .option("--statuses <list>", "Comma list of status IDs (SUPPLIES_STATUSES)")
    .option("--axes <list>", "Comma list of date types (SUPPLIES_DATE_TYPES)")
    .option("--dry-run", "Fetch and merge, but do not touch the table")
    .option("--non-atomic", "Delete and insert outside a single transaction")
    .action(async (options: SyncCommandOptions) => {
      const spinner = ora({ text: "Planning sync...", stream: process.stderr });
      let database: DatabaseHandle | undefined;

      try {
        const config = loadConfig(process.env, toOverrides(options));
        database = createDatabase(config.databaseUrl);

        const client = new SuppliesApiClient({
          apiUrl: config.apiUrl,
          apiToken: config.apiToken,
        });
        const reconciler = new SupplyTableReconciler(database.db, {
          schema: config.schema,
          table: config.table,
          atomic: config.atomicRefresh,
        });
        const orchestrator = new SupplySyncOrchestrator(
          config,
          client,
          reconciler
        );
        orchestrator.setProgressCallback((progress) => {
          spinner.text =
            progress.phase === "fetch"
              ? `Fetched axis ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`
              : `Writing ${String(progress.total)} rows...`;
        });

        spinner.start("Fetching supplies...");
        const summary = await orchestrator.run({ dryRun: options.dryRun });
        spinner.stop();

        for (const line of summaryLines(summary)) {
          console.log(line);
        }
      } catch (error) {
        spinner.stop();
        reportFailure(error);
      } finally {
        try {
          await database?.close();
        } catch (error) {
          reportFailure(error);
        }
      }
    });

  // sync plan: options are declared on `sync` and read through the parent
  sync
    .command("plan")
    .description("Show the window and axes a sync would use, without fetching")
    .action((_options: unknown, command: Command) => {
      try {
        const options = command.optsWithGlobals<SyncCommandOptions>();
        const config = loadConfig(process.env, toOverrides(options));
        const plan = planSync(config);
        displayPlan(plan, config);
      } catch (error) {
        reportFailure(error);
      }
    });
}
