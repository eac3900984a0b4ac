/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { maskDatabaseUrl, type SyncConfig } from "../../config.js";
import { axisWireValue } from "../../services/sync/planner.js";
import { formatFetchSummary } from "../../services/sync/orchestrator.js";

import type { SyncPlan } from "../../services/sync/planner.js";
import type { SyncSummary } from "../../services/sync/orchestrator.js";

/**
 * Display the window, statuses and axes a run would sweep
 */
export function displayPlan(plan: SyncPlan, config: SyncConfig): void {
  console.log(chalk.bold("\nSync plan:\n"));
  console.log(`  ${chalk.cyan("Window:")}   ${plan.window.start} → ${plan.window.end} (MSK)`);
  console.log(`  ${chalk.cyan("Statuses:")} ${plan.statuses.join(", ")}`);
  console.log(`  ${chalk.cyan("Target:")}   ${config.schema}.${config.table}`);
  console.log(`  ${chalk.cyan("Database:")} ${maskDatabaseUrl(config.databaseUrl)}`);
  console.log(
    `  ${chalk.cyan("Refresh:")}  ${config.atomicRefresh ? "transactional" : "two-phase (non-atomic)"}\n`
  );

  const table = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Axis"), chalk.cyan("Sent as")],
  });

  for (const [index, axis] of plan.axes.entries()) {
    const wire = axisWireValue(axis);
    table.push([
      String(index + 1),
      axis.name,
      axis.kind === "legacyCode"
        ? `${String(wire)} ${chalk.yellow("(legacy)")}`
        : String(wire),
    ]);
  }

  console.log(table.toString());
}

/**
 * Lines printed when a sync finishes
 */
export function summaryLines(summary: SyncSummary): string[] {
  const lines = [formatFetchSummary(summary)];
  if (summary.dryRun) {
    lines.push("Dry run: table not modified");
  } else {
    lines.push(`Inserted rows: ${String(summary.insertedCount)}`);
    lines.push("Sync completed");
  }
  return lines;
}
