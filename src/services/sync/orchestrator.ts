import { syncLogger } from "../../logger.js";
import { fetchAllAxes, PAGE_SIZE, type SupplyPageSource } from "./fetcher.js";
import { SupplyMerger } from "./merge.js";
import { describeAxis, planSync, type SyncPlan } from "./planner.js";

import type { SyncConfig } from "../../config.js";
import type { SupplyRow } from "../../db/types.js";
import type { SyncWindow } from "../../types/index.js";
import type { ReconcileResult } from "./reconcile.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncRunOptions {
  dryRun?: boolean;
}

export interface SyncSummary {
  uniqueCount: number;
  recordsFetched: number;
  window: SyncWindow;
  requestCount: number;
  insertedCount: number;
  deletedCount: number;
  dryRun: boolean;
}

export interface SyncProgress {
  phase: "fetch" | "reconcile";
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

/**
 * API client as seen by the orchestrator: pages plus a request counter
 */
export interface CountingPageSource extends SupplyPageSource {
  readonly requestCount: number;
}

export interface TableWriter {
  replaceAll(rows: readonly SupplyRow[]): Promise<ReconcileResult>;
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SupplySyncOrchestrator {
  private onProgress?: ProgressCallback;

  constructor(
    private readonly config: Pick<
      SyncConfig,
      "lookbackDays" | "statuses" | "axes"
    >,
    private readonly source: CountingPageSource,
    private readonly writer: TableWriter,
    private readonly clock: () => Date = () => new Date(),
    private readonly pageSize: number = PAGE_SIZE
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  plan(): SyncPlan {
    return planSync(
      {
        lookbackDays: this.config.lookbackDays,
        statuses: this.config.statuses,
        axes: this.config.axes,
      },
      this.clock()
    );
  }

  /**
   * Plan, fetch every axis, merge, then replace the table. Any error aborts
   * the run before or during the write; there is no partial-success result.
   */
  async run(options: SyncRunOptions = {}): Promise<SyncSummary> {
    const plan = this.plan();
    const { window, statuses, axes } = plan;
    const requestsBefore = this.source.requestCount;

    syncLogger.info(
      {
        window,
        statuses,
        axes: axes.map(describeAxis),
        dryRun: options.dryRun === true,
      },
      "Starting supplies sync"
    );

    const merger = new SupplyMerger();
    let axisIndex = 0;
    await fetchAllAxes(
      this.source,
      window,
      statuses,
      axes,
      (axis, records) => {
        axisIndex++;
        merger.add(records);
        this.onProgress?.({
          phase: "fetch",
          current: axisIndex,
          total: axes.length,
          currentItem: describeAxis(axis),
        });
      },
      this.pageSize
    );

    const summary: SyncSummary = {
      uniqueCount: merger.size,
      recordsFetched: merger.recordsSeen,
      window,
      requestCount: this.source.requestCount - requestsBefore,
      insertedCount: 0,
      deletedCount: 0,
      dryRun: options.dryRun === true,
    };

    if (summary.dryRun) {
      syncLogger.info(summary, "Dry run: table left untouched");
      return summary;
    }

    this.onProgress?.({
      phase: "reconcile",
      current: 0,
      total: merger.size,
    });

    const result = await this.writer.replaceAll(merger.values());
    summary.insertedCount = result.inserted;
    summary.deletedCount = result.deleted;

    this.onProgress?.({
      phase: "reconcile",
      current: result.inserted,
      total: merger.size,
    });

    syncLogger.info(summary, "Supplies sync completed");
    return summary;
  }
}

/**
 * The line printed after fetching, e.g.
 * `Fetched unique supplies: 3; period: ... → ... (MSK); requests: 2`
 */
export function formatFetchSummary(summary: SyncSummary): string {
  return `Fetched unique supplies: ${String(summary.uniqueCount)}; period: ${summary.window.start} → ${summary.window.end} (MSK); requests: ${String(summary.requestCount)}`;
}
