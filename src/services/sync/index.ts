// Sync Services - Re-exports
export {
  planSync,
  computeWindow,
  formatZonedIso,
  parseAxes,
  parseAxis,
  parseStatuses,
  axisWireValue,
  describeAxis,
  type PlanInput,
  type SyncPlan,
} from "./planner.js";
export {
  fetchAxis,
  fetchAllAxes,
  PAGE_SIZE,
  type SupplyPageSource,
} from "./fetcher.js";
export { deriveIdentityKey, normalizeSupply, SupplyMerger } from "./merge.js";
export {
  SupplyTableReconciler,
  INSERT_BATCH_SIZE,
  chunk,
  type ReconcileResult,
  type ReconcilerOptions,
} from "./reconcile.js";
export {
  SupplySyncOrchestrator,
  formatFetchSummary,
  type SyncSummary,
  type SyncProgress,
  type SyncRunOptions,
  type CountingPageSource,
  type TableWriter,
} from "./orchestrator.js";
