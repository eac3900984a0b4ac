/**
 * Paginated Fetcher
 *
 * Sweeps one axis at a time with offset pagination. Records reachable from
 * several axes are returned once per axis; dedup happens in the merger.
 */

import { syncLogger } from "../../logger.js";
import { describeAxis } from "./planner.js";

import type { QueryAxis, RawSupply, SyncWindow } from "../../types/index.js";

export const PAGE_SIZE = 1000;

/**
 * The part of the API client the fetcher needs
 */
export interface SupplyPageSource {
  fetchPage(
    offset: number,
    limit: number,
    window: SyncWindow,
    statuses: readonly number[],
    axis: QueryAxis
  ): Promise<RawSupply[]>;
}

/**
 * Fetch every record for one axis. Stops at the first page shorter than
 * `pageSize`.
 */
export async function fetchAxis(
  source: SupplyPageSource,
  window: SyncWindow,
  statuses: readonly number[],
  axis: QueryAxis,
  pageSize = PAGE_SIZE
): Promise<RawSupply[]> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${String(pageSize)}`);
  }

  const records: RawSupply[] = [];
  let offset = 0;
  let pages = 0;

  for (;;) {
    const page = await source.fetchPage(offset, pageSize, window, statuses, axis);
    pages++;
    records.push(...page);

    if (page.length < pageSize) {
      break;
    }
    offset += pageSize;
  }

  syncLogger.info(
    { axis: describeAxis(axis), pages, records: records.length },
    "Axis fetched"
  );

  return records;
}

/**
 * Sweep axes in configured order, handing each axis's records to `onAxis`
 * before the next axis is requested.
 */
export async function fetchAllAxes(
  source: SupplyPageSource,
  window: SyncWindow,
  statuses: readonly number[],
  axes: readonly QueryAxis[],
  onAxis: (axis: QueryAxis, records: RawSupply[]) => void,
  pageSize = PAGE_SIZE
): Promise<void> {
  for (const axis of axes) {
    const records = await fetchAxis(source, window, statuses, axis, pageSize);
    onAxis(axis, records);
  }
}
