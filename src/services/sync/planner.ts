/**
 * Window & Axis Planner
 *
 * Turns the configured lookback, statuses and axes into the absolute window
 * and validated axis list for one run. Pure: the clock is passed in.
 */

import { ConfigurationError } from "../../errors.js";
import {
  AXIS_NAMES,
  type AxisName,
  type LegacyAxisCode,
  type QueryAxis,
  type SyncWindow,
} from "../../types/index.js";

// Moscow time, no DST
export const ZONE_OFFSET_MINUTES = 180;

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export const VALID_STATUSES = [1, 2, 3, 4, 5, 6] as const;

const LEGACY_AXIS_NAMES: Record<LegacyAxisCode, AxisName> = {
  1: "createDate",
  2: "supplyDate",
  3: "factDate",
  4: "updatedDate",
};

export interface PlanInput {
  lookbackDays: number;
  statuses: readonly number[];
  axes: readonly QueryAxis[];
}

export interface SyncPlan {
  window: SyncWindow;
  statuses: number[];
  axes: QueryAxis[];
}

// ============================================================================
// Window
// ============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Format an instant as `YYYY-MM-DDTHH:mm:ss±HH:MM` in a fixed-offset zone
 */
export function formatZonedIso(
  instant: Date,
  offsetMinutes = ZONE_OFFSET_MINUTES
): string {
  // Shift so the UTC getters read local wall-clock fields
  const local = new Date(instant.getTime() + offsetMinutes * MS_PER_MINUTE);
  const date = `${String(local.getUTCFullYear())}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
  return `${date}T${time}${formatOffset(offsetMinutes)}`;
}

/**
 * Window ending at `now`, starting at local midnight `lookbackDays` days earlier
 */
export function computeWindow(
  lookbackDays: number,
  now: Date,
  offsetMinutes = ZONE_OFFSET_MINUTES
): SyncWindow {
  if (!Number.isInteger(lookbackDays) || lookbackDays < 1) {
    throw new ConfigurationError(
      `Lookback must be a positive integer number of days, got ${String(lookbackDays)}`
    );
  }

  const offsetMs = offsetMinutes * MS_PER_MINUTE;
  const localStart = now.getTime() + offsetMs - lookbackDays * MS_PER_DAY;
  const localMidnight = localStart - (((localStart % MS_PER_DAY) + MS_PER_DAY) % MS_PER_DAY);

  return {
    start: formatZonedIso(new Date(localMidnight - offsetMs), offsetMinutes),
    end: formatZonedIso(now, offsetMinutes),
  };
}

// ============================================================================
// Statuses and Axes
// ============================================================================

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
}

/**
 * Parse a comma-separated status list such as "1,2,3"
 */
export function parseStatuses(raw: string): number[] {
  const parts = splitList(raw);
  if (parts.length === 0) {
    throw new ConfigurationError("Status list is empty");
  }

  return parts.map((part) => {
    if (!/^\d+$/.test(part)) {
      throw new ConfigurationError(`Invalid status "${part}" in "${raw}"`);
    }
    return Number(part);
  });
}

function isAxisName(value: string): value is AxisName {
  return AXIS_NAMES.some((name) => name === value);
}

function isLegacyCode(value: number): value is LegacyAxisCode {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

/**
 * Resolve one configured axis: a name, or a legacy integer code 1..4
 */
export function parseAxis(raw: string): QueryAxis {
  const value = raw.trim();

  if (isAxisName(value)) {
    return { kind: "name", name: value };
  }

  if (/^\d+$/.test(value)) {
    const code = Number(value);
    if (isLegacyCode(code)) {
      return { kind: "legacyCode", code, name: LEGACY_AXIS_NAMES[code] };
    }
  }

  throw new ConfigurationError(
    `Invalid date type "${value}" (expected one of ${AXIS_NAMES.join(", ")})`
  );
}

/**
 * Parse a comma-separated axis list such as "createDate,updatedDate"
 */
export function parseAxes(raw: string): QueryAxis[] {
  const parts = splitList(raw);
  if (parts.length === 0) {
    throw new ConfigurationError(
      "Date type list is empty (expected a comma list like 'createDate,updatedDate')"
    );
  }
  return parts.map(parseAxis);
}

/**
 * Value sent as `dates[].Type` for an axis
 */
export function axisWireValue(axis: QueryAxis): AxisName | LegacyAxisCode {
  return axis.kind === "name" ? axis.name : axis.code;
}

export function describeAxis(axis: QueryAxis): string {
  return axis.kind === "name"
    ? axis.name
    : `${axis.name} (legacy code ${String(axis.code)})`;
}

// ============================================================================
// Plan
// ============================================================================

export function planSync(input: PlanInput, now: Date = new Date()): SyncPlan {
  if (input.statuses.length === 0) {
    throw new ConfigurationError("Status list is empty");
  }
  for (const status of input.statuses) {
    if (!VALID_STATUSES.some((valid) => valid === status)) {
      throw new ConfigurationError(
        `Unknown supply status ${String(status)} (expected 1..6)`
      );
    }
  }
  if (input.axes.length === 0) {
    throw new ConfigurationError("Date type list is empty");
  }

  return {
    window: computeWindow(input.lookbackDays, now),
    statuses: [...input.statuses],
    axes: [...input.axes],
  };
}
