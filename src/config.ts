/**
 * Runtime configuration
 *
 * Built once from the environment at process start and passed down
 * explicitly; nothing else in the pipeline reads process.env.
 */

import "dotenv/config";

import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";
import { parseAxes, parseStatuses } from "./services/sync/planner.js";

import type { QueryAxis } from "./types/index.js";

export const DEFAULT_API_URL =
  "https://supplies-api.wildberries.ru/api/v1/supplies";

export const DEFAULTS = {
  schema: "public",
  table: "fbw_supplies",
  lookbackDays: "365",
  statuses: "1,2,3,4,5,6",
  axes: "createDate,supplyDate,factDate,updatedDate",
  atomicRefresh: "true",
} as const;

export interface SyncConfig {
  readonly apiToken: string;
  readonly apiUrl: string;
  readonly databaseUrl: string;
  readonly schema: string;
  readonly table: string;
  readonly lookbackDays: number;
  readonly statuses: readonly number[];
  readonly axes: readonly QueryAxis[];
  readonly atomicRefresh: boolean;
}

/**
 * Values that may come from CLI flags instead of the environment
 */
export interface ConfigOverrides {
  days?: string;
  statuses?: string;
  axes?: string;
  atomicRefresh?: boolean;
}

type Env = Record<string, string | undefined>;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function required(env: Env, name: string): string {
  const value = env[name]?.trim() ?? "";
  if (value === "") {
    throw new ConfigurationError(`${name} is empty`);
  }
  return value;
}

function optional(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim() ?? "";
  return value === "" ? fallback : value;
}

function identifier(name: string, value: string): string {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new ConfigurationError(`${name} is not a valid identifier: "${value}"`);
  }
  return value;
}

function positiveInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${value}"`
    );
  }
  return Number(value);
}

function bool(name: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
}

export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {}
): SyncConfig {
  const apiToken = required(env, "WB_SUPPLIES_TOKEN");
  const databaseUrl = required(env, "DATABASE_URL");

  const config: SyncConfig = {
    apiToken,
    apiUrl: optional(env, "SUPPLIES_API_URL", DEFAULT_API_URL),
    databaseUrl,
    schema: identifier(
      "SUPPLIES_SCHEMA",
      optional(env, "SUPPLIES_SCHEMA", DEFAULTS.schema)
    ),
    table: identifier(
      "SUPPLIES_TABLE",
      optional(env, "SUPPLIES_TABLE", DEFAULTS.table)
    ),
    lookbackDays: positiveInteger(
      "SUPPLIES_DAYS",
      overrides.days ?? optional(env, "SUPPLIES_DAYS", DEFAULTS.lookbackDays)
    ),
    statuses: Object.freeze(
      parseStatuses(
        overrides.statuses ??
          optional(env, "SUPPLIES_STATUSES", DEFAULTS.statuses)
      )
    ),
    axes: Object.freeze(
      parseAxes(
        overrides.axes ?? optional(env, "SUPPLIES_DATE_TYPES", DEFAULTS.axes)
      )
    ),
    atomicRefresh:
      overrides.atomicRefresh ??
      bool(
        "SUPPLIES_ATOMIC_REFRESH",
        optional(env, "SUPPLIES_ATOMIC_REFRESH", DEFAULTS.atomicRefresh)
      ),
  };

  for (const axis of config.axes) {
    if (axis.kind === "legacyCode") {
      logger.warn(
        { code: axis.code, axis: axis.name },
        "Integer date types are deprecated; configure the axis by name"
      );
    }
  }

  return Object.freeze(config);
}

/**
 * Database URL with the password masked, for log output
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    if (url.password !== "") {
      url.password = "****";
    }
    return url.toString();
  } catch {
    return "<unparseable database url>";
  }
}
