/**
 * Wildberries Supplies API Types
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Query Axes
// ============================================================================

export const AXIS_NAMES = [
  "createDate",
  "supplyDate",
  "factDate",
  "updatedDate",
] as const;

export type AxisName = (typeof AXIS_NAMES)[number];

export type LegacyAxisCode = 1 | 2 | 3 | 4;

/**
 * Date filter sent as `dates[].Type`.
 *
 * The string form is canonical. Older API versions took a small integer
 * instead; `legacyCode` keeps that encoding for configurations that still
 * use it.
 */
export type QueryAxis =
  | { kind: "name"; name: AxisName }
  | { kind: "legacyCode"; code: LegacyAxisCode; name: AxisName };

// ============================================================================
// Sync Window
// ============================================================================

/**
 * Half-open range [start, end) as ISO-8601 strings with explicit +03:00 offset
 */
export interface SyncWindow {
  start: string;
  end: string;
}

// ============================================================================
// Request / Response
// ============================================================================

export interface SuppliesRequestBody {
  dates: { start: string; end: string; Type: AxisName | LegacyAxisCode }[];
  statusIDs: number[];
}

const Identifier = Type.Union([Type.Number(), Type.String(), Type.Null()]);
const Timestamp = Type.Union([Type.String(), Type.Null()]);

export const RawSupplySchema = Type.Object({
  supplyID: Type.Optional(Identifier),
  preorderID: Type.Optional(Identifier),
  phone: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  createDate: Type.Optional(Timestamp),
  supplyDate: Type.Optional(Timestamp),
  factDate: Type.Optional(Timestamp),
  updatedDate: Type.Optional(Timestamp),
  statusID: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
});

export const SuppliesResponseSchema = Type.Array(RawSupplySchema);

/**
 * One supply as returned by POST /api/v1/supplies (fields we store)
 */
export type RawSupply = Static<typeof RawSupplySchema>;
