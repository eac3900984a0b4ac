/**
 * Supply normalization and merge
 *
 * Projects raw API records onto table rows and folds them into one map keyed
 * by identity. A later record with the same key replaces the earlier one, so
 * the order axes are swept in decides which copy is kept.
 */

import type { SupplyRow } from "../../db/types.js";
import type { RawSupply } from "../../types/index.js";

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Render an identifier the way it appears in a key: integers as integers,
 * anything else verbatim.
 */
function formatIdentifier(value: number | string): string {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(Math.trunc(value)) : String(value);
  }
  return INTEGER_PATTERN.test(value)
    ? String(Number.parseInt(value, 10))
    : value;
}

/**
 * `S:<supplyID>` when the supply has an ID, otherwise `P:<preorderID or 0>`
 */
export function deriveIdentityKey(raw: RawSupply): string {
  if (raw.supplyID !== undefined && raw.supplyID !== null) {
    return `S:${formatIdentifier(raw.supplyID)}`;
  }
  return `P:${formatIdentifier(raw.preorderID ?? 0)}`;
}

export function normalizeSupply(raw: RawSupply): SupplyRow {
  return {
    wb_key: deriveIdentityKey(raw),
    supply_id: raw.supplyID ?? null,
    preorder_id: raw.preorderID ?? null,
    phone: raw.phone ?? null,
    create_date: raw.createDate ?? null,
    supply_date: raw.supplyDate ?? null,
    fact_date: raw.factDate ?? null,
    updated_date: raw.updatedDate ?? null,
    status_id: raw.statusID ?? null,
  };
}

export class SupplyMerger {
  private readonly rows = new Map<string, SupplyRow>();
  private seen = 0;

  add(records: readonly RawSupply[]): void {
    for (const raw of records) {
      const row = normalizeSupply(raw);
      this.rows.set(row.wb_key, row);
      this.seen++;
    }
  }

  /**
   * Unique identities so far
   */
  get size(): number {
    return this.rows.size;
  }

  /**
   * Raw records merged so far, duplicates included
   */
  get recordsSeen(): number {
    return this.seen;
  }

  get(key: string): SupplyRow | undefined {
    return this.rows.get(key);
  }

  /**
   * Rows in first-seen order of their identity
   */
  values(): SupplyRow[] {
    return [...this.rows.values()];
  }
}
