import type { Insertable, Selectable } from "kysely";

// ============================================================================
// fbw_supplies
// ============================================================================

/**
 * Table that receives the full snapshot on every run. Its schema and name
 * come from configuration; `Database` maps the default name.
 *
 * Timestamps are written as the API sent them and cast by PostgreSQL to
 * timestamptz.
 */
export interface FbwSuppliesTable {
  wb_key: string;
  supply_id: number | string | null;
  preorder_id: number | string | null;
  phone: string | null;
  create_date: string | null;
  supply_date: string | null;
  fact_date: string | null;
  updated_date: string | null;
  status_id: number | null;
}

export type SupplyRow = Insertable<FbwSuppliesTable>;
export type StoredSupply = Selectable<FbwSuppliesTable>;

export const SUPPLY_COLUMNS = [
  "wb_key",
  "supply_id",
  "preorder_id",
  "phone",
  "create_date",
  "supply_date",
  "fact_date",
  "updated_date",
  "status_id",
] as const satisfies readonly (keyof FbwSuppliesTable)[];

export interface Database {
  fbw_supplies: FbwSuppliesTable;
}
