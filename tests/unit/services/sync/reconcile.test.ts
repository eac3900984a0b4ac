import { describe, it, expect, vi, beforeEach } from "vitest";

import { StoreError } from "../../../../src/errors.js";
import {
  chunk,
  SupplyTableReconciler,
} from "../../../../src/services/sync/reconcile.js";
import { createInMemoryDb, InMemorySupplyTable } from "../../../mocks/db.js";

import type { SupplyRow } from "../../../../src/db/types.js";

vi.mock("../../../../src/logger.js", () => ({
  dbLogger: { info: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

function supplyRow(id: number): SupplyRow {
  return {
    wb_key: `S:${String(id)}`,
    supply_id: id,
    preorder_id: null,
    phone: null,
    create_date: "2026-10-01T09:00:00+03:00",
    supply_date: null,
    fact_date: null,
    updated_date: null,
    status_id: 1,
  };
}

function rows(count: number): SupplyRow[] {
  return Array.from({ length: count }, (_, i) => supplyRow(i + 1));
}

function staleRow(key: string) {
  return {
    wb_key: key,
    supply_id: null,
    preorder_id: null,
    phone: null,
    create_date: null,
    supply_date: null,
    fact_date: null,
    updated_date: null,
    status_id: null,
  };
}

describe("services/sync/reconcile", () => {
  let table: InMemorySupplyTable;

  beforeEach(() => {
    table = new InMemorySupplyTable();
    table.rows = [staleRow("S:900"), staleRow("P:901")];
  });

  describe("chunk", () => {
    it("should split into fixed-size batches with a short tail", () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });

    it("should return no batches for no items", () => {
      expect(chunk([], 500)).toEqual([]);
    });
  });

  describe("SupplyTableReconciler.replaceAll", () => {
    it("should delete every row and insert the snapshot in batches of 500", async () => {
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
      });

      const result = await reconciler.replaceAll(rows(1200));

      expect(result).toEqual({ deleted: 2, inserted: 1200, batches: 3 });
      expect(table.rows).toHaveLength(1200);
      expect(new Set(table.rows.map((row) => row.wb_key)).size).toBe(1200);
      expect(table.rows[0]?.wb_key).toBe("S:1");
      expect(table.rows[1199]?.wb_key).toBe("S:1200");
      expect(
        table.statements("INSERT").map((query) => query.parameters.length / 9)
      ).toEqual([500, 500, 200]);
      expect(table.events).toEqual(["begin", "commit"]);
    });

    it("should target the schema-qualified table", async () => {
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "marketplace",
        table: "wb_supplies",
      });

      await reconciler.replaceAll(rows(1));

      const [deleteQuery] = table.statements("DELETE");
      const [insertQuery] = table.statements("INSERT");
      expect(deleteQuery?.sql.replace(/\s+/g, " ").trim()).toBe(
        `DELETE FROM "marketplace"."wb_supplies" WHERE wb_key <> ''`
      );
      expect(insertQuery?.sql).toContain(
        `INSERT INTO "marketplace"."wb_supplies"`
      );
      expect(insertQuery?.parameters).toEqual([
        "S:1",
        1,
        null,
        null,
        "2026-10-01T09:00:00+03:00",
        null,
        null,
        null,
        1,
      ]);
    });

    it("should empty the table when the snapshot is empty", async () => {
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
      });

      const result = await reconciler.replaceAll([]);

      expect(result).toEqual({ deleted: 2, inserted: 0, batches: 0 });
      expect(table.rows).toEqual([]);
      expect(table.statements("INSERT")).toEqual([]);
    });

    it("should roll back to the previous contents when an insert fails", async () => {
      table.failOn = (query) =>
        query.sql.includes("INSERT") && query.parameters[0] === "S:501"
          ? new Error("payload too large")
          : undefined;
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
      });

      const result = reconciler.replaceAll(rows(1200));

      await expect(result).rejects.toBeInstanceOf(StoreError);
      await expect(result).rejects.toThrow(
        "Insert batch 2 into public.fbw_supplies failed: payload too large"
      );
      expect(table.rows.map((row) => row.wb_key)).toEqual(["S:900", "P:901"]);
      expect(table.events).toEqual(["begin", "rollback"]);
    });

    it("should leave a partial table when non-atomic and an insert fails", async () => {
      table.failOn = (query) =>
        query.sql.includes("INSERT") && query.parameters[0] === "S:501"
          ? new Error("payload too large")
          : undefined;
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
        atomic: false,
      });

      await expect(reconciler.replaceAll(rows(1200))).rejects.toMatchObject({
        code: "STORE_ERROR",
        phase: "insert",
      });
      expect(table.rows).toHaveLength(500);
      expect(table.events).toEqual([]);
    });

    it("should wrap delete failures", async () => {
      table.failOn = (query) =>
        query.sql.includes("DELETE") ? new Error("permission denied") : undefined;
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
        atomic: false,
      });

      await expect(reconciler.replaceAll(rows(3))).rejects.toMatchObject({
        code: "STORE_ERROR",
        phase: "delete",
        message: "Delete from public.fbw_supplies failed: permission denied",
      });
      expect(table.statements("INSERT")).toEqual([]);
    });

    it("should honour a custom batch size", async () => {
      const reconciler = new SupplyTableReconciler(createInMemoryDb(table), {
        schema: "public",
        table: "fbw_supplies",
        batchSize: 2,
      });

      const result = await reconciler.replaceAll(rows(5));

      expect(result.batches).toBe(3);
      expect(table.rows).toHaveLength(5);
    });
  });
});
