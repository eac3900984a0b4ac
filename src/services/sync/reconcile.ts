/**
 * Full-refresh reconciliation
 *
 * Replaces the whole destination table with the merged snapshot: delete every
 * row, then insert the new rows in batches. By default both phases share one
 * transaction; with `atomic: false` a failure between them leaves the table
 * empty or partial until the next run.
 */

import { sql, type Kysely } from "kysely";

import { StoreError, errorMessage } from "../../errors.js";
import { dbLogger } from "../../logger.js";
import { SUPPLY_COLUMNS, type Database, type SupplyRow } from "../../db/types.js";

export const INSERT_BATCH_SIZE = 500;

export interface ReconcilerOptions {
  schema: string;
  table: string;
  atomic?: boolean;
  batchSize?: number;
}

export interface ReconcileResult {
  deleted: number;
  inserted: number;
  batches: number;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class SupplyTableReconciler {
  private readonly schema: string;
  private readonly table: string;
  private readonly atomic: boolean;
  private readonly batchSize: number;

  constructor(
    private readonly db: Kysely<Database>,
    options: ReconcilerOptions
  ) {
    this.schema = options.schema;
    this.table = options.table;
    this.atomic = options.atomic ?? true;
    this.batchSize = options.batchSize ?? INSERT_BATCH_SIZE;
  }

  get qualifiedName(): string {
    return `${this.schema}.${this.table}`;
  }

  /**
   * Delete all rows, then insert `rows` in order
   */
  async replaceAll(rows: readonly SupplyRow[]): Promise<ReconcileResult> {
    dbLogger.info(
      { table: this.qualifiedName, rows: rows.length, atomic: this.atomic },
      "Replacing table contents"
    );

    if (!this.atomic) {
      return this.replaceWith(this.db, rows);
    }

    try {
      return await this.db
        .transaction()
        .execute((trx) => this.replaceWith(trx, rows));
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(
        `Transaction on ${this.qualifiedName} failed: ${errorMessage(error)}`,
        "transaction",
        { cause: error }
      );
    }
  }

  private async replaceWith(
    executor: Kysely<Database>,
    rows: readonly SupplyRow[]
  ): Promise<ReconcileResult> {
    const deleted = await this.deleteAll(executor);

    let inserted = 0;
    const batches = chunk(rows, this.batchSize);
    for (const [index, batch] of batches.entries()) {
      await this.insertBatch(executor, batch, index);
      inserted += batch.length;
    }

    dbLogger.info(
      { table: this.qualifiedName, deleted, inserted, batches: batches.length },
      "Table contents replaced"
    );

    return { deleted, inserted, batches: batches.length };
  }

  private async deleteAll(executor: Kysely<Database>): Promise<number> {
    try {
      const result = await sql`
        DELETE FROM ${sql.table(this.qualifiedName)}
        WHERE wb_key <> ''
      `.execute(executor);
      return Number(result.numAffectedRows ?? 0n);
    } catch (error) {
      throw new StoreError(
        `Delete from ${this.qualifiedName} failed: ${errorMessage(error)}`,
        "delete",
        { cause: error }
      );
    }
  }

  private async insertBatch(
    executor: Kysely<Database>,
    batch: readonly SupplyRow[],
    index: number
  ): Promise<void> {
    const values = batch.map(
      (row) => sql`(${sql.join(SUPPLY_COLUMNS.map((column) => row[column] ?? null))})`
    );

    try {
      await sql`
        INSERT INTO ${sql.table(this.qualifiedName)}
          (${sql.join(SUPPLY_COLUMNS.map((column) => sql.ref(column)))})
        VALUES ${sql.join(values)}
      `.execute(executor);
    } catch (error) {
      throw new StoreError(
        `Insert batch ${String(index + 1)} into ${this.qualifiedName} failed: ${errorMessage(error)}`,
        "insert",
        { cause: error }
      );
    }

    dbLogger.debug(
      { table: this.qualifiedName, batch: index + 1, rows: batch.length },
      "Inserted batch"
    );
  }
}
