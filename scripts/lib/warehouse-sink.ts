/**
 * Warehouse Sink
 *
 * Appends finished tables to the SQL Server warehouse using the native bulk
 * insert protocol. All tables of a batch, plus the ingest ledger row, go in
 * one transaction: either every table is appended or none is.
 * Tables are never truncated, updated or replaced.
 */

import * as sql from 'mssql';
import { WarehouseBatch, WarehouseTable } from '../transforms/build-warehouse-tables';
import { PipelineError, RetryOptions, SinkWriteError, executeWithTransaction } from './error-handler';
import { IngestLedger } from './ingest-ledger';
import { ProgressReporter } from './progress-reporter';
import { COLUMN_LIMITS, ColumnKind } from './warehouse-schema';

export interface AppendOptions {
  messageId?: string | null;
}

export interface AppendResult {
  status: 'appended' | 'duplicate';
  rowsAppended: Record<string, number>;
}

export interface WarehouseSink {
  append(batch: WarehouseBatch, options?: AppendOptions): Promise<AppendResult>;
}

export interface SqlServerSinkOptions {
  schema: string;
  retry?: RetryOptions;
}

export function sqlTypeFor(kind: ColumnKind): sql.ISqlType {
  switch (kind) {
    case 'text':
      return sql.NVarChar(COLUMN_LIMITS.textLength);
    case 'code':
      return sql.NVarChar(COLUMN_LIMITS.codeLength);
    case 'numeric':
      return sql.Float();
    case 'integer':
      return sql.Int();
    case 'date':
      return sql.Date();
  }
}

/**
 * Build an mssql bulk table for an existing warehouse table
 */
export function buildBulkTable(schema: string, table: WarehouseTable): sql.Table {
  const bulkTable = new sql.Table(`[${schema}].[${table.table}]`);
  bulkTable.create = false;

  for (const column of table.columns) {
    bulkTable.columns.add(column.name, sqlTypeFor(column.kind), { nullable: true });
  }

  for (const row of table.rows) {
    bulkTable.rows.add(...table.columns.map(column => row[column.name] ?? null));
  }

  return bulkTable;
}

export class SqlServerWarehouseSink implements WarehouseSink {
  private readonly ledger: IngestLedger;

  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly options: SqlServerSinkOptions
  ) {
    this.ledger = new IngestLedger(options.schema);
  }

  async append(batch: WarehouseBatch, options: AppendOptions = {}): Promise<AppendResult> {
    const messageId = options.messageId ?? null;

    try {
      return await executeWithTransaction(this.pool, async (transaction): Promise<AppendResult> => {
        if (messageId && await this.withTable(this.ledger.tableName, () => this.ledger.hasApplied(transaction, messageId))) {
          return { status: 'duplicate', rowsAppended: {} };
        }

        const rowsAppended: Record<string, number> = {};
        for (const table of batch.tables) {
          rowsAppended[table.table] = await this.appendTable(transaction, table);
        }

        if (messageId) {
          await this.withTable(this.ledger.tableName, () => this.ledger.recordApplied(transaction, messageId, rowsAppended));
        }
        return { status: 'appended', rowsAppended };
      }, this.options.retry);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      // Failures outside a table write (connect, begin, commit)
      throw new SinkWriteError(`[${this.options.schema}] transaction`, error);
    }
  }

  private async appendTable(transaction: sql.Transaction, table: WarehouseTable): Promise<number> {
    if (table.rows.length === 0) {
      return 0;
    }
    const bulkTable = buildBulkTable(this.options.schema, table);
    const result = await this.withTable(
      `[${this.options.schema}].[${table.table}]`,
      () => new sql.Request(transaction).bulk(bulkTable)
    );
    return result.rowsAffected;
  }

  private async withTable<T>(tableName: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new SinkWriteError(tableName, error);
    }
  }
}

/**
 * Logs what would be appended without touching the warehouse
 */
export class DryRunWarehouseSink implements WarehouseSink {
  constructor(private readonly reporter: ProgressReporter) {}

  async append(batch: WarehouseBatch, options: AppendOptions = {}): Promise<AppendResult> {
    const rowsAppended: Record<string, number> = {};
    for (const table of batch.tables) {
      rowsAppended[table.table] = table.rows.length;
    }
    this.reporter.logInfo(`[DRY RUN] Would append message ${options.messageId ?? '(none)'}:`);
    this.reporter.logTableCounts(rowsAppended);
    return { status: 'appended', rowsAppended };
  }
}
