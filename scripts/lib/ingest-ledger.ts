import * as sql from 'mssql';

/**
 * Ingest Ledger
 * Records which messages have been appended to the warehouse. Calls run on the
 * sink's transaction so the ledger row commits or rolls back with the data.
 */
export class IngestLedger {
  constructor(private readonly schema: string) {}

  get tableName(): string {
    return `[${this.schema}].[IngestLog]`;
  }

  /**
   * Check whether a message has already been applied
   */
  async hasApplied(transaction: sql.Transaction, messageId: string): Promise<boolean> {
    const result = await new sql.Request(transaction)
      .input('MessageId', sql.NVarChar(200), messageId)
      .query<{ MessageId: string }>(`
        SELECT MessageId
        FROM ${this.tableName} WITH (UPDLOCK, HOLDLOCK)
        WHERE MessageId = @MessageId
      `);

    return result.recordset.length > 0;
  }

  /**
   * Record a message as applied, with the number of rows appended per table
   */
  async recordApplied(
    transaction: sql.Transaction,
    messageId: string,
    rowCounts: Record<string, number>
  ): Promise<void> {
    await new sql.Request(transaction)
      .input('MessageId', sql.NVarChar(200), messageId)
      .input('RowCounts', sql.NVarChar(sql.MAX), JSON.stringify(rowCounts))
      .query(`
        INSERT INTO ${this.tableName} (MessageId, AppliedAt, RowCounts)
        VALUES (@MessageId, SYSUTCDATETIME(), @RowCounts)
      `);
  }
}
