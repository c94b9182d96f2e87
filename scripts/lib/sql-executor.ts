import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import { ETLConfig } from './config-loader';
import { retryWithBackoff } from './error-handler';

export interface SQLExecutionOptions {
  config: ETLConfig;
  pool: sql.ConnectionPool;
  scriptPath: string;
  debugMode?: boolean;
}

export interface SQLExecutionResult {
  success: boolean;
  batches: number;
  recordsAffected?: number;
  duration: number;
  error?: Error;
}

/**
 * Substitute schema variable placeholders with the configured warehouse schema
 */
export function substituteSchemaVariables(sqlText: string, config: ETLConfig): string {
  return sqlText.replace(/\$\(WAREHOUSE_SCHEMA\)/g, config.database.schema);
}

/**
 * Split SQL by GO batch separator (SQL Server requirement)
 */
export function splitSqlBatches(sqlText: string): string[] {
  return sqlText
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute SQL script with schema variable substitution
 */
export async function executeSQLScript(options: SQLExecutionOptions): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  let batchCount = 0;

  try {
    const scriptContent = fs.readFileSync(options.scriptPath, 'utf-8');
    const batches = splitSqlBatches(substituteSchemaVariables(scriptContent, options.config));
    batchCount = batches.length;

    if (options.debugMode) {
      console.log(`   🐛 DEBUG: ${path.basename(options.scriptPath)} split into ${batches.length} batch(es)`);
    }

    console.log(`   ⚡ Executing ${batches.length} SQL batch(es)...`);
    let totalRowsAffected = 0;

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];
      const result = await retryWithBackoff(
        () => options.pool.request().query(batch),
        {
          maxRetries: options.config.retry.maxRetries,
          baseDelay: options.config.retry.baseDelay,
          onRetry: attempt => {
            console.log(`    Retry attempt ${attempt} for ${path.basename(options.scriptPath)} batch ${i + 1}`);
          }
        }
      );

      if (result.rowsAffected?.[0]) {
        totalRowsAffected += result.rowsAffected[0];
      }
    }

    return {
      success: true,
      batches: batchCount,
      recordsAffected: totalRowsAffected,
      duration: (Date.now() - startTime) / 1000
    };
  } catch (error) {
    return {
      success: false,
      batches: batchCount,
      duration: (Date.now() - startTime) / 1000,
      error: error instanceof Error ? error : new Error(String(error))
    };
  }
}
