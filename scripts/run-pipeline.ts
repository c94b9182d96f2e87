/**
 * Sales ETL Pipeline Runner
 * =========================
 * Processes one inbound sales message (or one CSV replay) end to end:
 * decode → normalize → entity graph → derive features → select → merge → append
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts --message <event.json> [--dry-run]
 *   npx tsx scripts/run-pipeline.ts --csv <file.csv> [--limit N] [--dry-run]
 *
 * Options:
 *   --message <file>  JSON event file: { data, messageId? } or { message: { data, messageId? } }
 *   --csv <file>      CSV export with one sales record per row (header = field names)
 *   --limit <n>       Read at most n CSV rows (default: all)
 *   --dry-run         Build the tables and log them, without writing to SQL Server
 *
 * Exit code is 0 when the batch was loaded or was a duplicate, 1 when it failed.
 */

import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import {
  ETLConfig,
  getReferencePolicy,
  getSqlConfig,
  loadConfig,
  printConfig,
  validateConfig,
} from './lib/config-loader';
import { readSalesCsv } from './lib/csv-reader';
import {
  ErrorCategory,
  FailureDisposition,
  classifyError,
  formatError,
  resolveDisposition,
} from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { WarehouseSchema, loadWarehouseSchema } from './lib/warehouse-schema';
import { DryRunWarehouseSink, SqlServerWarehouseSink, WarehouseSink } from './lib/warehouse-sink';
import { buildWarehouseTables } from './transforms/build-warehouse-tables';
import { decodeSalesMessage } from './transforms/decode-message';

export interface PipelineDependencies {
  sink: WarehouseSink;
  schema: WarehouseSchema;
  config: ETLConfig;
  reporter: ProgressReporter;
}

export type InvocationResult =
  | { status: 'loaded'; messageId: string | null; rowsAppended: Record<string, number> }
  | { status: 'duplicate'; messageId: string | null }
  | { status: 'failed'; disposition: FailureDisposition; category: ErrorCategory; error: Error };

const TOTAL_STEPS = 2;

// =============================================================================
// Invocation
// =============================================================================

/**
 * Handle one inbound message event. Never throws: failures come back as a
 * `failed` result whose disposition tells the transport whether to redeliver.
 */
export async function handleSalesMessage(event: unknown, deps: PipelineDependencies): Promise<InvocationResult> {
  const startTime = Date.now();

  try {
    const decoded = decodeSalesMessage(event);
    deps.reporter.logRunStart('message', decoded.messageId, TOTAL_STEPS);
    deps.reporter.logInfo(`Decoded ${decoded.records.length} record(s) from ${decoded.payload.length} byte payload`);
    return await runBatch(decoded.records, decoded.messageId, deps, startTime);
  } catch (error) {
    return failedResult(error, deps.reporter);
  }
}

/**
 * Handle an already-decoded batch of records (CSV replay). Batches without a
 * message ID are not checked against the ingest ledger.
 */
export async function handleSalesRecords(
  records: unknown[],
  deps: PipelineDependencies,
  source: string = 'records'
): Promise<InvocationResult> {
  const startTime = Date.now();

  try {
    deps.reporter.logRunStart(source, null, TOTAL_STEPS);
    return await runBatch(records, null, deps, startTime);
  } catch (error) {
    return failedResult(error, deps.reporter);
  }
}

async function runBatch(
  records: unknown[],
  messageId: string | null,
  deps: PipelineDependencies,
  startTime: number
): Promise<InvocationResult> {
  const { sink, schema, config, reporter } = deps;

  const built = await runStep(reporter, 'Build warehouse tables', 1, () =>
    buildWarehouseTables(records, schema, {
      maxDepth: config.pipeline.maxDepth,
      referencePolicy: getReferencePolicy(config),
      reporter,
    })
  );
  const batch = built.result;
  reporter.logStepComplete('Build warehouse tables', built.duration, batch.stats.recordsRead);
  reporter.logDebug(`${batch.stats.featuresDerived} features derived, ${batch.stats.danglingReferences.length} dangling reference set(s)`);

  const load = await runStep(reporter, 'Append to warehouse', 2, () => sink.append(batch, { messageId }));
  const appended = load.result;

  const duration = (Date.now() - startTime) / 1000;

  if (appended.status === 'duplicate') {
    reporter.logWarning(`Message ${messageId} was already applied; nothing appended`);
    reporter.logRunComplete('duplicate', duration);
    return { status: 'duplicate', messageId };
  }

  const totalRows = Object.values(appended.rowsAppended).reduce((sum, count) => sum + count, 0);
  reporter.logStepComplete('Append to warehouse', load.duration, totalRows);
  reporter.logTableCounts(appended.rowsAppended);
  reporter.logRunComplete('loaded', duration);
  return { status: 'loaded', messageId, rowsAppended: appended.rowsAppended };
}

async function runStep<T>(
  reporter: ProgressReporter,
  name: string,
  current: number,
  fn: () => T | Promise<T>
): Promise<{ result: T; duration: number }> {
  reporter.logStep(name, current, TOTAL_STEPS);
  const stepStart = Date.now();
  try {
    const result = await fn();
    return { result, duration: (Date.now() - stepStart) / 1000 };
  } catch (error) {
    reporter.logStepFailure(name, toError(error));
    throw error;
  }
}

function failedResult(error: unknown, reporter: ProgressReporter): InvocationResult {
  const disposition = resolveDisposition(error);
  const err = toError(error);

  console.log(formatError(error));
  reporter.logRunFailure(err, disposition);

  return {
    status: 'failed',
    disposition,
    category: classifyError(error).category,
    error: err,
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Main Entry Point
// =============================================================================

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function printUsage(): void {
  console.log('Usage:');
  console.log('  npx tsx scripts/run-pipeline.ts --message <event.json> [--dry-run]');
  console.log('  npx tsx scripts/run-pipeline.ts --csv <file.csv> [--limit N] [--dry-run]');
}

async function main(): Promise<void> {
  dotenv.config();

  const args = process.argv.slice(2);
  const messagePath = readFlag(args, '--message');
  const csvPath = readFlag(args, '--csv');
  const limit = Number(readFlag(args, '--limit') ?? 0);
  const dryRun = args.includes('--dry-run');

  if (Boolean(messagePath) === Boolean(csvPath) || !Number.isInteger(limit) || limit < 0) {
    printUsage();
    process.exit(1);
  }

  const config = loadConfig();
  const reporter = new ProgressReporter(config.debugMode.enabled);
  if (config.debugMode.enabled) {
    printConfig(config);
  }

  // A dry run never connects, so it does not need a connection string
  const { errors } = validateConfig(config);
  const blocking = dryRun ? errors.filter(e => !e.startsWith('Database connection string')) : errors;
  if (blocking.length > 0) {
    console.error('❌ Configuration errors:');
    blocking.forEach(e => console.error(`   - ${e}`));
    process.exit(1);
  }

  let pool: sql.ConnectionPool | null = null;

  try {
    const schema = loadWarehouseSchema();

    let sink: WarehouseSink;
    if (dryRun) {
      reporter.logInfo('Dry run: nothing will be written to SQL Server');
      sink = new DryRunWarehouseSink(reporter);
    } else {
      reporter.logInfo('Connecting to SQL Server...');
      pool = await sql.connect(getSqlConfig(config));
      sink = new SqlServerWarehouseSink(pool, {
        schema: config.database.schema,
        retry: {
          maxRetries: config.retry.maxRetries,
          baseDelay: config.retry.baseDelay,
        },
      });
    }

    const deps: PipelineDependencies = { sink, schema, config, reporter };

    let result: InvocationResult;
    if (messagePath) {
      const event: unknown = JSON.parse(fs.readFileSync(path.resolve(messagePath), 'utf-8'));
      result = await handleSalesMessage(event, deps);
    } else {
      const csvFile = path.resolve(csvPath ?? '');
      const records = await readSalesCsv(csvFile, schema.fields, { limit });
      result = await handleSalesRecords(records, deps, `csv ${path.basename(csvFile)}`);
    }

    process.exitCode = result.status === 'failed' ? 1 : 0;
  } catch (error) {
    console.error(formatError(error));
    process.exitCode = 1;
  } finally {
    if (pool) {
      await pool.close();
      reporter.logInfo('Connection closed');
    }
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(error);
    process.exit(1);
  });
}
