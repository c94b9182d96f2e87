/**
 * Create the warehouse schema, tables and ingest log (idempotent)
 *
 * Usage:
 *   npx tsx scripts/setup-warehouse.ts
 */

import * as sql from 'mssql';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { getSqlConfig, loadConfig, validateConfig } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { executeSQLScript } from './lib/sql-executor';

const SCRIPT_PATH = path.resolve(__dirname, '..', 'sql', '01-warehouse-tables.sql');

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Configuration errors:');
    validation.errors.forEach(e => console.error(`   - ${e}`));
    process.exit(1);
  }

  console.log(`📦 Setting up warehouse schema [${config.database.schema}]`);

  let pool: sql.ConnectionPool | null = null;
  try {
    pool = await sql.connect(getSqlConfig(config));

    const result = await executeSQLScript({
      config,
      pool,
      scriptPath: SCRIPT_PATH,
      debugMode: config.debugMode.enabled,
    });

    if (!result.success) {
      console.error(formatError(result.error));
      process.exitCode = 1;
      return;
    }

    console.log(`✅ Warehouse ready (${result.batches} batches in ${result.duration.toFixed(1)}s)`);
  } finally {
    if (pool) {
      await pool.close();
    }
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exit(1);
});
