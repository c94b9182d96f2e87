/**
 * Unit Tests for SQL script preparation
 */

import * as fs from 'fs';
import * as path from 'path';
import { ETLConfig } from '../config-loader';
import { splitSqlBatches, substituteSchemaVariables } from '../sql-executor';

const config: ETLConfig = {
  database: { connectionString: '', schema: 'dw_test' },
  pipeline: { maxDepth: 2, referencePolicy: 'null-join' },
  retry: { maxRetries: 3, baseDelay: 1000 },
  debugMode: { enabled: false },
};

describe('substituteSchemaVariables', () => {
  it('replaces every warehouse schema placeholder', () => {
    expect(substituteSchemaVariables('SELECT * FROM [$(WAREHOUSE_SCHEMA)].[A] JOIN [$(WAREHOUSE_SCHEMA)].[B]', config))
      .toBe('SELECT * FROM [dw_test].[A] JOIN [dw_test].[B]');
  });
});

describe('splitSqlBatches', () => {
  it('splits on GO lines and drops empty batches', () => {
    const script = 'CREATE TABLE a (x INT);\nGO\n\n  go  \nCREATE TABLE b (y INT);\nGO\n';

    expect(splitSqlBatches(script)).toEqual(['CREATE TABLE a (x INT);', 'CREATE TABLE b (y INT);']);
  });

  it('does not split on GO inside a line', () => {
    expect(splitSqlBatches("SELECT 'GO' AS word;")).toEqual(["SELECT 'GO' AS word;"]);
  });
});

describe('warehouse setup script', () => {
  it('creates the schema, the four tables and the ingest log', () => {
    const script = fs.readFileSync(path.resolve(__dirname, '../../../sql/01-warehouse-tables.sql'), 'utf-8');
    const batches = splitSqlBatches(substituteSchemaVariables(script, config));

    expect(batches).toHaveLength(6);
    expect(batches.some(b => b.includes('$(WAREHOUSE_SCHEMA)'))).toBe(false);
    for (const table of ['Customers', 'Products', 'Orders', 'OrderDetails', 'IngestLog']) {
      expect(batches.some(b => b.includes(`CREATE TABLE [dw_test].[${table}]`))).toBe(true);
    }
  });
});
