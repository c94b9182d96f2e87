/**
 * Unit Tests for configuration loading
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ETLConfig,
  getReferencePolicy,
  getSqlConfig,
  loadConfig,
  printConfig,
  validateConfig,
} from '../config-loader';

const ENV_KEYS = [
  'SQLSERVER',
  'SQLSERVER_HOST',
  'SQLSERVER_DATABASE',
  'SQLSERVER_USER',
  'SQLSERVER_PASSWORD',
  'WAREHOUSE_SCHEMA',
  'MAX_DEPTH',
  'REFERENCE_POLICY',
  'SINK_MAX_RETRIES',
  'SINK_BASE_DELAY_MS',
  'DEBUG_MODE',
];

const CONNECTION = 'Server=db.local;Database=sales;User Id=etl;Password=test-secret;TrustServerCertificate=True;Encrypt=True;';

describe('loadConfig', () => {
  const savedEnv: Record<string, string | undefined> = {};
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sales-etl-config-'));
    configPath = path.join(tmpDir, 'appsettings.json');
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (savedEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = savedEnv[key];
      }
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeSettings(settings: unknown): void {
    fs.writeFileSync(configPath, JSON.stringify(settings));
  }

  it('uses defaults when nothing is configured', () => {
    expect(loadConfig(undefined, configPath)).toEqual({
      database: { connectionString: '', schema: 'sales_dw' },
      pipeline: { maxDepth: 2, referencePolicy: 'null-join' },
      retry: { maxRetries: 3, baseDelay: 1000 },
      debugMode: { enabled: false },
    });
  });

  it('reads appsettings.json', () => {
    writeSettings({
      database: { connectionString: CONNECTION, schema: 'dw_file' },
      pipeline: { maxDepth: 3, referencePolicy: 'fail' },
      retry: { maxRetries: 5 },
      debugMode: { enabled: true },
    });

    const config = loadConfig(undefined, configPath);

    expect(config.database).toEqual({ connectionString: CONNECTION, schema: 'dw_file' });
    expect(config.pipeline).toEqual({ maxDepth: 3, referencePolicy: 'fail' });
    expect(config.retry).toEqual({ maxRetries: 5, baseDelay: 1000 });
    expect(config.debugMode.enabled).toBe(true);
  });

  it('prefers environment variables over the file', () => {
    writeSettings({ database: { schema: 'dw_file' }, pipeline: { maxDepth: 3 } });
    process.env.WAREHOUSE_SCHEMA = 'dw_env';
    process.env.MAX_DEPTH = '4';
    process.env.SINK_BASE_DELAY_MS = '10';

    const config = loadConfig(undefined, configPath);

    expect(config.database.schema).toBe('dw_env');
    expect(config.pipeline.maxDepth).toBe(4);
    expect(config.retry.baseDelay).toBe(10);
  });

  it('prefers explicit overrides over the environment and ignores undefined ones', () => {
    process.env.WAREHOUSE_SCHEMA = 'dw_env';
    process.env.REFERENCE_POLICY = 'fail';

    const config = loadConfig({
      database: { schema: 'dw_override' },
      pipeline: { referencePolicy: undefined },
    }, configPath);

    expect(config.database.schema).toBe('dw_override');
    expect(config.pipeline.referencePolicy).toBe('fail');
  });

  it('builds a connection string from its parts', () => {
    process.env.SQLSERVER_HOST = 'db.local';
    process.env.SQLSERVER_DATABASE = 'sales';
    process.env.SQLSERVER_USER = 'etl';
    process.env.SQLSERVER_PASSWORD = 'test-secret';

    expect(loadConfig(undefined, configPath).database.connectionString).toBe(CONNECTION);
  });

  it('falls back to defaults when the file is not valid JSON', () => {
    fs.writeFileSync(configPath, '{ not json');
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      expect(loadConfig(undefined, configPath).database.schema).toBe('sales_dw');
      expect(warnSpy).toHaveBeenCalledTimes(1);
    } finally {
      warnSpy.mockRestore();
    }
  });
});

function config(overrides: Partial<ETLConfig> = {}): ETLConfig {
  return {
    database: { connectionString: CONNECTION, schema: 'sales_dw' },
    pipeline: { maxDepth: 2, referencePolicy: 'null-join' },
    retry: { maxRetries: 3, baseDelay: 1000 },
    debugMode: { enabled: false },
    ...overrides,
  };
}

describe('getSqlConfig', () => {
  it('parses the connection string', () => {
    const sqlConfig = getSqlConfig(config());

    expect(sqlConfig).toMatchObject({
      server: 'db.local',
      database: 'sales',
      user: 'etl',
      password: 'test-secret',
      options: { encrypt: true, trustServerCertificate: true },
    });
  });

  it('rejects an incomplete connection string', () => {
    expect(() => getSqlConfig(config({ database: { connectionString: 'Server=db.local;', schema: 'sales_dw' } })))
      .toThrow('Invalid connection string');
  });
});

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(validateConfig(config())).toEqual({ valid: true, errors: [] });
  });

  it('reports every problem', () => {
    const result = validateConfig(config({
      database: { connectionString: '', schema: 'sales-dw' },
      pipeline: { maxDepth: 0, referencePolicy: 'ignore' },
      retry: { maxRetries: 0, baseDelay: 1000 },
    }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Database connection string is required',
      'Warehouse schema name "sales-dw" must be a plain identifier',
      'Feature derivation depth must be a positive integer',
      'Unknown reference policy "ignore" (expected null-join or fail)',
      'Sink retry count must be at least 1',
    ]);
  });
});

describe('getReferencePolicy', () => {
  it('narrows a valid policy', () => {
    expect(getReferencePolicy(config({ pipeline: { maxDepth: 2, referencePolicy: 'fail' } }))).toBe('fail');
  });

  it('rejects an unknown policy', () => {
    expect(() => getReferencePolicy(config({ pipeline: { maxDepth: 2, referencePolicy: 'ignore' } })))
      .toThrow('Unknown reference policy "ignore"');
  });
});

describe('printConfig', () => {
  it('masks the password', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      printConfig(config());
      const printed = JSON.parse(String(logSpy.mock.calls[2][0]));
      expect(printed.database.connectionString).toBe(
        'Server=db.local;Database=sales;User Id=etl;Password=***;TrustServerCertificate=True;Encrypt=True;'
      );
    } finally {
      logSpy.mockRestore();
    }
  });
});
