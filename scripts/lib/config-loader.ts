import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';
import { isUndefined, omitBy } from 'lodash';

export type ReferencePolicy = 'null-join' | 'fail';

export interface ETLConfig {
  database: {
    connectionString: string;
    schema: string;      // warehouse dataset, e.g. 'sales_dw'
  };
  pipeline: {
    maxDepth: number;
    referencePolicy: string;  // 'null-join' | 'fail', checked by validateConfig
  };
  retry: {
    maxRetries: number;
    baseDelay: number;   // milliseconds
  };
  debugMode: {
    enabled: boolean;
  };
}

export type ETLConfigOverrides = {
  database?: Partial<ETLConfig['database']>;
  pipeline?: Partial<ETLConfig['pipeline']>;
  retry?: Partial<ETLConfig['retry']>;
  debugMode?: Partial<ETLConfig['debugMode']>;
};

const REFERENCE_POLICIES: readonly string[] = ['null-join', 'fail'];

export function isReferencePolicy(value: string): value is ReferencePolicy {
  return REFERENCE_POLICIES.includes(value);
}

/**
 * Reference policy of a validated config
 */
export function getReferencePolicy(config: ETLConfig): ReferencePolicy {
  const policy = config.pipeline.referencePolicy;
  if (!isReferencePolicy(policy)) {
    throw new Error(`Unknown reference policy "${policy}" (expected null-join or fail)`);
  }
  return policy;
}

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
export function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  return {
    server: parts['server'] || parts['data source'],
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

const asString = (value: unknown): string | undefined => typeof value === 'string' ? value : undefined;
const asNumber = (value: unknown): number | undefined => typeof value === 'number' ? value : undefined;
const asBoolean = (value: unknown): boolean | undefined => typeof value === 'boolean' ? value : undefined;

/**
 * Read the known settings out of appsettings.json, ignoring anything else
 */
function readConfigFile(configPath: string): ETLConfigOverrides {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
    return {};
  }
  if (!isRecord(parsed)) {
    console.warn(`⚠️  Warning: ${path.basename(configPath)} does not contain a JSON object`);
    return {};
  }

  const database = section(parsed, 'database');
  const pipeline = section(parsed, 'pipeline');
  const retry = section(parsed, 'retry');
  const debugMode = section(parsed, 'debugMode');

  return {
    database: {
      connectionString: asString(database.connectionString),
      schema: asString(database.schema),
    },
    pipeline: {
      maxDepth: asNumber(pipeline.maxDepth),
      referencePolicy: asString(pipeline.referencePolicy),
    },
    retry: {
      maxRetries: asNumber(retry.maxRetries),
      baseDelay: asNumber(retry.baseDelay),
    },
    debugMode: {
      enabled: asBoolean(debugMode.enabled),
    },
  };
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load ETL configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Explicit overrides (passed as parameter)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(
  overrides?: ETLConfigOverrides,
  configPath: string = path.join(process.cwd(), 'appsettings.json')
): ETLConfig {
  const fileConfig = readConfigFile(configPath);

  let connectionString = process.env.SQLSERVER || '';

  if (!connectionString && (process.env.SQLSERVER_HOST || process.env.SQLSERVER_DATABASE)) {
    const server = process.env.SQLSERVER_HOST;
    const database = process.env.SQLSERVER_DATABASE;
    const user = process.env.SQLSERVER_USER;
    const password = process.env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      connectionString = `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  const config: ETLConfig = {
    database: {
      connectionString: connectionString || fileConfig.database?.connectionString || '',
      schema: process.env.WAREHOUSE_SCHEMA || fileConfig.database?.schema || 'sales_dw',
    },
    pipeline: {
      maxDepth: readInt(process.env.MAX_DEPTH) ?? fileConfig.pipeline?.maxDepth ?? 2,
      referencePolicy: process.env.REFERENCE_POLICY || fileConfig.pipeline?.referencePolicy || 'null-join',
    },
    retry: {
      maxRetries: readInt(process.env.SINK_MAX_RETRIES) ?? fileConfig.retry?.maxRetries ?? 3,
      baseDelay: readInt(process.env.SINK_BASE_DELAY_MS) ?? fileConfig.retry?.baseDelay ?? 1000,
    },
    debugMode: {
      enabled: process.env.DEBUG_MODE === 'true' || fileConfig.debugMode?.enabled || false,
    },
  };

  if (overrides) {
    Object.assign(config.database, omitBy(overrides.database, isUndefined));
    Object.assign(config.pipeline, omitBy(overrides.pipeline, isUndefined));
    Object.assign(config.retry, omitBy(overrides.retry, isUndefined));
    Object.assign(config.debugMode, omitBy(overrides.debugMode, isUndefined));
  }

  return config;
}

/**
 * Convert ETL config to mssql config
 */
export function getSqlConfig(config: ETLConfig): sql.config {
  if (!config.database.connectionString) {
    throw new Error('Database connection string is required');
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new Error('Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;');
  }

  return {
    server: parsed.server,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
    pool: {
      max: 10,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ETLConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required');
  }
  if (!config.database.schema) {
    errors.push('Warehouse schema name is required');
  } else if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(config.database.schema)) {
    errors.push(`Warehouse schema name "${config.database.schema}" must be a plain identifier`);
  }
  if (!Number.isInteger(config.pipeline.maxDepth) || config.pipeline.maxDepth < 1) {
    errors.push('Feature derivation depth must be a positive integer');
  }
  if (!isReferencePolicy(config.pipeline.referencePolicy)) {
    errors.push(`Unknown reference policy "${config.pipeline.referencePolicy}" (expected null-join or fail)`);
  }
  if (config.retry.maxRetries < 1) {
    errors.push('Sink retry count must be at least 1');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: ETLConfig): void {
  const maskedConfig: ETLConfig = {
    ...config,
    database: {
      ...config.database,
      connectionString: config.database.connectionString.replace(/Password=[^;]+/i, 'Password=***'),
    },
  };

  console.log('\n📋 ETL Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(maskedConfig, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}
