/**
 * Error Handler for the Sales ETL Pipeline
 * Defines the pipeline error taxonomy, classifies errors and provides retry logic
 * for transient failures
 */

import * as sql from 'mssql';

export type ErrorCategory =
  | 'connection'
  | 'timeout'
  | 'deadlock'
  | 'constraint'
  | 'syntax'
  | 'data'
  | 'malformed-input'
  | 'referential'
  | 'configuration'
  | 'unknown';

export interface ErrorClassification {
  isTransient: boolean;
  category: ErrorCategory;
  message: string;
  suggestion: string;
}

/**
 * What the message transport should do with a failed invocation
 */
export type FailureDisposition = 'retry' | 'discard';

// =============================================================================
// Pipeline errors
// =============================================================================

export abstract class PipelineError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get isTransient(): boolean {
    return false;
  }
}

export class MessageDecodeError extends PipelineError {
  readonly category = 'malformed-input';
}

export class MalformedRecordError extends PipelineError {
  readonly category = 'malformed-input';

  constructor(
    readonly field: string | null,
    readonly reason: string,
    readonly recordPosition: number
  ) {
    super(
      field === null
        ? `Record ${recordPosition}: ${reason}`
        : `Record ${recordPosition}: field "${field}" ${reason}`
    );
  }
}

export class GraphConfigurationError extends PipelineError {
  readonly category = 'configuration';
}

export class DanglingReferenceError extends PipelineError {
  readonly category = 'referential';

  constructor(
    readonly parent: string,
    readonly child: string,
    readonly childKey: string,
    readonly values: string[]
  ) {
    super(
      `${values.length} ${child} row key(s) in "${childKey}" have no matching ${parent} row: ${values.slice(0, 5).join(', ')}${values.length > 5 ? ', ...' : ''}`
    );
  }
}

export class MissingFeatureError extends PipelineError {
  readonly category = 'configuration';

  constructor(readonly missing: string[]) {
    super(`Derived feature matrix is missing ${missing.length} selected feature(s): ${missing.join(', ')}`);
  }
}

export class SinkWriteError extends PipelineError {
  readonly category: ErrorCategory;
  private readonly transient: boolean;

  constructor(readonly table: string, cause: unknown) {
    super(`Failed to append to warehouse table ${table}: ${describeError(cause).message}`, { cause });
    const classification = classifyError(cause);
    this.category = classification.category;
    this.transient = classification.isTransient;
  }

  override get isTransient(): boolean {
    return this.transient;
  }
}

// =============================================================================
// Classification
// =============================================================================

function readProperty(value: unknown, key: string): string | number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' || typeof property === 'number' ? property : undefined;
}

function describeError(error: unknown): { message: string; code: string | number | undefined } {
  const message = error instanceof Error
    ? error.message
    : String(readProperty(error, 'message') ?? error);
  return {
    message,
    code: readProperty(error, 'code') ?? readProperty(error, 'number'),
  };
}

/**
 * Classify an error to determine if it's transient
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof PipelineError) {
    return {
      isTransient: error.isTransient,
      category: error.category,
      message: error.message,
      suggestion: error.isTransient
        ? 'Redeliver the message once the warehouse is reachable'
        : 'Message cannot succeed as-is; fix the source record or the warehouse schema',
    };
  }

  const { message, code } = describeError(error);

  // Connection errors (transient)
  if (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      isTransient: true,
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  // Timeout errors (transient)
  if (
    code === -2 ||
    code === 'ETIMEOUT' ||
    message.includes('Timeout') ||
    message.includes('timeout')
  ) {
    return {
      isTransient: true,
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider increasing requestTimeout'
    };
  }

  // Deadlock victim (transient)
  if (code === 1205 || message.includes('deadlock')) {
    return {
      isTransient: true,
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Retrying transaction'
    };
  }

  // Constraint violations
  if (
    code === 547 ||
    code === 2627 ||
    code === 2601 ||
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      isTransient: false,
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check warehouse constraints against append-only loads'
    };
  }

  // Values the column types cannot hold (truncation, overflow, out-of-range parameters)
  if (
    code === 2628 ||
    code === 8152 ||
    code === 8115 ||
    code === 220 ||
    code === 'EPARAM' ||
    error instanceof RangeError ||
    message.includes('would be truncated') ||
    message.includes('Arithmetic overflow') ||
    message.includes('out of range') ||
    message.includes('Value must be between')
  ) {
    return {
      isTransient: false,
      category: 'data',
      message: 'Value does not fit its warehouse column',
      suggestion: 'Check record values against the warehouse column types'
    };
  }

  // Syntax and schema errors
  if (
    code === 102 ||
    code === 156 ||
    code === 207 ||
    code === 208 ||
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name') ||
    message.includes('Invalid column name')
  ) {
    return {
      isTransient: false,
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Run scripts/setup-warehouse.ts or verify the warehouse schema'
    };
  }

  return {
    isTransient: false,
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * Map an error to what the transport should do with the message
 */
export function resolveDisposition(error: unknown): FailureDisposition {
  return classifyError(error).isTransient ? 'retry' : 'discard';
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const classification = classifyError(error);

      if (!classification.isTransient || attempt === maxRetries) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      console.log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      console.log(`     ${classification.suggestion}`);
      console.log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Execute with transaction wrapper and error handling
 */
export async function executeWithTransaction<T>(
  pool: sql.ConnectionPool,
  fn: (transaction: sql.Transaction) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  return retryWithBackoff(async () => {
    const transaction = pool.transaction();

    await transaction.begin();
    try {
      const result = await fn(transaction);
      await transaction.commit();
      return result;
    } catch (error) {
      try {
        await transaction.rollback();
      } catch (rollbackError) {
        console.error('  ⚠️  Failed to rollback transaction:', rollbackError);
      }
      throw error;
    }
  }, options);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);
  const { code } = describeError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (code !== undefined) {
    formatted += `  Error Code:  ${code}\n`;
  }

  if (error instanceof PipelineError) {
    formatted += `  Error Type:  ${error.name}\n`;
  }

  if (error instanceof Error && error.stack) {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${error.stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
