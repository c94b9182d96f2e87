/**
 * Record Normalizer
 *
 * Validates flat sales records and splits them into deduplicated
 * Customers, Products, Orders and OrderDetails row sets.
 */

import { pick } from 'lodash';
import { MalformedRecordError } from '../lib/error-handler';
import {
  COLUMN_LIMITS,
  CellValue,
  EntityDefinition,
  FieldDefinition,
  Row,
  WarehouseSchema,
} from '../lib/warehouse-schema';

export interface NormalizedBatch {
  recordCount: number;
  tables: Map<string, Row[]>;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse a calendar date (YYYY-MM-DD, optionally with a time part, or M/D/YYYY)
 * into a Date at UTC midnight. Returns null for anything else, including
 * dates that do not exist such as 2023-02-30.
 */
export function parseCalendarDate(value: string): Date | null {
  const trimmed = value.trim();
  let year: number;
  let month: number;
  let day: number;

  const iso = ISO_DATE.exec(trimmed);
  const us = iso ? null : US_DATE.exec(trimmed);
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (us) {
    [month, day, year] = [Number(us[1]), Number(us[2]), Number(us[3])];
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Encode a tuple of key values as one string. Distinct tuples always encode
 * differently, whatever characters the values contain.
 */
export function encodeCompositeKey(values: CellValue[]): string {
  return JSON.stringify(values.map(v => (v instanceof Date ? v.toISOString() : v)));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseField(field: FieldDefinition, value: unknown, position: number): CellValue {
  const fail = (reason: string): never => {
    throw new MalformedRecordError(field.name, reason, position);
  };

  switch (field.kind) {
    case 'text':
      if (typeof value !== 'string') {
        return fail(`must be a string, got ${typeof value}`);
      }
      if (field.identifier && value.trim() === '') {
        return fail('must not be empty');
      }
      return value.length > COLUMN_LIMITS.textLength
        ? fail(`is longer than ${COLUMN_LIMITS.textLength} characters`)
        : value;

    case 'code': {
      let code: string;
      if (typeof value === 'string') {
        code = value;
      } else if (typeof value === 'number' && Number.isInteger(value)) {
        code = String(value);
      } else {
        return fail(`must be a string or an integer, got ${JSON.stringify(value)}`);
      }
      return code.length > COLUMN_LIMITS.codeLength
        ? fail(`is longer than ${COLUMN_LIMITS.codeLength} characters`)
        : code;
    }

    case 'numeric':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fail(`must be a finite number, got ${JSON.stringify(value)}`);
      }
      return value;

    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return fail(`must be an integer, got ${JSON.stringify(value)}`);
      }
      if (value < COLUMN_LIMITS.intMin || value > COLUMN_LIMITS.intMax) {
        return fail(`is outside the INT range, got ${value}`);
      }
      return value;

    case 'date': {
      if (value instanceof Date) {
        return isNaN(value.getTime()) ? fail('is an invalid date') : value;
      }
      if (typeof value !== 'string') {
        return fail(`must be a date string, got ${typeof value}`);
      }
      const date = parseCalendarDate(value);
      return date ?? fail(`is not a valid date: "${value}"`);
    }
  }
}

/**
 * Validate one decoded record against the inbound field list. Every field
 * must be present and correctly typed; keys outside the list are ignored.
 */
export function parseSalesRecord(input: unknown, fields: FieldDefinition[], position: number): Row {
  if (!isPlainRecord(input)) {
    throw new MalformedRecordError(null, 'is not a JSON object', position);
  }

  const row: Row = {};
  for (const field of fields) {
    const value = input[field.name];
    if (value === undefined || value === null) {
      throw new MalformedRecordError(field.name, 'is missing', position);
    }
    row[field.name] = parseField(field, value, position);
  }
  return row;
}

function dedupeKey(entity: EntityDefinition, row: Row): string {
  const columns = entity.dedupe.strategy === 'first-by-key' ? entity.dedupe.key : entity.columns;
  return encodeCompositeKey(columns.map(c => row[c] ?? null));
}

/**
 * Split records into one row set per entity. Parsing is all-or-nothing:
 * one malformed record fails the whole batch.
 */
export function normalizeRecords(records: unknown[], schema: WarehouseSchema): NormalizedBatch {
  const parsed = records.map((record, position) => parseSalesRecord(record, schema.fields, position));
  const { entity: targetName, joinKey } = schema.target;
  const tables = new Map<string, Row[]>();

  for (const entity of schema.entities) {
    const seen = new Set<string>();
    const rows: Row[] = [];

    for (const record of parsed) {
      const row: Row = pick(record, entity.columns);
      const key = dedupeKey(entity, row);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      if (entity.name === targetName) {
        row[joinKey.name] = encodeCompositeKey(joinKey.parts.map(part => row[part] ?? null));
      }
      rows.push(row);
    }

    tables.set(entity.name, rows);
  }

  return { recordCount: parsed.length, tables };
}
