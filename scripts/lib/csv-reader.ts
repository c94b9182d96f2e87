/**
 * CSV reader for replaying a sales export through the pipeline
 * Header row = inbound field names. Numeric fields are cast to numbers;
 * everything else stays text and is validated by the normalizer.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse';
import { FieldDefinition } from './warehouse-schema';

export interface CsvReadOptions {
  limit?: number;  // 0 = all rows
}

const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export async function readSalesCsv(
  filePath: string,
  fields: FieldDefinition[],
  options: CsvReadOptions = {}
): Promise<Record<string, unknown>[]> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`CSV file not found: ${filePath}`);
  }

  const numericFields = new Set(
    fields.filter(f => f.kind === 'numeric' || f.kind === 'integer').map(f => f.name)
  );
  const limit = options.limit ?? 0;

  const parser = fs.createReadStream(filePath).pipe(
    parse({
      columns: (header: string[]) => header.map(h => h.replace(/^\uFEFF/, '').trim()),
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
      cast: (value, context) => {
        if (context.header || typeof context.column !== 'string' || !numericFields.has(context.column)) {
          return value;
        }
        const trimmed = value.trim();
        return NUMBER.test(trimmed) ? Number(trimmed) : value;
      },
    })
  );

  const records: Record<string, unknown>[] = [];
  for await (const record of parser) {
    if (limit > 0 && records.length >= limit) {
      break;
    }
    records.push(record);
  }
  return records;
}
