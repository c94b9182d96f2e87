/**
 * Sales batch → warehouse tables
 *
 * normalize → entity graph → derive features → select → merge onto OrderDetails
 */

import { ReferencePolicy } from '../lib/config-loader';
import { ProgressReporter } from '../lib/progress-reporter';
import { ColumnDefinition, Row, WarehouseSchema, getTableColumns } from '../lib/warehouse-schema';
import { deriveFeatures } from './derive-features';
import { mergeFeatures } from './enrich-order-details';
import { DanglingReference, buildEntityGraph } from './entity-graph';
import { normalizeRecords } from './normalize-records';
import { selectFeatures } from './select-features';

export interface WarehouseTable {
  entity: string;
  table: string;
  columns: ColumnDefinition[];
  rows: Row[];
}

export interface WarehouseBatch {
  tables: WarehouseTable[];
  stats: {
    recordsRead: number;
    featuresDerived: number;
    danglingReferences: DanglingReference[];
  };
}

export interface BuildOptions {
  maxDepth?: number;
  referencePolicy?: ReferencePolicy;
  reporter?: ProgressReporter;
}

export function buildWarehouseTables(
  records: unknown[],
  schema: WarehouseSchema,
  options: BuildOptions = {}
): WarehouseBatch {
  const { reporter, referencePolicy = 'null-join', maxDepth = schema.maxDepth } = options;
  const targetName = schema.target.entity;

  const batch = normalizeRecords(records, schema);
  reporter?.logDebug(
    `Normalized ${batch.recordCount} record(s): ` +
    [...batch.tables].map(([name, rows]) => `${name}=${rows.length}`).join(', ')
  );

  const graph = buildEntityGraph(batch, schema, referencePolicy);
  for (const name of graph.entityNames) {
    const duplicates = graph.getEntity(name).duplicateIndexValues;
    if (duplicates.length > 0) {
      reporter?.logWarning(`${name}: ${duplicates.length} index value(s) repeat across rows (${duplicates.join(', ')}); lookups use the lowest-sorting row`);
    }
  }
  for (const { relationship, values } of graph.danglingReferences) {
    reporter?.logWarning(
      `${values.length} ${relationship.child} row key(s) in "${relationship.childKey}" have no ${relationship.parent} row; their ${relationship.parent} features are null`
    );
  }

  const matrix = deriveFeatures(graph, { target: targetName, maxDepth });
  reporter?.logDebug(`Derived ${matrix.featureNames.length} features for ${matrix.index.length} ${targetName} row(s)`);

  const selected = selectFeatures(matrix, schema.features);

  const tables = schema.entities.map(entity => {
    const rows = batch.tables.get(entity.name) ?? [];
    return {
      entity: entity.name,
      table: entity.name,
      columns: getTableColumns(schema, entity.name),
      rows: entity.name === targetName
        ? mergeFeatures(rows, schema.target.joinKey.name, selected)
        : rows,
    };
  });

  return {
    tables,
    stats: {
      recordsRead: batch.recordCount,
      featuresDerived: matrix.featureNames.length,
      danglingReferences: graph.danglingReferences,
    },
  };
}
