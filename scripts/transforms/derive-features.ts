/**
 * Feature Derivation Engine
 *
 * Walks the entity graph outward from a target entity and computes one
 * feature vector per target row:
 *
 *   identity     Sales                              column value         depth 0
 *   transform    MONTH(Order Date)                  date part            +1
 *   aggregation  SUM(OrderDetails.Sales)            over child rows      +1
 *   direct       Products.SUM(OrderDetails.Sales)   from the parent row  +1
 *
 * Features deeper than maxDepth are not generated. Aggregations fold the
 * child's own numeric columns only.
 */

import { max, sortBy, sum } from 'lodash';
import { GraphConfigurationError } from '../lib/error-handler';
import { CellValue, Row } from '../lib/warehouse-schema';
import { EntityFrame, EntityGraph, Relationship, keyOf } from './entity-graph';

export type AggregationPrimitive = 'COUNT' | 'SUM' | 'MEAN' | 'MAX';
export type TransformPrimitive = 'MONTH' | 'YEAR';
export type FeatureKind = 'identity' | 'transform' | 'aggregation' | 'direct';

export type FeatureValue = number | string | null;
export type FeatureRow = Record<string, FeatureValue>;

export interface FeatureDefinition {
  name: string;
  entity: string;
  kind: FeatureKind;
  depth: number;
}

export interface FeatureMatrix {
  targetEntity: string;
  /** Target index values, in target row order */
  index: string[];
  featureNames: string[];
  definitions: FeatureDefinition[];
  rows: Map<string, FeatureRow>;
}

export interface DerivationOptions {
  target: string;
  maxDepth: number;
}

/** Values aligned with the rows of the entity the feature belongs to */
interface ComputedFeature {
  definition: FeatureDefinition;
  values: FeatureValue[];
}

const NUMERIC_AGGREGATIONS: Exclude<AggregationPrimitive, 'COUNT'>[] = ['SUM', 'MEAN', 'MAX'];
const DATE_TRANSFORMS: TransformPrimitive[] = ['MONTH', 'YEAR'];

function toFeatureValue(value: CellValue): FeatureValue {
  return value instanceof Date ? value.toISOString().slice(0, 10) : value;
}

function datePart(primitive: TransformPrimitive, value: CellValue): number | null {
  if (!(value instanceof Date)) return null;
  return primitive === 'MONTH' ? value.getUTCMonth() + 1 : value.getUTCFullYear();
}

function aggregate(primitive: Exclude<AggregationPrimitive, 'COUNT'>, values: number[]): number | null {
  switch (primitive) {
    case 'SUM':
      return sum(values);
    case 'MEAN':
      return values.length === 0 ? null : sum(values) / values.length;
    case 'MAX':
      return max(values) ?? null;
  }
}

/** Columns that are plain attributes: not the index, not a foreign key */
function attributeColumns(graph: EntityGraph, frame: EntityFrame) {
  const foreignKeys = new Set(graph.parentsOf(frame.name).map(r => r.childKey));
  return frame.columns.filter(c => c.name !== frame.index && !foreignKeys.has(c.name));
}

function aggregationFeatures(graph: EntityGraph, parent: EntityFrame, rel: Relationship): ComputedFeature[] {
  const child = graph.getEntity(rel.child);
  const numericColumns = attributeColumns(graph, child).filter(
    c => c.kind === 'numeric' || c.kind === 'integer'
  );

  // Fold each group in child index order so results do not depend on input order
  const groups = new Map<string, Row[]>();
  for (const row of sortBy(child.rows, row => keyOf(row[child.index]) ?? '')) {
    const key = keyOf(row[rel.childKey]);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }

  const groupOf = (row: Row): Row[] => {
    const key = keyOf(row[rel.parentKey]);
    return (key !== null && groups.get(key)) || [];
  };

  const features: ComputedFeature[] = [{
    definition: { name: `COUNT(${child.name})`, entity: parent.name, kind: 'aggregation', depth: 1 },
    values: parent.rows.map(row => groupOf(row).length),
  }];

  for (const column of numericColumns) {
    for (const primitive of NUMERIC_AGGREGATIONS) {
      features.push({
        definition: {
          name: `${primitive}(${child.name}.${column.name})`,
          entity: parent.name,
          kind: 'aggregation',
          depth: 1,
        },
        values: parent.rows.map(row => {
          const values = groupOf(row)
            .map(r => r[column.name])
            .filter((v): v is number => typeof v === 'number');
          return aggregate(primitive, values);
        }),
      });
    }
  }

  return features;
}

function directFeatures(
  graph: EntityGraph,
  child: EntityFrame,
  rel: Relationship,
  parentFeatures: ComputedFeature[]
): ComputedFeature[] {
  const parent = graph.getEntity(rel.parent);
  const parentPositions = child.rows.map(row => {
    const key = keyOf(row[rel.childKey]);
    return key === null ? undefined : parent.lookup.get(key);
  });

  return parentFeatures.map(feature => ({
    definition: {
      name: `${parent.name}.${feature.definition.name}`,
      entity: child.name,
      kind: 'direct',
      depth: feature.definition.depth + 1,
    },
    // Dangling foreign keys resolve to null
    values: parentPositions.map(position => (position === undefined ? null : feature.values[position])),
  }));
}

function featuresFor(graph: EntityGraph, entityName: string, budget: number, path: string[]): ComputedFeature[] {
  const frame = graph.getEntity(entityName);
  const attributes = attributeColumns(graph, frame);
  const features: ComputedFeature[] = attributes.map(column => ({
    definition: { name: column.name, entity: entityName, kind: 'identity', depth: 0 },
    values: frame.rows.map(row => toFeatureValue(row[column.name] ?? null)),
  }));

  if (budget < 1) {
    return features;
  }

  for (const column of attributes.filter(c => c.kind === 'date')) {
    for (const primitive of DATE_TRANSFORMS) {
      features.push({
        definition: { name: `${primitive}(${column.name})`, entity: entityName, kind: 'transform', depth: 1 },
        values: frame.rows.map(row => datePart(primitive, row[column.name] ?? null)),
      });
    }
  }

  for (const rel of graph.childrenOf(entityName)) {
    features.push(...aggregationFeatures(graph, frame, rel));
  }

  for (const rel of graph.parentsOf(entityName)) {
    if (path.includes(rel.parent)) continue;
    const parentFeatures = featuresFor(graph, rel.parent, budget - 1, [...path, entityName]);
    features.push(...directFeatures(graph, frame, rel, parentFeatures));
  }

  return features;
}

/**
 * Derive the feature matrix for every row of the target entity
 */
export function deriveFeatures(graph: EntityGraph, options: DerivationOptions): FeatureMatrix {
  const { target, maxDepth } = options;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new GraphConfigurationError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  const frame = graph.getEntity(target);
  const features = featuresFor(graph, target, maxDepth, []);

  const featureNames: string[] = [];
  const seen = new Set<string>();
  for (const feature of features) {
    if (seen.has(feature.definition.name)) {
      throw new GraphConfigurationError(`Feature "${feature.definition.name}" is generated twice for ${target}`);
    }
    seen.add(feature.definition.name);
    featureNames.push(feature.definition.name);
  }

  const index: string[] = [];
  const rows = new Map<string, FeatureRow>();
  frame.rows.forEach((row, position) => {
    const key = keyOf(row[frame.index]) ?? String(position);
    const featureRow: FeatureRow = {};
    for (const feature of features) {
      featureRow[feature.definition.name] = feature.values[position] ?? null;
    }
    index.push(key);
    rows.set(key, featureRow);
  });

  return {
    targetEntity: target,
    index,
    featureNames,
    definitions: features.map(f => f.definition),
    rows,
  };
}
