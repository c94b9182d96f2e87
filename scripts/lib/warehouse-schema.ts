/**
 * Sales Warehouse Schema
 *
 * Single definition of the inbound record layout, the normalized entities,
 * their relationships and the feature selection written to the warehouse.
 * The normalizer, graph builder, feature selector and sink all read from it.
 */

import { uniq } from 'lodash';

export type ColumnKind = 'text' | 'code' | 'numeric' | 'integer' | 'date';

export type CellValue = string | number | Date | null;

export type Row = Record<string, CellValue>;

/** Largest values the warehouse column types hold */
export const COLUMN_LIMITS = {
  textLength: 255,       // NVARCHAR(255)
  codeLength: 20,        // NVARCHAR(20)
  intMin: -2147483648,   // INT
  intMax: 2147483647,
} as const;

export interface FieldDefinition {
  name: string;
  kind: ColumnKind;
  identifier?: boolean;  // must be a non-empty string
}

export type DedupeStrategy =
  | { strategy: 'first-by-key'; key: string[] }
  | { strategy: 'distinct-row' };

export interface EntityDefinition {
  name: string;          // also the warehouse table name
  index: string;
  columns: string[];
  dedupe: DedupeStrategy;
}

export interface RelationshipDefinition {
  parent: string;
  parentKey: string;
  child: string;
  childKey: string;
}

export interface FeatureSelection {
  feature: string;       // generated feature name
  column: string;        // persisted column name
  kind: 'numeric' | 'integer';
}

export interface WarehouseSchema {
  id: string;
  fields: FieldDefinition[];
  entities: EntityDefinition[];
  relationships: RelationshipDefinition[];
  target: {
    entity: string;
    joinKey: { name: string; parts: string[] };
  };
  maxDepth: number;
  features: FeatureSelection[];
}

export interface ColumnDefinition {
  name: string;
  kind: ColumnKind;
}

export const SALES_WAREHOUSE_SCHEMA: WarehouseSchema = {
  id: 'Superstore',
  fields: [
    { name: 'Customer ID', kind: 'text', identifier: true },
    { name: 'Customer Name', kind: 'text' },
    { name: 'Segment', kind: 'text' },
    { name: 'Country', kind: 'text' },
    { name: 'City', kind: 'text' },
    { name: 'State', kind: 'text' },
    { name: 'Postal Code', kind: 'code' },
    { name: 'Region', kind: 'text' },
    { name: 'Product ID', kind: 'text', identifier: true },
    { name: 'Category', kind: 'text' },
    { name: 'Sub-Category', kind: 'text' },
    { name: 'Product Name', kind: 'text' },
    { name: 'Order ID', kind: 'text', identifier: true },
    { name: 'Order Date', kind: 'date' },
    { name: 'Ship Date', kind: 'date' },
    { name: 'Ship Mode', kind: 'text' },
    { name: 'Sales', kind: 'numeric' },
    { name: 'Quantity', kind: 'integer' },
    { name: 'Discount', kind: 'numeric' },
    { name: 'Profit', kind: 'numeric' },
  ],
  entities: [
    {
      name: 'Customers',
      index: 'Customer ID',
      columns: ['Customer ID', 'Customer Name', 'Segment', 'Country', 'City', 'State', 'Postal Code', 'Region'],
      dedupe: { strategy: 'first-by-key', key: ['Customer ID'] },
    },
    {
      name: 'Products',
      index: 'Product ID',
      columns: ['Product ID', 'Category', 'Sub-Category', 'Product Name'],
      dedupe: { strategy: 'first-by-key', key: ['Product ID'] },
    },
    {
      name: 'Orders',
      index: 'Order ID',
      columns: ['Order ID', 'Order Date', 'Ship Date', 'Ship Mode'],
      dedupe: { strategy: 'distinct-row' },
    },
    {
      name: 'OrderDetails',
      index: 'OrderDetail ID',
      columns: ['Order ID', 'Product ID', 'Customer ID', 'Sales', 'Quantity', 'Discount', 'Profit'],
      dedupe: { strategy: 'first-by-key', key: ['Order ID', 'Product ID'] },
    },
  ],
  relationships: [
    { parent: 'Customers', parentKey: 'Customer ID', child: 'OrderDetails', childKey: 'Customer ID' },
    { parent: 'Products', parentKey: 'Product ID', child: 'OrderDetails', childKey: 'Product ID' },
    { parent: 'Orders', parentKey: 'Order ID', child: 'OrderDetails', childKey: 'Order ID' },
  ],
  target: {
    entity: 'OrderDetails',
    joinKey: { name: 'OrderDetail ID', parts: ['Order ID', 'Product ID'] },
  },
  maxDepth: 2,
  features: [
    { feature: 'Customers.COUNT(OrderDetails)', column: 'Customer_Order_Count', kind: 'integer' },
    { feature: 'Products.COUNT(OrderDetails)', column: 'Product_Order_Count', kind: 'integer' },
    { feature: 'Products.MAX(OrderDetails.Profit)', column: 'Product_Max_Profit', kind: 'numeric' },
    { feature: 'Products.MEAN(OrderDetails.Discount)', column: 'Product_Mean_Discount', kind: 'numeric' },
    { feature: 'Products.SUM(OrderDetails.Quantity)', column: 'Product_Total_Quantity', kind: 'integer' },
    { feature: 'Products.SUM(OrderDetails.Sales)', column: 'Product_Total_Sales', kind: 'numeric' },
    { feature: 'Orders.COUNT(OrderDetails)', column: 'Order_Item_Count', kind: 'integer' },
    { feature: 'Orders.MAX(OrderDetails.Quantity)', column: 'Order_Max_Quantity', kind: 'integer' },
    { feature: 'Orders.MEAN(OrderDetails.Profit)', column: 'Order_Mean_Profit', kind: 'numeric' },
    { feature: 'Orders.SUM(OrderDetails.Sales)', column: 'Order_Total_Sales', kind: 'numeric' },
    { feature: 'Orders.MONTH(Order Date)', column: 'Order_Month', kind: 'integer' },
    { feature: 'Orders.YEAR(Order Date)', column: 'Order_Year', kind: 'integer' },
  ],
};

/**
 * Validate that entities, relationships, join key and feature selection agree
 * with each other and with the inbound field list
 */
export function validateWarehouseSchema(schema: WarehouseSchema): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const fieldNames = new Set(schema.fields.map(f => f.name));
  const entities = new Map(schema.entities.map(e => [e.name, e]));
  const joinKeyName = schema.target.joinKey.name;

  if (uniq(schema.fields.map(f => f.name)).length !== schema.fields.length) {
    errors.push('Inbound field names must be unique');
  }
  if (entities.size !== schema.entities.length) {
    errors.push('Entity names must be unique');
  }

  for (const entity of schema.entities) {
    for (const column of entity.columns) {
      if (!fieldNames.has(column)) {
        errors.push(`${entity.name}: column "${column}" is not an inbound field`);
      }
    }
    const isTargetJoinKey = entity.name === schema.target.entity && entity.index === joinKeyName;
    if (!isTargetJoinKey && !entity.columns.includes(entity.index)) {
      errors.push(`${entity.name}: index "${entity.index}" is not one of its columns`);
    }
    if (entity.dedupe.strategy === 'first-by-key') {
      for (const keyColumn of entity.dedupe.key) {
        if (!entity.columns.includes(keyColumn)) {
          errors.push(`${entity.name}: dedupe key "${keyColumn}" is not one of its columns`);
        }
      }
    }
  }

  for (const rel of schema.relationships) {
    const label = `${rel.parent} → ${rel.child}`;
    const parent = entities.get(rel.parent);
    const child = entities.get(rel.child);
    if (!parent) {
      errors.push(`Relationship ${label}: unknown parent entity`);
    } else if (parent.index !== rel.parentKey) {
      errors.push(`Relationship ${label}: parent key "${rel.parentKey}" is not the index of ${rel.parent}`);
    }
    if (!child) {
      errors.push(`Relationship ${label}: unknown child entity`);
    } else if (!child.columns.includes(rel.childKey)) {
      errors.push(`Relationship ${label}: child key "${rel.childKey}" is not a column of ${rel.child}`);
    }
  }

  const target = entities.get(schema.target.entity);
  if (!target) {
    errors.push(`Target entity "${schema.target.entity}" is not declared`);
  } else {
    if (target.index !== joinKeyName) {
      errors.push(`Target entity must be indexed by its join key "${joinKeyName}"`);
    }
    if (target.columns.includes(joinKeyName)) {
      errors.push(`Join key "${joinKeyName}" must not be a persisted column of ${target.name}`);
    }
    for (const part of schema.target.joinKey.parts) {
      if (!target.columns.includes(part)) {
        errors.push(`Join key part "${part}" is not a column of ${target.name}`);
      }
    }
    for (const selection of schema.features) {
      if (target.columns.includes(selection.column)) {
        errors.push(`Feature column "${selection.column}" collides with a ${target.name} column`);
      }
    }
  }

  if (uniq(schema.features.map(f => f.feature)).length !== schema.features.length) {
    errors.push('Selected feature names must be unique');
  }
  if (uniq(schema.features.map(f => f.column)).length !== schema.features.length) {
    errors.push('Feature output column names must be unique');
  }
  if (!Number.isInteger(schema.maxDepth) || schema.maxDepth < 1) {
    errors.push('maxDepth must be a positive integer');
  }

  return { valid: errors.length === 0, errors };
}

let loadedSchema: WarehouseSchema | null = null;

/**
 * Validated sales schema, checked once per process
 */
export function loadWarehouseSchema(): WarehouseSchema {
  if (!loadedSchema) {
    const { valid, errors } = validateWarehouseSchema(SALES_WAREHOUSE_SCHEMA);
    if (!valid) {
      throw new Error(`Invalid warehouse schema:\n  - ${errors.join('\n  - ')}`);
    }
    loadedSchema = SALES_WAREHOUSE_SCHEMA;
  }
  return loadedSchema;
}

export function getEntityDefinition(schema: WarehouseSchema, name: string): EntityDefinition {
  const entity = schema.entities.find(e => e.name === name);
  if (!entity) {
    throw new Error(`Entity "${name}" is not declared in schema ${schema.id}`);
  }
  return entity;
}

/**
 * Persisted columns of an entity, with the feature columns appended for the target
 */
export function getTableColumns(schema: WarehouseSchema, entityName: string): ColumnDefinition[] {
  const kinds = new Map(schema.fields.map(f => [f.name, f.kind]));
  const columns: ColumnDefinition[] = getEntityDefinition(schema, entityName).columns.map(name => ({
    name,
    kind: kinds.get(name) ?? 'text',
  }));
  if (entityName === schema.target.entity) {
    for (const selection of schema.features) {
      columns.push({ name: selection.column, kind: selection.kind });
    }
  }
  return columns;
}
