/**
 * Entity Graph
 *
 * Named row sets with a declared index, joined by one-to-many relationships
 * (parent index → child foreign key). The feature derivation engine walks it.
 */

import { DanglingReferenceError, GraphConfigurationError } from '../lib/error-handler';
import { ReferencePolicy } from '../lib/config-loader';
import { ColumnDefinition, Row, WarehouseSchema, getTableColumns } from '../lib/warehouse-schema';
import { NormalizedBatch, encodeCompositeKey } from './normalize-records';

export interface EntityInput {
  name: string;
  index: string;
  columns: ColumnDefinition[];
  rows: Row[];
}

export interface EntityFrame extends EntityInput {
  /**
   * Position of the row each index value resolves to. When a value repeats,
   * the row whose encoded column values sort first wins, whatever the input order.
   */
  lookup: Map<string, number>;
  duplicateIndexValues: string[];
}

export interface Relationship {
  parent: string;
  parentKey: string;
  child: string;
  childKey: string;
}

export interface DanglingReference {
  relationship: Relationship;
  values: string[];
}

export function keyOf(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return value instanceof Date ? value.toISOString() : String(value);
}

export class EntityGraph {
  private readonly entities = new Map<string, EntityFrame>();
  private readonly relationships: Relationship[] = [];
  private readonly dangling: DanglingReference[] = [];

  constructor(
    readonly id: string,
    private readonly referencePolicy: ReferencePolicy = 'null-join'
  ) {}

  addEntity(input: EntityInput): this {
    if (this.entities.has(input.name)) {
      throw new GraphConfigurationError(`Entity "${input.name}" is already registered in ${this.id}`);
    }
    if (!input.columns.some(c => c.name === input.index)) {
      throw new GraphConfigurationError(`Entity "${input.name}": index "${input.index}" is not one of its columns`);
    }

    const lookup = new Map<string, number>();
    const rowKeys = new Map<string, string>();
    const duplicates = new Set<string>();
    input.rows.forEach((row, position) => {
      const key = keyOf(row[input.index]);
      if (key === null) {
        throw new GraphConfigurationError(`Entity "${input.name}": row ${position} has no value for index "${input.index}"`);
      }
      const rowKey = encodeCompositeKey(input.columns.map(c => row[c.name] ?? null));
      const current = rowKeys.get(key);
      if (current !== undefined) {
        duplicates.add(key);
        if (rowKey >= current) {
          return;
        }
      }
      lookup.set(key, position);
      rowKeys.set(key, rowKey);
    });

    this.entities.set(input.name, { ...input, lookup, duplicateIndexValues: [...duplicates].sort() });
    return this;
  }

  addRelationship(relationship: Relationship): this {
    const { parent, parentKey, child, childKey } = relationship;
    const parentFrame = this.getEntity(parent);
    const childFrame = this.getEntity(child);

    if (parentFrame.index !== parentKey) {
      throw new GraphConfigurationError(`Relationship ${parent} → ${child}: "${parentKey}" is not the index of ${parent}`);
    }
    if (!childFrame.columns.some(c => c.name === childKey)) {
      throw new GraphConfigurationError(`Relationship ${parent} → ${child}: child key "${childKey}" is not a column of ${child}`);
    }

    const unmatched = new Set<string>();
    for (const row of childFrame.rows) {
      const key = keyOf(row[childKey]);
      if (key !== null && !parentFrame.lookup.has(key)) {
        unmatched.add(key);
      }
    }

    if (unmatched.size > 0) {
      const values = [...unmatched].sort();
      if (this.referencePolicy === 'fail') {
        throw new DanglingReferenceError(parent, child, childKey, values);
      }
      this.dangling.push({ relationship, values });
    }

    this.relationships.push(relationship);
    return this;
  }

  getEntity(name: string): EntityFrame {
    const frame = this.entities.get(name);
    if (!frame) {
      throw new GraphConfigurationError(`Entity "${name}" is not registered in ${this.id}`);
    }
    return frame;
  }

  /** Relationships in which the entity is the child */
  parentsOf(name: string): Relationship[] {
    return this.relationships.filter(r => r.child === name);
  }

  /** Relationships in which the entity is the parent */
  childrenOf(name: string): Relationship[] {
    return this.relationships.filter(r => r.parent === name);
  }

  get danglingReferences(): DanglingReference[] {
    return [...this.dangling];
  }

  get entityNames(): string[] {
    return [...this.entities.keys()];
  }
}

/**
 * Register every schema entity and relationship for a normalized batch
 */
export function buildEntityGraph(
  batch: NormalizedBatch,
  schema: WarehouseSchema,
  referencePolicy: ReferencePolicy = 'null-join'
): EntityGraph {
  const graph = new EntityGraph(schema.id, referencePolicy);
  const { entity: targetName, joinKey } = schema.target;

  for (const entity of schema.entities) {
    const columns = getTableColumns(schema, entity.name).filter(c =>
      entity.columns.includes(c.name)
    );
    if (entity.name === targetName) {
      columns.unshift({ name: joinKey.name, kind: 'text' });
    }
    graph.addEntity({
      name: entity.name,
      index: entity.index,
      columns,
      rows: batch.tables.get(entity.name) ?? [],
    });
  }

  for (const relationship of schema.relationships) {
    graph.addRelationship(relationship);
  }

  return graph;
}
