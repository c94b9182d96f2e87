/**
 * Unit Tests for the Entity Graph
 */

import { DanglingReferenceError, GraphConfigurationError } from '../../lib/error-handler';
import { SALES_WAREHOUSE_SCHEMA } from '../../lib/warehouse-schema';
import { EntityGraph, EntityInput, buildEntityGraph, keyOf } from '../entity-graph';
import { normalizeRecords } from '../normalize-records';
import { salesRecord } from '../../__tests__/helpers/sales-records';

function customers(ids: string[]): EntityInput {
  return {
    name: 'Customers',
    index: 'Customer ID',
    columns: [{ name: 'Customer ID', kind: 'text' }, { name: 'Segment', kind: 'text' }],
    rows: ids.map(id => ({ 'Customer ID': id, 'Segment': 'Consumer' })),
  };
}

function details(customerIds: string[]): EntityInput {
  return {
    name: 'OrderDetails',
    index: 'Line',
    columns: [{ name: 'Line', kind: 'text' }, { name: 'Customer ID', kind: 'text' }, { name: 'Sales', kind: 'numeric' }],
    rows: customerIds.map((id, i) => ({ 'Line': `L${i}`, 'Customer ID': id, 'Sales': 1 })),
  };
}

const customerRelationship = {
  parent: 'Customers',
  parentKey: 'Customer ID',
  child: 'OrderDetails',
  childKey: 'Customer ID',
};

describe('keyOf', () => {
  it('renders dates by ISO timestamp and other values as strings', () => {
    expect(keyOf(new Date(Date.UTC(2024, 2, 15)))).toBe('2024-03-15T00:00:00.000Z');
    expect(keyOf(42)).toBe('42');
    expect(keyOf(null)).toBeNull();
    expect(keyOf(undefined)).toBeNull();
  });
});

describe('EntityGraph.addEntity', () => {
  it('rejects a second entity with the same name', () => {
    const graph = new EntityGraph('test').addEntity(customers(['C1']));
    expect(() => graph.addEntity(customers(['C2']))).toThrow(GraphConfigurationError);
    expect(() => graph.addEntity(customers(['C2']))).toThrow('Entity "Customers" is already registered in test');
  });

  it('rejects an index that is not one of the columns', () => {
    const graph = new EntityGraph('test');
    expect(() => graph.addEntity({ ...customers(['C1']), index: 'Nope' }))
      .toThrow('Entity "Customers": index "Nope" is not one of its columns');
  });

  it('tolerates repeated index values and keeps the first of identical rows', () => {
    const graph = new EntityGraph('test').addEntity(customers(['C1', 'C2', 'C1']));
    const frame = graph.getEntity('Customers');

    expect(frame.duplicateIndexValues).toEqual(['C1']);
    expect(frame.lookup.get('C1')).toBe(0);
    expect(frame.lookup.get('C2')).toBe(1);
  });

  it('resolves a repeated index value to the same row in any input order', () => {
    const rows = [
      { 'Customer ID': 'C1', 'Segment': 'Home Office' },
      { 'Customer ID': 'C1', 'Segment': 'Consumer' },
    ];
    const resolve = (ordered: typeof rows) => {
      const frame = new EntityGraph('test').addEntity({ ...customers([]), rows: ordered }).getEntity('Customers');
      return frame.rows[frame.lookup.get('C1') ?? -1];
    };

    expect(resolve(rows)).toEqual({ 'Customer ID': 'C1', 'Segment': 'Consumer' });
    expect(resolve([...rows].reverse())).toEqual({ 'Customer ID': 'C1', 'Segment': 'Consumer' });
  });
});

describe('EntityGraph.addRelationship', () => {
  it('rejects undeclared entities', () => {
    const graph = new EntityGraph('test').addEntity(details(['C1']));
    expect(() => graph.addRelationship(customerRelationship)).toThrow('Entity "Customers" is not registered in test');
  });

  it('rejects a parent key that is not the parent index', () => {
    const graph = new EntityGraph('test').addEntity(customers(['C1'])).addEntity(details(['C1']));
    expect(() => graph.addRelationship({ ...customerRelationship, parentKey: 'Segment' }))
      .toThrow('Relationship Customers → OrderDetails: "Segment" is not the index of Customers');
  });

  it('rejects a child key the child does not have', () => {
    const graph = new EntityGraph('test').addEntity(customers(['C1'])).addEntity(details(['C1']));
    expect(() => graph.addRelationship({ ...customerRelationship, childKey: 'Region' }))
      .toThrow('Relationship Customers → OrderDetails: child key "Region" is not a column of OrderDetails');
  });

  it('records dangling child keys under the null-join policy', () => {
    const graph = new EntityGraph('test')
      .addEntity(customers(['C1']))
      .addEntity(details(['C1', 'C9', 'C3', 'C9']))
      .addRelationship(customerRelationship);

    expect(graph.danglingReferences).toEqual([{ relationship: customerRelationship, values: ['C3', 'C9'] }]);
    expect(graph.childrenOf('Customers')).toEqual([customerRelationship]);
    expect(graph.parentsOf('OrderDetails')).toEqual([customerRelationship]);
  });

  it('raises on dangling child keys under the fail policy', () => {
    const graph = new EntityGraph('test', 'fail').addEntity(customers(['C1'])).addEntity(details(['C1', 'C9']));

    expect(() => graph.addRelationship(customerRelationship)).toThrow(DanglingReferenceError);
    expect(() => graph.addRelationship(customerRelationship))
      .toThrow('1 OrderDetails row key(s) in "Customer ID" have no matching Customers row: C9');
  });
});

describe('buildEntityGraph', () => {
  it('registers every schema entity with the join key as the target index', () => {
    const batch = normalizeRecords([salesRecord(), salesRecord({ 'Product ID': 'PR-2' })], SALES_WAREHOUSE_SCHEMA);
    const graph = buildEntityGraph(batch, SALES_WAREHOUSE_SCHEMA);

    expect(graph.entityNames).toEqual(['Customers', 'Products', 'Orders', 'OrderDetails']);
    const target = graph.getEntity('OrderDetails');
    expect(target.index).toBe('OrderDetail ID');
    expect(target.columns[0]).toEqual({ name: 'OrderDetail ID', kind: 'text' });
    expect(target.rows).toHaveLength(2);
    expect(graph.parentsOf('OrderDetails').map(r => r.parent)).toEqual(['Customers', 'Products', 'Orders']);
    expect(graph.danglingReferences).toEqual([]);
  });
});
