import { describe, it, expect, beforeEach } from 'vitest';
import { RelationshipInferencer } from '../../src/services/RelationshipInferencer.js';
import { customersAndOrders, makeRecord } from '../mocks/records.js';

describe('RelationshipInferencer', () => {
  let inferencer: RelationshipInferencer;

  beforeEach(() => {
    inferencer = new RelationshipInferencer();
  });

  // --- declared foreign keys ---

  it('should create one foreign_key edge for a resolvable declared key', () => {
    const { edges, report } = inferencer.infer(customersAndOrders());

    expect(edges).toEqual([
      {
        from: 'database/sample.db/orders/customer_id',
        to: 'database/sample.db/customers/customer_id',
        kind: 'foreign_key',
        confidence: 1,
      },
    ]);
    expect(report).toEqual({ explicitEdges: 1, heuristicEdges: 0, droppedForeignKeys: 0 });
  });

  it('should drop a declared key whose target is absent', () => {
    const records = customersAndOrders().filter((r) => r.containerName === 'orders');
    const { edges, report } = inferencer.infer(records);

    expect(edges).toEqual([]);
    expect(report.droppedForeignKeys).toBe(1);
  });

  it('should not resolve declared targets in another source', () => {
    const records = [
      ...customersAndOrders('a.db').filter((r) => r.containerName === 'orders'),
      ...customersAndOrders('b.db').filter((r) => r.containerName === 'customers'),
    ];
    const { edges } = inferencer.infer(records);

    expect(edges.filter((e) => e.kind === 'foreign_key')).toEqual([]);
  });

  it('should drop a declared key pointing at itself', () => {
    const { edges, report } = inferencer.infer([
      makeRecord({
        containerName: 'nodes',
        fieldName: 'parent_id',
        isForeignKey: true,
        fkTarget: { container: 'nodes', field: 'parent_id' },
      }),
    ]);

    expect(edges).toEqual([]);
    expect(report.droppedForeignKeys).toBe(1);
  });

  // --- naming convention ---

  it('should match a prefix to a container named after it', () => {
    const { edges, report } = inferencer.infer([
      makeRecord({ sourceType: 'file', sourceId: 'hr', containerName: 'employees.csv', fieldName: 'department_id' }),
      makeRecord({ sourceType: 'file', sourceId: 'hr', containerName: 'departments.csv', fieldName: 'id', isPrimaryKey: true }),
      makeRecord({ sourceType: 'file', sourceId: 'hr', containerName: 'departments.csv', fieldName: 'name' }),
    ]);

    expect(edges).toEqual([
      {
        from: 'file/hr/employees.csv/department_id',
        to: 'file/hr/departments.csv/id',
        kind: 'heuristic_name_match',
        confidence: 1,
      },
    ]);
    expect(report).toEqual({ explicitEdges: 0, heuristicEdges: 1, droppedForeignKeys: 0 });
  });

  it('should score a same-named key in an unrelated container at 0.5', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'clients', fieldName: 'customer_id', isPrimaryKey: true }),
    ]);

    expect(edges).toEqual([
      {
        from: 'database/sample.db/orders/customer_id',
        to: 'database/sample.db/clients/customer_id',
        kind: 'heuristic_name_match',
        confidence: 0.5,
      },
    ]);
  });

  it('should discard matches below the threshold', () => {
    const strict = new RelationshipInferencer({ threshold: 0.6 });
    const { edges } = strict.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'clients', fieldName: 'customer_id', isPrimaryKey: true }),
    ]);

    expect(edges).toEqual([]);
  });

  it('should ignore an id key in a container not named after the prefix', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'products', fieldName: 'id', isPrimaryKey: true }),
    ]);

    expect(edges).toEqual([]);
  });

  it('should only target primary-key fields', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'customers', fieldName: 'id', isPrimaryKey: false }),
    ]);

    expect(edges).toEqual([]);
  });

  it('should not propose a name match for a field with a declared edge', () => {
    const { edges } = inferencer.infer([
      ...customersAndOrders(),
      makeRecord({ containerName: 'customer', fieldName: 'id', isPrimaryKey: true }),
    ]);

    expect(edges.filter((e) => e.from === 'database/sample.db/orders/customer_id')).toEqual([
      {
        from: 'database/sample.db/orders/customer_id',
        to: 'database/sample.db/customers/customer_id',
        kind: 'foreign_key',
        confidence: 1,
      },
    ]);
  });

  it('should link a one-to-one extension table through its own primary key', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'customers', fieldName: 'id', isPrimaryKey: true }),
      makeRecord({ containerName: 'customer_profiles', fieldName: 'customer_id', isPrimaryKey: true }),
    ]);

    expect(edges).toEqual([
      {
        from: 'database/sample.db/customer_profiles/customer_id',
        to: 'database/sample.db/customers/id',
        kind: 'heuristic_name_match',
        confidence: 1,
      },
    ]);
  });

  it('should link each column of a composite junction key', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'order_items', fieldName: 'order_id', isPrimaryKey: true }),
      makeRecord({ containerName: 'order_items', fieldName: 'product_id', isPrimaryKey: true }),
      makeRecord({ containerName: 'orders', fieldName: 'id', isPrimaryKey: true }),
      makeRecord({ containerName: 'products', fieldName: 'id', isPrimaryKey: true }),
    ]);

    expect(edges.map((e) => `${e.from} -> ${e.to}`)).toEqual([
      'database/sample.db/order_items/order_id -> database/sample.db/orders/id',
      'database/sample.db/order_items/product_id -> database/sample.db/products/id',
    ]);
  });

  it('should match across sources', () => {
    const { edges } = inferencer.infer([
      makeRecord({ sourceType: 'file', sourceId: 'hr', containerName: 'employees.csv', fieldName: 'department_id' }),
      makeRecord({ sourceId: 'erp.db', containerName: 'departments', fieldName: 'id', isPrimaryKey: true }),
    ]);

    expect(edges).toEqual([
      {
        from: 'file/hr/employees.csv/department_id',
        to: 'database/erp.db/departments/id',
        kind: 'heuristic_name_match',
        confidence: 1,
      },
    ]);
  });

  // --- tie-breaking ---

  it('should prefer the container closest to the prefix on equal confidence', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'customers', fieldName: 'id', isPrimaryKey: true }),
      makeRecord({ containerName: 'customer', fieldName: 'id', isPrimaryKey: true }),
    ]);

    expect(edges).toHaveLength(1);
    expect(edges[0].to).toBe('database/sample.db/customer/id');
  });

  it('should fall back to container name order', () => {
    const { edges } = inferencer.infer([
      makeRecord({ containerName: 'orders', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'b_customers', fieldName: 'customer_id', isPrimaryKey: true }),
      makeRecord({ containerName: 'a_customers', fieldName: 'customer_id', isPrimaryKey: true }),
    ]);

    expect(edges.filter((e) => e.from === 'database/sample.db/orders/customer_id')).toEqual([
      {
        from: 'database/sample.db/orders/customer_id',
        to: 'database/sample.db/a_customers/customer_id',
        kind: 'heuristic_name_match',
        confidence: 0.5,
      },
    ]);
  });

  it('should produce the identical edge list on every run', () => {
    const records = [
      ...customersAndOrders(),
      makeRecord({ containerName: 'reviews', fieldName: 'customer_id' }),
      makeRecord({ containerName: 'reviews', fieldName: 'order_id' }),
    ];

    const first = inferencer.infer(records);
    const second = inferencer.infer([...records].reverse());

    expect(second.edges).toEqual(first.edges);
    expect(first.edges.map((e) => e.from)).toEqual([
      'database/sample.db/orders/customer_id',
      'database/sample.db/reviews/customer_id',
      'database/sample.db/reviews/order_id',
    ]);
  });
});
