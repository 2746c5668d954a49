import { describe, it, expect, beforeEach } from 'vitest';
import { DictionaryService } from '../../src/services/DictionaryService.js';
import { InMemoryCatalogStore } from '../../src/stores/InMemoryCatalogStore.js';
import { RelationshipInferencer } from '../../src/services/RelationshipInferencer.js';
import { customersAndOrders } from '../mocks/records.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('DictionaryService', () => {
  let store: InMemoryCatalogStore;
  let service: DictionaryService;

  beforeEach(async () => {
    store = new InMemoryCatalogStore(new RelationshipInferencer(), () => NOW);
    service = new DictionaryService(store, () => NOW);
    await store.ingest('sample.db', customersAndOrders());
  });

  describe('dictionary', () => {
    it('should list one row per record in key order', () => {
      expect(service.dictionary().map((row) => row.entry)).toEqual([
        'customers.customer_id',
        'customers.name',
        'orders.customer_id',
        'orders.order_id',
      ]);
    });

    it('should name the fields a row references', () => {
      const row = service.dictionary().find((r) => r.entry === 'orders.customer_id');

      expect(row).toEqual({
        key: 'database/sample.db/orders/customer_id',
        entry: 'orders.customer_id',
        source: 'sample.db',
        sourceType: 'database',
        container: 'orders',
        field: 'customer_id',
        dataType: 'INTEGER',
        nullable: false,
        primaryKey: false,
        foreignKey: true,
        references: ['customers.customer_id'],
        sampleValue: null,
      });
    });

    it('should resolve references outside the filter', () => {
      const rows = service.dictionary({ container: 'orders' });

      expect(rows.map((r) => r.entry)).toEqual(['orders.customer_id', 'orders.order_id']);
      expect(rows[0].references).toEqual(['customers.customer_id']);
    });
  });

  it('should collapse field edges into container links', () => {
    expect(service.lineage()).toEqual({
      nodes: [
        {
          id: 'database/sample.db/customers',
          container: 'customers',
          sourceType: 'database',
          sourceId: 'sample.db',
        },
        {
          id: 'database/sample.db/orders',
          container: 'orders',
          sourceType: 'database',
          sourceId: 'sample.db',
        },
      ],
      edges: [
        {
          from: 'database/sample.db/orders',
          to: 'database/sample.db/customers',
          relationship: 'foreign_key',
        },
      ],
    });
  });

  it('should export one consistent generation', () => {
    const snapshot = service.export();

    expect(snapshot.generatedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(snapshot.records).toHaveLength(4);
    expect(snapshot.relationships).toHaveLength(1);
    expect(snapshot.statistics.totalRecords).toBe(4);
    expect(snapshot.dictionary).toHaveLength(4);
    expect(snapshot.lineage.edges).toHaveLength(1);
  });
});
