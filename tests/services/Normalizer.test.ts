import { describe, it, expect, beforeEach } from 'vitest';
import { Normalizer } from '../../src/services/Normalizer.js';
import { FieldRejectedError, ValidationError } from '../../src/errors.js';

describe('Normalizer', () => {
  let normalizer: Normalizer;

  beforeEach(() => {
    normalizer = new Normalizer();
  });

  // --- mapping ---

  it('should map a database column onto a canonical record', () => {
    const { records, rejected } = normalizer.normalize('database', 'sample.db', 'customers', [
      { name: 'customer_id', typeHint: 'INTEGER', nullable: false, isPrimaryKey: true, samples: [1, 2] },
    ]);

    expect(rejected).toEqual([]);
    expect(records).toEqual([
      {
        sourceType: 'database',
        sourceId: 'sample.db',
        containerName: 'customers',
        fieldName: 'customer_id',
        declaredType: 'INTEGER',
        nullable: false,
        isPrimaryKey: true,
        isForeignKey: false,
        fkTarget: null,
        sampleValue: '1',
        description: null,
      },
    ]);
  });

  it('should default nullable to true and flags to false', () => {
    const { records } = normalizer.normalize('file', 'a.csv', 'a.csv', [{ name: 'x' }]);

    expect(records[0]).toMatchObject({ nullable: true, isPrimaryKey: false, isForeignKey: false });
  });

  // --- type classification ---

  it('should use unknown for a database column without a native type', () => {
    const { records } = normalizer.normalize('database', 'sample.db', 't', [
      { name: 'loose', samples: [1] },
    ]);
    expect(records[0].declaredType).toBe('unknown');
  });

  it('should keep a database type name exactly as the source reported it', () => {
    const { records } = normalizer.normalize('database', 'sample.db', 't', [
      { name: 'code', typeHint: ' character varying(20) ' },
      { name: 'blank', typeHint: '   ' },
    ]);
    expect(records.map((r) => r.declaredType)).toEqual([' character varying(20) ', 'unknown']);
  });

  it('should type api fields from observed values and ignore type hints', () => {
    const { records } = normalizer.normalize('api', 'https://example.test/users', 'users', [
      { name: 'age', typeHint: 'VARCHAR', samples: [null, 3] },
    ]);
    expect(records[0].declaredType).toBe('integer');
    expect(records[0].sampleValue).toBe('3');
  });

  it('should classify all-null fields as unknown', () => {
    const { records } = normalizer.normalize('file', 'a.csv', 'a.csv', [
      { name: 'empty', samples: [null, null] },
    ]);
    expect(records[0].declaredType).toBe('unknown');
    expect(records[0].sampleValue).toBeNull();
  });

  it('should fall back to sampleValue when no samples are given', () => {
    const { records } = normalizer.normalize('file', 'a.csv', 'a.csv', [
      { name: 'greeting', sampleValue: 'hello' },
    ]);
    expect(records[0]).toMatchObject({ declaredType: 'string', sampleValue: 'hello' });
  });

  // --- sample rendering ---

  it('should truncate sample values to the configured length', () => {
    const short = new Normalizer({ sampleValueLength: 5 });
    const { records } = short.normalize('file', 'a.csv', 'a.csv', [
      { name: 'text', samples: ['abcdefgh'] },
    ]);
    expect(records[0].sampleValue).toBe('abcde');
  });

  it('should render objects as JSON and dates as ISO strings', () => {
    const { records } = normalizer.normalize('api', 'src', 'root', [
      { name: 'meta', samples: [{ a: 1 }] },
      { name: 'created', samples: [new Date('2026-01-02T03:04:05.000Z')] },
    ]);
    expect(records[0]).toMatchObject({ declaredType: 'object', sampleValue: '{"a":1}' });
    expect(records[1]).toMatchObject({
      declaredType: 'string',
      sampleValue: '2026-01-02T03:04:05.000Z',
    });
  });

  // --- foreign keys ---

  it('should keep a trimmed foreign key target', () => {
    const { records } = normalizer.normalize('database', 'sample.db', 'orders', [
      {
        name: 'customer_id',
        isForeignKey: true,
        fkTarget: { container: ' customers ', field: 'customer_id' },
      },
    ]);
    expect(records[0].fkTarget).toEqual({ container: 'customers', field: 'customer_id' });
  });

  it('should drop a target that is incomplete or not flagged', () => {
    const { records } = normalizer.normalize('database', 'sample.db', 'orders', [
      { name: 'a_id', isForeignKey: true, fkTarget: { container: 'customers', field: ' ' } },
      { name: 'b_id', isForeignKey: false, fkTarget: { container: 'customers', field: 'id' } },
    ]);
    expect(records[0]).toMatchObject({ isForeignKey: true, fkTarget: null });
    expect(records[1]).toMatchObject({ isForeignKey: false, fkTarget: null });
  });

  // --- rejection ---

  it('should reject blank field names without aborting the batch', () => {
    const { records, rejected } = normalizer.normalize('file', 'a.csv', 'a.csv', [
      { name: '  ' },
      { name: 'kept' },
    ]);

    expect(records.map((r) => r.fieldName)).toEqual(['kept']);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(FieldRejectedError);
    expect(rejected[0].reason).toBe('field name is empty');
  });

  it('should keep the first of duplicate names', () => {
    const { records, rejected } = normalizer.normalize('file', 'a.csv', 'a.csv', [
      { name: 'a', samples: [1] },
      { name: ' a ', samples: ['x'] },
    ]);

    expect(records).toHaveLength(1);
    expect(records[0].declaredType).toBe('integer');
    expect(rejected[0].fieldName).toBe('a');
    expect(rejected[0].reason).toBe('duplicate field name in container');
  });

  it('should trim descriptions and drop blank ones', () => {
    const { records } = normalizer.normalize('file', 'a.csv', 'a.csv', [
      { name: 'a', description: ' Key ' },
      { name: 'b', description: '   ' },
    ]);
    expect(records.map((r) => r.description)).toEqual(['Key', null]);
  });

  it('should throw ValidationError for a blank source id or container', () => {
    expect(() => normalizer.normalize('file', ' ', 'a.csv', [])).toThrow(ValidationError);
    expect(() => normalizer.normalize('file', 'a.csv', '', [])).toThrow(ValidationError);
  });

  it('should return no records for an empty container', () => {
    expect(normalizer.normalize('file', 'a.csv', 'a.csv', [])).toEqual({ records: [], rejected: [] });
  });
});
