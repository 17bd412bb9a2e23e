import { describe, it, expect } from 'vitest';
import { classifyColumn } from '../../../src/domain/services/ColumnClassifier.js';

describe('classifyColumn', () => {
  it.each(['int2', 'int4', 'int8', 'float4', 'float8', 'numeric', 'oid', 'xid', 'cid', 'money'])(
    'should classify %s as numeric',
    (tag) => {
      expect(classifyColumn(tag)).toBe('numeric');
    },
  );

  it('should ignore case and type modifiers', () => {
    expect(classifyColumn('INTEGER')).toBe('numeric');
    expect(classifyColumn('NUMERIC(10,2)')).toBe('numeric');
    expect(classifyColumn('Double Precision')).toBe('numeric');
    expect(classifyColumn('decimal (8, 3)')).toBe('numeric');
  });

  it.each(['text', 'varchar(20)', 'bool', 'date', 'timestamptz', 'json', 'BLOB'])(
    'should classify %s as generic',
    (tag) => {
      expect(classifyColumn(tag)).toBe('generic');
    },
  );

  it('should classify unknown and empty tags as generic', () => {
    expect(classifyColumn('')).toBe('generic');
    expect(classifyColumn('no-such-type')).toBe('generic');
  });
});
