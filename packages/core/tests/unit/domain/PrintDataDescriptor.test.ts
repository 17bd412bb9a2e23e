import { describe, it, expect } from 'vitest';
import { PrintDataDescriptor } from '../../../src/domain/model/PrintDataDescriptor.js';
import type { FieldMetrics } from '../../../src/domain/model/FieldMetrics.js';

function metrics(width: number, isMultiline = false): FieldMetrics {
  return { width, isMultiline, aux: { digits: 0, others: 0 } };
}

describe('PrintDataDescriptor', () => {
  it('should hold one entry per column', () => {
    const descriptor = new PrintDataDescriptor(['numeric', 'generic']);

    expect(descriptor.nfields).toBe(2);
    expect(descriptor.hasHeader).toBe(true);
    expect(descriptor.columns()).toEqual([
      { alignment: 'numeric', width: 0, multiline: false },
      { alignment: 'generic', width: 0, multiline: false },
    ]);
  });

  it('should seed a column from its header cell', () => {
    const descriptor = new PrintDataDescriptor(['generic']);

    descriptor.seed(0, metrics(4, true));

    expect(descriptor.column(0)).toEqual({ alignment: 'generic', width: 4, multiline: true });
  });

  it('should keep the running maximum width', () => {
    const descriptor = new PrintDataDescriptor(['generic']);
    descriptor.seed(0, metrics(2));

    descriptor.fold(0, metrics(5));
    descriptor.fold(0, metrics(3));

    expect(descriptor.column(0).width).toBe(5);
  });

  it('should never turn the multiline flag back off', () => {
    const descriptor = new PrintDataDescriptor(['generic']);
    descriptor.seed(0, metrics(1));

    descriptor.fold(0, metrics(1, true));
    descriptor.fold(0, metrics(1, false));

    expect(descriptor.column(0).multiline).toBe(true);
  });

  it('should throw RangeError for an unknown column', () => {
    const descriptor = new PrintDataDescriptor(['generic']);

    expect(() => descriptor.fold(1, metrics(1))).toThrow(RangeError);
    expect(() => descriptor.column(-1)).toThrow(RangeError);
  });
});
