/**
 * Tests for the error taxonomy.
 */

import { describe, it, expect } from 'vitest';
import {
  ComputeFailedError,
  CyclicDependencyError,
  InvalidOperationError,
  SheetError,
  TracegraphError,
} from '../../src/core/errors.js';

describe('CyclicDependencyError', () => {
  it('should name the whole cycle and close it on the entry', () => {
    const error = new CyclicDependencyError(['first', 'third', 'second']);

    expect(error.message).toBe('Cyclic dependency: first -> third -> second -> first');
    expect(error.cycle).toEqual(['first', 'third', 'second']);
    expect(error.code).toBe('CYCLIC_DEPENDENCY');
    expect(error.name).toBe('CyclicDependencyError');
  });

  it('should describe a self-reference', () => {
    expect(new CyclicDependencyError(['self']).message).toBe(
      'Cyclic dependency: self -> self'
    );
  });
});

describe('ComputeFailedError', () => {
  it('should keep the original error as cause', () => {
    const cause = new RangeError('out of range');
    const error = new ComputeFailedError('total', cause);

    expect(error.message).toBe('Computing "total" failed: out of range');
    expect(error.attributeId).toBe('total');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('COMPUTE_FAILED');
  });

  it('should stringify thrown non-errors', () => {
    expect(new ComputeFailedError('x', 'oops').message).toBe('Computing "x" failed: oops');
  });
});

describe('TracegraphError', () => {
  it('should be the base of every engine error', () => {
    const errors = [
      new InvalidOperationError('nope'),
      new CyclicDependencyError(['a']),
      new ComputeFailedError('a', new Error('x')),
      new SheetError('bad'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(TracegraphError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(errors.map((e) => e.code)).toEqual([
      'INVALID_OPERATION',
      'CYCLIC_DEPENDENCY',
      'COMPUTE_FAILED',
      'SHEET_INVALID',
    ]);
  });
});
