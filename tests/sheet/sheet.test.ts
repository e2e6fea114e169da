/**
 * Tests for sheets declared on top of the engine.
 */

import { describe, it, expect } from 'vitest';
import {
  ComputeFailedError,
  CyclicDependencyError,
  InvalidOperationError,
  SheetError,
} from '../../src/core/errors.js';
import { FormulaError } from '../../src/sheet/formula.js';
import { Sheet } from '../../src/sheet/sheet.js';

describe('Sheet', () => {
  it('should evaluate formulas lazily and recompute after a set', () => {
    const sheet = new Sheet({
      cells: { a: 2, b: 3, sum: '= a + b', doubled: '= sum * 2' },
    });

    expect(sheet.engine.stateOf(sheet.handle('doubled'))).toBe('stale');
    expect(sheet.get('doubled')).toBe(10);

    sheet.set('a', 10);
    expect(sheet.engine.stateOf(sheet.handle('sum'))).toBe('stale');
    expect(sheet.get('doubled')).toBe(26);
  });

  it('should follow the branch a formula takes', () => {
    const sheet = new Sheet({
      cells: { useX: true, x: 1, y: 2, pick: '= if(useX, x, y)' },
    });
    const pick = sheet.handle('pick');

    expect(sheet.get('pick')).toBe(1);
    expect(sheet.engine.dependenciesOf(pick)).toEqual(['useX', 'x']);

    sheet.set('useX', false);
    expect(sheet.get('pick')).toBe(2);
    expect(sheet.engine.dependenciesOf(pick)).toEqual(['useX', 'y']);

    sheet.set('x', 100);
    expect(sheet.engine.stateOf(pick)).toBe('clean');
  });

  it('should describe its cells', () => {
    const sheet = new Sheet({ cells: { a: 1, total: '=a*2' } });

    expect(sheet.ids()).toEqual(['a', 'total']);
    expect(sheet.has('total')).toBe(true);
    expect(sheet.has('nope')).toBe(false);
    expect(sheet.isFormula('a')).toBe(false);
    expect(sheet.isFormula('total')).toBe(true);
    expect(sheet.formula('total')).toBe('a*2');
    expect(sheet.formula('a')).toBeUndefined();
  });

  it('should export sources and formulas without evaluating', () => {
    const sheet = new Sheet({ name: 'budget', cells: { a: 2, sum: '=  a + 1 ' } });
    sheet.set('a', 5);

    expect(sheet.toDocument()).toEqual({ name: 'budget', cells: { a: 5, sum: '= a + 1' } });
    expect(sheet.engine.stateOf(sheet.handle('sum'))).toBe('stale');
  });

  it('should pass engine options through', () => {
    const sheet = new Sheet({ cells: { a: 2 } }, { compareOnWrite: true });
    sheet.set('a', 2);

    expect(sheet.engine.versionOf(sheet.handle('a'))).toBe(1);
  });
});

describe('Sheet errors', () => {
  it('should reject references to unknown cells', () => {
    expect(() => new Sheet({ cells: { a: 1, total: '= a + c' } })).toThrow(
      'Cell "total" references unknown cell "c"'
    );
    expect(() => new Sheet({ cells: { total: '= toString + 1' } })).toThrow(
      'Cell "total" references unknown cell "toString"'
    );
  });

  it('should prefix formula errors with the cell', () => {
    expect(() => new Sheet({ cells: { bad: '= 1 +' } })).toThrow(
      'Cell "bad": Unexpected end of formula'
    );
    expect(() => new Sheet({ cells: { bad: '= nope(1)' } })).toThrow(
      'Cell "bad": Unknown function "nope"'
    );
  });

  it('should reject unknown cells and writes to formulas', () => {
    const sheet = new Sheet({ cells: { a: 1, b: '= a' } });

    expect(() => sheet.get('zzz')).toThrow(SheetError);
    expect(() => sheet.get('zzz')).toThrow('Unknown cell "zzz"');
    expect(() => sheet.set('b', 2)).toThrow(InvalidOperationError);
  });

  it('should surface runtime formula errors as compute failures', () => {
    const sheet = new Sheet({ cells: { flag: true, n: '= flag + 1' } });

    let caught: unknown;
    try {
      sheet.get('n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ComputeFailedError);
    expect(caught).toHaveProperty('cause', expect.any(FormulaError));

    sheet.set('flag', false);
    expect(() => sheet.get('n')).toThrow('Computing "n" failed: + expects a number, got false');
  });

  it('should detect cycles between formulas', () => {
    const sheet = new Sheet({ cells: { p: '= q + 1', q: '= p + 1' } });

    expect(() => sheet.get('p')).toThrow(CyclicDependencyError);
    expect(() => sheet.get('q')).toThrow('Cyclic dependency: q -> p -> q');
  });
});
