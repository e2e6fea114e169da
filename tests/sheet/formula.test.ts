/**
 * Tests for formula evaluation.
 */

import { describe, it, expect, vi } from 'vitest';
import { SheetError } from '../../src/core/errors.js';
import {
  checkCalls,
  evaluate,
  FormulaError,
  type CellValue,
} from '../../src/sheet/formula.js';
import { parseFormula } from '../../src/sheet/parser.js';

const cells: Record<string, CellValue> = { a: 2, b: 3, yes: true, no: false };

function run(source: string): CellValue {
  return evaluate(parseFormula(source), (name) => cells[name]);
}

describe('evaluate', () => {
  it('should do arithmetic with precedence and left associativity', () => {
    expect(run('a * (b + 1)')).toBe(8);
    expect(run('8 - 3 - 2')).toBe(3);
    expect(run('7 % 4 + 10 / 4')).toBe(5.5);
    expect(run('--a')).toBe(2);
  });

  it('should compare and combine booleans', () => {
    expect(run('a < b && b <= 3')).toBe(true);
    expect(run('a >= b || !yes')).toBe(false);
    expect(run('a == 2')).toBe(true);
    expect(run('1 == yes')).toBe(false);
    expect(run('yes != no')).toBe(true);
  });

  it('should call built-in functions', () => {
    expect(run('sum(1, a, b)')).toBe(6);
    expect(run('min(4, a, 8)')).toBe(2);
    expect(run('max(4, a, 8)')).toBe(8);
    expect(run('abs(-3)')).toBe(3);
    expect(run('round(2.5)')).toBe(3);
    expect(run('round(1.26, 1)')).toBe(1.3);
  });

  it('should evaluate only the branch taken', () => {
    const read = vi.fn((name: string): CellValue => cells[name] ?? 0);

    expect(evaluate(parseFormula('if(yes, a, b)'), read)).toBe(2);
    expect(read.mock.calls.map(([name]) => name)).toEqual(['yes', 'a']);

    read.mockClear();
    expect(evaluate(parseFormula('no && missing'), read)).toBe(false);
    expect(evaluate(parseFormula('yes || missing'), read)).toBe(true);
    expect(read.mock.calls.map(([name]) => name)).toEqual(['no', 'yes']);
  });

  it('should raise FormulaError on type mismatches', () => {
    expect(() => run('yes + 1')).toThrow(FormulaError);
    expect(() => run('yes + 1')).toThrow('+ expects a number, got true');
    expect(() => run('if(a, 1, 2)')).toThrow('if expects a boolean, got 2');
    expect(() => run('!a')).toThrow('! expects a boolean, got 2');
    expect(() => run('sum(a, no)')).toThrow('sum expects a number, got false');
  });

  it('should raise FormulaError on division by zero', () => {
    expect(() => run('a / 0')).toThrow('Division by zero');
    expect(() => run('a % (b - 3)')).toThrow('Division by zero');
  });
});

describe('checkCalls', () => {
  it('should accept known functions with valid arity', () => {
    expect(() => checkCalls(parseFormula('if(a > 1, max(a, b), round(b, 1))'))).not.toThrow();
  });

  it('should reject unknown functions', () => {
    expect(() => checkCalls(parseFormula('1 + foo(1)'))).toThrow('Unknown function "foo"');
  });

  it('should reject the wrong number of arguments', () => {
    expect(() => checkCalls(parseFormula('abs(1, 2)'))).toThrow(
      'Function "abs" takes 1 argument(s), got 2'
    );
    expect(() => checkCalls(parseFormula('if(true, 1)'))).toThrow(
      'Function "if" takes 3 argument(s), got 2'
    );
    expect(() => checkCalls(parseFormula('round()'))).toThrow(
      'Function "round" takes 1 to 2 argument(s), got 0'
    );
    expect(() => checkCalls(parseFormula('-sum()'))).toThrow(
      'Function "sum" takes at least 1 argument(s), got 0'
    );
    expect(() => checkCalls(parseFormula('abs()'))).toThrow(SheetError);
  });
});
