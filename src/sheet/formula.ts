/**
 * Formula evaluation against a read context.
 *
 * Only the branch actually taken is evaluated (`if`, `&&`, `||`), so a
 * formula's dependency set follows the data: this is what makes sheet cells
 * dynamic dependencies.
 */

import { SheetError } from '../core/errors.js';
import type { BinaryOperator, FormulaNode } from './parser.js';

export type CellValue = number | boolean;

/**
 * Runtime failure inside a formula: a type mismatch, division by zero.
 * Thrown from compute functions and reported by the engine as
 * `ComputeFailedError`.
 */
export class FormulaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormulaError';
  }
}

export type CellReader = (name: string) => CellValue;

interface FunctionDef {
  arity: [min: number, max: number];
}

const FUNCTIONS: Record<string, FunctionDef> = {
  if: { arity: [3, 3] },
  min: { arity: [1, Infinity] },
  max: { arity: [1, Infinity] },
  sum: { arity: [1, Infinity] },
  abs: { arity: [1, 1] },
  round: { arity: [1, 2] },
};

/**
 * Reject calls to unknown functions or with the wrong number of arguments.
 */
export function checkCalls(node: FormulaNode): void {
  switch (node.type) {
    case 'unary':
      checkCalls(node.operand);
      return;
    case 'binary':
      checkCalls(node.left);
      checkCalls(node.right);
      return;
    case 'call': {
      const def = FUNCTIONS[node.name];
      if (!def) throw new SheetError(`Unknown function "${node.name}"`);
      const [min, max] = def.arity;
      if (node.args.length < min || node.args.length > max) {
        const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
        throw new SheetError(
          `Function "${node.name}" takes ${expected} argument(s), got ${node.args.length}`
        );
      }
      node.args.forEach(checkCalls);
      return;
    }
    default:
      return;
  }
}

function num(value: CellValue, where: string): number {
  if (typeof value !== 'number') {
    throw new FormulaError(`${where} expects a number, got ${value}`);
  }
  return value;
}

function bool(value: CellValue, where: string): boolean {
  if (typeof value !== 'boolean') {
    throw new FormulaError(`${where} expects a boolean, got ${value}`);
  }
  return value;
}

export function evaluate(node: FormulaNode, read: CellReader): CellValue {
  switch (node.type) {
    case 'number':
    case 'boolean':
      return node.value;
    case 'ref':
      return read(node.name);
    case 'unary': {
      const operand = evaluate(node.operand, read);
      return node.operator === '-' ? -num(operand, 'unary -') : !bool(operand, '!');
    }
    case 'binary':
      return binary(node.operator, node.left, node.right, read);
    case 'call':
      return call(node.name, node.args, read);
  }
}

function binary(
  operator: BinaryOperator,
  leftNode: FormulaNode,
  rightNode: FormulaNode,
  read: CellReader
): CellValue {
  if (operator === '&&') {
    return bool(evaluate(leftNode, read), '&&') && bool(evaluate(rightNode, read), '&&');
  }
  if (operator === '||') {
    return bool(evaluate(leftNode, read), '||') || bool(evaluate(rightNode, read), '||');
  }

  const left = evaluate(leftNode, read);
  const right = evaluate(rightNode, read);

  switch (operator) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    case '+':
      return num(left, '+') + num(right, '+');
    case '-':
      return num(left, '-') - num(right, '-');
    case '*':
      return num(left, '*') * num(right, '*');
    case '/': {
      const divisor = num(right, '/');
      if (divisor === 0) throw new FormulaError('Division by zero');
      return num(left, '/') / divisor;
    }
    case '%': {
      const divisor = num(right, '%');
      if (divisor === 0) throw new FormulaError('Division by zero');
      return num(left, '%') % divisor;
    }
    case '<':
      return num(left, '<') < num(right, '<');
    case '<=':
      return num(left, '<=') <= num(right, '<=');
    case '>':
      return num(left, '>') > num(right, '>');
    case '>=':
      return num(left, '>=') >= num(right, '>=');
  }
}

function call(name: string, args: FormulaNode[], read: CellReader): CellValue {
  if (name === 'if') {
    const [condition, then, otherwise] = args;
    return bool(evaluate(condition, read), 'if')
      ? evaluate(then, read)
      : evaluate(otherwise, read);
  }

  const values = args.map((arg) => num(evaluate(arg, read), name));
  switch (name) {
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
    case 'sum':
      return values.reduce((total, value) => total + value, 0);
    case 'abs':
      return Math.abs(values[0]);
    case 'round': {
      const [value, digits = 0] = values;
      const factor = 10 ** digits;
      return Math.round(value * factor) / factor;
    }
    default:
      throw new FormulaError(`Unknown function "${name}"`);
  }
}
