/**
 * Formula language: tokenizer and precedence-climbing parser.
 *
 * Grammar, loosest binding first:
 *   ||   &&   == !=   < <= > >=   + -   * / %   unary - !
 * Primaries are numbers, `true`/`false`, cell references, parenthesised
 * expressions and calls `name(arg, ...)`.
 */

import { SheetError } from '../core/errors.js';

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||';

export type UnaryOperator = '-' | '!';

export type FormulaNode =
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'ref'; name: string }
  | { type: 'unary'; operator: UnaryOperator; operand: FormulaNode }
  | { type: 'binary'; operator: BinaryOperator; left: FormulaNode; right: FormulaNode }
  | { type: 'call'; name: string; args: FormulaNode[] };

type Token =
  | { type: 'number'; value: number; at: number }
  | { type: 'ident'; value: string; at: number }
  | { type: 'punct'; value: string; at: number }
  | { type: 'end'; at: number };

const PUNCTUATION = [
  '<=', '>=', '==', '!=', '&&', '||',
  '+', '-', '*', '/', '%', '<', '>', '!', '(', ')', ',',
];

const BINARY_LEVELS: BinaryOperator[][] = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/', '%'],
];

export const CELL_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const number = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(source.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), at: i });
      i += number[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ type: 'ident', value: ident[0], at: i });
      i += ident[0].length;
      continue;
    }

    const punct = PUNCTUATION.find((p) => source.startsWith(p, i));
    if (punct) {
      tokens.push({ type: 'punct', value: punct, at: i });
      i += punct.length;
      continue;
    }

    throw new SheetError(`Unexpected character "${ch}" at ${i}`);
  }

  tokens.push({ type: 'end', at: source.length });
  return tokens;
}

function isBinary(value: string, level: BinaryOperator[]): value is BinaryOperator {
  return level.some((op) => op === value);
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): FormulaNode {
    const node = this.expression(0);
    const next = this.peek();
    if (next.type !== 'end') {
      throw new SheetError(`Unexpected ${describe(next)} at ${next.at}`);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'end') this.pos++;
    return token;
  }

  private expect(punct: string): void {
    const token = this.advance();
    if (token.type !== 'punct' || token.value !== punct) {
      throw new SheetError(`Expected "${punct}" but found ${describe(token)} at ${token.at}`);
    }
  }

  private expression(level: number): FormulaNode {
    const operators = BINARY_LEVELS[level];
    if (!operators) return this.unary();

    let left = this.expression(level + 1);
    for (;;) {
      const token = this.peek();
      if (token.type !== 'punct') return left;
      const operator = token.value;
      if (!isBinary(operator, operators)) return left;
      this.advance();
      const right = this.expression(level + 1);
      left = { type: 'binary', operator, left, right };
    }
  }

  private unary(): FormulaNode {
    const token = this.peek();
    if (token.type === 'punct') {
      const operator = token.value;
      if (operator === '-' || operator === '!') {
        this.advance();
        return { type: 'unary', operator, operand: this.unary() };
      }
    }
    return this.primary();
  }

  private primary(): FormulaNode {
    const token = this.advance();

    switch (token.type) {
      case 'number':
        return { type: 'number', value: token.value };
      case 'ident': {
        if (token.value === 'true') return { type: 'boolean', value: true };
        if (token.value === 'false') return { type: 'boolean', value: false };

        const next = this.peek();
        if (next.type === 'punct' && next.value === '(') {
          this.advance();
          return { type: 'call', name: token.value, args: this.args() };
        }
        return { type: 'ref', name: token.value };
      }
      case 'punct':
        if (token.value === '(') {
          const inner = this.expression(0);
          this.expect(')');
          return inner;
        }
        throw new SheetError(`Unexpected ${describe(token)} at ${token.at}`);
      case 'end':
        throw new SheetError('Unexpected end of formula');
    }
  }

  private args(): FormulaNode[] {
    const args: FormulaNode[] = [];
    const first = this.peek();
    if (first.type === 'punct' && first.value === ')') {
      this.advance();
      return args;
    }

    for (;;) {
      args.push(this.expression(0));
      const token = this.advance();
      if (token.type === 'punct' && token.value === ')') return args;
      if (token.type !== 'punct' || token.value !== ',') {
        throw new SheetError(`Expected "," or ")" but found ${describe(token)} at ${token.at}`);
      }
    }
  }
}

function describe(token: Token): string {
  return token.type === 'end' ? 'end of formula' : `"${token.value}"`;
}

/**
 * Parse formula text (without the leading `=`).
 */
export function parseFormula(source: string): FormulaNode {
  return new Parser(tokenize(source)).parse();
}

/**
 * Cell names referenced anywhere in the formula, in first-seen order.
 */
export function references(node: FormulaNode): string[] {
  const seen = new Set<string>();

  function walk(current: FormulaNode) {
    switch (current.type) {
      case 'ref':
        seen.add(current.name);
        break;
      case 'unary':
        walk(current.operand);
        break;
      case 'binary':
        walk(current.left);
        walk(current.right);
        break;
      case 'call':
        current.args.forEach(walk);
        break;
      default:
        break;
    }
  }

  walk(node);
  return Array.from(seen);
}
