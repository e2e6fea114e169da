/**
 * Sheet - declares engine attributes from a sheet document.
 *
 * Plain values become sources; `=` formulas become derived attributes whose
 * compute function evaluates the formula, reading referenced cells through
 * the engine.
 */

import { SheetError } from '../core/errors.js';
import type { AttributeHandle, EngineOptions } from '../core/types.js';
import { Engine } from '../graph/engine.js';
import { checkCalls, evaluate, type CellValue } from './formula.js';
import { parseFormula, references, type FormulaNode } from './parser.js';
import type { SheetDocument } from './schema.js';

interface FormulaCell {
  source: string;
  ast: FormulaNode;
}

export class Sheet {
  readonly engine: Engine;
  readonly name: string | undefined;
  private readonly cells = new Map<string, AttributeHandle<CellValue>>();
  private readonly formulas = new Map<string, FormulaCell>();

  constructor(document: SheetDocument, options: EngineOptions = {}) {
    this.engine = new Engine(options);
    this.name = document.name;

    const entries = Object.entries(document.cells);
    for (const [id, cell] of entries) {
      if (typeof cell !== 'string') continue;
      const source = cell.slice(1).trim();
      let ast: FormulaNode;
      try {
        ast = parseFormula(source);
        checkCalls(ast);
      } catch (error) {
        if (error instanceof SheetError) {
          throw new SheetError(`Cell "${id}": ${error.message}`);
        }
        throw error;
      }

      for (const ref of references(ast)) {
        if (!Object.hasOwn(document.cells, ref)) {
          throw new SheetError(`Cell "${id}" references unknown cell "${ref}"`);
        }
      }
      this.formulas.set(id, { source, ast });
    }

    for (const [id, cell] of entries) {
      const formula = this.formulas.get(id);
      if (formula) {
        this.cells.set(
          id,
          this.engine.createDerived(id, (ctx) =>
            evaluate(formula.ast, (name) => ctx.get(this.handle(name)))
          )
        );
      } else if (typeof cell !== 'string') {
        this.cells.set(id, this.engine.createSource<CellValue>(id, cell));
      }
    }
  }

  ids(): string[] {
    return Array.from(this.cells.keys());
  }

  has(id: string): boolean {
    return this.cells.has(id);
  }

  isFormula(id: string): boolean {
    return this.formulas.has(id);
  }

  formula(id: string): string | undefined {
    return this.formulas.get(id)?.source;
  }

  handle(id: string): AttributeHandle<CellValue> {
    const handle = this.cells.get(id);
    if (!handle) throw new SheetError(`Unknown cell "${id}"`);
    return handle;
  }

  get(id: string): CellValue {
    return this.engine.read(this.handle(id));
  }

  set(id: string, value: CellValue): void {
    this.engine.write(this.handle(id), value);
  }

  /**
   * Current source values and formula text, in declaration order. Formula
   * cells are not evaluated.
   */
  toDocument(): SheetDocument {
    const cells: SheetDocument['cells'] = {};
    for (const id of this.cells.keys()) {
      const formula = this.formulas.get(id);
      cells[id] = formula ? `= ${formula.source}` : this.get(id);
    }
    return this.name === undefined ? { cells } : { name: this.name, cells };
  }
}
