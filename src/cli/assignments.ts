/**
 * Parsing and formatting helpers for the CLI.
 */

import { InvalidArgumentError } from 'commander';
import { SheetError } from '../core/errors.js';
import type { NodeSnapshot } from '../core/types.js';
import type { CellValue } from '../sheet/formula.js';
import { CELL_ID } from '../sheet/parser.js';

export interface Assignment {
  id: string;
  value: CellValue;
}

/**
 * Parse `id=value`, where value is `true`, `false` or a number.
 */
export function parseAssignment(text: string): Assignment {
  const eq = text.indexOf('=');
  if (eq === -1) {
    throw new SheetError(`Invalid assignment "${text}", expected id=value`);
  }

  const id = text.slice(0, eq).trim();
  const raw = text.slice(eq + 1).trim();
  if (!CELL_ID.test(id)) {
    throw new SheetError(`Invalid cell id "${id}"`);
  }

  if (raw === 'true' || raw === 'false') {
    return { id, value: raw === 'true' };
  }

  const value = Number(raw);
  if (raw === '' || Number.isNaN(value)) {
    throw new SheetError(`Invalid value "${raw}" for ${id}, expected a number or boolean`);
  }
  return { id, value };
}

/**
 * commander collector for repeatable `--set` options. Parse failures are
 * reported through commander, which runs collectors outside any action.
 */
export function collectAssignment(text: string, previous: Assignment[]): Assignment[] {
  try {
    return [...previous, parseAssignment(text)];
  } catch (error) {
    if (error instanceof SheetError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

/**
 * One line per node: `id (kind, state, vN) <- dep, dep`.
 */
export function formatSnapshot(nodes: NodeSnapshot[]): string[] {
  return nodes.map((node) => {
    const head = `${node.id} (${node.kind}, ${node.state}, v${node.version})`;
    return node.dependencies.length > 0
      ? `${head} <- ${node.dependencies.join(', ')}`
      : head;
  });
}
