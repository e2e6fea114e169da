/**
 * Sheet document schema.
 */

import { z } from 'zod';
import { CELL_ID } from './parser.js';

/**
 * A cell is a source value, or a formula string starting with `=`.
 */
export const CellSchema = z.union([
  z.number(),
  z.boolean(),
  z.string().startsWith('=', { message: 'Formulas must start with "="' }),
]);

export const SheetDocumentSchema = z.object({
  name: z.string().optional(),
  cells: z.record(
    z.string().regex(CELL_ID, { message: 'Invalid cell id' }),
    CellSchema
  ),
});

export type SheetDocument = z.infer<typeof SheetDocumentSchema>;
