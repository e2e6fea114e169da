/**
 * File-based storage for sheet documents.
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { parse, stringify } from 'yaml';
import type { ZodIssue } from 'zod';
import { SheetError } from '../core/errors.js';
import type { EngineOptions } from '../core/types.js';
import { SheetDocumentSchema, type SheetDocument } from '../sheet/schema.js';
import { Sheet } from '../sheet/sheet.js';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Parse and validate YAML sheet text.
 */
export function parseSheetDocument(content: string): SheetDocument {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SheetError(`Invalid YAML: ${reason}`);
  }

  const result = SheetDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new SheetError(
      `Invalid sheet: ${result.error.issues.map(formatIssue).join('; ')}`
    );
  }
  return result.data;
}

/**
 * Build a sheet from YAML text.
 */
export function loadSheet(content: string, options: EngineOptions = {}): Sheet {
  return new Sheet(parseSheetDocument(content), options);
}

/**
 * Load a sheet from a YAML file.
 */
export function loadSheetFile(filePath: string, options: EngineOptions = {}): Sheet {
  if (!existsSync(filePath)) {
    throw new SheetError(`Sheet file not found: ${filePath}`);
  }
  return loadSheet(readFileSync(filePath, 'utf-8'), options);
}

/**
 * Save a sheet's sources and formulas to a YAML file.
 */
export function saveSheetFile(filePath: string, sheet: Sheet): void {
  const content = stringify(sheet.toDocument(), { lineWidth: 0 });
  writeFileSync(filePath, content, 'utf-8');
}
