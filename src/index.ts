/**
 * tracegraph - a lazy, incrementally recomputed dependency graph of attributes
 *
 * @packageDocumentation
 */

export type {
  AttributeHandle,
  AttributeId,
  AttributeKind,
  AttributeState,
  ChangeEvent,
  ChangeListener,
  CycleReport,
  DerivedHandle,
  DerivedOptions,
  EngineOptions,
  NodeSnapshot,
  ReadContext,
  SourceHandle,
  SourceOptions,
} from './core/types.js';
export {
  TracegraphError,
  InvalidOperationError,
  CyclicDependencyError,
  ComputeFailedError,
  SheetError,
  type ErrorCode,
} from './core/errors.js';
export { silentLogger, type Logger } from './core/logger.js';
export { Engine } from './graph/engine.js';
export { Graph } from './graph/graph.js';
export { DependencyTracker } from './graph/tracker.js';
export { propagateFrom } from './graph/propagate.js';
export { Sheet } from './sheet/sheet.js';
export { FormulaError, type CellValue } from './sheet/formula.js';
export { parseFormula, type FormulaNode } from './sheet/parser.js';
export { SheetDocumentSchema, type SheetDocument } from './sheet/schema.js';
export {
  loadSheet,
  loadSheetFile,
  parseSheetDocument,
  saveSheetFile,
} from './storage/files.js';
