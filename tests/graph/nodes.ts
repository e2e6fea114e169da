/**
 * Hand-built nodes for graph-level tests.
 */

import type {
  AttributeState,
  DerivedAttribute,
  SourceAttribute,
} from '../../src/core/types.js';

export function sourceNode(id: string, value = 0): SourceAttribute<number> {
  return {
    id,
    kind: 'source',
    state: 'clean',
    value,
    version: 1,
    compareOnWrite: false,
    watchers: new Set(),
    layers: new WeakMap(),
    equals: Object.is,
  };
}

export function derivedNode(
  id: string,
  state: AttributeState = 'clean'
): DerivedAttribute<number> {
  return {
    id,
    kind: 'derived',
    state,
    current: { value: 0 },
    observed: undefined,
    version: 1,
    cutoff: false,
    computeCount: 0,
    watchers: new Set(),
    layers: new WeakMap(),
    equals: Object.is,
    compute: () => 0,
  };
}
