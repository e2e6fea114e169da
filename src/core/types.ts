/**
 * Core type definitions for attributes, handles and engine options.
 */

import type { Logger } from './logger.js';

/**
 * Stable identity of an attribute within one graph.
 */
export type AttributeId = string;

/**
 * Sources are set by the caller; derived attributes are computed.
 */
export type AttributeKind = 'source' | 'derived';

/**
 * Per-attribute evaluation state.
 *
 * Sources are always `clean`. Derived attributes start `stale`, move to
 * `evaluating` while their compute function runs and settle on `clean` once a
 * value has been committed.
 */
export type AttributeState = 'clean' | 'stale' | 'evaluating';

/**
 * How much of a detected cycle is reported in `CyclicDependencyError.cycle`.
 */
export type CycleReport = 'full' | 'entry';

/**
 * Read access handed to a compute function. Every `get` is recorded as a
 * dependency of the attribute being computed.
 */
export interface ReadContext {
  readonly attributeId: AttributeId;
  get<T>(handle: AttributeHandle<T>): T;
}

/**
 * Value change notification.
 */
export interface ChangeEvent<T> {
  readonly id: AttributeId;
  readonly value: T;
  readonly previous: T | undefined;
}

export type ChangeListener<T> = (event: ChangeEvent<T>) => void;

interface AttributeBase<T> {
  readonly id: AttributeId;
  version: number;
  watchers: Set<() => void>;
  /** Copies of this attribute inherited by forked engines, keyed by engine. */
  layers: WeakMap<object, Attribute<T>>;
  equals(a: T, b: T): boolean;
}

/**
 * A leaf attribute whose value is assigned directly.
 */
export interface SourceAttribute<T> extends AttributeBase<T> {
  readonly kind: 'source';
  state: 'clean';
  value: T;
  compareOnWrite: boolean;
}

/**
 * An attribute computed from other attributes.
 *
 * `observed` holds the version of each dependency as read during the last
 * successful computation, in read order. It is `undefined` until the first
 * computation, and after a forced invalidation.
 */
export interface DerivedAttribute<T> extends AttributeBase<T> {
  readonly kind: 'derived';
  state: AttributeState;
  current: { readonly value: T } | undefined;
  observed: Map<AttributeId, number> | undefined;
  cutoff: boolean;
  computeCount: number;
  compute(ctx: ReadContext): T;
}

export type Attribute<T> = SourceAttribute<T> | DerivedAttribute<T>;

export type AnyAttribute = Attribute<unknown>;

export interface SourceHandle<T> {
  readonly kind: 'source';
  readonly id: AttributeId;
  /** @internal */
  readonly node: SourceAttribute<T>;
}

export interface DerivedHandle<T> {
  readonly kind: 'derived';
  readonly id: AttributeId;
  /** @internal */
  readonly node: DerivedAttribute<T>;
}

/**
 * Opaque reference returned by `Engine.createSource` / `Engine.createDerived`.
 */
export type AttributeHandle<T> = SourceHandle<T> | DerivedHandle<T>;

export interface SourceOptions<T> {
  /** Writing a value equal to the current one is a no-op. */
  compareOnWrite?: boolean;
  equals?: (a: T, b: T) => boolean;
}

export interface DerivedOptions<T> {
  /** A recomputation that yields an equal value keeps the version. */
  cutoff?: boolean;
  equals?: (a: T, b: T) => boolean;
}

export interface EngineOptions {
  /** Default for `SourceOptions.compareOnWrite`. */
  compareOnWrite?: boolean;
  cycleReport?: CycleReport;
  logger?: Logger;
}

/**
 * Diagnostic view of one node.
 */
export interface NodeSnapshot {
  id: AttributeId;
  kind: AttributeKind;
  state: AttributeState;
  version: number;
  dependencies: AttributeId[];
}
