/**
 * Engine - the in-process surface of the evaluator.
 *
 * Owns one graph. Several engines can coexist; nothing is shared between them
 * except along a fork. A forked engine reads through to its parent: the first
 * time it resolves one of the parent's handles it takes a copy of the
 * attribute. Inherited sources follow the parent's value until the fork writes
 * them, inherited derived attributes are recomputed against the fork's own
 * values, and nothing written in a fork ever reaches the parent.
 */

import { InvalidOperationError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type {
  AnyAttribute,
  Attribute,
  AttributeHandle,
  AttributeId,
  AttributeState,
  ChangeListener,
  CycleReport,
  DerivedAttribute,
  DerivedHandle,
  DerivedOptions,
  EngineOptions,
  NodeSnapshot,
  ReadContext,
  SourceAttribute,
  SourceHandle,
  SourceOptions,
} from '../core/types.js';
import { Evaluator } from './evaluator.js';
import { Graph } from './graph.js';
import { propagateFrom } from './propagate.js';
import { DependencyTracker } from './tracker.js';

export class Engine {
  private readonly graph = new Graph();
  private readonly evaluator: Evaluator;
  private readonly logger: Logger;
  private readonly compareOnWrite: boolean;
  private readonly cycleReport: CycleReport;
  private readonly handles = new Map<AttributeId, AttributeHandle<unknown>>();

  private parent: Engine | undefined;
  private readonly forks = new Set<Engine>();
  /** Inherited sources this engine has written. */
  private readonly overridden = new Set<AttributeId>();

  /** Tracker of the read in progress, joined by nested `read` calls. */
  private active: DependencyTracker | undefined;
  /** Watchers of attributes recomputed during the read in progress. */
  private pending: (() => void)[] = [];

  constructor(options: EngineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.compareOnWrite = options.compareOnWrite ?? false;
    this.cycleReport = options.cycleReport ?? 'full';
    this.evaluator = new Evaluator(this.graph, {
      cycleReport: this.cycleReport,
      logger: this.logger,
      onChange: (node) => {
        this.pending.push(...node.watchers);
      },
      resolve: <T>(handle: AttributeHandle<T>) => this.resolve(handle),
    });
  }

  get size(): number {
    return this.graph.size;
  }

  createSource<T>(
    id: AttributeId,
    initialValue: T,
    options: SourceOptions<T> = {}
  ): SourceHandle<T> {
    const node: SourceAttribute<T> = {
      id,
      kind: 'source',
      state: 'clean',
      value: initialValue,
      version: 1,
      compareOnWrite: options.compareOnWrite ?? this.compareOnWrite,
      watchers: new Set(),
      layers: new WeakMap(),
      equals: options.equals ?? Object.is,
    };
    this.declare(node);

    const handle: SourceHandle<T> = { kind: 'source', id, node };
    this.handles.set(id, handle);
    this.logger.debug(`declared source ${id}`);
    return handle;
  }

  createDerived<T>(
    id: AttributeId,
    compute: (ctx: ReadContext) => T,
    options: DerivedOptions<T> = {}
  ): DerivedHandle<T> {
    const node: DerivedAttribute<T> = {
      id,
      kind: 'derived',
      state: 'stale',
      current: undefined,
      observed: undefined,
      version: 0,
      cutoff: options.cutoff ?? false,
      computeCount: 0,
      watchers: new Set(),
      layers: new WeakMap(),
      equals: options.equals ?? Object.is,
      compute,
    };
    this.declare(node);

    const handle: DerivedHandle<T> = { kind: 'derived', id, node };
    this.handles.set(id, handle);
    this.logger.debug(`declared derived ${id}`);
    return handle;
  }

  /**
   * Handle of a declared attribute, by id. A fork also finds its ancestors'.
   */
  lookup(id: AttributeId): AttributeHandle<unknown> | undefined {
    return this.handles.get(id) ?? this.parent?.lookup(id);
  }

  /**
   * Child engine layered over this one. Options default to this engine's.
   */
  fork(options: EngineOptions = {}): Engine {
    const child = new Engine({
      compareOnWrite: this.compareOnWrite,
      cycleReport: this.cycleReport,
      logger: this.logger,
      ...options,
    });
    child.parent = this;
    this.forks.add(child);
    this.logger.info(`forked engine, ${this.forks.size} fork(s)`);
    return child;
  }

  /**
   * Stop following the parent. Values inherited so far are kept.
   */
  detach(): void {
    if (!this.parent) return;
    this.parent.forks.delete(this);
    this.parent = undefined;
    this.logger.info('detached fork');
  }

  /**
   * Current value of an attribute, recomputing whatever is stale on the way.
   * Change listeners of recomputed attributes are called before it returns;
   * if one throws, the others still run and the failure is rethrown.
   *
   * Called from inside a compute function, the read is recorded against the
   * attribute being computed, the same as `ReadContext.get`.
   */
  read<T>(handle: AttributeHandle<T>): T {
    const node = this.resolve(handle);
    if (this.active) {
      return this.evaluator.read(node, this.active);
    }

    const tracker = new DependencyTracker();
    this.active = tracker;
    let value: T;
    try {
      value = this.evaluator.read(node, tracker);
    } catch (error) {
      this.active = undefined;
      try {
        this.flush();
      } catch (listenerError) {
        this.logger.warn(`change listener failed: ${String(listenerError)}`);
      }
      throw error;
    }
    this.active = undefined;
    this.flush();
    return value;
  }

  /**
   * Assign a source and mark its transitive dependents stale. Nothing is
   * recomputed until it is read. In a fork, writing an inherited source
   * overrides the parent's value until `reset`.
   */
  write<T>(handle: AttributeHandle<T>, value: T): void {
    const node = this.resolve(handle);
    if (node.kind !== 'source') {
      throw new InvalidOperationError(
        `Cannot write derived attribute "${node.id}"`
      );
    }
    this.assertIdle(`write "${node.id}"`);
    if (!this.handles.has(node.id)) this.overridden.add(node.id);

    if (node.compareOnWrite && node.equals(node.value, value)) {
      this.logger.debug(`write ${node.id}: unchanged, skipped`);
      return;
    }

    const changed = !node.equals(node.value, value);
    node.value = value;
    node.version += 1;
    const marked = propagateFrom(this.graph, node.id);
    this.logger.debug(`write ${node.id} v${node.version}, ${marked.length} marked stale`);

    this.forward(node);
    if (changed) deliver(node.watchers);
  }

  /**
   * Drop a fork's override of an inherited source, so it follows the parent
   * again. Does nothing if the source was never written here.
   */
  reset<T>(handle: AttributeHandle<T>): void {
    const node = this.resolve(handle);
    const parent = this.parent;
    if (node.kind !== 'source' || !parent || this.handles.has(node.id)) {
      throw new InvalidOperationError(
        `Attribute "${node.id}" has no inherited value to reset to`
      );
    }
    this.assertIdle(`reset "${node.id}"`);
    if (!this.overridden.delete(node.id)) return;

    this.logger.debug(`reset ${node.id}`);
    this.inherit(parent.resolve(handle));
  }

  /**
   * Treat an attribute as changed without assigning it. A source gets a new
   * version; a derived attribute is forced to recompute on its next read.
   * Either way its dependents are marked stale, here and in forks that
   * inherited it.
   */
  invalidate<T>(handle: AttributeHandle<T>): AttributeId[] {
    const node = this.resolve(handle);
    this.assertIdle(`invalidate "${node.id}"`);

    switch (node.kind) {
      case 'source':
        node.version += 1;
        break;
      case 'derived':
        node.state = 'stale';
        node.observed = undefined;
        break;
    }
    const marked = propagateFrom(this.graph, node.id);
    this.forward(node);
    return marked;
  }

  /**
   * Call `listener` after every assignment that changes the attribute's value,
   * whether by a write or a recomputation. Returns the unsubscribe function.
   */
  subscribe<T>(handle: AttributeHandle<T>, listener: ChangeListener<T>): () => void {
    const node = this.resolve(handle);
    let previous = currentValue(node);

    const watcher = () => {
      const value = currentValue(node);
      if (value === undefined) return;
      listener({ id: node.id, value: value.value, previous: previous?.value });
      previous = value;
    };

    node.watchers.add(watcher);
    return () => {
      node.watchers.delete(watcher);
    };
  }

  stateOf<T>(handle: AttributeHandle<T>): AttributeState {
    return this.resolve(handle).state;
  }

  versionOf<T>(handle: AttributeHandle<T>): number {
    return this.resolve(handle).version;
  }

  /**
   * How many times this engine has run the compute function. Always 0 for
   * sources.
   */
  computeCountOf<T>(handle: AttributeHandle<T>): number {
    const node = this.resolve(handle);
    return node.kind === 'derived' ? node.computeCount : 0;
  }

  /** True when this fork has written the inherited source. */
  isOverridden<T>(handle: AttributeHandle<T>): boolean {
    return this.overridden.has(this.resolve(handle).id);
  }

  dependenciesOf<T>(handle: AttributeHandle<T>): AttributeId[] {
    return this.graph.dependenciesOf(this.resolve(handle).id);
  }

  dependentsOf<T>(handle: AttributeHandle<T>): AttributeId[] {
    return this.graph.dependentsOf(this.resolve(handle).id);
  }

  snapshot(): NodeSnapshot[] {
    return this.graph.snapshot();
  }

  /**
   * Map a handle to this graph's node. A fork copies an ancestor's attribute
   * on first use; any other foreign handle is rejected.
   */
  private resolve<T>(handle: AttributeHandle<T>): Attribute<T> {
    const local = this.graph.get(handle.id);
    if (local === handle.node) return handle.node;

    const inherited = handle.node.layers.get(this);
    if (inherited) return inherited;

    if (!this.parent || local) {
      throw new InvalidOperationError(
        `Attribute "${handle.id}" is not registered on this graph`
      );
    }
    const upstream = this.parent.resolve(handle);
    const node = copyAttribute(upstream);
    this.register(node);
    handle.node.layers.set(this, node);
    this.logger.debug(`inherited ${node.kind} ${node.id}`);
    return node;
  }

  /**
   * Pass a change of `node` on to every fork that inherited it.
   */
  private forward(node: AnyAttribute): void {
    for (const fork of this.forks) fork.inherit(node);
  }

  /**
   * Follow a change of the parent's copy of an attribute. Overridden sources
   * and attributes this engine has not used yet are left alone.
   */
  private inherit(upstream: AnyAttribute): void {
    const node = this.graph.get(upstream.id);
    if (!node || this.handles.has(node.id) || this.overridden.has(node.id)) return;

    let changed = false;
    if (node.kind === 'source' && upstream.kind === 'source') {
      changed = !node.equals(node.value, upstream.value);
      node.value = upstream.value;
      node.version += 1;
    } else if (node.kind === 'derived') {
      node.state = 'stale';
      node.observed = undefined;
    }

    const marked = propagateFrom(this.graph, node.id);
    this.logger.debug(`inherited change of ${node.id}, ${marked.length} marked stale`);
    this.forward(node);
    if (changed) deliver(node.watchers);
  }

  /**
   * Deliver change notifications queued during a read. Listeners run outside
   * any evaluation, so they may read and write freely.
   */
  private flush(): void {
    const watchers = this.pending;
    this.pending = [];
    deliver(watchers);
  }

  private declare(node: AnyAttribute): void {
    if (this.parent?.lookup(node.id)) {
      throw new InvalidOperationError(`Attribute "${node.id}" is already declared`);
    }
    this.register(node);
  }

  private register(node: AnyAttribute): void {
    const registered = this.graph.getOrCreate(node.id, node.kind, () => node);
    if (registered !== node) {
      throw new InvalidOperationError(`Attribute "${node.id}" is already declared`);
    }
  }

  /**
   * A write may reach forks, so none of them may be evaluating either.
   */
  private assertIdle(operation: string): void {
    const active = this.evaluation();
    if (!active) return;
    const evaluating = active.current();
    throw new InvalidOperationError(
      evaluating === undefined
        ? `Cannot ${operation} during evaluation`
        : `Cannot ${operation} while evaluating "${evaluating}"`
    );
  }

  private evaluation(): DependencyTracker | undefined {
    if (this.active) return this.active;
    for (const fork of this.forks) {
      const active = fork.evaluation();
      if (active) return active;
    }
    return undefined;
  }
}

function currentValue<T>(node: Attribute<T>): { value: T } | undefined {
  return node.kind === 'source' ? { value: node.value } : node.current;
}

function copyAttribute<T>(upstream: Attribute<T>): Attribute<T> {
  const base = {
    id: upstream.id,
    watchers: new Set<() => void>(),
    layers: new WeakMap<object, Attribute<T>>(),
    equals: (a: T, b: T) => upstream.equals(a, b),
  };
  if (upstream.kind === 'source') {
    return {
      ...base,
      kind: 'source',
      state: 'clean',
      value: upstream.value,
      version: 1,
      compareOnWrite: upstream.compareOnWrite,
    };
  }
  return {
    ...base,
    kind: 'derived',
    state: 'stale',
    current: undefined,
    observed: undefined,
    version: 0,
    cutoff: upstream.cutoff,
    computeCount: 0,
    compute: (ctx: ReadContext) => upstream.compute(ctx),
  };
}

/**
 * Run every watcher, then rethrow what failed.
 */
function deliver(watchers: Iterable<() => void>): void {
  const failures: unknown[] = [];
  for (const watcher of Array.from(watchers)) {
    try {
      watcher();
    } catch (error) {
      failures.push(error);
    }
  }
  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new AggregateError(failures, `${failures.length} change listeners failed`);
  }
}
