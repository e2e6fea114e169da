/**
 * Read path: cache hits, verification, recomputation and cycle detection.
 *
 * A stale derived attribute that already holds a value is first verified:
 * its recorded dependencies are brought up to date in the order they were
 * read, and if none of their versions moved the cached value is kept. Only
 * when verification finds a changed dependency does the compute function run.
 */

import {
  ComputeFailedError,
  CyclicDependencyError,
  TracegraphError,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type {
  AnyAttribute,
  Attribute,
  AttributeHandle,
  AttributeId,
  CycleReport,
  DerivedAttribute,
  ReadContext,
} from '../core/types.js';
import type { Graph } from './graph.js';
import type { DependencyTracker } from './tracker.js';

export interface EvaluatorOptions {
  cycleReport: CycleReport;
  logger: Logger;
  /** Called after a recomputation assigns a different value. */
  onChange: (node: AnyAttribute) => void;
  /** Maps a handle read by a compute function to this graph's node. */
  resolve<T>(handle: AttributeHandle<T>): Attribute<T>;
}

export class Evaluator {
  constructor(
    private readonly graph: Graph,
    private readonly options: EvaluatorOptions
  ) {}

  /**
   * Bring `node` up to date and record the read in the enclosing frame.
   */
  read<T>(node: Attribute<T>, tracker: DependencyTracker): T {
    const value = this.refresh(node, tracker);
    tracker.record(node.id);
    return value;
  }

  private refresh<T>(node: Attribute<T>, tracker: DependencyTracker): T {
    switch (node.kind) {
      case 'source':
        return node.value;
      case 'derived':
        return this.refreshDerived(node, tracker);
    }
  }

  private refreshDerived<T>(node: DerivedAttribute<T>, tracker: DependencyTracker): T {
    if (node.state === 'clean' && node.current) {
      this.debug(tracker, `hit ${node.id} v${node.version}`);
      return node.current.value;
    }

    this.assertAcyclic(node, tracker);
    node.state = 'evaluating';

    try {
      const cached = node.current;
      if (cached && this.verify(node, tracker)) {
        node.state = 'clean';
        this.debug(tracker, `verified ${node.id} v${node.version}`);
        return cached.value;
      }

      this.debug(tracker, `start eval ${node.id}`);
      const { value, dependencies } = tracker.runTracked(node.id, () =>
        this.invoke(node, tracker)
      );
      this.commit(node, value, dependencies);
      this.debug(
        tracker,
        `finish eval ${node.id} v${node.version}, dep(s): ${dependencies.length}`
      );
      return value;
    } catch (error) {
      node.state = 'stale';
      throw error;
    }
  }

  /**
   * True when every dependency observed last time still has the same version.
   * Stops at the first dependency that moved; later ones may no longer be
   * read by the compute function.
   */
  private verify<T>(node: DerivedAttribute<T>, tracker: DependencyTracker): boolean {
    const observed = node.observed;
    if (!observed) return false;

    const { value } = tracker.runTracked(node.id, () => {
      for (const [id, version] of observed) {
        const dependency: AnyAttribute = this.graph.require(id);
        this.refresh(dependency, tracker);
        if (dependency.version !== version) {
          this.debug(tracker, `${node.id}: ${id} moved v${version} -> v${dependency.version}`);
          return false;
        }
      }
      return true;
    });
    return value;
  }

  private invoke<T>(node: DerivedAttribute<T>, tracker: DependencyTracker): T {
    const ctx: ReadContext = {
      attributeId: node.id,
      get: <U>(handle: AttributeHandle<U>): U =>
        this.read(this.options.resolve(handle), tracker),
    };

    node.computeCount += 1;
    try {
      return node.compute(ctx);
    } catch (error) {
      if (error instanceof TracegraphError) throw error;
      throw new ComputeFailedError(node.id, error);
    }
  }

  private commit<T>(node: DerivedAttribute<T>, value: T, dependencies: AttributeId[]): void {
    this.graph.setDependencies(node.id, dependencies);
    node.observed = new Map(
      dependencies.map((id) => [id, this.graph.require(id).version])
    );

    const previous = node.current;
    const changed = previous === undefined || !node.equals(previous.value, value);
    node.current = { value };
    if (changed || !node.cutoff) node.version += 1;
    node.state = 'clean';

    if (changed) this.options.onChange(node);
  }

  private assertAcyclic<T>(node: DerivedAttribute<T>, tracker: DependencyTracker): void {
    const index = tracker.indexOf(node.id);
    if (index === -1) return;

    const cycle =
      this.options.cycleReport === 'full' ? tracker.path().slice(index) : [node.id];
    this.options.logger.warn(`cycle detected at ${node.id}`);
    throw new CyclicDependencyError(cycle);
  }

  private debug(tracker: DependencyTracker, message: string): void {
    this.options.logger.debug(`${'  '.repeat(tracker.depth)}${message}`);
  }
}
