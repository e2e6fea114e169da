/**
 * Owning registry of attributes and the edges between them.
 *
 * `dependencyEdges` maps a dependent to what it read on its last computation;
 * `dependentEdges` is the exact reverse index, kept in lock-step so that
 * invalidation walks cost O(fan-out).
 */

import { InvalidOperationError } from '../core/errors.js';
import type {
  AnyAttribute,
  AttributeId,
  AttributeKind,
  NodeSnapshot,
} from '../core/types.js';

export class Graph {
  private readonly nodes = new Map<AttributeId, AnyAttribute>();
  private readonly dependencyEdges = new Map<AttributeId, Set<AttributeId>>();
  private readonly dependentEdges = new Map<AttributeId, Set<AttributeId>>();

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Register a node, or return the one already registered under `id`.
   * `create` runs only when the id is new.
   */
  getOrCreate(
    id: AttributeId,
    kind: AttributeKind,
    create: () => AnyAttribute
  ): AnyAttribute {
    const existing = this.nodes.get(id);
    if (existing) {
      if (existing.kind !== kind) {
        throw new InvalidOperationError(
          `Attribute "${id}" is already declared as ${existing.kind}`
        );
      }
      return existing;
    }

    const node = create();
    if (node.id !== id || node.kind !== kind) {
      throw new InvalidOperationError(
        `Attribute factory for "${id}" produced ${node.kind} "${node.id}"`
      );
    }
    this.nodes.set(id, node);
    return node;
  }

  has(id: AttributeId): boolean {
    return this.nodes.has(id);
  }

  get(id: AttributeId): AnyAttribute | undefined {
    return this.nodes.get(id);
  }

  require(id: AttributeId): AnyAttribute {
    const node = this.nodes.get(id);
    if (!node) {
      throw new InvalidOperationError(`Unknown attribute "${id}"`);
    }
    return node;
  }

  ids(): AttributeId[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Replace the outgoing edges of `dependentId`. Reverse entries for dropped
   * dependencies are removed and entries for new ones added before returning.
   */
  setDependencies(dependentId: AttributeId, dependencyIds: Iterable<AttributeId>): void {
    const dependent = this.require(dependentId);
    const next = new Set(dependencyIds);

    if (dependent.kind === 'source') {
      if (next.size > 0) {
        throw new InvalidOperationError(
          `Source attribute "${dependentId}" cannot have dependencies`
        );
      }
      return;
    }

    for (const id of next) {
      if (id === dependentId) {
        throw new InvalidOperationError(`Attribute "${id}" cannot depend on itself`);
      }
      this.require(id);
    }

    const previous = this.dependencyEdges.get(dependentId) ?? new Set<AttributeId>();

    for (const id of previous) {
      if (!next.has(id)) {
        const reverse = this.dependentEdges.get(id);
        reverse?.delete(dependentId);
        if (reverse && reverse.size === 0) this.dependentEdges.delete(id);
      }
    }

    for (const id of next) {
      if (!previous.has(id)) {
        let reverse = this.dependentEdges.get(id);
        if (!reverse) {
          reverse = new Set();
          this.dependentEdges.set(id, reverse);
        }
        reverse.add(dependentId);
      }
    }

    if (next.size === 0) {
      this.dependencyEdges.delete(dependentId);
    } else {
      this.dependencyEdges.set(dependentId, next);
    }
  }

  dependenciesOf(id: AttributeId): AttributeId[] {
    return Array.from(this.dependencyEdges.get(id) ?? []);
  }

  dependentsOf(id: AttributeId): AttributeId[] {
    return Array.from(this.dependentEdges.get(id) ?? []);
  }

  snapshot(): NodeSnapshot[] {
    return Array.from(this.nodes.values(), (node) => ({
      id: node.id,
      kind: node.kind,
      state: node.state,
      version: node.version,
      dependencies: this.dependenciesOf(node.id),
    }));
  }
}
