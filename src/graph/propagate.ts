/**
 * Invalidation propagation.
 */

import type { AttributeId } from '../core/types.js';
import type { Graph } from './graph.js';

/**
 * Walk dependents of `startId` breadth-first, marking each derived node stale.
 * A node that is already stale is not descended from: its dependents were
 * marked when it was. Values and versions are left untouched.
 *
 * Returns the ids newly marked stale, in visiting order.
 */
export function propagateFrom(graph: Graph, startId: AttributeId): AttributeId[] {
  const marked: AttributeId[] = [];
  const queue = graph.dependentsOf(startId);

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;

    const node = graph.require(id);
    if (node.kind === 'source' || node.state === 'stale') continue;

    node.state = 'stale';
    marked.push(id);
    queue.push(...graph.dependentsOf(id));
  }

  return marked;
}
