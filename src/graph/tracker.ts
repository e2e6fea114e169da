/**
 * Dependency tracing.
 *
 * One tracker lives for the duration of a top-level read. Each derived
 * attribute under evaluation owns a frame; reads land in the innermost frame
 * only, so an outer attribute records the inner attribute and never its
 * sub-dependencies. The frame stack doubles as the evaluation stack used for
 * cycle detection.
 */

import type { AttributeId } from '../core/types.js';

interface TrackingFrame {
  readonly attributeId: AttributeId;
  readonly reads: Set<AttributeId>;
}

export interface TrackedResult<T> {
  value: T;
  dependencies: AttributeId[];
}

export class DependencyTracker {
  private readonly frames: TrackingFrame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Run `fn` inside a new frame for `attributeId` and return what it read,
   * in first-read order.
   */
  runTracked<T>(attributeId: AttributeId, fn: () => T): TrackedResult<T> {
    const frame: TrackingFrame = { attributeId, reads: new Set() };
    this.frames.push(frame);
    try {
      const value = fn();
      return { value, dependencies: Array.from(frame.reads) };
    } finally {
      this.frames.pop();
    }
  }

  /**
   * Note a read in the innermost frame. Reads outside any frame are untracked.
   */
  record(id: AttributeId): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.reads.add(id);
  }

  /**
   * Position of `id` on the evaluation stack, or -1.
   */
  indexOf(id: AttributeId): number {
    return this.frames.findIndex((frame) => frame.attributeId === id);
  }

  /** Ids on the evaluation stack, outermost first. */
  path(): AttributeId[] {
    return this.frames.map((frame) => frame.attributeId);
  }

  current(): AttributeId | undefined {
    return this.frames[this.frames.length - 1]?.attributeId;
  }
}
