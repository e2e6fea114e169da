/**
 * Tests for dependency tracing frames.
 */

import { describe, it, expect } from 'vitest';
import { DependencyTracker } from '../../src/graph/tracker.js';

describe('DependencyTracker', () => {
  it('should record reads in first-read order without duplicates', () => {
    const tracker = new DependencyTracker();
    const result = tracker.runTracked('d', () => {
      tracker.record('b');
      tracker.record('a');
      tracker.record('b');
      return 42;
    });

    expect(result).toEqual({ value: 42, dependencies: ['b', 'a'] });
  });

  it('should keep inner reads out of the outer frame', () => {
    const tracker = new DependencyTracker();
    const outer = tracker.runTracked('outer', () => {
      tracker.record('x');
      const inner = tracker.runTracked('inner', () => {
        tracker.record('y');
        tracker.record('z');
        return tracker.path();
      });
      tracker.record('inner');
      return inner;
    });

    expect(outer.value).toEqual({ value: ['outer', 'inner'], dependencies: ['y', 'z'] });
    expect(outer.dependencies).toEqual(['x', 'inner']);
  });

  it('should ignore reads outside any frame', () => {
    const tracker = new DependencyTracker();
    tracker.record('x');

    expect(tracker.depth).toBe(0);
    expect(tracker.current()).toBeUndefined();
  });

  it('should pop the frame when the function throws', () => {
    const tracker = new DependencyTracker();

    expect(() =>
      tracker.runTracked('d', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(tracker.depth).toBe(0);
    expect(tracker.indexOf('d')).toBe(-1);
  });

  it('should expose the evaluation stack', () => {
    const tracker = new DependencyTracker();
    tracker.runTracked('a', () =>
      tracker.runTracked('b', () => {
        expect(tracker.depth).toBe(2);
        expect(tracker.indexOf('a')).toBe(0);
        expect(tracker.indexOf('b')).toBe(1);
        expect(tracker.indexOf('c')).toBe(-1);
        expect(tracker.current()).toBe('b');
      })
    );
  });
});
