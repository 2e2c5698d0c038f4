import { describe, it, expect } from 'vitest';
import { detectCycles, stronglyConnectedComponents } from '../cycles';
import { course, graphOf } from './utils/fixtures';

describe('detectCycles', () => {
  it('should find nothing in an acyclic graph', () => {
    const graph = graphOf([
      ['B', 'A'],
      ['C', 'B'],
      ['C', 'A'],
    ]);

    expect(detectCycles(graph)).toEqual([]);
  });

  it('should report a two-course cycle once', () => {
    const graph = graphOf([
      ['X', 'Y'],
      ['Y', 'X'],
    ]);

    expect(detectCycles(graph)).toEqual([{ courses: ['X', 'Y'] }]);
  });

  it('should rotate a cycle to start at its smallest course', () => {
    const graph = graphOf([
      ['C', 'B'],
      ['B', 'A'],
      ['A', 'C'],
    ]);

    expect(detectCycles(graph)).toEqual([{ courses: ['A', 'C', 'B'] }]);
  });

  it('should report a course that requires itself', () => {
    expect(detectCycles(graphOf([['S', 'S']]))).toEqual([{ courses: ['S'] }]);
  });

  it('should report every cycle through a shared course', () => {
    const graph = graphOf([
      ['A', 'B'],
      ['B', 'A'],
      ['A', 'C'],
      ['C', 'A'],
    ]);

    expect(detectCycles(graph)).toEqual([{ courses: ['A', 'B'] }, { courses: ['A', 'C'] }]);
  });

  it('should stop at the result limit', () => {
    const graph = graphOf([
      ['A', 'B'],
      ['B', 'A'],
      ['A', 'C'],
      ['C', 'A'],
    ]);

    expect(detectCycles(graph, { limit: 1 })).toEqual([{ courses: ['A', 'B'] }]);
  });

  it('should ignore cycles longer than the length bound', () => {
    const graph = graphOf([
      ['A', 'B'],
      ['B', 'C'],
      ['C', 'D'],
      ['D', 'A'],
    ]);

    expect(detectCycles(graph, { maxLength: 3 })).toEqual([]);
    expect(detectCycles(graph, { maxLength: 4 })).toEqual([{ courses: ['A', 'B', 'C', 'D'] }]);
  });

  it('should finish quickly on a dense acyclic catalog', () => {
    // 10 layers of 6 courses, each requiring every course of the next layer
    const pairs: Array<[string, string]> = [];
    for (let layer = 0; layer < 9; layer++) {
      for (let a = 0; a < 6; a++) {
        for (let b = 0; b < 6; b++) {
          pairs.push([`L${layer} C${a}`, `L${layer + 1} C${b}`]);
        }
      }
    }
    const graph = graphOf(pairs);

    const started = performance.now();
    expect(detectCycles(graph)).toEqual([]);
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it('should not walk from a cycle into the courses it requires', () => {
    const graph = graphOf([
      ['X', 'Y'],
      ['Y', 'X'],
      ['Y', 'Z'],
      ['Z', 'W'],
    ]);

    expect(detectCycles(graph)).toEqual([{ courses: ['X', 'Y'] }]);
  });
});

describe('stronglyConnectedComponents', () => {
  it('should group mutually required courses', () => {
    const graph = graphOf([
      ['A', 'B'],
      ['B', 'A'],
      ['B', 'C'],
      ['D', 'D'],
    ]);

    const component = stronglyConnectedComponents(graph);

    expect(component.get(course('A'))).toBe(component.get(course('B')));
    expect(component.get(course('C'))).not.toBe(component.get(course('A')));
    expect(component.get(course('D'))).not.toBe(component.get(course('A')));
    expect(new Set(component.values()).size).toBe(3);
  });
});
