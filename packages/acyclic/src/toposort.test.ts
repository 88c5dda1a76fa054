import { describe, it, expect, vi } from 'vitest';
import { toposort, type TopoNode } from './toposort.js';
import { CycleDetectedError, DuplicateNodeError } from './errors.js';

describe('toposort', () => {
  describe('basic functionality', () => {
    it('sorts nodes with simple dependency chain', () => {
      const nodes: TopoNode[] = [
        { id: 'c', after: ['b'] },
        { id: 'b', after: ['a'] },
        { id: 'a', after: [] }
      ];

      const result = toposort(nodes);

      expect(result).toEqual(['a', 'b', 'c']);
    });

    it('sorts nodes with no dependencies by id', () => {
      const nodes: TopoNode[] = [
        { id: 'c', after: [] },
        { id: 'a', after: [] },
        { id: 'b', after: [] }
      ];

      expect(toposort(nodes)).toEqual(['a', 'b', 'c']);
    });

    it('handles empty input', () => {
      const result = toposort([]);
      expect(result).toEqual([]);
    });

    it('handles single node', () => {
      const nodes: TopoNode[] = [{ id: 'a', after: [] }];
      const result = toposort(nodes);
      expect(result).toEqual(['a']);
    });
  });

  describe('complex dependencies', () => {
    it('sorts nodes with multiple dependencies', () => {
      const nodes: TopoNode[] = [
        { id: 'd', after: ['b', 'c'] },
        { id: 'c', after: ['a'] },
        { id: 'b', after: ['a'] },
        { id: 'a', after: [] }
      ];

      expect(toposort(nodes)).toEqual(['a', 'b', 'c', 'd']);
    });

    it('handles partial ordering with independent branches', () => {
      const nodes: TopoNode[] = [
        { id: 'y', after: ['x'] },
        { id: 'x', after: [] },
        { id: 'b', after: ['a'] },
        { id: 'a', after: [] }
      ];

      expect(toposort(nodes)).toEqual(['a', 'b', 'x', 'y']);
    });
  });

  describe('cycle detection', () => {
    it('detects simple cycle', () => {
      const nodes: TopoNode[] = [
        { id: 'a', after: ['b'] },
        { id: 'b', after: ['a'] }
      ];

      expect(() => toposort(nodes)).toThrow(CycleDetectedError);
      expect(() => toposort(nodes)).toThrow('Cycle detected: a -> b -> a');
    });

    it('detects self-dependency', () => {
      const nodes: TopoNode[] = [{ id: 'a', after: ['a'] }];

      expect(() => toposort(nodes)).toThrow('Cycle detected: a -> a');
    });

    it('exposes the cycle path on the error', () => {
      const nodes: TopoNode[] = [
        { id: 'x', after: ['z'] },
        { id: 'y', after: ['x'] },
        { id: 'z', after: ['y'] }
      ];

      try {
        toposort(nodes);
        expect.unreachable('toposort should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(CycleDetectedError);
        if (error instanceof CycleDetectedError) {
          expect(error.path).toEqual(['x', 'z', 'y', 'x']);
        }
      }
    });
  });

  describe('edge cases', () => {
    it('leaves out dependencies that are not declared as nodes', () => {
      const nodes: TopoNode[] = [
        { id: 'a', after: ['nonexistent'] },
        { id: 'b', after: ['a'] }
      ];

      expect(toposort(nodes)).toEqual(['a', 'b']);
    });

    it('handles duplicate dependencies', () => {
      const nodes: TopoNode[] = [
        { id: 'b', after: ['a', 'a', 'a'] },
        { id: 'a', after: [] }
      ];

      const result = toposort(nodes);

      expect(result).toEqual(['a', 'b']);
    });

    it('rejects duplicate ids', () => {
      const nodes: TopoNode[] = [
        { id: 'a', after: [] },
        { id: 'a', after: [] }
      ];

      expect(() => toposort(nodes)).toThrow(DuplicateNodeError);
    });

    it('handles long dependency chain', () => {
      const nodes: TopoNode[] = Array.from({ length: 10 }, (_, i) => ({
        id: `node${i}`,
        after: i === 0 ? [] : [`node${i - 1}`]
      }));

      const result = toposort(nodes);

      expect(result).toEqual(nodes.map(node => node.id));
    });

    it('passes options to the graph', () => {
      const onTrace = vi.fn();

      toposort([{ id: 'a', after: [] }], { onTrace });

      expect(onTrace).toHaveBeenCalledWith(
        expect.objectContaining({ action: 'addNode', data: { id: 'a', predecessors: [], successors: [] } })
      );
    });
  });

  describe('real-world task scenarios', () => {
    it('handles service dependency ordering', () => {
      const services: TopoNode[] = [
        { id: 'analytics', after: ['auth', 'db'] },
        { id: 'auth', after: [] },
        { id: 'db', after: ['auth'] },
        { id: 'logger', after: [] }
      ];

      expect(toposort(services)).toEqual(['auth', 'db', 'analytics', 'logger']);
    });

    it('handles middleware-style dependency chain', () => {
      const middleware: TopoNode[] = [
        { id: 'final', after: ['validation', 'auth', 'logging'] },
        { id: 'validation', after: ['logging'] },
        { id: 'auth', after: ['logging'] },
        { id: 'logging', after: [] }
      ];

      expect(toposort(middleware)).toEqual(['logging', 'auth', 'validation', 'final']);
    });
  });
});
