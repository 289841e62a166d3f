import { describe, it, expect } from 'vitest';

import {
  CycleError,
  DuplicateNodeError,
  InvalidInputError,
  MissingParameterError,
  NodeNotFoundError,
  UnknownKindError,
} from '../src/graph/errors';
import { GraphStore } from '../src/graph/graph.store';
import { buildStore, defaultRegistry, params } from './helpers/graph';

const state = (store: GraphStore) => ({
  nodes: store.nodeIds(),
  edges: store.edges(),
  version: store.version,
});

describe('GraphStore', () => {
  it('adds nodes with canonical frozen parameters and bumps the version', () => {
    const store = new GraphStore(defaultRegistry());
    const node = store.addNode('C', 'ADD', [{ column: 'x' }, { value: 5 }]);
    expect(node).toEqual({ id: 'C', kind: 'ADD', parameters: { columns: ['x'], value: 5 } });
    expect(Object.isFrozen(node)).toBe(true);
    expect(store.version).toBe(1);
    expect(store.getNode('C')).toBe(node);
  });

  it('rejects an empty id', () => {
    const store = new GraphStore(defaultRegistry());
    expect(() => store.addNode('', 'ADD', params())).toThrow(InvalidInputError);
    expect(store.nodeCount).toBe(0);
  });

  it('rejects a duplicate id and keeps the first node', () => {
    const store = buildStore(['a']);
    expect(() => store.addNode('a', 'SMA', params())).toThrow(DuplicateNodeError);
    expect(store.getNode('a')?.kind).toBe('ADD');
    expect(store.version).toBe(1);
  });

  it('does not add a node of an unregistered kind', () => {
    const store = new GraphStore(defaultRegistry());
    expect(() => store.addNode('x', 'MUL', params())).toThrow(UnknownKindError);
    expect(store.hasNode('x')).toBe(false);
    expect(store.version).toBe(0);
  });

  it('lists exactly the missing parameter names in registry order', () => {
    const store = new GraphStore(defaultRegistry());
    try {
      store.addNode('s', 'SMA', [{ column: 'close' }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingParameterError);
      if (!(err instanceof MissingParameterError)) return;
      expect(err.missing).toEqual(['value']);
      expect(err.nodeId).toBe('s');
    }
    expect(store.hasNode('s')).toBe(false);
  });

  it('answers degree and adjacency queries', () => {
    const store = buildStore(['a', 'b', 'c'], [
      ['a', 'b'],
      ['a', 'c'],
      ['b', 'c'],
    ]);
    expect(store.outDegree('a')).toBe(2);
    expect(store.inDegree('c')).toBe(2);
    expect(store.successors('a')).toEqual(['b', 'c']);
    expect(store.predecessors('c')).toEqual(['a', 'b']);
    expect(store.edgeCount).toBe(3);
    expect(() => store.inDegree('zz')).toThrow(NodeNotFoundError);
  });

  it('names the missing endpoints of an edge', () => {
    const store = buildStore(['a']);
    try {
      store.addEdge('a', 'ghost');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NodeNotFoundError);
      if (!(err instanceof NodeNotFoundError)) return;
      expect(err.missing).toEqual(['ghost']);
      expect(err.message).toBe('Cannot add edge a -> ghost: node not found (ghost)');
    }
    expect(() => store.addEdge('x', 'x')).toThrow('Cannot add edge x -> x: node not found (x)');
  });

  it('treats a repeated edge as a no-op', () => {
    const store = buildStore(['a', 'b'], [['a', 'b']]);
    const before = store.version;
    expect(store.addEdge('a', 'b')).toBe(false);
    expect(store.version).toBe(before);
    expect(store.edgeCount).toBe(1);
  });

  it('rejects a self loop as a cycle', () => {
    const store = buildStore(['a']);
    expect(() => store.addEdge('a', 'a')).toThrow(CycleError);
    expect(store.edgeCount).toBe(0);
  });

  it('leaves nodes and edges untouched when an edge would close a cycle', () => {
    const store = buildStore(['a', 'b', 'c', 'd'], [
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'd'],
    ]);
    const before = state(store);
    try {
      store.addEdge('d', 'a');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CycleError);
      if (!(err instanceof CycleError)) return;
      expect(err.source).toBe('d');
      expect(err.target).toBe('a');
      expect(err.path).toEqual(['a', 'b', 'c', 'd']);
      expect(err.message).toBe('Adding edge d -> a would create a cycle: a -> b -> c -> d -> a');
    }
    expect(state(store)).toEqual(before);
  });

  it('keeps only A->B after a rejected B->A', () => {
    const store = new GraphStore(defaultRegistry());
    store.addNode('A', 'ADD', params('x', 1));
    store.addNode('B', 'SMA', params('A', 2));
    store.addEdge('A', 'B');
    expect(() => store.addEdge('B', 'A')).toThrow(CycleError);
    expect(store.edges()).toEqual([{ source: 'A', target: 'B' }]);
  });

  it('removes a node with its incident edges, idempotently', () => {
    const store = buildStore(['a', 'b', 'c'], [
      ['a', 'b'],
      ['b', 'c'],
    ]);
    expect(store.removeNode('b')).toBe(true);
    expect(store.edges()).toEqual([]);
    expect(store.outDegree('a')).toBe(0);
    expect(store.inDegree('c')).toBe(0);
    const version = store.version;
    expect(store.removeNode('b')).toBe(false);
    expect(store.version).toBe(version);
  });

  it('removes edges idempotently', () => {
    const store = buildStore(['a', 'b'], [['a', 'b']]);
    expect(store.removeEdge('a', 'b')).toBe(true);
    expect(store.removeEdge('a', 'b')).toBe(false);
    expect(store.removeEdge('nope', 'b')).toBe(false);
  });

  it('hands out snapshots that do not follow later mutations', () => {
    const store = buildStore(['a', 'b'], [['a', 'b']]);
    const snap = store.snapshot();
    store.addNode('c', 'ADD', params());
    store.removeEdge('a', 'b');
    expect(snap.nodeIds()).toEqual(['a', 'b']);
    expect(snap.edges()).toEqual([{ source: 'a', target: 'b' }]);
    expect(snap.version).toBe(3);
    expect(Object.isFrozen(snap)).toBe(true);
  });

  it('starts from a base version when given one', () => {
    const store = new GraphStore(defaultRegistry(), 7);
    store.addNode('a', 'ADD', params());
    expect(store.version).toBe(8);
  });
});
