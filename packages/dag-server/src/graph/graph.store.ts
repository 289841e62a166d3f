import type { OperationRegistry } from '../graph-core/operationRegistry';
import type { GraphEdge, GraphNode, GraphView, ParamList } from '../shared/types/graph.types';
import { CycleError, DuplicateNodeError, InvalidInputError, NodeNotFoundError } from './errors';
import { toInternalParameters } from './parameters';

type Adjacency = Map<string, Set<string>>;

class AdjacencyGraph implements GraphView {
  protected readonly nodeMap = new Map<string, GraphNode>();
  protected readonly outbound: Adjacency = new Map();
  protected readonly inbound: Adjacency = new Map();
  protected currentVersion = 0;

  get version(): number {
    return this.currentVersion;
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.outbound.values()) count += targets.size;
    return count;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  hasEdge(source: string, target: string): boolean {
    return this.outbound.get(source)?.has(target) ?? false;
  }

  nodeIds(): string[] {
    return Array.from(this.nodeMap.keys());
  }

  nodes(): GraphNode[] {
    return Array.from(this.nodeMap.values());
  }

  // Grouped by source in node insertion order, targets in edge insertion order.
  edges(): GraphEdge[] {
    const out: GraphEdge[] = [];
    for (const [source, targets] of this.outbound) {
      for (const target of targets) out.push({ source, target });
    }
    return out;
  }

  successors(id: string): string[] {
    return Array.from(this.adjacent(this.outbound, id));
  }

  predecessors(id: string): string[] {
    return Array.from(this.adjacent(this.inbound, id));
  }

  inDegree(id: string): number {
    return this.adjacent(this.inbound, id).size;
  }

  outDegree(id: string): number {
    return this.adjacent(this.outbound, id).size;
  }

  private adjacent(map: Adjacency, id: string): Set<string> {
    const set = map.get(id);
    if (!set) throw new NodeNotFoundError([id]);
    return set;
  }

  protected insertNode(node: GraphNode): void {
    this.nodeMap.set(node.id, node);
    this.outbound.set(node.id, new Set());
    this.inbound.set(node.id, new Set());
  }

  protected insertEdge(source: string, target: string): void {
    this.outbound.get(source)?.add(target);
    this.inbound.get(target)?.add(source);
  }
}

/** Immutable copy of a store taken between mutations. */
export class GraphSnapshot extends AdjacencyGraph {
  constructor(version: number, nodes: ReadonlyArray<GraphNode>, edges: ReadonlyArray<GraphEdge>) {
    super();
    this.currentVersion = version;
    for (const node of nodes) this.insertNode(node);
    for (const edge of edges) this.insertEdge(edge.source, edge.target);
    Object.freeze(this);
  }
}

/**
 * Mutable DAG of operation nodes. Every mutation is synchronous and either
 * applies fully or leaves the graph untouched; the edge set is acyclic after
 * every call.
 */
export class GraphStore extends AdjacencyGraph {
  constructor(
    private readonly registry: OperationRegistry,
    baseVersion = 0,
  ) {
    super();
    this.currentVersion = baseVersion;
  }

  addNode(id: string, kind: string, parameters: ParamList): GraphNode {
    if (typeof id !== 'string' || id.length === 0) {
      throw new InvalidInputError('id', 'node id must be a non-empty string');
    }
    if (this.nodeMap.has(id)) throw new DuplicateNodeError(id);
    const { unit } = this.registry.lookup(kind, id);
    const params = toInternalParameters(parameters, id);
    this.registry.validate(unit.kind, params, id);

    const node: GraphNode = Object.freeze({ id, kind: unit.kind, parameters: params });
    this.insertNode(node);
    this.currentVersion++;
    return node;
  }

  /** Removes the node with all incident edges; false when it did not exist. */
  removeNode(id: string): boolean {
    if (!this.nodeMap.has(id)) return false;
    for (const target of this.outbound.get(id) ?? []) this.inbound.get(target)?.delete(id);
    for (const source of this.inbound.get(id) ?? []) this.outbound.get(source)?.delete(id);
    this.outbound.delete(id);
    this.inbound.delete(id);
    this.nodeMap.delete(id);
    this.currentVersion++;
    return true;
  }

  /** Inserts source -> target; false when the edge already existed. */
  addEdge(source: string, target: string): boolean {
    const missing = [source, target].filter((id, i, all) => !this.nodeMap.has(id) && all.indexOf(id) === i);
    if (missing.length > 0) {
      throw new NodeNotFoundError(missing, `Cannot add edge ${source} -> ${target}`);
    }
    if (this.hasEdge(source, target)) return false;

    // The new edge closes a cycle iff source is already reachable from target.
    const path = this.findPath(target, source);
    if (path) throw new CycleError(source, target, path);

    this.insertEdge(source, target);
    this.currentVersion++;
    return true;
  }

  removeEdge(source: string, target: string): boolean {
    if (!this.hasEdge(source, target)) return false;
    this.outbound.get(source)?.delete(target);
    this.inbound.get(target)?.delete(source);
    this.currentVersion++;
    return true;
  }

  snapshot(): GraphSnapshot {
    return new GraphSnapshot(this.currentVersion, this.nodes(), this.edges());
  }

  // Iterative DFS over current edges; returns from -> ... -> to when reachable.
  private findPath(from: string, to: string): string[] | null {
    const parent = new Map<string, string | null>([[from, null]]);
    const stack = [from];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === to) {
        const path: string[] = [];
        for (let at: string | null | undefined = current; at != null; at = parent.get(at)) path.push(at);
        return path.reverse();
      }
      for (const next of this.outbound.get(current) ?? []) {
        if (parent.has(next)) continue;
        parent.set(next, current);
        stack.push(next);
      }
    }
    return null;
  }
}
