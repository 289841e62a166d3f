import { Inject, Injectable } from '@nestjs/common';

import { LoggerService } from '../core/services/logger.service';
import { OperationRegistry } from '../graph-core/operationRegistry';
import type { GraphDocument, GraphNode, GraphView, ParamList } from '../shared/types/graph.types';
import { describeError } from './errors';
import { exportDocument, parseGraphDocument, replayDocument } from './graph.document';
import { GraphSnapshot, GraphStore } from './graph.store';
import { GraphFileRepository } from './graphFile.repository';

export interface ImportResult {
  version: number;
  nodes: number;
  edges: number;
}

/**
 * Owns the live graph for the process. Structural errors from the store
 * propagate unchanged; every effective mutation is logged.
 */
@Injectable()
export class GraphService {
  private store: GraphStore;

  constructor(
    @Inject(OperationRegistry) private readonly registry: OperationRegistry,
    @Inject(GraphFileRepository) private readonly repository: GraphFileRepository,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {
    this.store = new GraphStore(registry);
  }

  get view(): GraphView {
    return this.store;
  }

  get version(): number {
    return this.store.version;
  }

  addNode(id: string, kind: string, parameters: ParamList): GraphNode {
    const node = this.store.addNode(id, kind, parameters);
    this.logger.info('Node added', { nodeId: id, kind: node.kind, version: this.store.version });
    return node;
  }

  removeNode(id: string): boolean {
    const removed = this.store.removeNode(id);
    if (removed) {
      this.logger.info('Node removed', { nodeId: id, version: this.store.version });
    }
    return removed;
  }

  addEdge(source: string, target: string): boolean {
    const added = this.store.addEdge(source, target);
    if (added) {
      this.logger.info('Edge added', { source, target, version: this.store.version });
    }
    return added;
  }

  removeEdge(source: string, target: string): boolean {
    const removed = this.store.removeEdge(source, target);
    if (removed) {
      this.logger.info('Edge removed', { source, target, version: this.store.version });
    }
    return removed;
  }

  snapshot(): GraphSnapshot {
    return this.store.snapshot();
  }

  exportGraph(): GraphDocument {
    return exportDocument(this.store);
  }

  /**
   * Replays the document into a fresh store and swaps it in only when every
   * node and edge applied; the live graph is untouched on failure.
   */
  importGraph(raw: unknown): ImportResult {
    const doc = parseGraphDocument(raw);
    const next = new GraphStore(this.registry, this.store.version + 1);
    try {
      replayDocument(next, doc);
    } catch (err) {
      this.logger.warn('Graph import rejected', { error: describeError(err) });
      throw err;
    }
    this.store = next;
    const result = { version: next.version, nodes: next.nodeCount, edges: next.edgeCount };
    this.logger.info('Graph replaced', result);
    return result;
  }

  async save(): Promise<{ path: string; nodes: number; edges: number }> {
    const doc = this.exportGraph();
    const path = await this.repository.write(doc);
    this.logger.info('Graph saved', { path, nodes: doc.nodes.length, edges: doc.edges.length });
    return { path, nodes: doc.nodes.length, edges: doc.edges.length };
  }

  async load(): Promise<{ applied: boolean } & Partial<ImportResult>> {
    const raw = await this.repository.read();
    if (raw === null) {
      this.logger.info('No persisted graph found', { path: this.repository.filePath });
      return { applied: false };
    }
    const result = this.importGraph(raw);
    return { applied: true, ...result };
  }
}
