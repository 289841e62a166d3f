import { z } from 'zod';

import type { GraphDocument, GraphView } from '../shared/types/graph.types';
import { InvalidInputError } from './errors';
import type { GraphStore } from './graph.store';
import { toParamList } from './parameters';

export const ParamEntrySchema = z.union([
  z.object({ column: z.string() }).strict(),
  z.object({ value: z.number() }).strict(),
]);

export const GraphDocumentNodeSchema = z.object({
  id: z.string(),
  type: z.string(),
  parameters: z.array(ParamEntrySchema).default([]),
});

export const GraphDocumentEdgeSchema = z.object({
  source: z.string(),
  target: z.string(),
});

export const GraphDocumentSchema = z.object({
  nodes: z.array(GraphDocumentNodeSchema).default([]),
  edges: z.array(GraphDocumentEdgeSchema).default([]),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

export function parseGraphDocument(raw: unknown): GraphDocument {
  const parsed = GraphDocumentSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidInputError('document', formatIssues(parsed.error));
  return parsed.data;
}

/** Nodes in insertion order, edges grouped by source. */
export function exportDocument(view: GraphView): GraphDocument {
  return {
    nodes: view.nodes().map((node) => ({ id: node.id, type: node.kind, parameters: toParamList(node.parameters) })),
    edges: view.edges().map(({ source, target }) => ({ source, target })),
  };
}

/** Replays every node, then every edge, in document order. Throws on the first failure. */
export function replayDocument(store: GraphStore, doc: GraphDocument): void {
  for (const node of doc.nodes) store.addNode(node.id, node.type, node.parameters);
  for (const edge of doc.edges) store.addEdge(edge.source, edge.target);
}
