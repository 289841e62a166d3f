// Wire and domain shapes shared by the store, resolver, executor and HTTP layer.

export const OPERATION_KINDS = ['ADD', 'SMA', 'ADX'] as const;
export type OperationKind = (typeof OPERATION_KINDS)[number];

export type ParameterName = 'columns' | 'value';

export type ColumnParam = { column: string };
export type ValueParam = { value: number };
export type ParamEntry = ColumnParam | ValueParam;
export type ParamList = ParamEntry[];

// Canonical internal representation: ordered column references plus an optional scalar.
export interface NodeParameters {
  readonly columns: ReadonlyArray<string>;
  readonly value?: number;
}

export interface GraphNode {
  readonly id: string;
  readonly kind: OperationKind;
  readonly parameters: NodeParameters;
}

export interface GraphEdge {
  readonly source: string;
  readonly target: string;
}

/** Read-only graph queries shared by the live store and its snapshots. */
export interface GraphView {
  readonly version: number;
  readonly nodeCount: number;
  readonly edgeCount: number;
  hasNode(id: string): boolean;
  getNode(id: string): GraphNode | undefined;
  hasEdge(source: string, target: string): boolean;
  nodeIds(): string[];
  nodes(): GraphNode[];
  edges(): GraphEdge[];
  successors(id: string): string[];
  predecessors(id: string): string[];
  inDegree(id: string): number;
  outDegree(id: string): number;
}

export interface GraphDocumentNode {
  id: string;
  type: string;
  parameters: ParamList;
}

export interface GraphDocumentEdge {
  source: string;
  target: string;
}

export interface GraphDocument {
  nodes: GraphDocumentNode[];
  edges: GraphDocumentEdge[];
}

export type Series = ReadonlyArray<number | null>;
export type Dataset = Readonly<Record<string, ReadonlyArray<number>>>;
