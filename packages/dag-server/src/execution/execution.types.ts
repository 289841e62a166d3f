import type { GraphNode } from '../shared/types/graph.types';

export interface PlannedNode extends GraphNode {
  readonly stage: number;
  readonly predecessors: ReadonlyArray<string>;
}

/** Stages in execution order; nodes within a stage are mutually independent. */
export interface StagedPlan {
  readonly version: number;
  readonly stages: ReadonlyArray<ReadonlyArray<string>>;
  readonly nodes: ReadonlyMap<string, PlannedNode>;
}

export type NodeStatus = 'pending' | 'running' | 'succeeded' | 'failed';
export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

export interface SerializedError {
  name: string;
  message: string;
}

export interface NodeOutcome {
  nodeId: string;
  kind: string;
  stage: number;
  status: NodeStatus;
  attempts: number;
  result?: unknown;
  error?: SerializedError;
}

export interface ExecutionSummary {
  runId: string;
  status: RunStatus;
  graphVersion: number;
  stages: string[][];
  nodes: NodeOutcome[];
  startedAt: string;
  finishedAt: string;
  failedNode?: string;
}

export interface NodeTransition {
  runId: string;
  nodeId: string;
  attempt: number;
  from: NodeStatus;
  to: NodeStatus;
  at: number;
  error?: unknown;
}
