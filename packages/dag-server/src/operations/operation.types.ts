import type { Dataset, NodeParameters, OperationKind, ParameterName } from '../shared/types/graph.types';

export interface OperationContext {
  nodeId: string;
  attempt: number;
  // Results of the node's direct predecessors, keyed by node id.
  inputs: ReadonlyMap<string, unknown>;
  dataset: Dataset;
  signal: AbortSignal;
}

/** Executable unit behind an operation kind. */
export interface OperationUnit<TResult = unknown> {
  readonly kind: OperationKind;
  readonly title: string;
  readonly requiredParams: ReadonlyArray<ParameterName>;
  /** Deeper checks than presence; runs inside every attempt and fails that attempt. */
  validate?(params: NodeParameters): void;
  execute(params: NodeParameters, ctx: OperationContext): Promise<TResult> | TResult;
}

export interface OperationEntry {
  unit: OperationUnit;
  requiredParams: ReadonlyArray<ParameterName>;
}

export interface OperationSchema {
  kind: OperationKind;
  title: string;
  requiredParams: ParameterName[];
}

export const OPERATION_UNITS = Symbol('OPERATION_UNITS');

export class OperationInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OperationInputError';
  }
}
