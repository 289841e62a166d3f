import type { ExecutionSummary } from '../execution/execution.types';
import type { ParameterName } from '../shared/types/graph.types';

export enum GraphErrorCode {
  DuplicateNode = 'DUPLICATE_NODE',
  NodeNotFound = 'NODE_NOT_FOUND',
  UnknownKind = 'UNKNOWN_KIND',
  MissingParameter = 'MISSING_PARAMETER',
  InvalidInput = 'INVALID_INPUT',
  Cycle = 'CYCLE',
  Consistency = 'CONSISTENCY',
  Execution = 'EXECUTION_ERROR',
  Fatal = 'FATAL',
}

export interface GraphErrorDetails {
  code: GraphErrorCode;
  message: string;
  nodeId?: string;
  cause?: unknown;
}

export class GraphError extends Error {
  code: GraphErrorCode;
  nodeId?: string | undefined;
  cause?: unknown;
  constructor(details: GraphErrorDetails) {
    super(details.message);
    this.name = 'GraphError';
    this.code = details.code;
    this.nodeId = details.nodeId;
    this.cause = details.cause;
  }
}

export class DuplicateNodeError extends GraphError {
  constructor(nodeId: string) {
    super({ code: GraphErrorCode.DuplicateNode, message: `Node with id ${nodeId} already exists`, nodeId });
    this.name = 'DuplicateNodeError';
  }
}

export class NodeNotFoundError extends GraphError {
  readonly missing: string[];
  constructor(missing: string[], context?: string) {
    const list = missing.join(', ');
    super({
      code: GraphErrorCode.NodeNotFound,
      message: context ? `${context}: node not found (${list})` : `Node not found: ${list}`,
      nodeId: missing[0],
    });
    this.name = 'NodeNotFoundError';
    this.missing = missing;
  }
}

export class UnknownKindError extends GraphError {
  readonly kind: string;
  readonly known: string[];
  constructor(kind: string, known: string[], nodeId?: string) {
    super({
      code: GraphErrorCode.UnknownKind,
      message: `Unsupported operation kind "${kind}"${nodeId ? ` for node ${nodeId}` : ''} (known: ${known.join(', ')})`,
      nodeId,
    });
    this.name = 'UnknownKindError';
    this.kind = kind;
    this.known = known;
  }
}

export class MissingParameterError extends GraphError {
  readonly kind: string;
  readonly missing: ParameterName[];
  readonly required: ParameterName[];
  readonly supplied: ParameterName[];
  constructor(
    args: { kind: string; missing: ParameterName[]; required: ParameterName[]; supplied: ParameterName[] },
    nodeId?: string,
  ) {
    super({
      code: GraphErrorCode.MissingParameter,
      message: `Missing required parameters for ${args.kind}${nodeId ? ` node ${nodeId}` : ''}: ${args.missing.join(', ')} (required: ${args.required.join(', ')}; supplied: ${args.supplied.join(', ') || 'none'})`,
      nodeId,
    });
    this.name = 'MissingParameterError';
    this.kind = args.kind;
    this.missing = args.missing;
    this.required = args.required;
    this.supplied = args.supplied;
  }
}

export class InvalidInputError extends GraphError {
  readonly field: string;
  readonly reason: string;
  constructor(field: string, reason: string, nodeId?: string) {
    super({ code: GraphErrorCode.InvalidInput, message: `Invalid ${field}: ${reason}`, nodeId });
    this.name = 'InvalidInputError';
    this.field = field;
    this.reason = reason;
  }
}

export class CycleError extends GraphError {
  readonly source: string;
  readonly target: string;
  // Existing path target -> ... -> source that the new edge would close.
  readonly path: string[];
  constructor(source: string, target: string, path: string[]) {
    super({
      code: GraphErrorCode.Cycle,
      message: `Adding edge ${source} -> ${target} would create a cycle: ${[...path, target].join(' -> ')}`,
    });
    this.name = 'CycleError';
    this.source = source;
    this.target = target;
    this.path = path;
  }
}

export class ConsistencyError extends GraphError {
  readonly unplaced: string[];
  constructor(unplaced: string[]) {
    super({
      code: GraphErrorCode.Consistency,
      message: `Graph snapshot is not acyclic; unresolved nodes: ${unplaced.join(', ')}`,
    });
    this.name = 'ConsistencyError';
    this.unplaced = unplaced;
  }
}

export class ExecutionError extends GraphError {
  readonly attempt: number;
  constructor(nodeId: string, attempt: number, cause: unknown) {
    super({
      code: GraphErrorCode.Execution,
      message: `Node ${nodeId} failed on attempt ${attempt}: ${describeError(cause)}`,
      nodeId,
      cause,
    });
    this.name = 'ExecutionError';
    this.attempt = attempt;
  }
}

export class FatalError extends GraphError {
  readonly attempts: number;
  readonly summary: ExecutionSummary;
  constructor(nodeId: string, attempts: number, cause: unknown, summary: ExecutionSummary) {
    super({
      code: GraphErrorCode.Fatal,
      message: `Execution aborted: node ${nodeId} failed after ${attempts} attempt(s): ${describeError(cause)}`,
      nodeId,
      cause,
    });
    this.name = 'FatalError';
    this.attempts = attempts;
    this.summary = summary;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof ExecutionError) return describeError(err.cause);
  if (err instanceof Error) return err.message;
  return String(err);
}
