import { HttpException, HttpStatus } from '@nestjs/common';
import type { ZodError } from 'zod';

import {
  ConsistencyError,
  CycleError,
  DuplicateNodeError,
  FatalError,
  GraphError,
  GraphErrorCode,
  InvalidInputError,
  MissingParameterError,
  NodeNotFoundError,
  UnknownKindError,
  describeError,
} from '../errors';

const STATUS_BY_CODE: Record<GraphErrorCode, HttpStatus> = {
  [GraphErrorCode.DuplicateNode]: HttpStatus.CONFLICT,
  [GraphErrorCode.NodeNotFound]: HttpStatus.NOT_FOUND,
  [GraphErrorCode.UnknownKind]: HttpStatus.BAD_REQUEST,
  [GraphErrorCode.MissingParameter]: HttpStatus.BAD_REQUEST,
  [GraphErrorCode.InvalidInput]: HttpStatus.BAD_REQUEST,
  [GraphErrorCode.Cycle]: HttpStatus.CONFLICT,
  [GraphErrorCode.Consistency]: HttpStatus.INTERNAL_SERVER_ERROR,
  [GraphErrorCode.Execution]: HttpStatus.INTERNAL_SERVER_ERROR,
  [GraphErrorCode.Fatal]: HttpStatus.INTERNAL_SERVER_ERROR,
};

function details(err: GraphError): Record<string, unknown> {
  if (err instanceof DuplicateNodeError) return { nodeId: err.nodeId };
  if (err instanceof NodeNotFoundError) return { missing: err.missing };
  if (err instanceof UnknownKindError) return { kind: err.kind, known: err.known };
  if (err instanceof MissingParameterError) {
    return { kind: err.kind, missing: err.missing, required: err.required, supplied: err.supplied };
  }
  if (err instanceof InvalidInputError) return { field: err.field, reason: err.reason };
  if (err instanceof CycleError) return { source: err.source, target: err.target, path: err.path };
  if (err instanceof ConsistencyError) return { unplaced: err.unplaced };
  if (err instanceof FatalError) return { nodeId: err.nodeId, attempts: err.attempts, summary: err.summary };
  return err.nodeId ? { nodeId: err.nodeId } : {};
}

/** Body `{ error: <code>, message, ...details }` with the status for the error's code. */
export function toHttpException(err: unknown): HttpException {
  if (err instanceof HttpException) return err;
  if (err instanceof GraphError) {
    return new HttpException({ error: err.code, message: err.message, ...details(err) }, STATUS_BY_CODE[err.code]);
  }
  return new HttpException(
    { error: 'INTERNAL_ERROR', message: describeError(err) || 'unexpected error' },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}

export function badPayload(error: ZodError): HttpException {
  return new HttpException({ error: 'BAD_PAYLOAD', issues: error.format() }, HttpStatus.BAD_REQUEST);
}
