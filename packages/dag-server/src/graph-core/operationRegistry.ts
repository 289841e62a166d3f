import { Inject, Injectable } from '@nestjs/common';

import { MissingParameterError, UnknownKindError } from '../graph/errors';
import { presentParameterNames } from '../graph/parameters';
import {
  OPERATION_UNITS,
  type OperationEntry,
  type OperationSchema,
  type OperationUnit,
} from '../operations/operation.types';
import {
  OPERATION_KINDS,
  type NodeParameters,
  type OperationKind,
  type ParameterName,
} from '../shared/types/graph.types';

export function isOperationKind(kind: string): kind is OperationKind {
  return OPERATION_KINDS.some((known) => known === kind);
}

/**
 * Immutable kind -> unit table. Populated once from the injected unit list;
 * there is no registration API after construction.
 */
@Injectable()
export class OperationRegistry {
  private readonly entries: ReadonlyMap<OperationKind, OperationEntry>;

  constructor(@Inject(OPERATION_UNITS) units: ReadonlyArray<OperationUnit>) {
    const entries = new Map<OperationKind, OperationEntry>();
    for (const unit of units) {
      if (entries.has(unit.kind)) {
        throw new Error(`Operation kind ${unit.kind} registered twice`);
      }
      entries.set(unit.kind, { unit, requiredParams: Object.freeze([...unit.requiredParams]) });
    }
    this.entries = entries;
  }

  has(kind: string): kind is OperationKind {
    return isOperationKind(kind) && this.entries.has(kind);
  }

  kinds(): OperationKind[] {
    return Array.from(this.entries.keys()).sort();
  }

  lookup(kind: string, nodeId?: string): OperationEntry {
    const entry = isOperationKind(kind) ? this.entries.get(kind) : undefined;
    if (!entry) throw new UnknownKindError(kind, this.kinds(), nodeId);
    return entry;
  }

  /** Names from the required set that `params` lacks, in registry order. */
  missingParameters(kind: string, params: NodeParameters): ParameterName[] {
    const present = new Set(presentParameterNames(params));
    return this.lookup(kind).requiredParams.filter((name) => !present.has(name));
  }

  validate(kind: string, params: NodeParameters, nodeId?: string): void {
    const { requiredParams } = this.lookup(kind, nodeId);
    const missing = this.missingParameters(kind, params);
    if (missing.length > 0) {
      throw new MissingParameterError(
        { kind, missing, required: [...requiredParams], supplied: presentParameterNames(params) },
        nodeId,
      );
    }
  }

  toSchema(): OperationSchema[] {
    return this.kinds().map((kind) => {
      const { unit, requiredParams } = this.lookup(kind);
      return { kind, title: unit.title, requiredParams: [...requiredParams] };
    });
  }
}
