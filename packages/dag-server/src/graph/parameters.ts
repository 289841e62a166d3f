import type { NodeParameters, ParamEntry, ParamList, ParameterName } from '../shared/types/graph.types';
import { InvalidInputError } from './errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Convert the wire parameter list into the canonical frozen representation.
 * Column order is preserved; a list may carry at most one value entry.
 */
export function toInternalParameters(list: ReadonlyArray<unknown>, nodeId?: string): NodeParameters {
  if (!Array.isArray(list)) throw new InvalidInputError('parameters', 'expected a list', nodeId);
  const columns: string[] = [];
  let value: number | undefined;
  for (let index = 0; index < list.length; index++) {
    const entry: unknown = list[index];
    if (!isRecord(entry)) {
      throw new InvalidInputError('parameters', `entry ${index} is not an object`, nodeId);
    }
    const hasColumn = 'column' in entry;
    const hasValue = 'value' in entry;
    if (hasColumn === hasValue) {
      throw new InvalidInputError('parameters', `entry ${index} must have exactly one of "column" or "value"`, nodeId);
    }
    if (hasColumn) {
      const column = entry.column;
      if (typeof column !== 'string' || column.length === 0) {
        throw new InvalidInputError('parameters', `entry ${index} column must be a non-empty string`, nodeId);
      }
      columns.push(column);
      continue;
    }
    const raw = entry.value;
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new InvalidInputError('parameters', `entry ${index} value must be a finite number`, nodeId);
    }
    if (value !== undefined) {
      throw new InvalidInputError('parameters', `entry ${index} is a second value entry`, nodeId);
    }
    value = raw;
  }

  const frozenColumns = Object.freeze(columns);
  return Object.freeze(value === undefined ? { columns: frozenColumns } : { columns: frozenColumns, value });
}

export function toParamList(params: NodeParameters): ParamList {
  const list: ParamEntry[] = params.columns.map((column) => ({ column }));
  if (params.value !== undefined) list.push({ value: params.value });
  return list;
}

export function presentParameterNames(params: NodeParameters): ParameterName[] {
  const names: ParameterName[] = [];
  if (params.columns.length > 0) names.push('columns');
  if (params.value !== undefined) names.push('value');
  return names;
}
