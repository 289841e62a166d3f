import type { Series } from '../../shared/types/graph.types';
import { OperationInputError, type OperationContext } from '../operation.types';

export const isSeries = (value: unknown): value is Series =>
  Array.isArray(value) && value.every((x: unknown) => x === null || (typeof x === 'number' && Number.isFinite(x)));

/**
 * A column reference names a direct predecessor's output first, then a
 * dataset column.
 */
export function resolveColumn(name: string, ctx: OperationContext): Series {
  if (ctx.inputs.has(name)) {
    const output = ctx.inputs.get(name);
    if (!isSeries(output)) {
      throw new OperationInputError(`Output of node ${name} is not a numeric series`);
    }
    return output;
  }
  if (!Object.hasOwn(ctx.dataset, name)) {
    throw new OperationInputError(`Unknown column ${name}`);
  }
  const column = ctx.dataset[name];
  if (!isSeries(column)) {
    throw new OperationInputError(`Dataset column ${name} is not a numeric series`);
  }
  return column;
}

export function resolveColumns(names: ReadonlyArray<string>, ctx: OperationContext): Series[] {
  return names.map((name) => resolveColumn(name, ctx));
}

export function requirePositiveInteger(value: number | undefined, label: string): number {
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    throw new OperationInputError(`${label} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

export function requireSameLength(series: ReadonlyArray<Series>, names: ReadonlyArray<string>): number {
  const [first] = series;
  const length = first ? first.length : 0;
  series.forEach((s, i) => {
    if (s.length !== length) {
      throw new OperationInputError(
        `Column ${names[i]} has length ${s.length}, expected ${length} (as ${names[0]})`,
      );
    }
  });
  return length;
}
