import type { NodeParameters, Series } from '../../shared/types/graph.types';
import { OperationInputError, type OperationContext, type OperationUnit } from '../operation.types';
import { requireSameLength, resolveColumns } from './series';

/** Element-wise sum of the referenced columns plus the scalar `value`. */
export const addOperation: OperationUnit<Series> = {
  kind: 'ADD',
  title: 'Add',
  requiredParams: ['columns', 'value'],
  validate(params: NodeParameters) {
    if (params.columns.length === 0) throw new OperationInputError('ADD needs at least one column');
  },
  execute(params, ctx: OperationContext): Series {
    const series = resolveColumns(params.columns, ctx);
    const length = requireSameLength(series, params.columns);
    const offset = params.value ?? 0;
    const out: Array<number | null> = [];
    for (let i = 0; i < length; i++) {
      let sum: number | null = offset;
      for (const s of series) {
        const x = s[i];
        if (x === null || x === undefined) {
          sum = null;
          break;
        }
        sum += x;
      }
      out.push(sum);
    }
    return out;
  },
};
