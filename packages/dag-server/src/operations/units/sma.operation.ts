import type { Series } from '../../shared/types/graph.types';
import type { OperationUnit } from '../operation.types';
import { requirePositiveInteger, resolveColumn } from './series';

/**
 * Simple moving average of the first column. Positions before the first
 * full window, and windows that contain a null, yield null.
 */
export const smaOperation: OperationUnit<Series> = {
  kind: 'SMA',
  title: 'Simple moving average',
  requiredParams: ['columns', 'value'],
  validate(params) {
    requirePositiveInteger(params.value, 'SMA window');
  },
  execute(params, ctx): Series {
    const window = requirePositiveInteger(params.value, 'SMA window');
    const [column] = params.columns;
    const source = resolveColumn(column, ctx);
    const out: Array<number | null> = [];
    for (let i = 0; i < source.length; i++) {
      if (i + 1 < window) {
        out.push(null);
        continue;
      }
      let sum: number | null = 0;
      for (let j = i - window + 1; j <= i; j++) {
        const x = source[j];
        if (x === null || x === undefined) {
          sum = null;
          break;
        }
        sum += x;
      }
      out.push(sum === null ? null : sum / window);
    }
    return out;
  },
};
