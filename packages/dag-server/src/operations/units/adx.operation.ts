import type { NodeParameters, Series } from '../../shared/types/graph.types';
import { OperationInputError, type OperationUnit } from '../operation.types';
import { requirePositiveInteger, requireSameLength, resolveColumns } from './series';

const ADX_COLUMNS = ['high', 'low', 'close'] as const;

function checkColumns(params: NodeParameters): void {
  if (params.columns.length !== ADX_COLUMNS.length) {
    throw new OperationInputError(
      `ADX expects ${ADX_COLUMNS.length} columns (${ADX_COLUMNS.join(', ')}), got ${params.columns.length}`,
    );
  }
}

function toNumbers(series: Series, name: string): number[] {
  return series.map((x, i) => {
    if (x === null) throw new OperationInputError(`ADX column ${name} has no value at position ${i}`);
    return x;
  });
}

/**
 * Average directional index, Wilder smoothing. True range and directional
 * movement start at bar 1, the smoothed sums at bar `period`, DX from there
 * on, and ADX at bar `2 * period - 1` as the mean of the first `period` DX
 * values. Earlier positions are null.
 */
export function averageDirectionalIndex(high: number[], low: number[], close: number[], period: number): Series {
  const length = close.length;
  const out: Array<number | null> = new Array<number | null>(length).fill(null);
  if (length < 2 * period) return out;

  let trSum = 0;
  let plusSum = 0;
  let minusSum = 0;
  let dxSum = 0;
  let adx = 0;

  for (let i = 1; i < length; i++) {
    const up = high[i] - high[i - 1];
    const down = low[i - 1] - low[i];
    const plusDm = up > down && up > 0 ? up : 0;
    const minusDm = down > up && down > 0 ? down : 0;
    const tr = Math.max(high[i] - low[i], Math.abs(high[i] - close[i - 1]), Math.abs(low[i] - close[i - 1]));

    if (i <= period) {
      trSum += tr;
      plusSum += plusDm;
      minusSum += minusDm;
      if (i < period) continue;
    } else {
      trSum = trSum - trSum / period + tr;
      plusSum = plusSum - plusSum / period + plusDm;
      minusSum = minusSum - minusSum / period + minusDm;
    }

    const plusDi = trSum === 0 ? 0 : (100 * plusSum) / trSum;
    const minusDi = trSum === 0 ? 0 : (100 * minusSum) / trSum;
    const diSum = plusDi + minusDi;
    const dx = diSum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / diSum;

    if (i < 2 * period - 1) {
      dxSum += dx;
    } else if (i === 2 * period - 1) {
      adx = (dxSum + dx) / period;
      out[i] = adx;
    } else {
      adx = (adx * (period - 1) + dx) / period;
      out[i] = adx;
    }
  }
  return out;
}

export const adxOperation: OperationUnit<Series> = {
  kind: 'ADX',
  title: 'Average directional index',
  requiredParams: ['columns', 'value'],
  validate(params) {
    checkColumns(params);
    requirePositiveInteger(params.value, 'ADX period');
  },
  execute(params, ctx): Series {
    checkColumns(params);
    const period = requirePositiveInteger(params.value, 'ADX period');
    const series = resolveColumns(params.columns, ctx);
    requireSameLength(series, params.columns);
    const [high, low, close] = series.map((s, i) => toNumbers(s, params.columns[i]));
    return averageDirectionalIndex(high, low, close, period);
  },
};
