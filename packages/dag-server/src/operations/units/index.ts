import type { OperationUnit } from '../operation.types';
import { addOperation } from './add.operation';
import { adxOperation } from './adx.operation';
import { smaOperation } from './sma.operation';

export { addOperation, adxOperation, smaOperation };
export { averageDirectionalIndex } from './adx.operation';
export { isSeries, resolveColumn } from './series';

export const DEFAULT_OPERATION_UNITS: ReadonlyArray<OperationUnit> = [addOperation, smaOperation, adxOperation];
