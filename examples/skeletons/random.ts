import { invokeOperator, type NDArray, type NDArrayFuncReturn, type Shape } from '../runtime.js';

export namespace random {}
