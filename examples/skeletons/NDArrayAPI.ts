import { invokeOperator, type NDArray, type NDArrayFuncReturn, type Shape } from '../runtime.js';

export class NDArrayAPI {}
