import { invokeOperator, type NDArray, type Shape } from '../runtime.js';

export const ops = {};
