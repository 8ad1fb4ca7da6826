/**
 * Minimal runtime the example skeletons import. A real binding passes these
 * calls to the native library.
 */

export type Shape = number[];

export interface SymbolNode {
  op: string;
  name: string | undefined;
  attr: Record<string, string>;
  inputs: SymbolNode[];
  params: Record<string, unknown>;
}

export interface NDArray {
  shape: Shape;
  data: Float32Array;
}

export type NDArrayFuncReturn = NDArray[];

export function createSymbol(
  op: string,
  name: string | undefined,
  attr: Record<string, string> | undefined,
  inputs: SymbolNode[],
  params: Record<string, unknown>
): SymbolNode {
  return { op, name, attr: attr ?? {}, inputs, params };
}

export function invokeOperator(op: string, inputs: NDArray[], params: Record<string, unknown>): NDArrayFuncReturn {
  throw new Error(`No native library loaded (operator ${op}, ${inputs.length} inputs, ${Object.keys(params).length} params)`);
}
