/**
 * Branded Types - opaque registry handles
 *
 * A handle is a plain number at runtime. The brand keeps arbitrary numbers
 * (indices, counts) from being passed where the registry expects a handle
 * it issued itself.
 *
 * @example
 * const handle = registry.getOpHandle('Convolution');
 * if (handle !== undefined) registry.getAtomicSymbolInfo(handle); // OK
 * registry.getAtomicSymbolInfo(3); // ERROR - not an OpHandle
 */

/**
 * Unique symbol for branding handles.
 * Declared but never actually exists at runtime - purely for type checking.
 */
declare const HANDLE_BRAND: unique symbol;

/**
 * Handle of one registered operator, issued by an OperatorRegistry.
 */
export type OpHandle = number & {
  readonly [HANDLE_BRAND]: true;
};

/**
 * Brand a raw registry index as a handle.
 * Only registry implementations should call this.
 *
 * @internal
 */
export function brandHandle(index: number): OpHandle {
  return index as OpHandle;
}
