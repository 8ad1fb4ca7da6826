/**
 * Surface Types: the generated bindings' public entry points.
 */

export const SURFACE_KINDS = ['graph', 'eager', 'interop'] as const;

/**
 * - graph: symbolic graph-construction API
 * - eager: eager tensor API
 * - interop: eager variant for plain JavaScript callers (one argument object per call)
 */
export type SurfaceKind = (typeof SURFACE_KINDS)[number];

export const GENERATION_MODES = ['typed', 'untyped', 'random'] as const;

/**
 * - typed: one typed parameter per operator argument
 * - untyped: generic `(inputs, params)` signature per operator
 * - random: unified random/sample distributions
 */
export type GenerationMode = (typeof GENERATION_MODES)[number];

export interface SurfaceProfile {
  kind: SurfaceKind;
  /** Type name of a tensor/graph-node handle, e.g. `SymbolNode` */
  handleType: string;
  /** Return type of an eager call, e.g. `NDArrayFuncReturn` */
  resultType: string;
  /** Runtime function every generated body delegates to */
  callee: string;
}

/**
 * Structural shapes a skeleton may offer as a splice target.
 */
export type SpliceTargetKind = 'class' | 'namespace' | 'object';
