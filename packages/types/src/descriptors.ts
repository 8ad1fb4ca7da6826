/**
 * Descriptor Types: the generator's in-memory view of operators.
 *
 * Descriptors are built from a registry query at the start of a generation
 * run and discarded at the end of it.
 */

/**
 * Normalized argument type. Closed set: every native type string maps to
 * exactly one of these or the run fails.
 */
export type TypeRef =
  | { kind: 'handle' }
  | { kind: 'handleArray' }
  | { kind: 'number' }
  | { kind: 'numberArray' }
  | { kind: 'string' }
  | { kind: 'boolean' }
  | { kind: 'shape' }
  | { kind: 'enum'; values: string[] }
  | { kind: 'unknown' }
  /** Type parameter shared by the arguments of a random-family callable */
  | { kind: 'generic'; name: string }
  /** The surface's declared result type */
  | { kind: 'result' };

export type TypeKind = TypeRef['kind'];

export interface ArgDescriptor {
  /** Native argument name, used as the key at every call site */
  name: string;
  /** Declared type string exactly as the registry reports it */
  nativeType: string;
  type: TypeRef;
  description: string;
  optional: boolean;
  /** Value after `default=` in the native type string, when present */
  defaultValue?: string;
}

export interface FunctionDescriptor {
  /** Registry identifier (alias names are kept as listed) */
  name: string;
  description: string;
  args: ArgDescriptor[];
  returnType: TypeRef;
  /** Variadic-arity key from the registry, when the operator has one */
  keyVarNumArgs?: string;
}

export type RandomFamily = 'random' | 'sample';

/**
 * One native operator backing a unified random distribution.
 */
export interface RandomTarget {
  family: RandomFamily;
  /** Native operator name to call, e.g. `_random_normal` */
  opName: string;
  /** Canonical argument name → this operator's own argument name, for renamed arguments only */
  nativeArgNames: Record<string, string>;
}

/**
 * Distribution descriptor after `random`/`sample` unification.
 * `name` is the canonical distribution name (e.g. `normal`).
 */
export interface RandomDescriptor extends FunctionDescriptor {
  targets: RandomTarget[];
}
