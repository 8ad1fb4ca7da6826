/**
 * Registry Types: the native operator registry as an explicit capability.
 *
 * The generator never reflects over the native library. It only sees
 * something that can list operator names and resolve them to metadata,
 * which is what the framework's C API exposes.
 */

import type { OpHandle } from './branded.js';

/**
 * Metadata of one operator, shaped as the native API returns it:
 * parallel arrays of argument names, types and descriptions.
 */
export interface AtomicSymbolInfo {
  /** Canonical operator name (aliases resolve to the aliased operator) */
  name: string;
  description: string;
  argNames: string[];
  argTypes: string[];
  argDescriptions: string[];
  /**
   * Name of the argument holding the number of variadic inputs.
   * Empty string when the operator has a fixed arity.
   */
  keyVarNumArgs: string;
}

/**
 * Process-wide operator registry.
 *
 * Read-only for the whole generation run.
 */
export interface OperatorRegistry {
  /** All registered names, aliases included, in registration order */
  listAllOpNames(): string[];
  /** Resolve a name to its handle; undefined when nothing is registered under it */
  getOpHandle(name: string): OpHandle | undefined;
  /** Metadata for a handle previously returned by getOpHandle */
  getAtomicSymbolInfo(handle: OpHandle): AtomicSymbolInfo;
}

/**
 * One argument as written in a registry snapshot file.
 */
export interface SnapshotArgument {
  name: string;
  type: string;
  description?: string;
}

/**
 * One operator as written in a registry snapshot file.
 */
export interface SnapshotOperator {
  name: string;
  description?: string;
  arguments?: SnapshotArgument[];
  keyVarNumArgs?: string;
  /** Extra names the operator is registered under */
  aliases?: string[];
}

/**
 * Registry snapshot: a dump of the native registry, stored as JSON or YAML.
 */
export interface RegistrySnapshot {
  operators: SnapshotOperator[];
}
