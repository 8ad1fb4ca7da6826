/**
 * Babel ESM/CJS interop
 *
 * @babel/traverse and @babel/generator are CommonJS packages with a default
 * export. Imported from ESM, the function may arrive wrapped in a `.default`
 * property. These helpers normalize access to it.
 *
 * Usage:
 *   import generateModule from '@babel/generator';
 *   const generate = getGenerateFunction(generateModule);
 */

import type { Node } from '@babel/types';
import type { TraverseOptions, Scope, NodePath } from '@babel/traverse';
import type { GeneratorOptions, GeneratorResult } from '@babel/generator';

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

export type GenerateFunction = (ast: Node, opts?: GeneratorOptions, code?: string) => GeneratorResult;

interface ModuleWithPossibleDefault {
  default?: unknown;
}

function hasDefaultExport(mod: unknown): mod is ModuleWithPossibleDefault {
  return typeof mod === 'object' && mod !== null && 'default' in mod;
}

function unwrapFunction(mod: unknown): unknown {
  // ESM environment where default is wrapped
  if (hasDefaultExport(mod) && typeof mod.default === 'function') {
    return mod.default;
  }
  return mod;
}

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === 'function';
}

function isGenerateFunction(value: unknown): value is GenerateFunction {
  return typeof value === 'function';
}

/**
 * @throws Error if the traverse function cannot be resolved
 */
export function getTraverseFunction(traverseModule: unknown): TraverseFunction {
  const fn = unwrapFunction(traverseModule);
  if (isTraverseFunction(fn)) {
    return fn;
  }
  throw new Error(
    'Unable to resolve @babel/traverse function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}

/**
 * @throws Error if the generate function cannot be resolved
 */
export function getGenerateFunction(generateModule: unknown): GenerateFunction {
  const fn = unwrapFunction(generateModule);
  if (isGenerateFunction(fn)) {
    return fn;
  }
  throw new Error(
    'Unable to resolve @babel/generator function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}
