import generateModule from '@babel/generator';
import type * as t from '@babel/types';
import { getGenerateFunction } from './babelInterop.js';

const generate = getGenerateFunction(generateModule);

/**
 * Print a node as TypeScript source, comments included.
 */
export function printNode(node: t.Node): string {
  return generate(node, { comments: true }).code;
}
