/**
 * Shape-neutral generated callables and TypeRef → TypeScript type nodes.
 */

import * as t from '@babel/types';
import type { SurfaceProfile, TypeRef } from '@opbind/types';

/** Type name generated code uses for tensor shapes; skeletons import it */
export const SHAPE_TYPE = 'Shape';

export type CallableParam = t.Identifier | t.AssignmentPattern;

/**
 * One generated callable, before it is given the form of a class method,
 * namespace function or object method.
 */
export interface GeneratedCallable {
  /** Member name in the target */
  name: string;
  /** Native operator the callable delegates to (first target for random callables) */
  opName: string;
  typeParameters: t.TSTypeParameterDeclaration | null;
  params: CallableParam[];
  returnType: t.TSTypeAnnotation;
  body: t.BlockStatement;
  /** Text of a JSDoc block, without the comment delimiters */
  docComment: string | null;
}

function typeReference(name: string): t.TSTypeReference {
  return t.tsTypeReference(t.identifier(name));
}

export function recordType(value: t.TSType): t.TSTypeReference {
  return t.tsTypeReference(t.identifier('Record'), t.tsTypeParameterInstantiation([t.tsStringKeyword(), value]));
}

export function toTSType(type: TypeRef, profile: SurfaceProfile): t.TSType {
  switch (type.kind) {
    case 'handle':
      return typeReference(profile.handleType);
    case 'handleArray':
      return t.tsArrayType(typeReference(profile.handleType));
    case 'number':
      return t.tsNumberKeyword();
    case 'numberArray':
      return t.tsArrayType(t.tsNumberKeyword());
    case 'string':
      return t.tsStringKeyword();
    case 'boolean':
      return t.tsBooleanKeyword();
    case 'shape':
      return typeReference(SHAPE_TYPE);
    case 'enum':
      if (type.values.length === 0) return t.tsStringKeyword();
      if (type.values.length === 1) return t.tsLiteralType(t.stringLiteral(type.values[0]));
      return t.tsUnionType(type.values.map(v => t.tsLiteralType(t.stringLiteral(v))));
    case 'unknown':
      return t.tsUnknownKeyword();
    case 'generic':
      return typeReference(type.name);
    case 'result':
      return typeReference(profile.resultType);
  }
}

/**
 * Identifier carrying a type annotation, e.g. `params: Record<string, unknown>`.
 */
export function typedIdentifier(name: string, type: t.TSType, optional = false): t.Identifier {
  const id = t.identifier(name);
  id.typeAnnotation = t.tsTypeAnnotation(type);
  if (optional) id.optional = true;
  return id;
}
