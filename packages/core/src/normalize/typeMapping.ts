/**
 * Native type string → TypeRef
 *
 * The registry describes every argument with a free-form type string such
 * as "Shape(tuple), optional, default=[]" or "{'avg', 'max'},required".
 * argumentCleaner() splits off optionality and the default value, and
 * convertNativeType() maps the remaining type token.
 */

import type { SurfaceKind, TypeRef } from '@opbind/types';
import { TypeMappingError } from '../errors/OpbindError.js';

export interface CleanedArgument {
  type: TypeRef;
  optional: boolean;
  defaultValue?: string;
}

/** Keyed by the type token with all whitespace removed */
const NATIVE_TYPES = new Map<string, TypeRef>(Object.entries({
  'Shape(tuple)': { kind: 'shape' },
  'ShapeorNone': { kind: 'shape' },
  'Symbol': { kind: 'handle' },
  'NDArray': { kind: 'handle' },
  'NDArray-or-Symbol': { kind: 'handle' },
  'Symbol[]': { kind: 'handleArray' },
  'NDArray[]': { kind: 'handleArray' },
  'NDArray-or-Symbol[]': { kind: 'handleArray' },
  'SymbolorSymbol[]': { kind: 'handleArray' },
  'float': { kind: 'number' },
  'real_t': { kind: 'number' },
  'floatorNone': { kind: 'number' },
  'double': { kind: 'number' },
  'doubleorNone': { kind: 'number' },
  'int': { kind: 'number' },
  'intorNone': { kind: 'number' },
  'int(non-negative)': { kind: 'number' },
  'long': { kind: 'number' },
  'long(non-negative)': { kind: 'number' },
  'string': { kind: 'string' },
  'boolean': { kind: 'boolean' },
  'booleanorNone': { kind: 'boolean' },
  'tupleof<float>': { kind: 'numberArray' },
  'tupleof<double>': { kind: 'numberArray' },
  'tupleof<int>': { kind: 'numberArray' },
  'tupleof<long>': { kind: 'numberArray' },
  'tupleof<>': { kind: 'unknown' },
  'ptr': { kind: 'unknown' },
  '': { kind: 'unknown' },
} satisfies Record<string, TypeRef>));

export function isArrayType(type: TypeRef): boolean {
  return type.kind === 'handleArray' || type.kind === 'numberArray';
}

/**
 * Map one whitespace-free type token.
 *
 * @throws TypeMappingError when the token has no mapping
 */
export function convertNativeType(token: string, argName: string, argType: string): TypeRef {
  const mapped = NATIVE_TYPES.get(token);
  if (mapped === undefined) {
    throw new TypeMappingError(
      `Invalid type for argument "${argName}": ${token}`,
      'ERR_TYPE_UNMAPPED',
      { argument: argName, nativeType: argType },
      'Add a mapping for this native type before regenerating'
    );
  }
  return { ...mapped };
}

/**
 * Parse the values of an enum token: "{'csr','default'}" → ['csr', 'default']
 */
function parseEnumValues(token: string): string[] {
  return token
    .slice(1, -1)
    .split(',')
    .map(v => v.replace(/^['"]|['"]$/g, ''))
    .filter(v => v.length > 0);
}

/**
 * Split a native argument type into its TypeRef, optionality and default.
 *
 * Fields after the type token follow "<type>, optional, default=<value>".
 * A required handle argument of the graph surface is treated as optional:
 * graph inputs may be bound after the node is created.
 *
 * @throws TypeMappingError on malformed optional fields or unmapped types
 */
export function argumentCleaner(argName: string, argType: string, surface: SurfaceKind): CleanedArgument {
  const spaceRemoved = argType.replace(/\s+/g, '');

  let type: TypeRef | undefined;
  let fields: string[];
  if (spaceRemoved.startsWith('{')) {
    const endIdx = spaceRemoved.indexOf('}');
    if (endIdx < 0) {
      throw new TypeMappingError(
        `Unterminated enum type for argument "${argName}": ${argType}`,
        'ERR_TYPE_MALFORMED',
        { argument: argName, nativeType: argType }
      );
    }
    type = { kind: 'enum', values: parseEnumValues(spaceRemoved.slice(0, endIdx + 1)) };
    fields = spaceRemoved.slice(endIdx + 1).split(',');
  } else {
    fields = spaceRemoved.split(',');
  }

  type ??= convertNativeType(fields[0], argName, argType);

  if (fields.length >= 3) {
    if (fields[1] !== 'optional' || !fields[2].startsWith('default=')) {
      throw new TypeMappingError(
        `Unrecognized optional field for argument "${argName}": ${argType}`,
        'ERR_TYPE_MALFORMED',
        { argument: argName, nativeType: argType }
      );
    }
    // Defaults may themselves contain commas, e.g. default=[1,1]
    const defaultValue = fields.slice(2).join(',').slice('default='.length);
    return { type, optional: true, defaultValue };
  }

  return { type, optional: surface === 'graph' && type.kind === 'handle' };
}
