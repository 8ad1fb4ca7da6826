/**
 * Registry reflection: one FunctionDescriptor per registered operator name.
 */

import type {
  ArgDescriptor,
  FunctionDescriptor,
  OperatorRegistry,
  OpHandle,
  SurfaceKind,
  TypeRef,
} from '@opbind/types';
import { RegistryError, TypeMappingError } from '../errors/OpbindError.js';
import { argumentCleaner, type CleanedArgument } from '../normalize/typeMapping.js';

const RETURN_TYPES: Record<SurfaceKind, TypeRef> = {
  graph: { kind: 'handle' },
  eager: { kind: 'result' },
  interop: { kind: 'handleArray' },
};

export function variadicNote(keyVarNumArgs: string): string {
  return `This function support variable length of positional input (${keyVarNumArgs}).`;
}

/**
 * Query every registered operator and describe it for a surface.
 *
 * Names are visited in registry order; a name listed twice is described once.
 *
 * @throws RegistryError when a listed name does not resolve to a handle
 * @throws TypeMappingError when an argument type has no mapping
 */
export function getBackEndFunctions(registry: OperatorRegistry, surface: SurfaceKind): FunctionDescriptor[] {
  const opNames = [...new Set(registry.listAllOpNames())];
  return opNames.map((opName) => {
    const handle = registry.getOpHandle(opName);
    if (handle === undefined) {
      throw new RegistryError(
        `Cannot resolve operator handle for "${opName}"`,
        'ERR_REGISTRY_UNRESOLVED_OP',
        { operator: opName },
        'Regenerate the registry snapshot from the native library'
      );
    }
    return makeAtomicFunction(registry, handle, opName, surface);
  });
}

function cleanArgument(opName: string, argName: string, argType: string, surface: SurfaceKind): CleanedArgument {
  try {
    return argumentCleaner(argName, argType, surface);
  } catch (err) {
    if (err instanceof TypeMappingError) {
      throw new TypeMappingError(
        `Operator "${opName}": ${err.message}`,
        err.code,
        { ...err.context, operator: opName },
        err.suggestion
      );
    }
    throw err;
  }
}

/**
 * Describe one operator. `aliasName` is the name it was listed under,
 * which becomes the descriptor name.
 */
export function makeAtomicFunction(
  registry: OperatorRegistry,
  handle: OpHandle,
  aliasName: string,
  surface: SurfaceKind
): FunctionDescriptor {
  const info = registry.getAtomicSymbolInfo(handle);
  const { argNames, argTypes, argDescriptions } = info;

  if (argTypes.length !== argNames.length || argDescriptions.length !== argNames.length) {
    throw new RegistryError(
      `Operator "${aliasName}" reports ${argNames.length} argument names, ` +
        `${argTypes.length} types and ${argDescriptions.length} descriptions`,
      'ERR_REGISTRY_INFO_MALFORMED',
      { operator: aliasName }
    );
  }

  const args = argNames.map((argName, i): ArgDescriptor => {
    const cleaned = cleanArgument(aliasName, argName, argTypes[i], surface);
    return {
      name: argName,
      nativeType: argTypes[i],
      type: cleaned.type,
      description: argDescriptions[i],
      optional: cleaned.optional,
      ...(cleaned.defaultValue !== undefined ? { defaultValue: cleaned.defaultValue } : {}),
    };
  });

  const descriptor: FunctionDescriptor = {
    name: aliasName,
    description: info.description,
    args,
    returnType: { ...RETURN_TYPES[surface] },
  };

  if (info.keyVarNumArgs.length > 0) {
    descriptor.keyVarNumArgs = info.keyVarNumArgs;
    descriptor.description = [info.description, variadicNote(info.keyVarNumArgs)]
      .filter(part => part.length > 0)
      .join('\n');
  }

  return descriptor;
}
