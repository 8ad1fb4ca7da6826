/**
 * Registry reflection Tests
 *
 * Tests:
 * - One descriptor per listed name, aliases keep their alias name
 * - Argument types, optionality and defaults per surface
 * - Variadic note on the description
 * - Fatal errors for unresolvable names, malformed info and unmapped types
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { SnapshotRegistry, getBackEndFunctions, variadicNote } from '@opbind/core';
import { brandHandle, type AtomicSymbolInfo, type OperatorRegistry, type OpHandle } from '@opbind/types';
import { fixtureRegistry } from '../../helpers/registryFixture.js';

function byName<T extends { name: string }>(items: T[], name: string): T {
  const found = items.find(i => i.name === name);
  assert.ok(found, `missing ${name}`);
  return found;
}

describe('getBackEndFunctions', () => {
  it('should describe every listed name exactly once', () => {
    const descriptors = getBackEndFunctions(fixtureRegistry(), 'graph');
    assert.strictEqual(descriptors.length, 13);
    assert.strictEqual(new Set(descriptors.map(d => d.name)).size, 13);
  });

  it('should describe a name listed twice once', () => {
    const registry: OperatorRegistry = {
      listAllOpNames: () => ['relu', 'relu'],
      getOpHandle: () => brandHandle(0),
      getAtomicSymbolInfo: (): AtomicSymbolInfo => ({
        name: 'relu',
        description: '',
        argNames: [],
        argTypes: [],
        argDescriptions: [],
        keyVarNumArgs: '',
      }),
    };
    assert.deepStrictEqual(getBackEndFunctions(registry, 'eager').map(d => d.name), ['relu']);
  });

  it('should keep alias names', () => {
    const descriptors = getBackEndFunctions(fixtureRegistry(), 'graph');
    const alias = byName(descriptors, 'cast');
    assert.deepStrictEqual(alias.args.map(a => a.name), ['data', 'dtype']);
  });

  it('should make graph handle arguments optional', () => {
    const activation = byName(getBackEndFunctions(fixtureRegistry(), 'graph'), 'Activation');
    assert.deepStrictEqual(activation, {
      name: 'Activation',
      description: 'Applies an activation function element-wise to the input.',
      args: [
        {
          name: 'data',
          nativeType: 'NDArray-or-Symbol',
          type: { kind: 'handle' },
          description: 'The input array.',
          optional: true,
        },
        {
          name: 'act_type',
          nativeType: "{'relu', 'sigmoid', 'tanh'}, required",
          type: { kind: 'enum', values: ['relu', 'sigmoid', 'tanh'] },
          description: 'Activation function to be applied.',
          optional: false,
        },
      ],
      returnType: { kind: 'handle' },
    });
  });

  it('should keep eager handle arguments required', () => {
    const activation = byName(getBackEndFunctions(fixtureRegistry(), 'eager'), 'Activation');
    assert.strictEqual(activation.args[0].optional, false);
    assert.deepStrictEqual(activation.returnType, { kind: 'result' });
  });

  it('should return handle arrays from the interop surface', () => {
    const activation = byName(getBackEndFunctions(fixtureRegistry(), 'interop'), 'Activation');
    assert.deepStrictEqual(activation.returnType, { kind: 'handleArray' });
  });

  it('should record defaults and the variadic key', () => {
    const concat = byName(getBackEndFunctions(fixtureRegistry(), 'graph'), 'Concat');
    assert.strictEqual(concat.keyVarNumArgs, 'num_args');
    assert.strictEqual(
      concat.description,
      'Joins input arrays along a given axis.\nThis function support variable length of positional input (num_args).'
    );
    assert.deepStrictEqual(
      concat.args.map(a => [a.name, a.type.kind, a.optional, a.defaultValue]),
      [
        ['data', 'handleArray', false, undefined],
        ['num_args', 'number', false, undefined],
        ['dim', 'number', true, '1'],
      ]
    );
  });

  it('should fail on a name without a handle', () => {
    const registry: OperatorRegistry = {
      listAllOpNames: () => ['ghost'],
      getOpHandle: (): OpHandle | undefined => undefined,
      getAtomicSymbolInfo: () => {
        throw new Error('unreachable');
      },
    };
    assert.throws(() => getBackEndFunctions(registry, 'graph'), {
      name: 'RegistryError',
      code: 'ERR_REGISTRY_UNRESOLVED_OP',
      message: 'Cannot resolve operator handle for "ghost"',
    });
  });

  it('should fail on mismatched argument arrays', () => {
    const registry: OperatorRegistry = {
      listAllOpNames: () => ['dot'],
      getOpHandle: () => brandHandle(0),
      getAtomicSymbolInfo: (): AtomicSymbolInfo => ({
        name: 'dot',
        description: '',
        argNames: ['lhs', 'rhs'],
        argTypes: ['NDArray'],
        argDescriptions: ['', ''],
        keyVarNumArgs: '',
      }),
    };
    assert.throws(() => getBackEndFunctions(registry, 'graph'), {
      code: 'ERR_REGISTRY_INFO_MALFORMED',
      message: 'Operator "dot" reports 2 argument names, 1 types and 2 descriptions',
    });
  });

  it('should name the operator when a type has no mapping', () => {
    const registry = new SnapshotRegistry({
      operators: [{ name: 'fft', arguments: [{ name: 'data', type: 'complex64' }] }],
    });
    assert.throws(() => getBackEndFunctions(registry, 'eager'), {
      name: 'TypeMappingError',
      code: 'ERR_TYPE_UNMAPPED',
      message: 'Operator "fft": Invalid type for argument "data": complex64',
    });
  });
});

describe('variadicNote', () => {
  it('should name the key', () => {
    assert.strictEqual(variadicNote('num_args'), 'This function support variable length of positional input (num_args).');
  });
});
