/**
 * Callable builder Tests
 *
 * Tests:
 * - Typed graph, eager and interop callables: signature, body, docs
 * - Renamed parameters keep their native key at the call site
 * - Optional arrays default to `[]` and are only sent when non-empty
 * - Untyped callables pass inputs and params through
 * - Random callables pick the native operator per call
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as t from '@babel/types';

import {
  IdentifierPolicy,
  buildRandomCallable,
  buildTypedCallable,
  buildUntypedCallable,
  calleeExpression,
  getBackEndFunctions,
  printNode,
  typeSafeRandomFunctionsToGenerate,
  type GeneratedCallable,
} from '@opbind/core';
import type { FunctionDescriptor, SurfaceKind } from '@opbind/types';
import {
  EAGER_PROFILE,
  GRAPH_PROFILE,
  INTEROP_PROFILE,
  fixtureRegistry,
} from '../../helpers/registryFixture.js';

function descriptor(surface: SurfaceKind, name: string): FunctionDescriptor {
  const found = getBackEndFunctions(fixtureRegistry(), surface).find(d => d.name === name);
  assert.ok(found, `missing ${name}`);
  return found;
}

function bodyLines(callable: GeneratedCallable): string[] {
  return callable.body.body.map(statement => printNode(statement));
}

const WRAPPER_HEAD = 'function f';
const WRAPPER_TAIL = ' {}';

/**
 * Parameters and type parameters only print inside a function, so each is
 * printed in an empty `function f` and cut back out.
 */
function printInFunction(params: GeneratedCallable['params'], typeParameters: t.TSTypeParameterDeclaration | null): string {
  const fn = t.functionDeclaration(t.identifier('f'), params, t.blockStatement([]));
  fn.typeParameters = typeParameters;
  const code = printNode(fn);
  assert.ok(code.startsWith(WRAPPER_HEAD) && code.endsWith(WRAPPER_TAIL), code);
  return code.slice(WRAPPER_HEAD.length, code.length - WRAPPER_TAIL.length);
}

function paramLines(callable: GeneratedCallable): string[] {
  return callable.params.map(param => printInFunction([param], null).slice(1, -1));
}

function typeParameterText(callable: GeneratedCallable): string {
  return printInFunction([], callable.typeParameters).slice(0, -'()'.length);
}

// =============================================================================
// Typed, graph surface
// =============================================================================

describe('buildTypedCallable (graph)', () => {
  it('should build a variadic operator', () => {
    const callable = buildTypedCallable(descriptor('graph', 'Concat'), 'Concat', GRAPH_PROFILE);

    assert.strictEqual(callable.name, 'Concat');
    assert.strictEqual(callable.opName, 'Concat');
    assert.strictEqual(callable.typeParameters, null);
    assert.deepStrictEqual(paramLines(callable), [
      'data: SymbolNode[]',
      'num_args: number',
      'dim?: number',
      'name?: string',
      'attr?: Record<string, string>',
    ]);
    assert.strictEqual(printNode(callable.returnType.typeAnnotation), 'SymbolNode');
    assert.deepStrictEqual(bodyLines(callable), [
      'const params: Record<string, unknown> = {};',
      'const inputs: SymbolNode[] = [];',
      'inputs.push(...data);',
      'params["num_args"] = num_args;',
      'if (dim !== undefined) {\n  params["dim"] = dim;\n}',
      'return createSymbol("Concat", name, attr, inputs, params);',
    ]);
  });

  it('should put required arguments before optional handles', () => {
    const callable = buildTypedCallable(descriptor('graph', 'Activation'), 'Activation', GRAPH_PROFILE);

    assert.deepStrictEqual(paramLines(callable), [
      'act_type: "relu" | "sigmoid" | "tanh"',
      'data?: SymbolNode',
      'name?: string',
      'attr?: Record<string, string>',
    ]);
    assert.deepStrictEqual(bodyLines(callable).slice(2, 4), [
      'if (data !== undefined) {\n  inputs.push(data);\n}',
      'params["act_type"] = act_type;',
    ]);
  });

  it('should document parameters in signature order', () => {
    const callable = buildTypedCallable(descriptor('graph', 'Concat'), 'Concat', GRAPH_PROFILE);

    assert.strictEqual(
      callable.docComment,
      [
        'Joins input arrays along a given axis.',
        'This function support variable length of positional input (num_args).',
        '',
        '@param data List of arrays to concatenate',
        '@param num_args Number of inputs to be concatenated.',
        '@param dim The dimension to be concatenated. (default: 1)',
        '@param name Name of the resulting symbol',
        '@param attr Attributes attached to the resulting symbol',
        '@returns The resulting symbol',
      ].join('\n')
    );
  });

  it('should call a dotted callee', () => {
    const callable = buildTypedCallable(descriptor('graph', 'Cast'), 'Cast', {
      ...GRAPH_PROFILE,
      callee: 'runtime.createSymbol',
    });
    assert.strictEqual(bodyLines(callable).at(-1), 'return runtime.createSymbol("Cast", name, attr, inputs, params);');
  });
});

// =============================================================================
// Typed, eager surface
// =============================================================================

describe('buildTypedCallable (eager)', () => {
  it('should rename reserved parameters but keep native keys', () => {
    const callable = buildTypedCallable(descriptor('eager', 'Lookup'), 'Lookup', EAGER_PROFILE);

    assert.deepStrictEqual(paramLines(callable), [
      'data: NDArray',
      'vari?: number',
      'default_?: string',
      'out?: NDArray',
    ]);
    assert.deepStrictEqual(bodyLines(callable), [
      'const params: Record<string, unknown> = {};',
      'const inputs: NDArray[] = [];',
      'inputs.push(data);',
      'if (vari !== undefined) {\n  params["var"] = vari;\n}',
      'if (default_ !== undefined) {\n  params["default"] = default_;\n}',
      'if (out !== undefined) {\n  params["out"] = out;\n}',
      'return invokeOperator("Lookup", inputs, params);',
    ]);
    assert.strictEqual(printNode(callable.returnType.typeAnnotation), 'NDArrayFuncReturn');
  });

  it('should default optional arrays to empty and skip them when empty', () => {
    const callable = buildTypedCallable(descriptor('eager', 'Pad'), 'Pad', EAGER_PROFILE);

    assert.deepStrictEqual(paramLines(callable), ['data: NDArray', 'pad_width: number[] = []', 'out?: NDArray']);
    assert.strictEqual(bodyLines(callable)[3], 'if (pad_width.length > 0) {\n  params["pad_width"] = pad_width;\n}');
  });

  it('should type shapes and booleans', () => {
    const callable = buildTypedCallable(descriptor('eager', 'Reshape'), 'Reshape', EAGER_PROFILE);
    assert.deepStrictEqual(paramLines(callable), [
      'data: NDArray',
      'shape?: Shape',
      'reverse?: boolean',
      'out?: NDArray',
    ]);
  });

  it('should use the policy it is given', () => {
    const policy = new IdentifierPolicy('eager', { var: 'variance' });
    const callable = buildTypedCallable(descriptor('eager', 'Lookup'), 'Lookup', EAGER_PROFILE, policy);
    assert.strictEqual(paramLines(callable)[1], 'variance?: number');
    assert.strictEqual(bodyLines(callable)[3], 'if (variance !== undefined) {\n  params["var"] = variance;\n}');
  });

  it('should document the output parameter', () => {
    const callable = buildTypedCallable(descriptor('eager', 'Pad'), 'Pad', EAGER_PROFILE);
    assert.strictEqual(
      callable.docComment,
      [
        'Pads an input array.',
        '',
        '@param data An n-dimensional input array.',
        '@param pad_width Widths of the padding regions. (default: [])',
        '@param out Output array to write the result into',
        '@returns The resulting arrays',
      ].join('\n')
    );
  });
});

// =============================================================================
// Typed, interop surface
// =============================================================================

describe('buildTypedCallable (interop)', () => {
  it('should read arguments from one object', () => {
    const callable = buildTypedCallable(descriptor('interop', 'Reshape'), 'Reshape', INTEROP_PROFILE);

    assert.strictEqual(callable.params.length, 1);
    assert.deepStrictEqual(bodyLines(callable), [
      'const params: Record<string, unknown> = {};',
      'const inputs: NDArray[] = [];',
      'inputs.push(args.data);',
      'if (args.shape !== undefined) {\n  params["shape"] = args.shape;\n}',
      'if (args.reverse !== undefined) {\n  params["reverse"] = args.reverse;\n}',
      'return invokeOperator("Reshape", inputs, params);',
    ]);
    assert.strictEqual(printNode(callable.returnType.typeAnnotation), 'NDArray[]');
  });

  it('should keep reserved words as object keys', () => {
    const callable = buildTypedCallable(descriptor('interop', 'Lookup'), 'Lookup', INTEROP_PROFILE);
    assert.strictEqual(bodyLines(callable)[3], 'if (args.var !== undefined) {\n  params["var"] = args.var;\n}');
  });

  it('should default optional array members to empty and skip them when empty', () => {
    const callable = buildTypedCallable(descriptor('interop', 'Pad'), 'Pad', INTEROP_PROFILE);

    assert.deepStrictEqual(bodyLines(callable), [
      'const params: Record<string, unknown> = {};',
      'const inputs: NDArray[] = [];',
      'inputs.push(args.data);',
      'if ((args.pad_width ?? []).length > 0) {\n  params["pad_width"] = args.pad_width ?? [];\n}',
      'return invokeOperator("Pad", inputs, params);',
    ]);
  });

  it('should document argument object members', () => {
    const callable = buildTypedCallable(descriptor('interop', 'Cast'), 'Cast', INTEROP_PROFILE);
    assert.strictEqual(
      callable.docComment,
      [
        'Casts all elements of the input to a new type.',
        '',
        '@param args.data The input.',
        '@param args.dtype Output data type.',
        '@returns The output arrays',
      ].join('\n')
    );
  });

  it('should take no parameters for an operator without arguments', () => {
    const callable = buildTypedCallable(
      { name: 'Noop', description: '', args: [], returnType: { kind: 'handleArray' } },
      'Noop',
      INTEROP_PROFILE
    );
    assert.deepStrictEqual(callable.params, []);
    assert.strictEqual(callable.docComment, '@returns The output arrays');
  });
});

// =============================================================================
// Untyped
// =============================================================================

describe('buildUntypedCallable', () => {
  it('should pass name and attr on the graph surface', () => {
    const callable = buildUntypedCallable(descriptor('graph', 'Custom'), 'Custom', GRAPH_PROFILE);

    assert.deepStrictEqual(paramLines(callable), [
      'inputs: SymbolNode[] = []',
      'params: Record<string, unknown> = {}',
      'name?: string',
      'attr?: Record<string, string>',
    ]);
    assert.deepStrictEqual(bodyLines(callable), ['return createSymbol("Custom", name, attr, inputs, params);']);
  });

  it('should take only inputs and params on the eager surface', () => {
    const callable = buildUntypedCallable(descriptor('eager', 'Custom'), 'Custom', EAGER_PROFILE);

    assert.deepStrictEqual(paramLines(callable), ['inputs: NDArray[] = []', 'params: Record<string, unknown> = {}']);
    assert.strictEqual(
      callable.docComment,
      [
        'Apply a custom operator.',
        '',
        '@param inputs Input handles, in positional order',
        '@param params Operator parameters keyed by native argument name',
        '@returns The resulting arrays',
      ].join('\n')
    );
  });
});

// =============================================================================
// Random
// =============================================================================

describe('buildRandomCallable', () => {
  function distribution(name: string, surface: SurfaceKind) {
    const found = typeSafeRandomFunctionsToGenerate(getBackEndFunctions(fixtureRegistry(), surface)).find(
      d => d.name === name
    );
    assert.ok(found, `missing ${name}`);
    return found;
  }

  it('should choose between the random and sample operators', () => {
    const callable = buildRandomCallable(distribution('normal', 'eager'), 'normal', EAGER_PROFILE, new IdentifierPolicy('eager'));

    assert.strictEqual(callable.opName, '_random_normal');
    assert.strictEqual(typeParameterText(callable), '<T extends NDArray | number>');
    assert.deepStrictEqual(paramLines(callable), [
      'mu?: T',
      'sigma?: T',
      'shape?: Shape',
      'ctx?: string',
      'dtype?: "None" | "float16" | "float32"',
      'out?: NDArray',
    ]);

    const lines = bodyLines(callable);
    assert.strictEqual(
      lines[2],
      [
        'if (mu !== undefined) {',
        '  if (typeof mu === "number") {',
        '    params["mu"] = mu;',
        '  } else {',
        '    inputs.push(mu);',
        '  }',
        '}',
      ].join('\n')
    );
    assert.strictEqual(
      lines[8],
      'const target = (mu === undefined || typeof mu === "number") && (sigma === undefined || typeof sigma === "number") ? "_random_normal" : "_sample_normal";'
    );
    assert.strictEqual(
      lines[9],
      [
        'if (target === "_random_normal") {',
        '  if ("mu" in params) {',
        '    params["loc"] = params["mu"];',
        '    delete params["mu"];',
        '  }',
        '  if ("sigma" in params) {',
        '    params["scale"] = params["sigma"];',
        '    delete params["sigma"];',
        '  }',
        '}',
      ].join('\n')
    );
    assert.strictEqual(lines[10], 'return invokeOperator(target, inputs, params);');
    assert.strictEqual(lines.length, 11);
  });

  it('should call the only operator of a single-family distribution', () => {
    const callable = buildRandomCallable(distribution('uniform', 'graph'), 'uniform', GRAPH_PROFILE, new IdentifierPolicy('graph'));
    const lines = bodyLines(callable);

    assert.deepStrictEqual(lines.slice(-2), [
      'const target = "_random_uniform";',
      'return createSymbol(target, name, attr, inputs, params);',
    ]);
    assert.strictEqual(printNode(callable.returnType.typeAnnotation), 'SymbolNode');
  });

  it('should refuse the interop surface', () => {
    assert.throws(
      () => buildRandomCallable(distribution('uniform', 'interop'), 'uniform', INTEROP_PROFILE),
      { message: 'Random callables are generated for the graph and eager surfaces only' }
    );
  });
});

describe('calleeExpression', () => {
  it('should build member expressions for dotted names', () => {
    assert.strictEqual(printNode(calleeExpression('invokeOperator')), 'invokeOperator');
    assert.strictEqual(printNode(calleeExpression('nd.api.invoke')), 'nd.api.invoke');
  });
});
