/**
 * Splice Tests
 *
 * Tests:
 * - Class, namespace and const object targets
 * - Static and instance class members
 * - Missing, ambiguous and wrongly shaped targets
 * - Member name conflicts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { buildUntypedCallable, printNode, spliceMembers, type GeneratedCallable } from '@opbind/core';
import { EAGER_PROFILE } from '../../helpers/registryFixture.js';
import { lineContaining, parseSkeleton } from '../../helpers/skeleton.js';

function callable(name: string): GeneratedCallable {
  const built = buildUntypedCallable(
    { name, description: '', args: [], returnType: { kind: 'result' } },
    name,
    EAGER_PROFILE
  );
  return { ...built, docComment: null };
}

const SIGNATURE = '(inputs: NDArray[] = [], params: Record<string, unknown> = {}): NDArrayFuncReturn {';

// =============================================================================
// Targets
// =============================================================================

describe('spliceMembers', () => {
  it('should add static methods to a class', () => {
    const file = parseSkeleton('export class Ops {\n  static version = 1;\n}\n');
    const result = spliceMembers(file, 'Ops', [callable('relu'), callable('tanh')]);

    assert.deepStrictEqual(result, { kind: 'class', members: ['relu', 'tanh'] });
    const code = printNode(file);
    assert.strictEqual(lineContaining(code, 'relu('), `static relu${SIGNATURE}`);
    assert.strictEqual(lineContaining(code, 'return invokeOperator("tanh"'), 'return invokeOperator("tanh", inputs, params);');
    assert.ok(code.indexOf('static relu(') < code.indexOf('static tanh('));
  });

  it('should add instance methods when asked', () => {
    const file = parseSkeleton('export class Ops {}\n');
    spliceMembers(file, 'Ops', [callable('relu')], { staticMembers: false });
    assert.strictEqual(lineContaining(printNode(file), 'relu('), `relu${SIGNATURE}`);
  });

  it('should add exported functions to a namespace', () => {
    const file = parseSkeleton('export namespace ops {\n  export const kind = "eager";\n}\n');
    const result = spliceMembers(file, 'ops', [callable('relu')]);

    assert.strictEqual(result.kind, 'namespace');
    assert.strictEqual(lineContaining(printNode(file), 'relu('), `export function relu${SIGNATURE}`);
  });

  it('should add methods to a const object literal', () => {
    const file = parseSkeleton('export const ops = {} as const;\n');
    const result = spliceMembers(file, 'ops', [callable('relu')]);

    assert.strictEqual(result.kind, 'object');
    assert.strictEqual(lineContaining(printNode(file), 'relu('), `relu${SIGNATURE}`);
  });

  it('should prefer the class when an interface shares its name', () => {
    const file = parseSkeleton('export interface Ops { extra(): void }\nexport class Ops {}\n');
    assert.strictEqual(spliceMembers(file, 'Ops', [callable('relu')]).kind, 'class');
  });

  it('should attach doc comments', () => {
    const file = parseSkeleton('export class Ops {}\n');
    spliceMembers(file, 'Ops', [{ ...callable('relu'), docComment: 'Rectified linear unit.\n\n@returns The resulting arrays' }]);
    const code = printNode(file);

    assert.strictEqual(lineContaining(code, 'Rectified'), '* Rectified linear unit.');
    assert.strictEqual(lineContaining(code, '@returns'), '* @returns The resulting arrays');
  });

  it('should leave the file untouched without callables', () => {
    const file = parseSkeleton('export class Ops {}\n');
    assert.deepStrictEqual(spliceMembers(file, 'Ops', []), { kind: 'class', members: [] });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  it('should fail when the target is missing', () => {
    const file = parseSkeleton('export class Other {}\n');
    assert.throws(() => spliceMembers(file, 'Ops', [callable('relu')], { filePath: 'skeleton.ts' }), {
      name: 'SpliceError',
      code: 'ERR_SPLICE_TARGET_MISSING',
      message: 'Splice target "Ops" not found in skeleton',
    });
  });

  it('should name what was found for a wrongly shaped target', () => {
    const file = parseSkeleton('export function Ops() {}\n');
    assert.throws(() => spliceMembers(file, 'Ops', [callable('relu')]), {
      code: 'ERR_SPLICE_TARGET_INVALID',
      message:
        'Splice target "Ops" must be a class, a namespace or a const object literal; found function declaration at line 1',
    });
  });

  it('should reject objects bound with let', () => {
    const file = parseSkeleton('export let ops = {};\n');
    assert.throws(() => spliceMembers(file, 'ops', [callable('relu')]), {
      code: 'ERR_SPLICE_TARGET_INVALID',
      message:
        'Splice target "ops" must be a class, a namespace or a const object literal; ' +
        'found variable not initialised with an object literal by const at line 1',
    });
  });

  it('should reject ambient classes', () => {
    const file = parseSkeleton('export declare class Ops {}\n');
    assert.throws(() => spliceMembers(file, 'Ops', []), {
      code: 'ERR_SPLICE_TARGET_INVALID',
      message:
        'Splice target "Ops" must be a class, a namespace or a const object literal; found ambient class declaration at line 1',
    });
  });

  it('should fail when the target is declared twice', () => {
    const file = parseSkeleton('export class Ops {}\nexport namespace Ops {}\n');
    assert.throws(() => spliceMembers(file, 'Ops', []), {
      code: 'ERR_SPLICE_TARGET_AMBIGUOUS',
      message: 'Splice target "Ops" is declared 2 times (lines 1, 2)',
    });
  });

  it('should refuse to overwrite a hand-written member', () => {
    const file = parseSkeleton('export class Ops {\n  static relu(): void {}\n}\n');
    assert.throws(() => spliceMembers(file, 'Ops', [callable('relu')]), {
      code: 'ERR_SPLICE_MEMBER_CONFLICT',
      message: 'Member "relu" (operator "relu") already exists in "Ops"',
    });
  });

  it('should see bodiless method declarations', () => {
    const file = parseSkeleton('export abstract class Ops {\n  abstract relu(): void;\n}\n');
    assert.throws(() => spliceMembers(file, 'Ops', [callable('relu')]), {
      code: 'ERR_SPLICE_MEMBER_CONFLICT',
      message: 'Member "relu" (operator "relu") already exists in "Ops"',
    });
  });

  it('should refuse two callables with the same member name', () => {
    const file = parseSkeleton('export const ops = { kind: "eager" };\n');
    assert.throws(() => spliceMembers(file, 'ops', [callable('relu'), { ...callable('Relu'), name: 'relu' }]), {
      code: 'ERR_SPLICE_MEMBER_CONFLICT',
      message: 'Member "relu" (operator "Relu") already exists in "ops"',
    });
  });

  it('should see namespace members', () => {
    const file = parseSkeleton('export namespace ops {\n  export function relu(): void {}\n}\n');
    assert.throws(() => spliceMembers(file, 'ops', [callable('relu')]), { code: 'ERR_SPLICE_MEMBER_CONFLICT' });
  });
});
