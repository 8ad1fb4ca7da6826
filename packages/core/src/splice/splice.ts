/**
 * Splice generated callables into a parsed skeleton.
 *
 * A skeleton is an ordinary TypeScript module that declares the target the
 * generated members go into. Three shapes are accepted:
 *
 *   class Ops { ... }               → class methods (static by default)
 *   namespace ops { ... }           → exported function declarations
 *   const ops = { ... };            → object methods
 *
 * Any other declaration carrying the target name fails the run.
 */

import traverseModule from '@babel/traverse';
import * as t from '@babel/types';
import type { SpliceTargetKind } from '@opbind/types';
import { SpliceError } from '../errors/OpbindError.js';
import { getTraverseFunction } from '../emit/babelInterop.js';
import { attachDocComment } from '../emit/docComment.js';
import type { GeneratedCallable } from '../emit/types.js';

const traverse = getTraverseFunction(traverseModule);

export interface SpliceOptions {
  /** Class targets only: emit `static` methods (default true) */
  staticMembers?: boolean;
  /** Skeleton path, for error context */
  filePath?: string;
}

export interface SpliceResult {
  kind: SpliceTargetKind;
  members: string[];
}

type SpliceTarget =
  | { kind: 'class'; node: t.ClassBody; line: number | undefined }
  | { kind: 'namespace'; node: t.TSModuleBlock; line: number | undefined }
  | { kind: 'object'; node: t.ObjectExpression; line: number | undefined };

interface InvalidTarget {
  description: string;
  line: number | undefined;
}

interface TargetScan {
  valid: SpliceTarget[];
  invalid: InvalidTarget[];
}

function lineOf(node: t.Node): number | undefined {
  return node.loc?.start.line;
}

function hasName(id: t.Node | null | undefined, name: string): boolean {
  return t.isIdentifier(id) && id.name === name;
}

function unwrapObjectLiteral(init: t.Expression | null | undefined): t.ObjectExpression | null {
  let expr = init;
  while (t.isTSAsExpression(expr) || t.isTSSatisfiesExpression(expr) || t.isParenthesizedExpression(expr)) {
    expr = expr.expression;
  }
  return t.isObjectExpression(expr) ? expr : null;
}

function scanTargets(file: t.File, targetName: string): TargetScan {
  const scan: TargetScan = { valid: [], invalid: [] };

  const reject = (description: string, node: t.Node & { id?: t.Node | null }): void => {
    if (hasName(node.id, targetName)) {
      scan.invalid.push({ description, line: lineOf(node) });
    }
  };

  traverse(file, {
    ClassDeclaration(path) {
      const { node } = path;
      if (!hasName(node.id, targetName)) return;
      if (node.declare) {
        scan.invalid.push({ description: 'ambient class declaration', line: lineOf(node) });
        return;
      }
      scan.valid.push({ kind: 'class', node: node.body, line: lineOf(node) });
    },

    TSModuleDeclaration(path) {
      const { node } = path;
      if (!hasName(node.id, targetName)) return;
      if (node.declare || !t.isTSModuleBlock(node.body)) {
        scan.invalid.push({ description: 'ambient or dotted namespace', line: lineOf(node) });
        return;
      }
      scan.valid.push({ kind: 'namespace', node: node.body, line: lineOf(node) });
    },

    VariableDeclarator(path) {
      const { node } = path;
      if (!hasName(node.id, targetName)) return;
      const declaration = path.parent;
      const literal = unwrapObjectLiteral(node.init);
      if (t.isVariableDeclaration(declaration) && declaration.kind === 'const' && literal) {
        scan.valid.push({ kind: 'object', node: literal, line: lineOf(node) });
        return;
      }
      scan.invalid.push({ description: 'variable not initialised with an object literal by const', line: lineOf(node) });
    },

    FunctionDeclaration(path) {
      reject('function declaration', path.node);
    },
    TSInterfaceDeclaration(path) {
      reject('interface', path.node);
    },
    TSEnumDeclaration(path) {
      reject('enum', path.node);
    },
    TSTypeAliasDeclaration(path) {
      reject('type alias', path.node);
    },
  });

  return scan;
}

function locate(file: t.File, targetName: string, filePath: string | undefined): SpliceTarget {
  const { valid, invalid } = scanTargets(file, targetName);

  if (valid.length === 1) {
    return valid[0];
  }

  if (valid.length > 1) {
    throw new SpliceError(
      `Splice target "${targetName}" is declared ${valid.length} times ` +
        `(lines ${valid.map(v => v.line ?? '?').join(', ')})`,
      'ERR_SPLICE_TARGET_AMBIGUOUS',
      { filePath, target: targetName },
      'Rename all but one declaration in the skeleton'
    );
  }

  if (invalid.length > 0) {
    const found = invalid.map(i => `${i.description} at line ${i.line ?? '?'}`).join('; ');
    throw new SpliceError(
      `Splice target "${targetName}" must be a class, a namespace or a const object literal; found ${found}`,
      'ERR_SPLICE_TARGET_INVALID',
      { filePath, target: targetName }
    );
  }

  throw new SpliceError(
    `Splice target "${targetName}" not found in skeleton`,
    'ERR_SPLICE_TARGET_MISSING',
    { filePath, target: targetName },
    `Declare "class ${targetName} {}" in the skeleton`
  );
}

function keyName(key: t.Node, computed = false): string | null {
  if (!computed && t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  return null;
}

function existingMembers(target: SpliceTarget): Set<string> {
  const names = new Set<string>();
  const add = (name: string | null) => {
    if (name !== null) names.add(name);
  };

  switch (target.kind) {
    case 'class':
      for (const member of target.node.body) {
        if (
          t.isClassMethod(member) ||
          t.isClassProperty(member) ||
          t.isTSDeclareMethod(member) ||
          t.isClassAccessorProperty(member)
        ) {
          add(keyName(member.key, member.computed));
        }
      }
      break;
    case 'object':
      for (const member of target.node.properties) {
        if (t.isObjectProperty(member) || t.isObjectMethod(member)) {
          add(keyName(member.key, member.computed));
        }
      }
      break;
    case 'namespace':
      for (const statement of target.node.body) {
        const declaration = t.isExportNamedDeclaration(statement) ? statement.declaration : statement;
        if (t.isFunctionDeclaration(declaration) || t.isClassDeclaration(declaration) || t.isTSModuleDeclaration(declaration)) {
          add(t.isIdentifier(declaration.id) ? declaration.id.name : null);
        } else if (t.isVariableDeclaration(declaration)) {
          for (const d of declaration.declarations) {
            add(t.isIdentifier(d.id) ? d.id.name : null);
          }
        }
      }
      break;
  }
  return names;
}

function toClassMethod(callable: GeneratedCallable, isStatic: boolean): t.ClassMethod {
  const method = t.classMethod('method', t.identifier(callable.name), callable.params, callable.body, false, isStatic);
  method.typeParameters = callable.typeParameters;
  method.returnType = callable.returnType;
  attachDocComment(method, callable.docComment);
  return method;
}

function toNamespaceFunction(callable: GeneratedCallable): t.ExportNamedDeclaration {
  const fn = t.functionDeclaration(t.identifier(callable.name), callable.params, callable.body);
  fn.typeParameters = callable.typeParameters;
  fn.returnType = callable.returnType;
  const exported = t.exportNamedDeclaration(fn);
  attachDocComment(exported, callable.docComment);
  return exported;
}

function toObjectMethod(callable: GeneratedCallable): t.ObjectMethod {
  const method = t.objectMethod('method', t.identifier(callable.name), callable.params, callable.body);
  method.typeParameters = callable.typeParameters;
  method.returnType = callable.returnType;
  attachDocComment(method, callable.docComment);
  return method;
}

/**
 * Append `callables` to the declaration named `targetName`, in order.
 * The file is modified in place.
 *
 * @throws SpliceError when the target is missing, ambiguous or of the wrong
 *   shape, or when a member name is already taken
 */
export function spliceMembers(
  file: t.File,
  targetName: string,
  callables: GeneratedCallable[],
  options: SpliceOptions = {}
): SpliceResult {
  const target = locate(file, targetName, options.filePath);

  const taken = existingMembers(target);
  for (const callable of callables) {
    if (taken.has(callable.name)) {
      throw new SpliceError(
        `Member "${callable.name}" (operator "${callable.opName}") already exists in "${targetName}"`,
        'ERR_SPLICE_MEMBER_CONFLICT',
        { filePath: options.filePath, target: targetName, operator: callable.opName },
        'Remove the hand-written member or add the operator to the deny-list'
      );
    }
    taken.add(callable.name);
  }

  switch (target.kind) {
    case 'class': {
      const isStatic = options.staticMembers ?? true;
      target.node.body.push(...callables.map(c => toClassMethod(c, isStatic)));
      break;
    }
    case 'namespace':
      target.node.body.push(...callables.map(toNamespaceFunction));
      break;
    case 'object':
      target.node.properties.push(...callables.map(toObjectMethod));
      break;
  }

  return { kind: target.kind, members: callables.map(c => c.name) };
}
