/**
 * Callable builders.
 *
 * Every generated body has the same outline:
 *
 *   const params: Record<string, unknown> = {};
 *   const inputs: Handle[] = [];
 *   // one statement per argument, in registry order
 *   return callee("op", ...);
 *
 * Handles go to `inputs`, everything else to `params` under the native
 * argument name, so parameter renames never reach the runtime.
 */

import * as t from '@babel/types';
import type {
  ArgDescriptor,
  FunctionDescriptor,
  RandomDescriptor,
  RandomTarget,
  SurfaceProfile,
} from '@opbind/types';
import { IdentifierPolicy } from '../normalize/identifiers.js';
import { isArrayType } from '../normalize/typeMapping.js';
import { GENERIC_TYPE_NAME } from '../random/unifyRandom.js';
import { buildDocComment, type DocParam } from './docComment.js';
import { recordType, toTSType, typedIdentifier, type CallableParam, type GeneratedCallable } from './types.js';

interface ArgBinding {
  arg: ArgDescriptor;
  /** Fresh expression reading the argument's value */
  value: () => t.Expression;
  /** Optional array bound with a `[]` default */
  defaultsToEmpty: boolean;
}

/**
 * Expression for a callee name; dotted names become member expressions.
 */
export function calleeExpression(callee: string): t.Expression {
  const [head, ...rest] = callee.split('.');
  let expr: t.Expression = t.identifier(head);
  for (const part of rest) {
    expr = t.memberExpression(expr, t.identifier(part));
  }
  return expr;
}

function handleArrayType(profile: SurfaceProfile): t.TSArrayType {
  return t.tsArrayType(t.tsTypeReference(t.identifier(profile.handleType)));
}

function paramsRecordType(): t.TSTypeReference {
  return recordType(t.tsUnknownKeyword());
}

function localDeclarations(profile: SurfaceProfile): t.Statement[] {
  return [
    t.variableDeclaration('const', [
      t.variableDeclarator(typedIdentifier('params', paramsRecordType()), t.objectExpression([])),
    ]),
    t.variableDeclaration('const', [
      t.variableDeclarator(typedIdentifier('inputs', handleArrayType(profile)), t.arrayExpression([])),
    ]),
  ];
}

function paramSlot(key: string): t.MemberExpression {
  return t.memberExpression(t.identifier('params'), t.stringLiteral(key), true);
}

function setParam(key: string, value: t.Expression): t.Statement {
  return t.expressionStatement(t.assignmentExpression('=', paramSlot(key), value));
}

function pushInput(value: t.Expression | t.SpreadElement): t.Statement {
  return t.expressionStatement(
    t.callExpression(t.memberExpression(t.identifier('inputs'), t.identifier('push')), [value])
  );
}

function isDefined(value: t.Expression): t.Expression {
  return t.binaryExpression('!==', value, t.identifier('undefined'));
}

function block(statement: t.Statement): t.BlockStatement {
  return t.isBlockStatement(statement) ? statement : t.blockStatement([statement]);
}

function when(test: t.Expression, consequent: t.Statement, alternate?: t.Statement): t.IfStatement {
  return t.ifStatement(test, block(consequent), alternate ? block(alternate) : null);
}

function isNumber(value: t.Expression): t.Expression {
  return t.binaryExpression('===', t.unaryExpression('typeof', value), t.stringLiteral('number'));
}

function argStatement(binding: ArgBinding): t.Statement {
  const { arg, value } = binding;
  let statement: t.Statement;

  switch (arg.type.kind) {
    case 'handle':
      statement = pushInput(value());
      break;
    case 'handleArray':
      statement = pushInput(t.spreadElement(value()));
      break;
    case 'numberArray':
      statement = setParam(arg.name, value());
      if (binding.defaultsToEmpty) {
        return when(
          t.binaryExpression('>', t.memberExpression(value(), t.identifier('length')), t.numericLiteral(0)),
          statement
        );
      }
      break;
    case 'generic':
      statement = when(isNumber(value()), setParam(arg.name, value()), pushInput(value()));
      break;
    default:
      statement = setParam(arg.name, value());
  }

  return arg.optional && !binding.defaultsToEmpty ? when(isDefined(value()), statement) : statement;
}

/**
 * Required arguments first, each group in registry order.
 */
function signatureOrder(args: ArgDescriptor[]): ArgDescriptor[] {
  return [...args.filter(a => !a.optional), ...args.filter(a => a.optional)];
}

function docParam(name: string, arg: ArgDescriptor): DocParam {
  return {
    name,
    description: arg.description,
    ...(arg.defaultValue !== undefined ? { defaultValue: arg.defaultValue } : {}),
  };
}

interface BoundArguments {
  params: CallableParam[];
  bindings: ArgBinding[];
  docs: DocParam[];
}

/**
 * One positional parameter per argument (graph and eager surfaces).
 */
function bindPositional(args: ArgDescriptor[], profile: SurfaceProfile, policy: IdentifierPolicy): BoundArguments {
  const names = policy.assign(args.map(a => a.name));
  const safe = (arg: ArgDescriptor): string => names.get(arg.name) ?? policy.safeName(arg.name);

  const params = signatureOrder(args).map((arg): CallableParam => {
    const type = toTSType(arg.type, profile);
    if (arg.optional && isArrayType(arg.type)) {
      return t.assignmentPattern(typedIdentifier(safe(arg), type), t.arrayExpression([]));
    }
    return typedIdentifier(safe(arg), type, arg.optional);
  });

  const bindings = args.map((arg): ArgBinding => ({
    arg,
    value: () => t.identifier(safe(arg)),
    defaultsToEmpty: arg.optional && isArrayType(arg.type),
  }));

  const docs = signatureOrder(args).map(arg => docParam(safe(arg), arg));
  return { params, bindings, docs };
}

function argsMember(key: string): t.MemberExpression {
  return t.isValidIdentifier(key, false)
    ? t.memberExpression(t.identifier('args'), t.identifier(key))
    : t.memberExpression(t.identifier('args'), t.stringLiteral(key), true);
}

/**
 * A single `args` object keyed by native argument name (interop surface).
 * Optional array members read as `[]` when absent.
 */
function bindArgumentObject(args: ArgDescriptor[], profile: SurfaceProfile): BoundArguments {
  if (args.length === 0) {
    return { params: [], bindings: [], docs: [] };
  }

  const members = args.map((arg) => {
    const key = t.isValidIdentifier(arg.name, false) ? t.identifier(arg.name) : t.stringLiteral(arg.name);
    const signature = t.tsPropertySignature(key, t.tsTypeAnnotation(toTSType(arg.type, profile)));
    if (arg.optional) signature.optional = true;
    return signature;
  });

  const id = typedIdentifier('args', t.tsTypeLiteral(members));
  const param: CallableParam = args.every(a => a.optional) ? t.assignmentPattern(id, t.objectExpression([])) : id;

  const bindings = args.map((arg): ArgBinding => {
    const defaultsToEmpty = arg.optional && isArrayType(arg.type);
    return {
      arg,
      value: defaultsToEmpty
        ? () => t.logicalExpression('??', argsMember(arg.name), t.arrayExpression([]))
        : () => argsMember(arg.name),
      defaultsToEmpty,
    };
  });

  const docs = args.map(arg => docParam(`args.${arg.name}`, arg));
  return { params: [param], bindings, docs };
}

function trailingParams(profile: SurfaceProfile): CallableParam[] {
  switch (profile.kind) {
    case 'graph':
      return [
        typedIdentifier('name', t.tsStringKeyword(), true),
        typedIdentifier('attr', recordType(t.tsStringKeyword()), true),
      ];
    case 'eager':
      return [typedIdentifier('out', t.tsTypeReference(t.identifier(profile.handleType)), true)];
    case 'interop':
      return [];
  }
}

function trailingStatements(profile: SurfaceProfile): t.Statement[] {
  if (profile.kind === 'eager') {
    return [when(isDefined(t.identifier('out')), setParam('out', t.identifier('out')))];
  }
  return [];
}

function returnCall(profile: SurfaceProfile, op: t.Expression): t.ReturnStatement {
  const args: t.Expression[] =
    profile.kind === 'graph'
      ? [op, t.identifier('name'), t.identifier('attr'), t.identifier('inputs'), t.identifier('params')]
      : [op, t.identifier('inputs'), t.identifier('params')];
  return t.returnStatement(t.callExpression(calleeExpression(profile.callee), args));
}

function bindArguments(args: ArgDescriptor[], profile: SurfaceProfile, policy: IdentifierPolicy): BoundArguments {
  return profile.kind === 'interop' ? bindArgumentObject(args, profile) : bindPositional(args, profile, policy);
}

/**
 * Typed callable: one parameter per operator argument.
 */
export function buildTypedCallable(
  descriptor: FunctionDescriptor,
  memberName: string,
  profile: SurfaceProfile,
  policy: IdentifierPolicy = new IdentifierPolicy(profile.kind)
): GeneratedCallable {
  const bound = bindArguments(descriptor.args, profile, policy);

  const body = t.blockStatement([
    ...localDeclarations(profile),
    ...bound.bindings.map(argStatement),
    ...trailingStatements(profile),
    returnCall(profile, t.stringLiteral(descriptor.name)),
  ]);

  return {
    name: memberName,
    opName: descriptor.name,
    typeParameters: null,
    params: [...bound.params, ...trailingParams(profile)],
    returnType: t.tsTypeAnnotation(toTSType(descriptor.returnType, profile)),
    body,
    docComment: buildDocComment(descriptor, profile.kind, bound.docs),
  };
}

/**
 * Untyped callable: `(inputs = [], params = {})` plus the graph surface's
 * `name` and `attr`, passed through to the callee unchanged.
 */
export function buildUntypedCallable(
  descriptor: FunctionDescriptor,
  memberName: string,
  profile: SurfaceProfile
): GeneratedCallable {
  const params: CallableParam[] = [
    t.assignmentPattern(typedIdentifier('inputs', handleArrayType(profile)), t.arrayExpression([])),
    t.assignmentPattern(typedIdentifier('params', paramsRecordType()), t.objectExpression([])),
  ];
  if (profile.kind === 'graph') {
    params.push(...trailingParams(profile));
  }

  const docs: DocParam[] = [
    { name: 'inputs', description: 'Input handles, in positional order' },
    { name: 'params', description: 'Operator parameters keyed by native argument name' },
  ];

  return {
    name: memberName,
    opName: descriptor.name,
    typeParameters: null,
    params,
    returnType: t.tsTypeAnnotation(toTSType(descriptor.returnType, profile)),
    body: t.blockStatement([returnCall(profile, t.stringLiteral(descriptor.name))]),
    docComment: buildDocComment(
      descriptor,
      profile.kind,
      docs,
      profile.kind === 'graph' ? undefined : []
    ),
  };
}

function targetOf(descriptor: RandomDescriptor, family: RandomTarget['family']): RandomTarget | undefined {
  return descriptor.targets.find(target => target.family === family);
}

/**
 * `const target = <every generic argument absent or a number> ? random : sample;`
 */
function targetSelection(descriptor: RandomDescriptor, bindings: ArgBinding[]): t.Statement {
  const random = targetOf(descriptor, 'random');
  const sample = targetOf(descriptor, 'sample');
  const declare = (init: t.Expression): t.Statement =>
    t.variableDeclaration('const', [t.variableDeclarator(t.identifier('target'), init)]);

  if (!random || !sample) {
    const only = random ?? sample ?? descriptor.targets[0];
    return declare(t.stringLiteral(only ? only.opName : descriptor.name));
  }

  const scalarChecks = bindings
    .filter(b => b.arg.type.kind === 'generic')
    .map(b => t.logicalExpression('||', t.binaryExpression('===', b.value(), t.identifier('undefined')), isNumber(b.value())));

  if (scalarChecks.length === 0) {
    return declare(t.stringLiteral(random.opName));
  }

  const test = scalarChecks.reduce((acc, check) => t.logicalExpression('&&', acc, check));
  return declare(t.conditionalExpression(test, t.stringLiteral(random.opName), t.stringLiteral(sample.opName)));
}

/**
 * Move canonical keys back to the chosen target's own argument names.
 */
function renameStatements(descriptor: RandomDescriptor): t.Statement[] {
  const statements: t.Statement[] = [];
  for (const target of descriptor.targets) {
    const moves = Object.entries(target.nativeArgNames).map(([canonical, native]) =>
      when(
        t.binaryExpression('in', t.stringLiteral(canonical), t.identifier('params')),
        t.blockStatement([
          setParam(native, paramSlot(canonical)),
          t.expressionStatement(t.unaryExpression('delete', paramSlot(canonical))),
        ])
      )
    );
    if (moves.length === 0) continue;
    if (descriptor.targets.length === 1) {
      statements.push(...moves);
    } else {
      statements.push(
        when(
          t.binaryExpression('===', t.identifier('target'), t.stringLiteral(target.opName)),
          t.blockStatement(moves)
        )
      );
    }
  }
  return statements;
}

/**
 * Random callable: distribution parameters share the type parameter `T`
 * and the native operator is chosen per call.
 *
 * @throws Error for the interop surface, which has no random callables
 */
export function buildRandomCallable(
  descriptor: RandomDescriptor,
  memberName: string,
  profile: SurfaceProfile,
  policy: IdentifierPolicy = new IdentifierPolicy(profile.kind)
): GeneratedCallable {
  if (profile.kind === 'interop') {
    throw new Error('Random callables are generated for the graph and eager surfaces only');
  }

  const bound = bindPositional(descriptor.args, profile, policy);
  const hasGeneric = descriptor.args.some(a => a.type.kind === 'generic');

  const typeParameters = hasGeneric
    ? t.tsTypeParameterDeclaration([
        t.tsTypeParameter(
          t.tsUnionType([t.tsTypeReference(t.identifier(profile.handleType)), t.tsNumberKeyword()]),
          null,
          GENERIC_TYPE_NAME
        ),
      ])
    : null;

  const body = t.blockStatement([
    ...localDeclarations(profile),
    ...bound.bindings.map(argStatement),
    ...trailingStatements(profile),
    targetSelection(descriptor, bound.bindings),
    ...renameStatements(descriptor),
    returnCall(profile, t.identifier('target')),
  ]);

  return {
    name: memberName,
    opName: descriptor.targets[0]?.opName ?? descriptor.name,
    typeParameters,
    params: [...bound.params, ...trailingParams(profile)],
    returnType: t.tsTypeAnnotation(toTSType(descriptor.returnType, profile)),
    body,
    docComment: buildDocComment(descriptor, profile.kind, bound.docs),
  };
}
