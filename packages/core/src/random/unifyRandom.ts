/**
 * Random-sampling unification.
 *
 * The registry exposes most distributions twice: `_random_<dist>` takes
 * scalar parameters, `_sample_<dist>` takes tensors of parameters. Both are
 * merged into one `<dist>` descriptor whose distribution parameters share a
 * generic type, and the generated body picks the native operator per call.
 *
 * The two families also disagree on some argument names (`loc`/`scale` vs
 * `mu`/`sigma`). Descriptors use the canonical names; every target records
 * how to map them back to its own names.
 */

import type {
  ArgDescriptor,
  FunctionDescriptor,
  RandomDescriptor,
  RandomFamily,
  RandomTarget,
} from '@opbind/types';

export const RANDOM_PREFIX = '_random_';
export const SAMPLE_PREFIX = '_sample_';

/** Native argument name → canonical name */
export const CANONICAL_ARG_NAMES: Readonly<Record<string, string>> = {
  loc: 'mu',
  scale: 'sigma',
};

export const GENERIC_TYPE_NAME = 'T';

export function isRandomOperator(name: string): boolean {
  return name.startsWith(RANDOM_PREFIX) || name.startsWith(SAMPLE_PREFIX);
}

export function canonicalDistributionName(opName: string): string {
  return opName.replace(/^_/, '').replace(/(random|sample)_/g, '');
}

/**
 * Rename an argument to its canonical name.
 */
export function canonicalArg(arg: ArgDescriptor): ArgDescriptor {
  const canonical = Object.hasOwn(CANONICAL_ARG_NAMES, arg.name) ? CANONICAL_ARG_NAMES[arg.name] : arg.name;
  return canonical === arg.name ? arg : { ...arg, name: canonical };
}

/**
 * Turn one `_random_*` / `_sample_*` descriptor into a single-target
 * distribution descriptor.
 */
export function unifyRandom(func: FunctionDescriptor): RandomDescriptor {
  const family: RandomFamily = func.name.startsWith(RANDOM_PREFIX) ? 'random' : 'sample';
  const nativeArgNames: Record<string, string> = {};

  const args = func.args.map((arg) => {
    const renamed = canonicalArg(arg);
    if (renamed.name !== arg.name) {
      nativeArgNames[renamed.name] = arg.name;
    }
    if (renamed.type.kind === 'handle' || renamed.type.kind === 'number') {
      return { ...renamed, type: { kind: 'generic' as const, name: GENERIC_TYPE_NAME } };
    }
    return renamed;
  });

  const target: RandomTarget = { family, opName: func.name, nativeArgNames };

  return {
    ...func,
    name: canonicalDistributionName(func.name),
    args,
    targets: [target],
  };
}

/**
 * Distribution descriptors for the typed random surface.
 *
 * Input order does not matter: operators are visited by native name, so
 * each distribution keeps the arguments of its `random` variant when it has
 * one. Optionality is taken from that variant as well; the `sample` variant
 * may disagree. Output is sorted by canonical name.
 */
export function typeSafeRandomFunctionsToGenerate(descriptors: FunctionDescriptor[]): RandomDescriptor[] {
  const byName = new Map<string, RandomDescriptor>();

  const candidates = descriptors
    .filter(d => isRandomOperator(d.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const func of candidates) {
    const unified = unifyRandom(func);
    const existing = byName.get(unified.name);
    if (!existing) {
      byName.set(unified.name, unified);
      continue;
    }
    for (const target of unified.targets) {
      if (!existing.targets.some(t => t.opName === target.opName)) {
        existing.targets.push(target);
      }
    }
  }

  return [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
