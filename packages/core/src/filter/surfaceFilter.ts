/**
 * Surface filtering: which descriptors a surface exposes, and under what member names.
 *
 * Policy:
 * - names starting with `_` are internal and never exposed...
 * - ...except `_contrib_*` names, which are exposed when the contrib flag is set
 */

import type { FunctionDescriptor } from '@opbind/types';
import type { IdentifierPolicy } from '../normalize/identifiers.js';

export const INTERNAL_PREFIX = '_';
export const CONTRIB_PREFIX = '_contrib_';

/** Operators that need hand-written bindings */
export const DEFAULT_DENY_LIST: readonly string[] = ['Custom'];

export interface SurfaceFilterOptions {
  contrib: boolean;
  /** Only consulted by typeSafeFunctionsToGenerate */
  denyList?: readonly string[];
}

export function isExposed(name: string, contrib: boolean): boolean {
  if (contrib) {
    return name.startsWith(CONTRIB_PREFIX) || !name.startsWith(INTERNAL_PREFIX);
  }
  return !name.startsWith(INTERNAL_PREFIX);
}

/**
 * Descriptors for the untyped surface.
 */
export function functionsToGenerate<T extends FunctionDescriptor>(
  descriptors: T[],
  options: SurfaceFilterOptions
): T[] {
  return descriptors.filter(d => isExposed(d.name, options.contrib));
}

/**
 * Descriptors for the typed surface: the same policy minus the deny-list.
 */
export function typeSafeFunctionsToGenerate<T extends FunctionDescriptor>(
  descriptors: T[],
  options: SurfaceFilterOptions
): T[] {
  const denied = new Set(options.denyList ?? DEFAULT_DENY_LIST);
  return functionsToGenerate(descriptors, options).filter(d => !denied.has(d.name));
}

/**
 * Member name for every descriptor, keyed by descriptor name.
 *
 * In contrib mode `_contrib_foo` becomes `foo`, unless another exposed
 * descriptor already claims `foo`; then the full name is kept.
 */
export function assignMemberNames(
  descriptors: FunctionDescriptor[],
  contrib: boolean,
  policy: IdentifierPolicy
): Map<string, string> {
  const claimed = new Set(
    descriptors.filter(d => !d.name.startsWith(CONTRIB_PREFIX)).map(d => policy.memberName(d.name))
  );

  const names = new Map<string, string>();
  for (const d of descriptors) {
    let member = policy.memberName(d.name);
    if (contrib && d.name.startsWith(CONTRIB_PREFIX)) {
      const stripped = policy.memberName(d.name.slice(CONTRIB_PREFIX.length));
      if (!claimed.has(stripped)) {
        member = stripped;
        claimed.add(stripped);
      }
    }
    names.set(d.name, member);
  }
  return names;
}
