/**
 * Safe identifiers for native argument names.
 *
 * Generated parameters must be valid TypeScript bindings and must not shadow
 * the names the generated body itself binds. The native name is kept on the
 * descriptor, so every rename is undone at the call site.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SurfaceKind } from '@opbind/types';

/** Explicit renames applied before any other rule */
export const DEFAULT_RENAMES: Readonly<Record<string, string>> = {
  var: 'vari',
  type: 'typeOf',
};

/** Locals every generated body declares */
export const BODY_LOCALS = ['params', 'inputs', 'target'] as const;

/** Parameters each surface appends after the operator's own arguments */
export const TRAILING_PARAMS: Record<SurfaceKind, readonly string[]> = {
  graph: ['name', 'attr'],
  eager: ['out'],
  interop: ['args'],
};

let reservedWords: ReadonlySet<string> | undefined;

/**
 * ECMAScript reserved words and restricted globals, read from data/reserved-words.json.
 */
export function getReservedWords(): ReadonlySet<string> {
  if (!reservedWords) {
    const path = fileURLToPath(new URL('../../data/reserved-words.json', import.meta.url));
    const words: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!Array.isArray(words) || !words.every((w): w is string => typeof w === 'string')) {
      throw new Error(`Reserved word list is not an array of strings: ${path}`);
    }
    reservedWords = new Set(words);
  }
  return reservedWords;
}

/**
 * Replace characters that cannot appear in an identifier with `_`.
 */
export function toIdentifier(raw: string): string {
  const name = raw.replace(/[^A-Za-z0-9_$]/g, '_');
  return name === '' || /^[0-9]/.test(name) ? `_${name}` : name;
}

export class IdentifierPolicy {
  private readonly renames: Readonly<Record<string, string>>;
  private readonly taken: ReadonlySet<string>;

  constructor(surface: SurfaceKind, renames: Readonly<Record<string, string>> = DEFAULT_RENAMES) {
    this.renames = renames;
    this.taken = new Set([...getReservedWords(), ...BODY_LOCALS, ...TRAILING_PARAMS[surface]]);
  }

  /**
   * Safe binding name for one native name.
   *
   * "var" → "vari", "default" → "default_", "num-args" → "num_args"
   */
  safeName(nativeName: string): string {
    if (Object.hasOwn(this.renames, nativeName)) {
      return this.renames[nativeName];
    }
    const name = toIdentifier(nativeName);
    return this.taken.has(name) ? `${name}_` : name;
  }

  /**
   * Safe names for one callable's arguments, unique within the callable.
   * Later duplicates get a numeric suffix.
   */
  assign(nativeNames: string[]): Map<string, string> {
    const result = new Map<string, string>();
    const used = new Set<string>();
    for (const nativeName of nativeNames) {
      const base = this.safeName(nativeName);
      let candidate = base;
      for (let n = 2; used.has(candidate); n++) {
        candidate = `${base}${n}`;
      }
      used.add(candidate);
      result.set(nativeName, candidate);
    }
    return result;
  }

  /**
   * Name of a generated member. Namespace members are function
   * declarations, so reserved words are suffixed here too.
   */
  memberName(nativeName: string): string {
    const name = toIdentifier(nativeName);
    return getReservedWords().has(name) ? `${name}_` : name;
  }
}
