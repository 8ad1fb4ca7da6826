/**
 * CODEOWNERS-style ownership manifests for generated files.
 *
 * Each non-comment line is `<pattern> <owner>...`. The last rule whose
 * pattern matches a path decides its owners.
 */

import { minimatch } from 'minimatch';
import type { OwnershipMatch, OwnershipRule } from '@opbind/types';

const MATCH_OPTIONS = { dot: true } as const;

export function parseOwnershipManifest(text: string): OwnershipRule[] {
  const rules: OwnershipRule[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const hash = lines[i].indexOf('#');
    const content = (hash === -1 ? lines[i] : lines[i].slice(0, hash)).trim();
    if (!content) continue;

    const [pattern, ...owners] = content.split(/\s+/);
    rules.push({ pattern, owners, line: i + 1 });
  }

  return rules;
}

/**
 * Glob patterns equivalent to one manifest pattern.
 *
 * "/build/"   → ["build/**"]
 * "*.ts"      → ["**\/*.ts", "**\/*.ts/**"]
 * "src/gen"   → ["src/gen", "src/gen/**"]
 * "docs/*"    → ["docs/*"]
 */
export function patternToGlobs(pattern: string): string[] {
  let base = pattern;
  const anchored = base.startsWith('/');
  if (anchored) base = base.slice(1);

  const directoryOnly = base.endsWith('/');
  if (directoryOnly) base = base.replace(/\/+$/, '');

  if (!anchored && !base.includes('/')) {
    base = `**/${base}`;
  }

  if (directoryOnly) return [`${base}/**`];
  // A trailing wildcard stops at its own level
  if (base.endsWith('*')) return [base];
  return [base, `${base}/**`];
}

function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

export function ruleMatches(rule: OwnershipRule, path: string): boolean {
  const normalized = normalizePath(path);
  return patternToGlobs(rule.pattern).some(glob => minimatch(normalized, glob, MATCH_OPTIONS));
}

/**
 * Owners of `path`. A matching rule without owners leaves the path unowned.
 */
export function resolveOwners(rules: OwnershipRule[], path: string): OwnershipMatch {
  let matched: OwnershipRule | null = null;
  for (const rule of rules) {
    if (ruleMatches(rule, path)) {
      matched = rule;
    }
  }
  return { path, owners: matched ? [...matched.owners] : [], rule: matched };
}
