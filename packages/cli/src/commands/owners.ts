/**
 * Owners command - resolve owners of generated files from an ownership manifest
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { FileAccessError, parseOwnershipManifest, resolveOwners } from '@opbind/core';
import type { OwnershipMatch } from '@opbind/types';
import { exitWithFailure } from '../utils/errorFormatter.js';
import { parseFormat } from '../utils/outputFormat.js';

interface OwnersOptions {
  manifest: string;
  format: string;
}

export function readManifest(manifestPath: string): string {
  try {
    return readFileSync(manifestPath, 'utf-8');
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new FileAccessError(
      `Cannot read ownership manifest ${manifestPath}: ${error.message}`,
      'ERR_FILE_UNREADABLE',
      { filePath: manifestPath }
    );
  }
}

export function ownersFor(manifestText: string, paths: string[]): OwnershipMatch[] {
  const rules = parseOwnershipManifest(manifestText);
  return paths.map(path => resolveOwners(rules, path));
}

export function formatMatch(match: OwnershipMatch): string {
  if (match.owners.length === 0) {
    return `${match.path}  (unowned)`;
  }
  const rule = match.rule ? `  [line ${match.rule.line}: ${match.rule.pattern}]` : '';
  return `${match.path}  ${match.owners.join(' ')}${rule}`;
}

export const ownersCommand = new Command('owners')
  .description('Show the owners of paths according to an ownership manifest')
  .argument('<paths...>', 'Paths relative to the repository root')
  .requiredOption('-m, --manifest <path>', 'Ownership manifest (CODEOWNERS format)')
  .option('-f, --format <format>', 'Output format: text or json', 'text')
  .addHelpText('after', `
Examples:
  opbind owners generated/SymbolAPI.ts -m CODEOWNERS
  opbind owners generated/*.ts -m .github/CODEOWNERS -f json
`)
  .action((paths: string[], options: OwnersOptions) => {
    try {
      const format = parseFormat(options.format);
      const matches = ownersFor(readManifest(options.manifest), paths);

      if (format === 'json') {
        console.log(JSON.stringify(matches, null, 2));
        return;
      }
      for (const match of matches) {
        console.log(formatMatch(match));
      }
    } catch (err) {
      exitWithFailure(err);
    }
  });
