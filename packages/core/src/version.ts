/**
 * opbind version constants.
 *
 * Reads version from @opbind/core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  throw new Error('@opbind/core package.json has no version');
}

/** Full opbind version string (e.g., "0.3.0-beta") */
export const OPBIND_VERSION: string = readPackageVersion();

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.3.0-beta" → "0.3.0"
 * "0.3.0" → "0.3.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
