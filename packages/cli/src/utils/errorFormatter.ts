/**
 * Standardized error formatting for CLI commands
 *
 * Provides consistent error messages across all CLI commands.
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { OpbindError } from '@opbind/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Config file not found', [
 *   'Create opbind.config.yaml or pass --config <path>'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

export interface FormattedError {
  title: string;
  nextSteps: string[];
}

/**
 * Title and next steps for any thrown value. opbind errors carry their code
 * and suggestion; anything else is reported by message.
 */
export function formatError(err: unknown): FormattedError {
  if (err instanceof OpbindError) {
    const nextSteps: string[] = [];
    if (err.suggestion) nextSteps.push(err.suggestion);
    if (typeof err.context.filePath === 'string') nextSteps.push(`File: ${err.context.filePath}`);
    nextSteps.push(`Code: ${err.code}`);
    return { title: err.message, nextSteps };
  }
  if (err instanceof Error) {
    return { title: err.message, nextSteps: [] };
  }
  return { title: String(err), nextSteps: [] };
}

export function exitWithFailure(err: unknown): never {
  const { title, nextSteps } = formatError(err);
  exitWithError(title, nextSteps);
}
