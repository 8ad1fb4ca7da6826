/**
 * SnapshotRegistry - OperatorRegistry backed by a registry snapshot
 *
 * A snapshot is the native registry dumped to JSON or YAML: one entry per
 * operator with its arguments in registration order. Aliases are listed as
 * names of their own and resolve to the aliased operator's handle, the way
 * the native registry resolves them.
 *
 * Usage:
 *   const registry = loadRegistrySnapshot('registry.yaml');
 *   for (const name of registry.listAllOpNames()) { ... }
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import { parse as parseYAML } from 'yaml';
import {
  brandHandle,
  type AtomicSymbolInfo,
  type OperatorRegistry,
  type OpHandle,
  type RegistrySnapshot,
  type SnapshotArgument,
  type SnapshotOperator,
} from '@opbind/types';
import { FileAccessError, RegistryError } from '../errors/OpbindError.js';

export class SnapshotRegistry implements OperatorRegistry {
  private readonly operators: SnapshotOperator[];
  private readonly names: string[] = [];
  private readonly handles = new Map<string, OpHandle>();

  constructor(snapshot: RegistrySnapshot) {
    this.operators = snapshot.operators;

    this.operators.forEach((op, index) => {
      const handle = brandHandle(index);
      for (const name of [op.name, ...(op.aliases ?? [])]) {
        if (this.handles.has(name)) {
          throw new RegistryError(
            `Operator name "${name}" is registered twice`,
            'ERR_REGISTRY_SNAPSHOT_INVALID',
            { operator: name }
          );
        }
        this.handles.set(name, handle);
        this.names.push(name);
      }
    });
  }

  listAllOpNames(): string[] {
    return [...this.names];
  }

  getOpHandle(name: string): OpHandle | undefined {
    return this.handles.get(name);
  }

  getAtomicSymbolInfo(handle: OpHandle): AtomicSymbolInfo {
    const op = this.operators[handle];
    if (op === undefined) {
      throw new RegistryError(
        `No operator registered under handle ${handle}`,
        'ERR_REGISTRY_UNKNOWN_HANDLE',
        { handle }
      );
    }

    const args = op.arguments ?? [];
    return {
      name: op.name,
      description: op.description ?? '',
      argNames: args.map(a => a.name),
      argTypes: args.map(a => a.type),
      argDescriptions: args.map(a => a.description ?? ''),
      keyVarNumArgs: op.keyVarNumArgs ?? '',
    };
  }
}

/**
 * Read a registry snapshot from disk (.json, or YAML for anything else).
 *
 * @throws FileAccessError if the file cannot be read
 * @throws RegistryError if the content is not a valid snapshot
 */
export function loadRegistrySnapshot(filePath: string): SnapshotRegistry {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot read registry snapshot: ${filePath}`,
      'ERR_FILE_UNREADABLE',
      { filePath, reason },
      'Dump the native operator registry to this path first'
    );
  }

  let raw: unknown;
  try {
    raw = extname(filePath) === '.json' ? JSON.parse(content) : parseYAML(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RegistryError(
      `Failed to parse registry snapshot ${filePath}: ${reason}`,
      'ERR_REGISTRY_SNAPSHOT_INVALID',
      { filePath }
    );
  }

  return new SnapshotRegistry(validateSnapshot(raw, filePath));
}

function invalid(message: string, filePath?: string): RegistryError {
  return new RegistryError(`Registry snapshot error: ${message}`, 'ERR_REGISTRY_SNAPSHOT_INVALID', { filePath });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, where: string, filePath?: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`${where} must be a string, got ${typeof value}`, filePath);
  }
  return value;
}

/**
 * Validate parsed snapshot data.
 * THROWS on the first structural problem found.
 */
export function validateSnapshot(raw: unknown, filePath?: string): RegistrySnapshot {
  if (!isRecord(raw)) {
    throw invalid('root must be an object with an "operators" array', filePath);
  }
  if (!Array.isArray(raw.operators)) {
    throw invalid(`operators must be an array, got ${typeof raw.operators}`, filePath);
  }

  const operators = raw.operators.map((entry: unknown, i): SnapshotOperator => {
    if (!isRecord(entry)) {
      throw invalid(`operators[${i}] must be an object`, filePath);
    }
    if (typeof entry.name !== 'string' || !entry.name.trim()) {
      throw invalid(`operators[${i}].name must be a non-empty string`, filePath);
    }
    const where = `operators[${i}] (${entry.name})`;

    let args: SnapshotArgument[] = [];
    if (entry.arguments !== undefined && entry.arguments !== null) {
      if (!Array.isArray(entry.arguments)) {
        throw invalid(`${where}.arguments must be an array`, filePath);
      }
      args = entry.arguments.map((arg: unknown, j): SnapshotArgument => {
        if (!isRecord(arg) || typeof arg.name !== 'string' || typeof arg.type !== 'string') {
          throw invalid(`${where}.arguments[${j}] must have string "name" and "type"`, filePath);
        }
        return {
          name: arg.name,
          type: arg.type,
          description: optionalString(arg.description, `${where}.arguments[${j}].description`, filePath),
        };
      });
    }

    let aliases: string[] | undefined;
    if (entry.aliases !== undefined && entry.aliases !== null) {
      if (!Array.isArray(entry.aliases) || !entry.aliases.every((a): a is string => typeof a === 'string')) {
        throw invalid(`${where}.aliases must be an array of strings`, filePath);
      }
      aliases = entry.aliases;
    }

    return {
      name: entry.name,
      description: optionalString(entry.description, `${where}.description`, filePath),
      arguments: args,
      keyVarNumArgs: optionalString(entry.keyVarNumArgs, `${where}.keyVarNumArgs`, filePath),
      aliases,
    };
  });

  return { operators };
}
