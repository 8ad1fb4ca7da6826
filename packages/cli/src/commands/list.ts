/**
 * List command - show the members a surface would expose
 *
 * Reads a registry snapshot and prints one line per member, without
 * touching any skeleton. Useful to review filtering, renames and random
 * unification before running `opbind generate`.
 */

import { Command } from 'commander';
import {
  ConfigError,
  IdentifierPolicy,
  assignMemberNames,
  functionsToGenerate,
  getBackEndFunctions,
  loadRegistrySnapshot,
  typeSafeFunctionsToGenerate,
  typeSafeRandomFunctionsToGenerate,
} from '@opbind/core';
import {
  SURFACE_KINDS,
  type ArgDescriptor,
  type OperatorRegistry,
  type SurfaceKind,
  type TypeRef,
} from '@opbind/types';
import { exitWithFailure } from '../utils/errorFormatter.js';
import { parseFormat } from '../utils/outputFormat.js';

export interface ListOptions {
  registry: string;
  surface: string;
  contrib?: boolean;
  typed?: boolean;
  random?: boolean;
  format: string;
}

export interface ListEntry {
  member: string;
  /** Native operators behind the member */
  operators: string[];
  args: string[];
}

export function describeType(type: TypeRef): string {
  switch (type.kind) {
    case 'enum':
      return type.values.length > 0 ? type.values.map(v => JSON.stringify(v)).join(' | ') : 'string';
    case 'generic':
      return type.name;
    default:
      return type.kind;
  }
}

function describeArg(arg: ArgDescriptor): string {
  return `${arg.name}${arg.optional ? '?' : ''}: ${describeType(arg.type)}`;
}

function parseSurface(value: string): SurfaceKind {
  const surface = SURFACE_KINDS.find(s => s === value);
  if (surface === undefined) {
    throw new ConfigError(
      `Unknown surface "${value}"`,
      'ERR_CONFIG_INVALID',
      {},
      `Use one of: ${SURFACE_KINDS.join(', ')}`
    );
  }
  return surface;
}

export function listEntries(
  registry: OperatorRegistry,
  options: { surface: SurfaceKind; contrib: boolean; typed: boolean; random: boolean }
): ListEntry[] {
  const descriptors = getBackEndFunctions(registry, options.surface);
  const policy = new IdentifierPolicy(options.surface);

  if (options.random) {
    if (options.surface === 'interop') {
      throw new ConfigError(
        '--random requires --surface graph or eager',
        'ERR_CONFIG_INVALID'
      );
    }
    return typeSafeRandomFunctionsToGenerate(descriptors).map(d => ({
      member: policy.memberName(d.name),
      operators: d.targets.map(target => target.opName),
      args: d.args.map(describeArg),
    }));
  }

  const filterOptions = { contrib: options.contrib };
  const selected = options.typed
    ? typeSafeFunctionsToGenerate(descriptors, filterOptions)
    : functionsToGenerate(descriptors, filterOptions);
  const names = assignMemberNames(selected, options.contrib, policy);

  return selected.map(d => ({
    member: names.get(d.name) ?? policy.memberName(d.name),
    operators: [d.name],
    args: d.args.map(describeArg),
  }));
}

/**
 * `member(args)`, followed by the native operators when they differ from the member name.
 */
export function formatEntry(entry: ListEntry): string {
  const signature = `${entry.member}(${entry.args.join(', ')})`;
  const natives = entry.operators.filter(op => op !== entry.member);
  return natives.length > 0 ? `${signature}  ← ${entry.operators.join(', ')}` : signature;
}

export const listCommand = new Command('list')
  .description('List the members a surface would expose')
  .requiredOption('-r, --registry <path>', 'Registry snapshot (JSON or YAML)')
  .option('-s, --surface <kind>', `Surface (${SURFACE_KINDS.join(', ')})`, 'graph')
  .option('--contrib', 'Include _contrib_ operators')
  .option('--typed', 'Apply the typed surface deny-list')
  .option('--random', 'Show unified random distributions')
  .option('-f, --format <format>', 'Output format: text or json', 'text')
  .addHelpText('after', `
Examples:
  opbind list -r registry.yaml                    Graph surface members
  opbind list -r registry.yaml -s eager --typed   Typed eager members
  opbind list -r registry.yaml --random           Random distributions
  opbind list -r registry.yaml -f json            Output as JSON
`)
  .action((options: ListOptions) => {
    try {
      const format = parseFormat(options.format);
      const registry = loadRegistrySnapshot(options.registry);
      const entries = listEntries(registry, {
        surface: parseSurface(options.surface),
        contrib: options.contrib ?? false,
        typed: options.typed ?? false,
        random: options.random ?? false,
      });

      if (format === 'json') {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      for (const entry of entries) {
        console.log(formatEntry(entry));
      }
      console.log('');
      console.log(`${entries.length} members`);
    } catch (err) {
      exitWithFailure(err);
    }
  });
