/**
 * Generator - runs generation jobs against one operator registry.
 *
 * Per job: describe the registry for the job's surface, select and name the
 * members, build callables, splice them into the skeleton, print, write.
 * Descriptors are computed once per surface and shared by the jobs of a run.
 */

import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { parse } from '@babel/parser';
import type * as t from '@babel/types';
import type { FunctionDescriptor, OperatorRegistry, SpliceTargetKind, SurfaceKind } from '@opbind/types';
import type { JobConfig } from './config/ConfigLoader.js';
import { FileAccessError, SpliceError } from './errors/OpbindError.js';
import { createLogger, type Logger } from './logging/Logger.js';
import { getBackEndFunctions } from './reflection/reflect.js';
import {
  assignMemberNames,
  DEFAULT_DENY_LIST,
  functionsToGenerate,
  isExposed,
  typeSafeFunctionsToGenerate,
} from './filter/surfaceFilter.js';
import { DEFAULT_RENAMES, IdentifierPolicy } from './normalize/identifiers.js';
import { typeSafeRandomFunctionsToGenerate } from './random/unifyRandom.js';
import { buildRandomCallable, buildTypedCallable, buildUntypedCallable } from './emit/callables.js';
import { printNode } from './emit/print.js';
import type { GeneratedCallable } from './emit/types.js';
import { spliceMembers } from './splice/splice.js';

export const GENERATED_BANNER = '// Code generated by opbind. DO NOT EDIT.';

export type GenerationJob = JobConfig;

export interface GeneratorOptions {
  registry: OperatorRegistry;
  /** Parameter renames (default: `var → vari`, `type → typeOf`) */
  renames?: Readonly<Record<string, string>>;
  /** Operators left out of typed surfaces (default: `['Custom']`) */
  denyList?: readonly string[];
  logger?: Logger;
}

export interface GenerationResult {
  job: string;
  output: string;
  targetKind: SpliceTargetKind;
  members: string[];
}

export class Generator {
  private registry: OperatorRegistry;
  private renames: Readonly<Record<string, string>>;
  private denyList: readonly string[];
  private logger: Logger;
  private descriptors = new Map<SurfaceKind, FunctionDescriptor[]>();

  constructor(options: GeneratorOptions) {
    this.registry = options.registry;
    this.renames = options.renames ?? DEFAULT_RENAMES;
    this.denyList = options.denyList ?? DEFAULT_DENY_LIST;
    this.logger = options.logger ?? createLogger('info');
  }

  /**
   * Descriptors of every registered operator for a surface.
   */
  describe(surface: SurfaceKind): FunctionDescriptor[] {
    let descriptors = this.descriptors.get(surface);
    if (!descriptors) {
      descriptors = getBackEndFunctions(this.registry, surface);
      this.descriptors.set(surface, descriptors);
      this.logger.debug('Described registry', { surface, operators: descriptors.length });
    }
    return descriptors;
  }

  /**
   * Callables a job emits, in registry order (random jobs: by distribution name).
   */
  buildCallables(job: GenerationJob): GeneratedCallable[] {
    const descriptors = this.describe(job.surface);
    const policy = new IdentifierPolicy(job.surface, this.renames);
    const filterOptions = { contrib: job.contrib, denyList: this.denyList };

    switch (job.mode) {
      case 'typed': {
        const selected = typeSafeFunctionsToGenerate(descriptors, filterOptions);
        for (const name of this.denyList) {
          if (descriptors.some(d => d.name === name) && isExposed(name, job.contrib)) {
            this.logger.warn('Skipping deny-listed operator', { job: job.name, operator: name });
          }
        }
        const names = assignMemberNames(selected, job.contrib, policy);
        return selected.map(d => buildTypedCallable(d, names.get(d.name) ?? policy.memberName(d.name), job.profile, policy));
      }
      case 'untyped': {
        const selected = functionsToGenerate(descriptors, filterOptions);
        const names = assignMemberNames(selected, job.contrib, policy);
        return selected.map(d => buildUntypedCallable(d, names.get(d.name) ?? policy.memberName(d.name), job.profile));
      }
      case 'random': {
        const denied = new Set(this.denyList);
        return typeSafeRandomFunctionsToGenerate(descriptors)
          .filter(d => !denied.has(d.name))
          .map(d => buildRandomCallable(d, policy.memberName(d.name), job.profile, policy));
      }
    }
  }

  /**
   * Splice a job's callables into skeleton source and print the result.
   *
   * @throws SpliceError when the skeleton does not parse or has no usable target
   */
  render(job: GenerationJob, source: string): { code: string; targetKind: SpliceTargetKind; members: string[] } {
    let file: t.File;
    try {
      file = parse(source, {
        sourceType: 'module',
        plugins: ['typescript', 'decorators-legacy'],
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      throw new SpliceError(
        `Cannot parse skeleton ${job.skeleton}: ${error.message}`,
        'ERR_SKELETON_PARSE',
        { filePath: job.skeleton, job: job.name }
      );
    }

    const callables = this.buildCallables(job);
    const result = spliceMembers(file, job.target, callables, {
      staticMembers: job.staticMembers,
      filePath: job.skeleton,
    });

    for (const callable of callables) {
      this.logger.debug('Emitted member', { job: job.name, member: callable.name, operator: callable.opName });
    }

    const code = printNode(file);
    return { code: `${GENERATED_BANNER}\n\n${code}\n`, targetKind: result.kind, members: result.members };
  }

  /**
   * Read the skeleton, render, and write the output file (creating directories).
   */
  runJob(job: GenerationJob): GenerationResult {
    let source: string;
    try {
      source = readFileSync(job.skeleton, 'utf-8');
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      throw new FileAccessError(
        `Cannot read skeleton ${job.skeleton}: ${error.message}`,
        'ERR_FILE_UNREADABLE',
        { filePath: job.skeleton, job: job.name },
        'Check the job\'s "skeleton" path'
      );
    }

    const rendered = this.render(job, source);

    try {
      mkdirSync(dirname(job.output), { recursive: true });
      writeFileSync(job.output, rendered.code);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      throw new FileAccessError(
        `Cannot write ${job.output}: ${error.message}`,
        'ERR_FILE_UNWRITABLE',
        { filePath: job.output, job: job.name }
      );
    }

    this.logger.info('Generated', {
      job: job.name,
      surface: job.surface,
      mode: job.mode,
      target: `${rendered.targetKind} ${job.target}`,
      members: rendered.members.length,
      output: job.output,
    });

    return { job: job.name, output: job.output, targetKind: rendered.targetKind, members: rendered.members };
  }

  /**
   * Run jobs in order. The first failure aborts the run.
   */
  run(jobs: GenerationJob[]): GenerationResult[] {
    return jobs.map(job => this.runJob(job));
  }
}
