import { readFileSync, existsSync, statSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import {
  GENERATION_MODES,
  SURFACE_KINDS,
  type GenerationMode,
  type SurfaceKind,
  type SurfaceProfile,
} from '@opbind/types';
import { ConfigError } from '../errors/OpbindError.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { DEFAULT_RENAMES } from '../normalize/identifiers.js';
import { DEFAULT_DENY_LIST } from '../filter/surfaceFilter.js';
import { OPBIND_VERSION, getSchemaVersion } from '../version.js';

export const CONFIG_FILE_NAMES = ['opbind.config.yaml', 'opbind.config.json'] as const;

/**
 * One generation job: a surface, a mode and the skeleton it is spliced into.
 */
export interface JobConfig {
  name: string;
  surface: SurfaceKind;
  mode: GenerationMode;
  /** Expose `_contrib_*` operators */
  contrib: boolean;
  /** Absolute skeleton path */
  skeleton: string;
  /** Name of the class, namespace or const object receiving the members */
  target: string;
  /** Absolute output path */
  output: string;
  profile: SurfaceProfile;
  /** Class targets only */
  staticMembers: boolean;
}

/**
 * opbind configuration.
 *
 * Location: opbind.config.yaml (preferred) or opbind.config.json
 *
 * Example opbind.config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * registry: ./registry.yaml
 * logLevel: info
 * reservedNames:
 *   lambda: lam
 * jobs:
 *   - name: graph-typed
 *     surface: graph
 *     mode: typed
 *     skeleton: ./skeletons/Symbol.ts
 *     target: SymbolAPI
 *     output: ./generated/SymbolAPI.ts
 * ```
 *
 * Relative paths resolve against the directory holding the config file.
 */
export interface OpbindConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;
  /** Absolute path of the loaded config file */
  configPath: string;
  /** Absolute registry snapshot path */
  registry: string;
  logLevel?: LogLevel;
  /** Parameter renames, merged over the built-in ones */
  reservedNames: Record<string, string>;
  /** Operators left out of typed surfaces */
  denyList: string[];
  jobs: JobConfig[];
}

export const DEFAULT_PROFILES: Readonly<Record<SurfaceKind, Omit<SurfaceProfile, 'kind'>>> = {
  graph: { handleType: 'SymbolNode', resultType: 'SymbolNode', callee: 'createSymbol' },
  eager: { handleType: 'NDArray', resultType: 'NDArrayFuncReturn', callee: 'invokeOperator' },
  interop: { handleType: 'NDArray', resultType: 'NDArrayFuncReturn', callee: 'invokeOperator' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Find the config file: `configPath` itself, or one of CONFIG_FILE_NAMES
 * inside it when it is a directory.
 */
export function resolveConfigPath(configPath: string): string {
  const absolute = resolve(configPath);
  if (existsSync(absolute) && statSync(absolute).isDirectory()) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const candidate = join(absolute, fileName);
      if (existsSync(candidate)) return candidate;
    }
    throw new ConfigError(
      `No ${CONFIG_FILE_NAMES.join(' or ')} in ${absolute}`,
      'ERR_CONFIG_NOT_FOUND',
      { filePath: absolute },
      'Create opbind.config.yaml or pass --config <path>'
    );
  }
  if (!existsSync(absolute)) {
    throw new ConfigError(
      `Config file not found: ${absolute}`,
      'ERR_CONFIG_NOT_FOUND',
      { filePath: absolute },
      'Check the --config path'
    );
  }
  return absolute;
}

/**
 * Load and validate the opbind config.
 * THROWS ConfigError on any problem; there is no default configuration.
 *
 * @param configPath - Config file, or a directory containing one
 */
export function loadConfig(configPath: string): OpbindConfig {
  const filePath = resolveConfigPath(configPath);

  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    parsed = filePath.endsWith('.json') ? JSON.parse(content) : parseYAML(content);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(`Failed to parse ${filePath}: ${error.message}`, 'ERR_CONFIG_PARSE', { filePath });
  }

  return validateConfig(parsed, filePath);
}

function fail(message: string, filePath: string): never {
  throw new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { filePath });
}

function requireString(value: unknown, key: string, filePath: string): string {
  if (typeof value !== 'string') {
    fail(`${key} must be a string, got ${describe(value)}`, filePath);
  }
  if (!value.trim()) {
    fail(`${key} cannot be empty or whitespace-only`, filePath);
  }
  return value;
}

function optionalString(value: unknown, key: string, filePath: string): string | undefined {
  return value === undefined || value === null ? undefined : requireString(value, key, filePath);
}

function optionalBoolean(value: unknown, key: string, filePath: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    fail(`${key} must be a boolean, got ${describe(value)}`, filePath);
  }
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], key: string, filePath: string): T {
  const found = allowed.find(a => a === value);
  if (found === undefined) {
    fail(`${key} must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`, filePath);
  }
  return found;
}

/**
 * Validate parsed config data. Paths resolve against the config file's directory.
 */
export function validateConfig(raw: unknown, filePath: string): OpbindConfig {
  if (!isRecord(raw)) {
    fail(`config must be a mapping, got ${describe(raw)}`, filePath);
  }
  const baseDir = dirname(filePath);

  validateVersion(raw.version);

  const registry = resolve(baseDir, requireString(raw.registry, 'registry', filePath));

  let logLevel: LogLevel | undefined;
  if (raw.logLevel !== undefined && raw.logLevel !== null) {
    if (!isLogLevel(raw.logLevel)) {
      fail(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(raw.logLevel)}`, filePath);
    }
    logLevel = raw.logLevel;
  }

  const reservedNames: Record<string, string> = { ...DEFAULT_RENAMES };
  if (raw.reservedNames !== undefined && raw.reservedNames !== null) {
    if (!isRecord(raw.reservedNames)) {
      fail(`reservedNames must be a mapping, got ${describe(raw.reservedNames)}`, filePath);
    }
    for (const [nativeName, rename] of Object.entries(raw.reservedNames)) {
      const value = requireString(rename, `reservedNames.${nativeName}`, filePath);
      if (!/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(value)) {
        fail(`reservedNames.${nativeName} must be a valid identifier, got "${value}"`, filePath);
      }
      reservedNames[nativeName] = value;
    }
  }

  let denyList = [...DEFAULT_DENY_LIST];
  if (raw.denyList !== undefined && raw.denyList !== null) {
    if (!Array.isArray(raw.denyList)) {
      fail(`denyList must be an array, got ${describe(raw.denyList)}`, filePath);
    }
    denyList = raw.denyList.map((entry: unknown, i) => requireString(entry, `denyList[${i}]`, filePath));
  }

  if (!Array.isArray(raw.jobs)) {
    fail(`jobs must be an array, got ${describe(raw.jobs)}`, filePath);
  }
  if (raw.jobs.length === 0) {
    fail('jobs cannot be empty', filePath);
  }

  const jobs = raw.jobs.map((job: unknown, i) => validateJob(job, i, baseDir, filePath));

  const seen = new Set<string>();
  for (const job of jobs) {
    if (seen.has(job.name)) {
      fail(`duplicate job name "${job.name}"`, filePath);
    }
    seen.add(job.name);
  }

  const version = optionalString(raw.version, 'version', filePath);
  return {
    ...(version !== undefined ? { version } : {}),
    configPath: filePath,
    registry,
    ...(logLevel !== undefined ? { logLevel } : {}),
    reservedNames,
    denyList,
    jobs,
  };
}

function validateJob(raw: unknown, index: number, baseDir: string, filePath: string): JobConfig {
  const key = `jobs[${index}]`;
  if (!isRecord(raw)) {
    fail(`${key} must be a mapping, got ${describe(raw)}`, filePath);
  }

  const name = requireString(raw.name, `${key}.name`, filePath);
  const surface = oneOf(raw.surface, SURFACE_KINDS, `${key}.surface`, filePath);
  const mode = oneOf(raw.mode, GENERATION_MODES, `${key}.mode`, filePath);

  if (mode === 'random' && surface === 'interop') {
    fail(`${key}.mode "random" requires surface graph or eager`, filePath);
  }

  const defaults = DEFAULT_PROFILES[surface];
  const profile: SurfaceProfile = {
    kind: surface,
    handleType: optionalString(raw.handleType, `${key}.handleType`, filePath) ?? defaults.handleType,
    resultType: optionalString(raw.resultType, `${key}.resultType`, filePath) ?? defaults.resultType,
    callee: optionalString(raw.callee, `${key}.callee`, filePath) ?? defaults.callee,
  };

  return {
    name,
    surface,
    mode,
    contrib: optionalBoolean(raw.contrib, `${key}.contrib`, filePath, false),
    skeleton: resolve(baseDir, requireString(raw.skeleton, `${key}.skeleton`, filePath)),
    target: requireString(raw.target, `${key}.target`, filePath),
    output: resolve(baseDir, requireString(raw.output, `${key}.output`, filePath)),
    profile,
    staticMembers: optionalBoolean(raw.staticMembers, `${key}.staticMembers`, filePath, true),
  };
}

/**
 * Validate config version compatibility with the running opbind version.
 * THROWS on error.
 *
 * Compares major.minor.patch (pre-release tags are stripped).
 * If config has no version field, validation passes silently.
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to OPBIND_VERSION)
 */
export function validateVersion(
  configVersion: unknown,
  currentVersion?: string
): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(
      `Config error: version must be a string, got ${typeof configVersion}`,
      'ERR_CONFIG_VERSION'
    );
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_VERSION');
  }

  const current = currentVersion ?? OPBIND_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
        `opbind ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      {},
      `Set version: "${currentSchema}" in the config file`
    );
  }
}
