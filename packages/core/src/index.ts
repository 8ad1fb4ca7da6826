/**
 * @opbind/core - Operator binding generator
 */

// Error types
export {
  OpbindError,
  ConfigError,
  FileAccessError,
  RegistryError,
  TypeMappingError,
  SpliceError,
} from './errors/OpbindError.js';
export type { ErrorContext, ErrorSeverity, OpbindErrorJSON } from './errors/OpbindError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  formatMessage,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export {
  loadConfig,
  resolveConfigPath,
  validateConfig,
  validateVersion,
  CONFIG_FILE_NAMES,
  DEFAULT_PROFILES,
} from './config/index.js';
export type { OpbindConfig, JobConfig } from './config/index.js';

// Version
export { OPBIND_VERSION, getSchemaVersion } from './version.js';

// Registry
export { SnapshotRegistry, loadRegistrySnapshot, validateSnapshot } from './registry/SnapshotRegistry.js';
export { getBackEndFunctions, makeAtomicFunction, variadicNote } from './reflection/reflect.js';

// Filtering
export {
  functionsToGenerate,
  typeSafeFunctionsToGenerate,
  assignMemberNames,
  isExposed,
  CONTRIB_PREFIX,
  DEFAULT_DENY_LIST,
} from './filter/surfaceFilter.js';
export type { SurfaceFilterOptions } from './filter/surfaceFilter.js';

// Normalization
export { argumentCleaner, convertNativeType, isArrayType } from './normalize/typeMapping.js';
export type { CleanedArgument } from './normalize/typeMapping.js';
export {
  IdentifierPolicy,
  DEFAULT_RENAMES,
  BODY_LOCALS,
  TRAILING_PARAMS,
  getReservedWords,
  toIdentifier,
} from './normalize/identifiers.js';

// Random unification
export {
  typeSafeRandomFunctionsToGenerate,
  unifyRandom,
  canonicalDistributionName,
  isRandomOperator,
  CANONICAL_ARG_NAMES,
  GENERIC_TYPE_NAME,
} from './random/unifyRandom.js';

// Emission
export { buildTypedCallable, buildUntypedCallable, buildRandomCallable, calleeExpression } from './emit/callables.js';
export { buildDocComment, attachDocComment } from './emit/docComment.js';
export type { DocParam } from './emit/docComment.js';
export { toTSType, SHAPE_TYPE } from './emit/types.js';
export { printNode } from './emit/print.js';
export type { GeneratedCallable, CallableParam } from './emit/types.js';
export { spliceMembers } from './splice/splice.js';
export type { SpliceOptions, SpliceResult } from './splice/splice.js';

// Generation
export { Generator, GENERATED_BANNER } from './Generator.js';
export type { GenerationJob, GenerationResult, GeneratorOptions } from './Generator.js';

// Ownership
export { parseOwnershipManifest, resolveOwners, patternToGlobs, ruleMatches } from './ownership/CodeOwners.js';
