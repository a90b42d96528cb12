export { loadConfig, resolveConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { FindFlexConfig, ConfigResult } from './config/types.js';
export {
  FlexLocator,
  findFlex,
  probeVersion,
  FLEX_PROGRAM_NAMES,
  FLEX_LIBRARY_NAMES,
  FLEX_HEADER,
  type LocatorEnvironment,
} from './locator/locator.js';
export { findProgram, findLibrary, findHeaderDir } from './locator/search.js';
export { extractVersion, compareVersions, satisfiesVersion } from './locator/version.js';
export type { ToolLocation, FlexPackage, VersionProbe } from './locator/types.js';
export { RuleRegistry, type RuleRegistryOptions } from './rules/registry.js';
export { FLEX_TARGET_USAGE, parseTargetArguments, validateTargetOptions, resolveCompileFlags } from './rules/options.js';
export { commandLine, quoteArgument, describeStep } from './rules/command.js';
export { runGenerationStep } from './rules/runner.js';
export type {
  BuildStep,
  DuplicatePolicy,
  FlexTargetOptions,
  GenerationRule,
  ParserRuleLookup,
  SourceFileProperties,
} from './rules/types.js';
export { FlexError, FlexErrorCode, isFlexError } from './shared/errors.js';
export { logger } from './shared/logger.js';
