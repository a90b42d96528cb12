import path from 'path';
import type { FindFlexConfig } from '../config/types.js';
import { resolveConfig } from '../config/loader.js';
import { run, type ExecResult } from '../shared/exec.js';
import { FlexError, FlexErrorCode, isFlexError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { findHeaderDir, findLibrary, findProgram } from './search.js';
import type { FlexPackage, ToolLocation, VersionProbe } from './types.js';
import { extractVersion, satisfiesVersion } from './version.js';

export const FLEX_PROGRAM_NAMES = ['flex', 'win_flex'];
export const FLEX_LIBRARY_NAMES = ['fl'];
export const FLEX_HEADER = 'FlexLexer.h';

export interface LocatorEnvironment {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Finds flex once and remembers the answer. The search and the `--version`
 * probe run on the first `locate()`; later calls share the same promise,
 * including its rejection when flex was required and missing.
 * Invalid settings fail construction with `INVALID_CONFIG`.
 */
export class FlexLocator {
  private readonly config: FindFlexConfig;
  private pending: Promise<FlexPackage> | null = null;

  constructor(
    config: Partial<FindFlexConfig> = {},
    private readonly environment: LocatorEnvironment = {}
  ) {
    this.config = resolveConfig(config);
  }

  locate(): Promise<FlexPackage> {
    if (!this.pending) {
      this.pending = this.discover();
    }
    return this.pending;
  }

  private async discover(): Promise<FlexPackage> {
    const location = await this.findLocation();
    let version = '';

    if (location.executable) {
      const probe = await probeVersion(location.executable, this.config.probeTimeoutMs);
      if (probe.ok) {
        version = probe.version;
      } else if (this.config.required) {
        throw new FlexError(FlexErrorCode.VERSION_PROBE_FAILED, probe.diagnostic, {
          executable: location.executable,
          exitCode: probe.exitCode,
          stdout: probe.stdout,
          stderr: probe.stderr,
        });
      } else {
        logger.warn(
          { executable: location.executable, exitCode: probe.exitCode },
          `${probe.diagnostic}\nFLEX_VERSION will not be available`
        );
      }
    }

    const { found, message } = this.evaluate(location.executable, version);
    return {
      ...location,
      found,
      version,
      libraries: location.library ? [location.library] : [],
      includeDirs: location.includeDir ? [location.includeDir] : [],
      message,
    };
  }

  private async findLocation(): Promise<ToolLocation> {
    const { prefixes, libraryDirs, includeDirs, hints } = this.config;
    const platform = this.environment.platform ?? process.platform;

    const [executable, library, includeDir] = await Promise.all([
      findProgram({
        names: FLEX_PROGRAM_NAMES,
        hint: hints.executable,
        prefixes,
        env: this.environment.env,
        platform,
      }),
      findLibrary(FLEX_LIBRARY_NAMES, [...prefixes.map((p) => path.join(p, 'lib')), ...libraryDirs], platform),
      findHeaderDir(FLEX_HEADER, [...prefixes.map((p) => path.join(p, 'include')), ...includeDirs]),
    ]);
    logger.debug({ executable, library, includeDir }, 'flex search finished');
    return { executable, library, includeDir };
  }

  /** Applies the required / minimum-version rules and reports the outcome. */
  private evaluate(executable: string | null, version: string): { found: boolean; message: string } {
    const { required, minimumVersion, exactVersion, quiet } = this.config;

    if (!executable) {
      const message = 'Could NOT find FLEX (missing: FLEX_EXECUTABLE)';
      if (required) throw new FlexError(FlexErrorCode.TOOL_NOT_FOUND, message);
      if (!quiet) logger.info(message);
      return { found: false, message };
    }

    if (minimumVersion && !satisfiesVersion(version, minimumVersion, exactVersion)) {
      const requirement = exactVersion ? 'is exact version' : 'is at least';
      const foundPart = version ? `Found unsuitable version "${version}"` : 'Found unknown version';
      const message = `Could NOT find FLEX: ${foundPart}, but required ${requirement} "${minimumVersion}" (found ${executable})`;
      if (required) {
        throw new FlexError(FlexErrorCode.VERSION_UNSUITABLE, message, { executable, version, minimumVersion });
      }
      if (!quiet) logger.warn({ executable, version, minimumVersion }, message);
      return { found: false, message };
    }

    const message = `Found FLEX: ${executable}${version ? ` (found version "${version}")` : ''}`;
    if (!quiet) logger.info(message);
    return { found: true, message };
  }
}

/** Runs `<executable> --version` and parses the banner. A process that cannot start counts as a failed probe. */
export async function probeVersion(executable: string, timeoutMs?: number): Promise<VersionProbe> {
  let result: ExecResult;
  try {
    result = await run(executable, ['--version'], { timeoutMs });
  } catch (err) {
    if (!isFlexError(err, FlexErrorCode.SPAWN_FAILED)) throw err;
    const cause = err.context?.['cause'];
    result = { stdout: '', stderr: typeof cause === 'string' ? cause : err.message, exitCode: 1 };
  }

  const stdout = result.stdout.trimEnd();
  const stderr = result.stderr || result.spawnError || '';
  if (result.exitCode !== 0) {
    return {
      ok: false,
      version: '',
      diagnostic: `Command "${executable} --version" failed with output:\n${stdout}\n${stderr}`,
      stdout,
      stderr,
      exitCode: result.exitCode,
    };
  }
  return { ok: true, version: extractVersion(stdout, executable) };
}

/** One-shot convenience over `FlexLocator`; invalid settings reject rather than throw. */
export async function findFlex(
  config: Partial<FindFlexConfig> = {},
  environment: LocatorEnvironment = {}
): Promise<FlexPackage> {
  return new FlexLocator(config, environment).locate();
}
