import execa from 'execa';
import { FlexError, FlexErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  /** Set when the process could not be started at all (missing binary, EACCES). */
  spawnError?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  try {
    const result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      reject: false,
    });
    // execa leaves exitCode undefined when the process never started
    const exitCode: number | undefined = result.exitCode;
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: exitCode ?? 1,
      signal: result.signal ?? undefined,
      spawnError:
        exitCode === undefined && 'shortMessage' in result && typeof result.shortMessage === 'string'
          ? result.shortMessage
          : undefined,
    };
  } catch (err) {
    throw new FlexError(FlexErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function runOrThrow(
  command: string,
  args: string[],
  options?: ExecOptions & { errorCode?: FlexErrorCode }
): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new FlexError(
      options?.errorCode ?? FlexErrorCode.GENERATION_FAILED,
      `Command exited with ${result.exitCode}: ${command}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
        ...(result.spawnError ? { spawnError: result.spawnError } : {}),
      }
    );
  }
  return result;
}
