import { runOrThrow, type ExecResult } from '../shared/exec.js';
import { FlexError, FlexErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { commandLine } from './command.js';
import type { BuildStep } from './types.js';

/**
 * Runs one declared step in its working directory. Outputs are not checked
 * for staleness; callers that need incremental builds keep their own graph.
 */
export async function runGenerationStep(step: BuildStep, options?: { timeoutMs?: number }): Promise<ExecResult> {
  const [command, ...args] = step.argv;
  if (!command) {
    throw new FlexError(FlexErrorCode.GENERATION_FAILED, `Step for \`${step.rule}' has no command`);
  }

  logger.info({ rule: step.rule, cwd: step.workingDirectory }, step.comment);
  logger.debug({ command: commandLine(step.argv) }, 'Running generation step');

  return runOrThrow(command, args, {
    cwd: step.workingDirectory,
    timeoutMs: options?.timeoutMs,
    errorCode: FlexErrorCode.GENERATION_FAILED,
  });
}
