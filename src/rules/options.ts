import { z } from 'zod';
import { FlexError, FlexErrorCode } from '../shared/errors.js';
import type { FlexTargetOptions } from './types.js';

export const FLEX_TARGET_USAGE =
  'FLEX_TARGET(<Name> <Input> <Output> [COMPILE_FLAGS <string>] [DEFINES_FILE <string>]';

const flexTargetOptionsSchema = z
  .object({
    compileFlags: z.string().optional(),
    definesFile: z.string().optional(),
  })
  .strict();

const KEYWORDS = new Map<string, keyof FlexTargetOptions>([
  ['COMPILE_FLAGS', 'compileFlags'],
  ['DEFINES_FILE', 'definesFile'],
]);

/** Rejects anything but the two known option keys. */
export function validateTargetOptions(options: unknown): FlexTargetOptions {
  const parsed = flexTargetOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new FlexError(FlexErrorCode.INVALID_RULE_ARGUMENTS, FLEX_TARGET_USAGE, {
      issues: parsed.error.issues.map((i) => i.message),
    });
  }
  return parsed.data;
}

/**
 * Keyword form: `['COMPILE_FLAGS', '-Cem', 'DEFINES_FILE', 'lexer.h']`.
 * Each keyword takes exactly one value; stray tokens and keywords left
 * without a value are unparsed arguments and fail the whole call.
 */
export function parseTargetArguments(args: string[]): FlexTargetOptions {
  const options: FlexTargetOptions = {};
  const unparsed: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const token = args[i] ?? '';
    const key = KEYWORDS.get(token);
    if (!key) {
      unparsed.push(token);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || KEYWORDS.has(value)) {
      unparsed.push(token);
      continue;
    }
    options[key] = value;
    i++;
  }

  if (unparsed.length > 0) {
    throw new FlexError(FlexErrorCode.INVALID_RULE_ARGUMENTS, FLEX_TARGET_USAGE, { unparsed });
  }
  return options;
}

export function splitCompileFlags(flags: string | undefined): string[] {
  if (!flags) return [];
  return flags.split(/\s+/).filter((flag) => flag.length > 0);
}

/** Caller flags first; the header flag, when requested, is always last. */
export function resolveCompileFlags(options: FlexTargetOptions): string[] {
  const flags = splitCompileFlags(options.compileFlags);
  if (options.definesFile) {
    flags.push(`--header-file=${options.definesFile}`);
  }
  return flags;
}
