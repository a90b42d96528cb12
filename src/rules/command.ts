import type { BuildStep } from './types.js';

const NEEDS_QUOTING = /[\s"'\\$`;&|<>()*?#~!{}[\]]/;

/** Renders argv the way it is handed to the process: one token per argument, quoted only where needed. */
export function commandLine(argv: string[]): string {
  return argv.map(quoteArgument).join(' ');
}

export function quoteArgument(arg: string): string {
  if (arg === '') return "''";
  if (!NEEDS_QUOTING.test(arg)) return arg;
  // Single quotes suppress every expansion; an embedded quote closes, escapes and reopens.
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function stepComment(rule: string, version: string): string {
  return `[FLEX][${rule}] Building scanner with flex ${version}`.trimEnd();
}

export function describeStep(step: BuildStep): string {
  return `${step.comment}\n  cd ${quoteArgument(step.workingDirectory)} && ${commandLine(step.argv)}`;
}
