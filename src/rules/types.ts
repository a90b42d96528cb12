export interface FlexTargetOptions {
  /** Extra flex arguments as one string; split on whitespace. */
  compileFlags?: string;
  /** Where flex should also write its header (`--header-file`). */
  definesFile?: string;
}

/** A declared external command. Nothing here runs it; a build scheduler does. */
export interface BuildStep {
  rule: string;
  argv: string[];
  outputs: string[];
  depends: string[];
  workingDirectory: string;
  comment: string;
}

export interface GenerationRule {
  name: string;
  defined: true;
  input: string;
  output: string;
  /** Primary output first, then the defines file when one was requested. */
  outputs: string[];
  compileFlags: string[];
  /** '' when no header was requested. */
  outputHeader: string;
  step: BuildStep;
}

export interface SourceFileProperties {
  objectDepends: string[];
}

/** The slice of a parser generator's rule table the dependency helper reads. A Map satisfies it. */
export interface ParserRuleLookup {
  get(name: string): { outputHeader: string } | undefined;
}

export type DuplicatePolicy = 'overwrite' | 'error';
