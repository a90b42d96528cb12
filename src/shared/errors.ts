export enum FlexErrorCode {
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  VERSION_PROBE_FAILED = 'VERSION_PROBE_FAILED',
  VERSION_UNSUITABLE = 'VERSION_UNSUITABLE',
  INVALID_RULE_ARGUMENTS = 'INVALID_RULE_ARGUMENTS',
  DUPLICATE_RULE = 'DUPLICATE_RULE',
  MISSING_DEPENDENCY_TARGET = 'MISSING_DEPENDENCY_TARGET',
  SPAWN_FAILED = 'SPAWN_FAILED',
  GENERATION_FAILED = 'GENERATION_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class FlexError extends Error {
  readonly code: FlexErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: FlexErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'FlexError';
    this.code = code;
    this.context = context;
  }
}

export function isFlexError(err: unknown, code?: FlexErrorCode): err is FlexError {
  return err instanceof FlexError && (code === undefined || err.code === code);
}
