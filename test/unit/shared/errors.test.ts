import { FlexError, FlexErrorCode, isFlexError } from '../../../src/shared/errors.js';

describe('FlexError', () => {
  it('creates error with code and message', () => {
    const err = new FlexError(FlexErrorCode.TOOL_NOT_FOUND, 'flex missing');
    expect(err.code).toBe(FlexErrorCode.TOOL_NOT_FOUND);
    expect(err.message).toBe('flex missing');
    expect(err.name).toBe('FlexError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new FlexError(FlexErrorCode.VERSION_PROBE_FAILED, 'probe failed', { stderr: 'boom' });
    expect(err.context).toEqual({ stderr: 'boom' });
  });
});

describe('isFlexError', () => {
  it('matches any FlexError when no code is given', () => {
    expect(isFlexError(new FlexError(FlexErrorCode.DUPLICATE_RULE, 'x'))).toBe(true);
  });

  it('checks the code when one is given', () => {
    const err = new FlexError(FlexErrorCode.DUPLICATE_RULE, 'x');
    expect(isFlexError(err, FlexErrorCode.DUPLICATE_RULE)).toBe(true);
    expect(isFlexError(err, FlexErrorCode.INVALID_CONFIG)).toBe(false);
  });

  it('rejects plain errors', () => {
    expect(isFlexError(new Error('x'))).toBe(false);
  });
});
