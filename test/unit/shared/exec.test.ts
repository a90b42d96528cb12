import { run, runOrThrow } from '../../../src/shared/exec.js';
import { FlexErrorCode } from '../../../src/shared/errors.js';

describe('run', () => {
  it('captures both streams and the exit code without throwing', async () => {
    const result = await run('sh', ['-c', 'echo out; echo err >&2; exit 3']);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.exitCode).toBe(3);
  });

  it('reports a command that cannot start as a failed run', async () => {
    const result = await run('find-flex-no-such-command', []);
    expect(result.exitCode).toBe(1);
    expect(result.spawnError).toBeDefined();
  });
});

describe('runOrThrow', () => {
  it('returns the result on exit code 0', async () => {
    const result = await runOrThrow('sh', ['-c', 'echo ok']);
    expect(result.stdout).toBe('ok');
  });

  it('throws with both streams in the context on a non-zero exit', async () => {
    await expect(runOrThrow('sh', ['-c', 'echo partial; echo broken >&2; exit 1'])).rejects.toMatchObject({
      code: FlexErrorCode.GENERATION_FAILED,
      context: { stdout: 'partial', stderr: 'broken' },
    });
  });

  it('uses the caller-supplied error code', async () => {
    await expect(
      runOrThrow('sh', ['-c', 'exit 4'], { errorCode: FlexErrorCode.VERSION_PROBE_FAILED })
    ).rejects.toMatchObject({ code: FlexErrorCode.VERSION_PROBE_FAILED, message: 'Command exited with 4: sh' });
  });
});
