import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { RuleRegistry } from '../../../src/rules/registry.js';
import { runGenerationStep } from '../../../src/rules/runner.js';
import { FlexErrorCode } from '../../../src/shared/errors.js';
import { writeFakeTool } from '../../helpers/fake-tool.js';

// Writes "<flags> < <input>" into the -o target, the way flex writes its scanner.
const FAKE_FLEX = `flags=""
for arg in "$@"; do
  case "$arg" in
    -o*) out="\${arg#-o}" ;;
    *) flags="$flags $arg" ;;
  esac
done
echo "generated:$flags" > "$out"`;

describe('runGenerationStep', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'find-flex-run-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('runs the declared command in the source directory', async () => {
    const flex = await writeFakeTool(path.join(tmpDir, 'bin'), 'flex', FAKE_FLEX);
    const src = path.join(tmpDir, 'src');
    await fs.mkdir(src);
    await fs.writeFile(path.join(src, 'lexer.l'), '%%\n');

    const registry = new RuleRegistry({ executable: flex, version: '2.6.4', sourceDir: src });
    const rule = registry.flexTarget('Scanner', 'lexer.l', 'lexer.c', { compileFlags: '-Cem' });
    const result = await runGenerationStep(rule.step);

    expect(result.exitCode).toBe(0);
    expect(await fs.readFile(path.join(src, 'lexer.c'), 'utf-8')).toBe('generated: -Cem lexer.l\n');
  });

  it('raises GENERATION_FAILED with the tool output on failure', async () => {
    const flex = await writeFakeTool(path.join(tmpDir, 'bin'), 'flex', 'echo "lexer.l:3: bad character" >&2; exit 1');
    const registry = new RuleRegistry({ executable: flex, sourceDir: tmpDir });
    const rule = registry.flexTarget('Scanner', 'lexer.l', 'lexer.c');

    await expect(runGenerationStep(rule.step)).rejects.toMatchObject({
      code: FlexErrorCode.GENERATION_FAILED,
      context: { stderr: 'lexer.l:3: bad character' },
    });
  });

  it('rejects a step without a command', async () => {
    await expect(
      runGenerationStep({ rule: 'Empty', argv: [], outputs: [], depends: [], workingDirectory: tmpDir, comment: '' })
    ).rejects.toMatchObject({ code: FlexErrorCode.GENERATION_FAILED });
  });
});
