import fs from 'fs/promises';
import path from 'path';

/** Writes an executable /bin/sh script standing in for flex. */
export async function writeFakeTool(dir: string, name: string, body: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const toolPath = path.join(dir, name);
  await fs.writeFile(toolPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return toolPath;
}
