// Host filesystem search for the executable, the runtime library and the header directory.
// Every candidate is tried name-first: a later name is only considered once the earlier
// one has been looked up in every directory.
import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { logger } from '../shared/logger.js';

export interface ProgramSearch {
  names: string[];
  /** A path the caller has pinned; used as-is when it names an executable file. */
  hint?: string | null;
  prefixes: string[];
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export async function findProgram(search: ProgramSearch): Promise<string | null> {
  const platform = search.platform ?? process.platform;
  const env = search.env ?? process.env;

  if (search.hint) {
    const hinted = path.resolve(search.hint);
    if (await isExecutableFile(hinted, platform)) return hinted;
    logger.warn({ hint: hinted }, 'Pinned flex executable is not an executable file; searching instead');
  }

  const dirs = [...search.prefixes.map((p) => path.join(p, 'bin')), ...pathEntries(env, platform)];
  const suffixes = platform === 'win32' ? ['', ...pathExtensions(env)] : [''];

  for (const name of search.names) {
    for (const dir of dirs) {
      for (const suffix of suffixes) {
        const candidate = path.resolve(dir, name + suffix);
        if (await isExecutableFile(candidate, platform)) return candidate;
      }
    }
  }
  return null;
}

export async function findLibrary(
  names: string[],
  dirs: string[],
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  for (const name of names) {
    for (const dir of dirs) {
      for (const fileName of libraryFileNames(name, platform)) {
        const candidate = path.resolve(dir, fileName);
        if (await isFile(candidate)) return candidate;
      }
    }
  }
  return null;
}

/** First directory that contains `fileName`. */
export async function findHeaderDir(fileName: string, dirs: string[]): Promise<string | null> {
  for (const dir of dirs) {
    if (await isFile(path.join(dir, fileName))) return path.resolve(dir);
  }
  return null;
}

export function libraryFileNames(name: string, platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'win32':
      return [`${name}.lib`, `lib${name}.a`];
    case 'darwin':
      return [`lib${name}.dylib`, `lib${name}.a`];
    default:
      return [`lib${name}.so`, `lib${name}.a`];
  }
}

function pathEntries(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  const raw = env['PATH'] ?? env['Path'] ?? '';
  const delimiter = platform === 'win32' ? ';' : ':';
  return raw.split(delimiter).filter((entry) => entry.length > 0);
}

function pathExtensions(env: NodeJS.ProcessEnv): string[] {
  const raw = env['PATHEXT'] ?? '.COM;.EXE;.BAT;.CMD';
  return raw.split(';').filter((ext) => ext.length > 0).map((ext) => ext.toLowerCase());
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

async function isExecutableFile(p: string, platform: NodeJS.Platform): Promise<boolean> {
  if (!(await isFile(p))) return false;
  if (platform === 'win32') return true;
  try {
    await fs.access(p, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}
