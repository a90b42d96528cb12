/**
 * Pulls the version out of a `flex --version` banner.
 *
 * Old releases print `/full/path/to/flex version 2.5.4`, newer ones print
 * `flex 2.6.4`; both are anchored on the executable's own name. Returns ''
 * when the banner does not mention the executable or carries no version.
 */
export function extractVersion(output: string, executable: string): string {
  const { stem, ext } = splitExecutableName(executable);
  if (!stem) return '';
  const extGroup = ext ? `(?:${escapeRegExp(ext)})?` : '';
  const pattern = new RegExp(`^.*${escapeRegExp(stem)}${extGroup}"? (?:version )?(?<version>[0-9]+[^ ]*)(?: .*)?$`, 's');
  return pattern.exec(output)?.groups?.['version'] ?? '';
}

/** Base name split at its first dot, so `win_flex.exe` gives `win_flex` and `.exe`. */
export function splitExecutableName(executable: string): { stem: string; ext: string } {
  const segments = executable.split(/[\\/]/);
  const base = segments[segments.length - 1] ?? '';
  const dot = base.indexOf('.');
  if (dot <= 0) return { stem: base, ext: '' };
  return { stem: base.slice(0, dot), ext: base.slice(dot) };
}

/** Component-wise numeric comparison; missing components count as 0. */
export function compareVersions(a: string, b: string): number {
  const left = toComponents(a);
  const right = toComponents(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function satisfiesVersion(found: string, required: string, exact: boolean): boolean {
  if (!found) return false;
  const order = compareVersions(found, required);
  return exact ? order === 0 : order >= 0;
}

function toComponents(version: string): number[] {
  return version.split('.').map((part) => {
    const n = parseInt(part, 10);
    return Number.isNaN(n) ? 0 : n;
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
