/** Where the flex pieces live on this host; null for anything not found. */
export interface ToolLocation {
  executable: string | null;
  library: string | null;
  includeDir: string | null;
}

export interface FlexPackage extends ToolLocation {
  /** Executable located and any version requirement met. */
  found: boolean;
  /** '' when the probe failed or the banner could not be parsed. */
  version: string;
  libraries: string[];
  includeDirs: string[];
  /** The found / not-found summary line. */
  message: string;
}

export type VersionProbe =
  | { ok: true; version: string }
  | { ok: false; version: ''; diagnostic: string; stdout: string; stderr: string; exitCode: number };
