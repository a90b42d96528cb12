import { z } from 'zod';

/** Settings that steer how flex is searched for and what counts as found. */
export const findFlexConfigSchema = z
  .object({
    required: z.boolean(),
    minimumVersion: z
      .string()
      .regex(/^[0-9]+(\.[0-9]+)*$/, 'must be a dotted numeric version such as 2.5.35')
      .nullable(),
    exactVersion: z.boolean(),
    quiet: z.boolean(),
    prefixes: z.array(z.string().min(1)),
    libraryDirs: z.array(z.string().min(1)),
    includeDirs: z.array(z.string().min(1)),
    hints: z
      .object({
        executable: z.string().min(1).nullable(),
      })
      .strict(),
    probeTimeoutMs: z.number().int().positive(),
  })
  .strict();

export type FindFlexConfig = z.infer<typeof findFlexConfigSchema>;

export interface ConfigResult {
  config: FindFlexConfig;
  /** File the settings were read from, or null when only defaults and env applied. */
  configPath: string | null;
}
