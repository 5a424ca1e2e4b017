/**
 * Launch Command Definitions
 */

import { z } from 'zod';

export const launchArgsSchema = z.object({
  pathCheckpoint: z.string().min(1, 'path must not be empty'),
});

export type LaunchArgs = z.infer<typeof launchArgsSchema>;

/**
 * One fixed flag handed to the training executable. A missing value (or true)
 * renders a bare switch such as --dropout; false drops the flag entirely.
 */
export const hyperparameterSchema = z.object({
  flag: z.string().regex(/^-{1,2}[^-\s]/, 'flag must start with - or --'),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
});

export const launchPresetSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()).default([]),
  hyperparameters: z.array(hyperparameterSchema).default([]),
  env: z.record(z.string()).default({}),
});

export type Hyperparameter = z.infer<typeof hyperparameterSchema>;
export type LaunchPreset = z.infer<typeof launchPresetSchema>;
