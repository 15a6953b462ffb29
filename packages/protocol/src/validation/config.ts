// Registry configuration schema

import { z } from 'zod';

export const DEFAULT_MAX_GRAPH_SIZE = 100_000;

export const RegistryConfigSchema = z
  .object({
    /** Deep-freeze stored snapshots so accidental writes throw */
    freezeSnapshots: z.boolean().default(true),
    /** Run entity type schemas on every node before storing */
    validatePayloads: z.boolean().default(true),
    /** Largest tree a single graph may hold */
    maxGraphSize: z.number().int().positive().default(DEFAULT_MAX_GRAPH_SIZE),
  })
  .strict();

/**
 * Configuration as callers write it; every key is optional.
 */
export type RegistryConfig = z.input<typeof RegistryConfigSchema>;

/**
 * Configuration with defaults applied.
 */
export type ResolvedRegistryConfig = z.output<typeof RegistryConfigSchema>;

export type ConfigIssue = {
  path: string;
  message: string;
};

export type ConfigParseResult =
  | { success: true; config: ResolvedRegistryConfig }
  | { success: false; issues: ConfigIssue[] };

/**
 * Parse registry configuration, applying defaults.
 */
export function parseRegistryConfig(input: unknown): ConfigParseResult {
  const result = RegistryConfigSchema.safeParse(input ?? {});
  if (result.success) {
    return { success: true, config: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}
