/**
 * Configuration schemas and defaults for the control layer
 *
 * @module control/config
 */

import { z } from 'zod';
import { ControlError, DEFAULT_WINDOW_FACTOR, ErrorCode } from './protocol.js';

export const RegistryConfigSchema = z.object({
  /** Log connects and removals to the console */
  verbose: z.boolean(),
});

export const MultireceiverConfigSchema = z.object({
  /** Dedup window capacity per active member */
  windowFactor: z.number().positive(),
  /** Log evictions to the console */
  verbose: z.boolean(),
});

export const CliConfigSchema = z.object({
  verbose: z.boolean(),
  windowFactor: z.number().positive(),
  session: z.string().min(1),
  /** Party members as `Kind:Name` entries */
  party: z.array(z.string().regex(/^\w+:\S+$/, 'expected Kind:Name')).min(1),
});

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type MultireceiverConfig = z.infer<typeof MultireceiverConfigSchema>;
export type CliConfig = z.infer<typeof CliConfigSchema>;

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  verbose: false,
};

export const DEFAULT_MULTIRECEIVER_CONFIG: MultireceiverConfig = {
  windowFactor: DEFAULT_WINDOW_FACTOR,
  verbose: false,
};

export const DEFAULT_CLI_CONFIG: CliConfig = {
  verbose: false,
  windowFactor: DEFAULT_WINDOW_FACTOR,
  session: 'local',
  party: ['Sentinel:Ada', 'Sentinel:Bram', 'Wanderer:Cole'],
};

/**
 * Merge overrides onto defaults and validate the result.
 * Throws ControlError(INVALID_CONFIG) listing every failing field.
 */
export function resolveConfig<T extends object>(
  schema: z.ZodType<T>,
  defaults: T,
  overrides: Partial<T> = {}
): T {
  const result = schema.safeParse({ ...defaults, ...overrides });
  if (!result.success) {
    throw new ControlError(ErrorCode.INVALID_CONFIG, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse the JSON text of a CLI config file. Every field is optional;
 * unknown fields are dropped.
 */
export function parseCliConfigFile(text: string): Partial<CliConfig> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ControlError(
      ErrorCode.INVALID_CONFIG,
      `Config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = CliConfigSchema.partial().safeParse(json);
  if (!result.success) {
    throw new ControlError(ErrorCode.INVALID_CONFIG, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
