import { z } from 'zod';

import { ConfigurationError } from '../application/errors';

export const DEFAULT_HASH_CHUNK_SIZE_BYTES = 8192;

export const consolidationConfigSchema = z.object({
  destinationRoot: z.string().trim().min(1, 'destination root is required'),
  sourceRoots: z
    .array(z.string().trim().min(1, 'source root must not be empty'))
    .min(1, 'at least one source root is required'),
  logFile: z.string().trim().min(1).optional(),
  pruneSources: z.boolean().default(false),
  hashChunkSizeBytes: z.number().int().positive().default(DEFAULT_HASH_CHUNK_SIZE_BYTES),
});

export type ConsolidationConfig = z.infer<typeof consolidationConfigSchema>;
export type ConsolidationConfigInput = z.input<typeof consolidationConfigSchema>;

/**
 * Everything a config file may carry; completeness is checked after CLI flags
 * are merged in. Pruning is picked by the command, so the file cannot set it.
 */
export const partialConsolidationConfigSchema = consolidationConfigSchema
  .omit({ pruneSources: true })
  .partial()
  .strict();

export type PartialConsolidationConfig = z.infer<typeof partialConsolidationConfigSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );

export const parseConsolidationConfig = (input: unknown): ConsolidationConfig => {
  const parsed = consolidationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
  }
  return parsed.data;
};

export const parsePartialConsolidationConfig = (
  input: unknown,
  source: string,
): PartialConsolidationConfig => {
  const parsed = partialConsolidationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
};
