import { z } from 'zod';

import { DEFAULT_WORKER_COUNT } from '../lib/constants.js';
import { PathSchema, WorkerCountSchema } from './common.js';

// Emptiness of the service name is checked once, by the scan itself
const ServiceNameSchema = z
  .string()
  .describe("Service name to search for in each rule's msg field");

export const CliArgsSchema = z.object({
  inputFile: PathSchema,
  outputFile: PathSchema.optional(),
  serviceName: ServiceNameSchema,
  threads: z.coerce
    .number({ invalid_type_error: 'threads must be a number' })
    .pipe(WorkerCountSchema)
    .default(DEFAULT_WORKER_COUNT),
});

export const SearchRulesInputSchema = {
  inputPath: PathSchema.describe('Path to the rule file (one rule per line)'),
  serviceName: ServiceNameSchema,
  outputPath: PathSchema.optional().describe(
    'Append matched rules to this file instead of returning them'
  ),
  workers: WorkerCountSchema.optional()
    .default(DEFAULT_WORKER_COUNT)
    .describe(`Number of parallel workers (default ${DEFAULT_WORKER_COUNT})`),
};
