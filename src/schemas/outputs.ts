import { z } from 'zod';

import { ErrorSchema } from './common.js';

export const SearchRulesOutputSchema = z.object({
  ok: z.boolean(),
  serviceName: z.string().optional(),
  inputPath: z.string().optional(),
  totalMatches: z.number().optional(),
  linesScanned: z.number().optional(),
  chunksFailed: z.number().optional(),
  outputPath: z
    .string()
    .optional()
    .describe('File the matched rules were appended to'),
  matches: z
    .array(z.string())
    .optional()
    .describe('Matched rule lines, when no outputPath was given'),
  error: ErrorSchema.optional(),
});
