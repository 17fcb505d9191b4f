import { z } from 'zod';

export const ErrorSchema = z.object({
  code: z.string().describe('Error code (e.g., E_NOT_FOUND)'),
  message: z.string().describe('Human-readable error message'),
  path: z.string().optional().describe('Path that caused the error'),
  suggestion: z.string().optional().describe('Suggested action to resolve'),
});

export const WorkerCountSchema = z
  .number()
  .int('worker count must be an integer')
  .min(1, 'worker count must be at least 1');

export const PathSchema = z
  .string()
  .min(1, 'path must not be empty')
  .refine((value) => !value.includes('\0'), {
    message: 'path must not contain null bytes',
  });
