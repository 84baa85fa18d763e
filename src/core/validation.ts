// Submission validation - malformed requests are rejected before any
// classification or job store work happens. File sizes are whole bytes; the
// file type comes from file_extension or, failing that, file_name.

import { z } from 'zod';
import { InvalidSubmissionError } from './errors.js';
import { REQUESTED_PRIORITIES, USER_TIERS } from './types/queue.js';

export const SimilarFileRecordSchema = z.object({
  file_size: z.number().finite().nonnegative(),
  historical_ai_tier: z.number().finite().nonnegative(),
});

export const SubmissionRequestSchema = z
  .object({
    file_size: z.number().int().finite().nonnegative(),
    file_name: z.string().min(1).optional(),
    file_extension: z.string().min(1).optional(),
    user_tier: z.enum(USER_TIERS),
    requested_priority: z.enum(REQUESTED_PRIORITIES).default('normal'),
    similar_file_history: z.array(SimilarFileRecordSchema).optional(),
    file_id: z.string().optional(),
    user_id: z.string().optional(),
    payload: z.record(z.unknown()).optional(),
  })
  .refine(request => request.file_name !== undefined || request.file_extension !== undefined, {
    message: 'file_name or file_extension is required',
    path: ['file_name'],
  });

export type ValidatedSubmission = z.infer<typeof SubmissionRequestSchema>;

export function validateSubmission(request: unknown): ValidatedSubmission {
  const result = SubmissionRequestSchema.safeParse(request);
  if (!result.success) {
    throw new InvalidSubmissionError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
    );
  }
  return result.data;
}
