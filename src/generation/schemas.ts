/**
 * Request payload schemas for the generation and admin endpoints.
 */

import { z } from 'zod';
import { CertificateError, FieldIssue, payloadValidationError } from '../domain/errors';

export const participantSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255, 'Name must be at most 255 characters'),
  email: z.string().trim().email('Invalid email address').max(255),
});

export type Participant = z.infer<typeof participantSchema>;

export function generationRequestSchema(maxBatchSize: number) {
  return z.object({
    participants: z
      .array(participantSchema)
      .min(1, 'At least one participant is required')
      .max(maxBatchSize, `At most ${maxBatchSize} participants per request`),
    sendEmail: z.boolean().default(false),
  });
}

export const loginRequestSchema = z.object({
  password: z.string().min(1, 'Password is required'),
});

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const searchQuerySchema = listQuerySchema.extend({
  email: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
});

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/** Parse `input` or throw VALIDATION.PAYLOAD with one issue per failing field. */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new CertificateError(payloadValidationError(toFieldIssues(result.error)));
  }
  return result.data;
}
