import { z } from 'zod';

export const chatRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required').max(128),
  message: z.string().trim().min(1, 'Message is required and cannot be empty').max(1000, 'Message is too long'),
  userId: z.string().trim().min(1).max(128).optional(),
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;

export const sessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1).max(128),
});

export const historyIndexParamsSchema = sessionParamsSchema.extend({
  index: z.coerce.number().int('index must be an integer').min(0, 'index must be 0 or more'),
});

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

/**
 * Validates a request part against a schema
 * @returns typed data or one entry per failed field
 */
export function validateRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}
