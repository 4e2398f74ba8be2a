// =====================================================
// Zod Validation Helpers
// =====================================================
// Validates request body, query params, or URL params against Zod schemas.
// Validation happens at the boundary - no invalid data reaches the service.

import { z } from 'zod';
import { InvalidInputError } from '../utils/errors';

// ===========================================
// Types
// ===========================================

/**
 * Validation error detail with field path and message.
 */
export interface ValidationErrorDetail {
  field: string;
  message: string;
}

// ===========================================
// Parsing
// ===========================================

/**
 * Parses one request property and returns the transformed data.
 *
 * @throws {InvalidInputError} When validation fails, listing every field issue
 *
 * @example
 * ```typescript
 * const { n } = parseRequest(topNParamsSchema, req.params);
 * ```
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw new InvalidInputError(
      `Validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`
    );
  }

  return result.data;
}

// ===========================================
// Helper Functions
// ===========================================

/**
 * Formats Zod validation errors into a clean array of field errors.
 */
export function formatZodErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((err) => ({
    field: err.path.join('.') || 'body',
    message: err.message,
  }));
}
