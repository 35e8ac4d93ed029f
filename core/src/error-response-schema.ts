/**
 * Zod runtime schema for the error response body.
 *
 * Mirrors the ErrorResponse interface in error-response.ts. A missing
 * stackTrace is accepted and normalized to null.
 */

import { z } from "zod";

export const ErrorResponseSchema = z.object({
  errorMessage: z.string(),
  errorType: z.string(),
  stackTrace: z
    .array(z.string())
    .nullish()
    .transform((lines) => lines ?? null),
});
