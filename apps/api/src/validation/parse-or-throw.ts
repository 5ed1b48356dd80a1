import { BadRequestException } from '@nestjs/common';
import { ZodError, ZodType, ZodTypeDef } from 'zod';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ParseOptions {
  message?: string;
}

/**
 * Parses input against a Zod schema, throwing BadRequestException on failure.
 * Returns the parsed value on success.
 */
export function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  options?: ParseOptions,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new BadRequestException({
    message: options?.message ?? 'Invalid request',
    errors: formatZodErrors(result.error),
  });
}

/** Field errors sorted by path, then message. */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.issues
    .map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
      message: issue.message,
    }))
    .sort((a, b) =>
      a.path !== b.path
        ? a.path.localeCompare(b.path)
        : a.message.localeCompare(b.message),
    );
}
