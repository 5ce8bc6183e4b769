import { BadRequestException } from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';

/**
 * Validate request input against a zod schema.
 *
 * @throws BadRequestException listing each failing path
 */
export function parseInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}
