import { BadRequestException, PipeTransform } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

/**
 * Validates a request parameter against a zod schema.
 *
 * Applied per parameter so it does not depend on emitted type metadata:
 * ```typescript
 * @Post()
 * create(@Body(new ZodValidationPipe(CreateSchema)) body: CreateRequest) {}
 * ```
 */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      throw new BadRequestException(formatIssues(result.error.issues));
    }

    return result.data;
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
