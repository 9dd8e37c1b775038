import { PipeTransform, UnprocessableEntityException } from '@nestjs/common';
import type { ZodIssue, ZodTypeAny, z } from 'zod';

export type ValidationIssue = {
  loc: Array<string | number>;
  msg: string;
  type: string;
};

export function toValidationIssues(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/**
 * Parses a request body against a zod schema. Rejections become a 422 whose
 * `detail` lists each failing field.
 */
export class ZodValidationPipe<TSchema extends ZodTypeAny> implements PipeTransform<unknown, z.infer<TSchema>> {
  constructor(private readonly schema: TSchema) {}

  transform(value: unknown): z.infer<TSchema> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new UnprocessableEntityException({
        statusCode: 422,
        message: 'Validation failed',
        detail: toValidationIssues(result.error.issues),
      });
    }
    return result.data;
  }
}
