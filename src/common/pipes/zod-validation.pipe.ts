import { ArgumentMetadata, Injectable, PipeTransform } from '@nestjs/common';
import type { ZodType } from 'zod';

import { AppException } from '../errors/app.exception';

export type ValidationIssue = {
  code: string;
  path: string;
  message: string;
};

type ValidationDetails = {
  source: ArgumentMetadata['type'];
  field: string | null;
  issues: ValidationIssue[];
};

@Injectable()
export class ZodValidationPipe<TOutput = unknown> implements PipeTransform {
  constructor(
    private readonly schema: ZodType<TOutput>,
    private readonly errorMessage = 'Validation failed',
  ) {}

  transform(value: unknown, metadata: ArgumentMetadata): TOutput {
    const parsed = this.schema.safeParse(value);

    if (parsed.success) {
      return parsed.data;
    }

    const details: ValidationDetails = {
      source: metadata.type,
      field: metadata.data ?? null,
      issues: parsed.error.issues.map(formatIssue),
    };

    throw AppException.validation(
      details.issues[0]?.message ?? this.errorMessage,
      details,
    );
  }
}

function formatIssue(issue: {
  code: string;
  path: PropertyKey[];
  message: string;
}): ValidationIssue {
  return {
    code: issue.code,
    path: issue.path.length > 0 ? issue.path.map(String).join('.') : '$',
    message: issue.message,
  };
}
