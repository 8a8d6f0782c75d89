import { ZodError, type ZodIssue, type ZodTypeAny, type output } from 'zod';
import { UnauthorizedError, type Actor } from '@salesdesk/core';
import type { Request } from 'express';

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

export class HandledError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor({
    status,
    code,
    message,
    details,
  }: {
    status: number;
    code: string;
    message: string;
    details?: unknown;
  }) {
    super(message);
    this.name = 'HandledError';
    this.status = status;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, HandledError.prototype);
  }
}

const issueField = (issue: ZodIssue): string => (issue.path.length > 0 ? issue.path.join('.') : 'body');

/** One entry per field, keeping the first message reported for it. */
export const formatZodIssues = (issues: ZodIssue[]): ValidationErrorDetail[] =>
  issues
    .map((issue) => ({ field: issueField(issue), message: issue.message }))
    .filter((detail, index, details) => details.findIndex((other) => other.field === detail.field) === index);

export const buildValidationError = (issues: ZodIssue[]): HandledError =>
  new HandledError({
    status: 400,
    code: 'VALIDATION_ERROR',
    message: 'Invalid request payload.',
    details: { errors: formatZodIssues(issues) },
  });

export const parseOrFail = <S extends ZodTypeAny>(schema: S, payload: unknown): output<S> => {
  try {
    return schema.parse(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      throw buildValidationError(error.issues);
    }

    throw error;
  }
};

export const requireActor = (req: Request): Actor => {
  if (!req.user) {
    throw new UnauthorizedError();
  }

  const { id, tenantId, role, department } = req.user;
  return { id, tenantId, role, department };
};
