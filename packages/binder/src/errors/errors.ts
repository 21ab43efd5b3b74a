import { BadRequestError } from '@argbind/common';
import type { ZodError, ZodIssue } from 'zod';

/**
 * A raw argument could not be coerced into the kind its field declares.
 */
export class ArgumentDecodeError extends BadRequestError {
  constructor(
    readonly key: string,
    readonly value: string,
    readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`failed to decode \`${key}\`, got: \`${value}\` (${reason})`, options);
  }
}

export class BracketSyntaxError extends BadRequestError {
  constructor(
    readonly key: string,
    readonly detail: string,
  ) {
    super(`Malformed query string: ${detail} in key "${key}"`);
  }
}

/**
 * The canonical tree (or a JSON body) does not fit the shape of the destination.
 */
export class StructuredDecodeError extends BadRequestError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = [], options?: ErrorOptions) {
    super(message, options);

    this.issues = issues;
  }

  static fromZodError(error: ZodError): StructuredDecodeError {
    const details = error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');

    return new StructuredDecodeError(`failed to decode arguments: ${details}`, error.issues, { cause: error });
  }
}
