/**
 * Tagged success/failure values.
 *
 * Every store-facing operation returns a Result instead of throwing or
 * handing back null, so callers have to narrow on `ok` before they can
 * reach the value.
 */

import { z } from 'zod';

export type PipelineErrorKind = 'ConnectionError' | 'QueryError' | 'InsertError';

export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
  cause?: unknown;
}

export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * One line per validation failure, e.g. `row 0 MacroTopic: Expected string,
 * received null`, joined with '; '.
 */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const [head, ...rest] = issue.path;
      const where =
        typeof head === 'number' ? [`row ${head}`, ...rest].join(' ') : issue.path.join('.');
      return where === '' ? issue.message : `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Builds a PipelineError from a caught value, keeping the original as cause.
 */
export function pipelineError(
  kind: PipelineErrorKind,
  context: string,
  cause: unknown,
): PipelineError {
  let detail: string;
  if (cause instanceof z.ZodError) {
    detail = describeZodError(cause);
  } else if (cause instanceof Error) {
    detail = cause.message;
  } else {
    detail = String(cause);
  }
  return { kind, message: `${context}: ${detail}`, cause };
}
