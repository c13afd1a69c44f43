import { z } from 'zod';
import { ConstructionError } from './errors.js';

export type ValidationOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

export function accepted<T>(value: T): ValidationOutcome<T> {
  return { ok: true, value };
}

export function rejected<T>(message: string): ValidationOutcome<T> {
  return { ok: false, message };
}

/** Caller-supplied rule. Return a message to reject, nothing to accept. */
export type Check<A extends unknown[]> = (...args: A) => string | undefined;

/** Runs an optional caller check on top of an already accepted outcome. */
export function refine<T, A extends unknown[]>(
  outcome: ValidationOutcome<T>,
  check: Check<A> | undefined,
  ...args: A
): ValidationOutcome<T> {
  if (!outcome.ok || !check) return outcome;
  const message = check(...args);
  return message === undefined ? outcome : rejected(message);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`).join('\n');
}

/** Parses prompt construction options, turning zod issues into a ConstructionError. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConstructionError(`Invalid ${what} options:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
