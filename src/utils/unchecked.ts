/**
 * Outcome of a fallible step run through {@link attempt}.
 *
 * Result Pattern:
 * - `{ ok: true, value }` when the step returned normally.
 * - `{ ok: false, error }` when the step threw; `error` is whatever was thrown.
 */
export type Attempt<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

/**
 * Runs a fallible step and captures its failure as a value instead of
 * unwinding the stack.
 *
 * Callers decide per call site whether a failure is recovered (logged and
 * dropped) or re-thrown as a typed error; see {@link runUnchecked} for the
 * latter.
 *
 * @template T - The step's return type.
 * @param step - The function to run.
 * @returns The captured outcome.
 */
export function attempt<T>(step: () => T): Attempt<T> {
  try {
    return { ok: true, value: step() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Runs a fallible step, converting any failure into the error produced by
 * `wrap`.
 *
 * @param wrap - Builds the propagating error from the thrown value.
 * @throws The error returned by `wrap` when `step` throws.
 */
export function runUnchecked<T>(
  step: () => T,
  wrap: (cause: unknown) => Error
): T {
  const outcome = attempt(step);
  if (!outcome.ok) throw wrap(outcome.error);
  return outcome.value;
}

/**
 * Renders a thrown value for log lines.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
