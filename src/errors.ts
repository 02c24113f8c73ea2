/**
 * Error types for the viewer core.
 *
 * Boundary conditions (no next row, cursor already at the last line) are
 * modelled as `undefined` results, not errors. Anything thrown from here means
 * an invariant of the engine was broken by a caller or a bug.
 */

/** A broken engine invariant. Not recoverable. */
export class InvariantError extends Error {
  override readonly name = "InvariantError";
}

/**
 * Assert an engine invariant.
 * Throws InvariantError with `message` when `condition` is false.
 */
export function invariant(condition: boolean, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new InvariantError(typeof message === "string" ? message : message());
  }
}
