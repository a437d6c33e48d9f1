/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — Runtime assertion for internal states
 * - `unreachable(value?)` — Mark impossible code paths
 *
 * @example
 * ```typescript
 * type State = { kind: "unbound" } | { kind: "bound" };
 * function describe(state: State): string {
 *   switch (state.kind) {
 *     case "unbound": return "unbound";
 *     case "bound": return "bound";
 *     default: return unreachable(state); // Type error if State is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @param condition - The condition that must be true
 * @param message - Error message if the invariant is violated
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 * @throws Error always
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}
