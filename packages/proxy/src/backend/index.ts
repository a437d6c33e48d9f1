/**
 * Type synthesis backends.
 */

import { ArgumentError, config } from "@lazyproxy/core";
import { emitBackend } from "./emit.js";
import { tableBackend } from "./table.js";
import type { TypeSynthesisBackend } from "./types.js";

export { emitBackend, generateSource } from "./emit.js";
export { tableBackend } from "./table.js";
export {
  DEFAULT_ARITY_LIMIT,
  arityLimit,
  checkArity,
  createConstructorGate,
  installDefaults,
  type ConstructorGate,
} from "./shared.js";
export type { EmitRequest, EnterFunction, LoadableType, TypeSynthesisBackend } from "./types.js";

const backends = new Map<string, TypeSynthesisBackend>([
  [emitBackend.name, emitBackend],
  [tableBackend.name, tableBackend],
]);

function isBackend(value: unknown): value is TypeSynthesisBackend {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "emit" in value &&
    typeof value.emit === "function"
  );
}

/**
 * The backend for a `backend` option: a backend object, a backend name, or
 * nothing for the configured one (`emit` unless configured otherwise).
 *
 * @throws {ArgumentError} For an unknown name.
 */
export function resolveBackend(choice?: string | TypeSynthesisBackend): TypeSynthesisBackend {
  if (isBackend(choice)) {
    return choice;
  }
  const name: unknown = choice ?? config.get("backend");
  const backend = typeof name === "string" ? backends.get(name) : undefined;
  if (backend === undefined) {
    throw new ArgumentError(`unknown type synthesis backend '${String(name)}'`);
  }
  return backend;
}
