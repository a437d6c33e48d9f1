/**
 * Proxy Error Types
 *
 * Generation-time failures ({@link AccessError}, {@link ArgumentError}) are
 * fatal to the `defineProxy` call that raised them. A {@link LinkageError} is
 * scoped to the single proxy method call that triggered the binding.
 */

/**
 * When an error was raised.
 */
export type ProxyErrorPhase = "generation" | "linkage";

/**
 * Base class for all proxy errors.
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly phase: ProxyErrorPhase,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ProxyError";
  }
}

/**
 * A contract, or one of its methods, is not visible from the requesting lookup.
 */
export class AccessError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "generation", options);
    this.name = "AccessError";
  }
}

/**
 * Invalid contract, unsupported signature, conflicting options or a missing
 * required argument.
 */
export class ArgumentError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "generation", options);
    this.name = "ArgumentError";
  }
}

/**
 * The resolver produced no usable target for a method.
 *
 * `method` is the `Contract.name(params)return` descriptor of the method
 * whose call site failed to bind.
 */
export class LinkageError extends ProxyError {
  constructor(
    message: string,
    public readonly method: string,
    options?: ErrorOptions
  ) {
    super(message, "linkage", options);
    this.name = "LinkageError";
  }
}

/**
 * Render an unknown thrown value for an error message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
