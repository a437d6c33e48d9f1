/**
 * Pieces every backend shares: the arity limit, the constructor gate and the
 * installation of default method bodies.
 */

import { ArgumentError, config, createLogger } from "@lazyproxy/core";
import type { AnalyzedMethod } from "../analyzer.js";
import type { TypeToken } from "../types.js";
import type { EmitRequest, EnterFunction } from "./types.js";

const log = createLogger("backend");

export const DEFAULT_ARITY_LIMIT = 255;

export function arityLimit(): number {
  const limit = config.get("limits.arity");
  if (typeof limit === "number" && Number.isInteger(limit) && limit > 0) {
    return limit;
  }
  if (limit !== undefined) {
    log.warn(`ignoring limits.arity ${JSON.stringify(limit)}, using ${DEFAULT_ARITY_LIMIT}`);
  }
  return DEFAULT_ARITY_LIMIT;
}

/**
 * Reject methods whose target would take more arguments than the limit. The
 * receiver and the delegate count.
 *
 * @throws {ArgumentError}
 */
export function checkArity(request: EmitRequest): void {
  const limit = arityLimit();
  const extra = request.delegateType === undefined ? 1 : 2;
  for (const { info } of request.descriptor.methods) {
    const arity = info.parameterTypes.length + extra;
    if (arity > limit) {
      throw new ArgumentError(
        `${info.descriptor} needs ${arity} target arguments, more than the limit of ${limit}`
      );
    }
  }
}

/**
 * Put the bodies of default methods nobody overrides on the prototype, with
 * the attributes of a class method.
 */
export function installDefaults(prototype: object, defaults: readonly AnalyzedMethod[]): void {
  for (const { info } of defaults) {
    if (info.defaultBody === undefined) continue;
    Object.defineProperty(prototype, info.name, {
      value: info.defaultBody,
      writable: true,
      enumerable: false,
      configurable: true,
    });
  }
}

export interface ConstructorGate {
  readonly enter: EnterFunction;
  readonly isOpen: boolean;
  open(): void;
}

/**
 * Guards the constructor of a generated type: closed until the type is
 * published, then checks the constructor arguments.
 */
export function createConstructorGate(typeName: string, delegateType: TypeToken | undefined): ConstructorGate {
  let isOpen = false;
  const expected = delegateType === undefined ? 0 : 1;

  return {
    enter(argumentCount, delegate) {
      if (!isOpen) {
        throw new ArgumentError(`${typeName} cannot be instantiated before it is published`);
      }
      if (argumentCount !== expected) {
        throw new ArgumentError(
          `${typeName} takes ${expected} constructor argument${expected === 1 ? "" : "s"}, got ${argumentCount}`
        );
      }
      if (delegateType !== undefined && !delegateType.accepts(delegate)) {
        throw new ArgumentError(`the delegate of ${typeName} must be of type ${delegateType.name}`);
      }
    },
    get isOpen() {
      return isOpen;
    },
    open() {
      isOpen = true;
    },
  };
}
