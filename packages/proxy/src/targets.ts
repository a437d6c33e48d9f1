/**
 * Target combinators.
 *
 * Resolvers can return plain functions, but targets built here carry their
 * {@link MethodType}, so the call site can check them precisely and adapt
 * `void` results. A combinator that reshapes arguments (such as
 * {@link dropArguments}) needs that type to know the arity it produces.
 *
 * @example
 * ```typescript
 * // applyAsInt(int,int)int on a proxy without delegate
 * const sum = typed(methodType(Types.int, [Types.int, Types.int]), (a: number, b: number) => a + b);
 * const target = dropArguments(sum, 0, IntBinaryOperator.token);
 * ```
 */

import { ArgumentError } from "@lazyproxy/core";
import type { LinkRequest, TargetFunction, TypedTarget } from "./resolver.js";
import { MethodType, type TypeToken } from "./types.js";

/**
 * Attach a type to a function.
 */
export function typed(type: MethodType, invoke: TargetFunction): TypedTarget {
  if (typeof invoke !== "function") {
    throw new ArgumentError("a target needs a function");
  }
  return { type, invoke };
}

/**
 * `() => value`.
 */
export function constant(type: TypeToken, value: unknown): TypedTarget {
  if (!type.accepts(value)) {
    throw new ArgumentError(`${String(value)} is not of type ${type.name}`);
  }
  return typed(new MethodType(type), () => value);
}

/**
 * `(value) => value`.
 */
export function identity(type: TypeToken): TypedTarget {
  return typed(new MethodType(type, [type]), (value: unknown) => value);
}

/**
 * Ignores its arguments and returns the default value of the return type.
 */
export function empty(type: MethodType): TypedTarget {
  return typed(type, () => type.returnType.defaultValue);
}

/**
 * Insert ignored parameters of the given types at `position`.
 */
export function dropArguments(
  target: TypedTarget,
  position: number,
  ...types: TypeToken[]
): TypedTarget {
  const type = target.type.insertParameterTypes(position, ...types);
  const count = types.length;
  const invoke = target.invoke;
  return typed(type, (...args: unknown[]) =>
    Reflect.apply(invoke, undefined, [...args.slice(0, position), ...args.slice(position + count)])
  );
}

/**
 * Call the method `name` on the first argument with the remaining ones, as a
 * delegating resolver does with the proxy's delegate.
 *
 * @param owner - Type of the first argument
 * @param type - Type of the method on `owner`
 */
export function invokeVirtual(owner: TypeToken, name: string, type: MethodType): TypedTarget {
  return typed(type.insertParameterTypes(0, owner), (...args: unknown[]) => {
    const [receiver, ...rest] = args;
    if (receiver === null || receiver === undefined) {
      throw new TypeError(`cannot call ${name} on ${String(receiver)}`);
    }
    const method: unknown = Reflect.get(Object(receiver), name);
    if (typeof method !== "function") {
      throw new TypeError(`${owner.name} has no method ${name}`);
    }
    return Reflect.apply(method, receiver, rest);
  });
}

/**
 * Run the default body of the requested method on the proxy, skipping the
 * delegate when there is one.
 */
export function invokeDefault(request: LinkRequest): TypedTarget {
  const body = request.defaultBody;
  if (body === undefined) {
    throw new ArgumentError(`${request.descriptor} has no default body`);
  }
  const skip = request.delegateType === undefined ? 0 : 1;
  return typed(request.targetType, (...args: unknown[]) =>
    Reflect.apply(body, args[0], args.slice(1 + skip))
  );
}
