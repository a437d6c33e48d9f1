/**
 * The resolver contract.
 *
 * A resolver maps the description of one proxy method to the target that
 * implements it. It is consulted the first time the method is called on any
 * instance of the generated type, and never again once a target is bound.
 *
 * The target's calling convention is
 * `(proxy, [delegate], ...originalArgs) => originalReturn`: the delegate is
 * only passed when the proxy was defined with a delegate type.
 *
 * @module
 */

import type { ContractType, MethodBody } from "./contract.js";
import type { Lookup } from "./lookup.js";
import type { ProxyClass } from "./proxy-base.js";
import { MethodType, type TypeToken } from "./types.js";

/**
 * Description of a contract method, as seen by override policies and
 * resolvers.
 */
export interface MethodInfo {
  readonly declaringContract: ContractType;
  readonly name: string;
  readonly methodType: MethodType;
  readonly parameterTypes: readonly TypeToken[];
  readonly returnType: TypeToken;
  readonly isAbstract: boolean;
  readonly isDefault: boolean;
  readonly isVarargs: boolean;
  /** `equals`, `hashCode` or `toString` */
  readonly isUniversal: boolean;
  /** Body of a default method, for resolvers that want to call it */
  readonly defaultBody?: MethodBody;
  /** `Contract.name(params)return` */
  readonly descriptor: string;
}

/**
 * What a resolver receives when a call site binds.
 */
export interface LinkRequest extends MethodInfo {
  /** The generated type being linked */
  readonly proxyType: ProxyClass;
  readonly delegateType: TypeToken | undefined;
  /**
   * The type the target must have: `methodType` with the receiver and, if
   * present, the delegate inserted in front.
   */
  readonly targetType: MethodType;
  /** Index of the method's call site */
  readonly ordinal: number;
  /** Lookup the proxy was defined with */
  readonly lookup: Lookup;
}

/**
 * A plain target. Its `length` must equal the arity of the request's
 * `targetType`.
 */
export type TargetFunction = (...args: never[]) => unknown;

/**
 * A target that declares its own type; the call site checks it against the
 * request's `targetType` and adapts `void` results.
 */
export interface TypedTarget {
  readonly type: MethodType;
  readonly invoke: TargetFunction;
}

export type Target = TargetFunction | TypedTarget;

export type ResolveFunction = (request: LinkRequest) => Target | null | undefined;

export interface ResolverObject {
  resolve(request: LinkRequest): Target | null | undefined;
  /**
   * Called once per default-bodied method while the proxy type is defined.
   * Returning `true` routes the method through {@link resolve}; otherwise the
   * default body is used and no call site exists for it.
   */
  overrideDefaultMethod?(method: MethodInfo): boolean;
}

export type Resolver = ResolveFunction | ResolverObject;

/**
 * Decides, at definition time, whether a universal operation or a default
 * method is routed through the resolver.
 */
export type OverridePolicy = (method: MethodInfo) => boolean;

export const OverridePolicies = {
  /** Keep identity universals and default bodies */
  none: (() => false) satisfies OverridePolicy,
  /** Resolve `equals`, `hashCode` and `toString` */
  universal: ((method) => method.isUniversal) satisfies OverridePolicy,
  /** Resolve default-bodied methods */
  defaults: ((method) => method.isDefault) satisfies OverridePolicy,
  all: (() => true) satisfies OverridePolicy,
} as const;

export function isTypedTarget(value: unknown): value is TypedTarget {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type instanceof MethodType &&
    "invoke" in value &&
    typeof value.invoke === "function"
  );
}

export function isResolver(value: unknown): value is Resolver {
  if (typeof value === "function") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    "resolve" in value &&
    typeof value.resolve === "function"
  );
}

/**
 * Uniform view over the two resolver shapes.
 */
export function resolveWith(resolver: Resolver, request: LinkRequest): Target | null | undefined {
  return typeof resolver === "function" ? resolver(request) : resolver.resolve(request);
}

export function wantsDefaultOverride(resolver: Resolver, method: MethodInfo): boolean {
  if (typeof resolver === "function" || resolver.overrideDefaultMethod === undefined) {
    return false;
  }
  return resolver.overrideDefaultMethod(method) === true;
}
