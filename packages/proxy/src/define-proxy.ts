/**
 * defineProxy - Synthesize a proxy type for a list of contracts
 *
 * The generated type implements every method of the contracts. Abstract
 * methods, and the default or universal methods the override policy selects,
 * are linked lazily: the first call of a method on any instance asks the
 * resolver for its target, and every later call goes straight to it.
 *
 * @example
 * ```typescript
 * const Sum = defineProxy(lookup("app"), [IntBinaryOperator], {
 *   resolver: () => (_proxy: unknown, a: number, b: number) => a + b,
 * });
 * Sum.newInstance().applyAsInt(3, 5); // 8
 * ```
 */

import { ArgumentError, createLogger } from "@lazyproxy/core";
import * as ts from "typescript";
import { analyzeContracts } from "./analyzer.js";
import { createConstructorGate, resolveBackend, type TypeSynthesisBackend } from "./backend/index.js";
import { CallSiteTable } from "./call-site.js";
import type { ContractType, ProxyObject } from "./contract.js";
import { Lookup } from "./lookup.js";
import type { ProxyClass } from "./proxy-base.js";
import { globalProxyRegistry } from "./registry.js";
import { OverridePolicies, isResolver, type OverridePolicy, type Resolver } from "./resolver.js";
import type { TypeToken } from "./types.js";

const log = createLogger("define");

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface ProxyOptions<D = void> {
  /** Supplies the target of each linked method */
  resolver: Resolver;
  /**
   * Selects the universal operations and default methods that are linked
   * through the resolver (default: {@link OverridePolicies.none}).
   */
  overridePolicy?: OverridePolicy;
  /** Type of the value passed to the constructor and forwarded to targets */
  delegate?: TypeToken<D>;
  /** Keep the type alive as long as the lookup (default: false) */
  registerWithHostLifetime?: boolean;
  /** Backend name or object (default: the `backend` configuration) */
  backend?: string | TypeSynthesisBackend;
  /** Name of the generated class (default: `<FirstContract>$$Proxy`) */
  name?: string;
}

const OPTION_KEYS: ReadonlySet<string> = new Set([
  "resolver",
  "overridePolicy",
  "delegate",
  "registerWithHostLifetime",
  "backend",
  "name",
]);

type InstanceOf<C> = C extends ContractType<infer T> ? T : never;

/**
 * Intersection of the interfaces of a tuple of contracts.
 */
export type ContractsInstance<Cs extends readonly ContractType[]> =
  Cs extends readonly [infer First extends ContractType, ...infer Rest extends ContractType[]]
    ? InstanceOf<First> & ContractsInstance<Rest>
    : unknown;

/**
 * Constructor arguments: none, or the delegate.
 */
export type DelegateArgs<D> = [D] extends [void] ? [] : [delegate: D];

export interface ProxyConstructor<T, D = void> {
  readonly type: ProxyClass;
  readonly name: string;
  newInstance(...args: DelegateArgs<D>): T & ProxyObject;
}

function isTypeToken(value: unknown): value is TypeToken {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "accepts" in value &&
    typeof value.accepts === "function"
  );
}

/**
 * Names a class declaration cannot take in strict code: reserved words,
 * strict-mode reserved words, `eval` and `arguments`.
 */
function isRestrictedName(name: string): boolean {
  if (name === "eval" || name === "arguments") {
    return true;
  }
  const token = ts.identifierToKeywordKind(ts.factory.createIdentifier(name));
  if (token === undefined) {
    return false;
  }
  return (
    (token >= ts.SyntaxKind.FirstReservedWord && token <= ts.SyntaxKind.LastReservedWord) ||
    (token >= ts.SyntaxKind.FirstFutureReservedWord && token <= ts.SyntaxKind.LastFutureReservedWord)
  );
}

function isInstanceOf<T>(value: unknown, type: ProxyClass): value is T & ProxyObject {
  return value instanceof type;
}

function checkOptions(options: unknown): void {
  if (typeof options !== "object" || options === null) {
    throw new ArgumentError("options with a resolver are required");
  }
  for (const key of Object.keys(options)) {
    if (!OPTION_KEYS.has(key)) {
      throw new ArgumentError(`unknown option '${key}'`);
    }
  }
}

/**
 * Define a proxy type implementing `contracts`.
 *
 * @throws {ArgumentError} For a missing lookup or resolver, an invalid
 *   option, contract or type name.
 * @throws {AccessError} When `lookup` cannot define proxies of the contracts.
 */
export function defineProxy<const Cs extends readonly ContractType[], D = void>(
  lookup: Lookup,
  contracts: Cs,
  options: ProxyOptions<D>
): ProxyConstructor<ContractsInstance<Cs>, D> {
  if (!(lookup instanceof Lookup)) {
    throw new ArgumentError("a lookup is required");
  }
  if (!Array.isArray(contracts)) {
    throw new ArgumentError("contracts must be an array");
  }
  checkOptions(options);

  const { resolver, delegate: delegateType } = options;
  if (!isResolver(resolver)) {
    throw new ArgumentError("a resolver is required");
  }
  const policy = options.overridePolicy ?? OverridePolicies.none;
  if (typeof policy !== "function") {
    throw new ArgumentError("overridePolicy must be a function");
  }
  if (delegateType !== undefined && !isTypeToken(delegateType)) {
    throw new ArgumentError("delegate must be a type token");
  }
  if (delegateType?.kind === "void") {
    throw new ArgumentError("a delegate cannot be void");
  }
  const backend = resolveBackend(options.backend);

  const descriptor = analyzeContracts(lookup, contracts, policy, resolver, delegateType);

  const typeName = options.name ?? `${descriptor.contracts[0]?.name ?? "Anonymous"}$$Proxy`;
  if (typeof typeName !== "string" || !IDENTIFIER.test(typeName) || isRestrictedName(typeName)) {
    throw new ArgumentError(`'${String(typeName)}' is not a valid type name`);
  }

  const registry = globalProxyRegistry;
  const gate = createConstructorGate(typeName, delegateType);
  const table = new CallSiteTable(
    { typeName, lookup, delegateType, findResolver: (type) => registry.lookupResolver(type) },
    descriptor.methods
  );

  const { type } = backend.emit({
    typeName,
    descriptor,
    delegateType,
    sites: table.sites,
    enter: gate.enter,
  });
  table.attach(type);

  registry.publish({
    type,
    resolver,
    descriptor,
    contracts: descriptor.contracts,
    delegateType,
    backend: backend.name,
    lookup,
  });
  if (options.registerWithHostLifetime === true) {
    lookup.retain(type);
  }
  gate.open();

  log.debug(
    `defined ${typeName} (${backend.name}): ${descriptor.methods.length} linked, ${descriptor.inheritedDefaults.length} default`
  );

  return {
    type,
    name: typeName,
    newInstance(...args) {
      const instance: unknown = Reflect.construct(type, args);
      if (!isInstanceOf<ContractsInstance<Cs>>(instance, type)) {
        throw new TypeError(`${typeName} constructor returned a foreign object`);
      }
      return instance;
    },
  };
}
