/**
 * Call-Site Cache
 *
 * Every method a generated type resolves owns one {@link CallSite}. The
 * trampoline of the method reads `site.target` and calls it. Until the site
 * is bound, `target` is a stub that links the site: it asks the resolver
 * published for the type, validates and adapts the returned target, then
 * replaces itself with it. Later calls go straight to the bound target.
 *
 * Binding is single-writer: while a site is linking, a call that reaches it
 * again (the resolver calling the method it is resolving) fails instead of
 * consulting the resolver a second time. A failed bind leaves the site
 * unbound so the next call retries.
 */

import {
  LinkageError,
  createLogger,
  describeError,
  globalLinkageTracer,
  invariant,
  unreachable,
  type LinkageOutcome,
} from "@lazyproxy/core";
import type { AnalyzedMethod } from "./analyzer.js";
import type { Lookup } from "./lookup.js";
import type { ProxyClass } from "./proxy-base.js";
import {
  isTypedTarget,
  resolveWith,
  type LinkRequest,
  type Resolver,
  type Target,
} from "./resolver.js";
import { isConvertible, type MethodType, type TypeToken } from "./types.js";

const log = createLogger("linkage");

/**
 * What every site of a generated type shares.
 */
export interface CallSiteContext {
  readonly typeName: string;
  readonly lookup: Lookup;
  readonly delegateType: TypeToken | undefined;
  /** Resolver published for a generated type (the registry handshake) */
  readonly findResolver: (type: ProxyClass) => Resolver | undefined;
}

/**
 * Calling convention of a bound site: `(proxy, [delegate], ...args)`.
 */
export type Invoker = (...args: unknown[]) => unknown;

export type CallSiteState = "unbound" | "linking" | "bound";

export class CallSite {
  private currentState: CallSiteState = "unbound";

  /** Entry point read by the trampoline on every call */
  target: Invoker = (...args) => Reflect.apply(this.bind(), undefined, args);

  constructor(
    private readonly table: CallSiteTable,
    readonly method: AnalyzedMethod
  ) {}

  get state(): CallSiteState {
    return this.currentState;
  }

  get ordinal(): number {
    return this.method.ordinal;
  }

  get descriptor(): string {
    return this.method.info.descriptor;
  }

  /**
   * Bind the site if needed and return its target.
   *
   * @throws {LinkageError} When the type is not registered, the resolver
   *   fails or returns an unusable target, or the site is already linking.
   */
  bind(): Invoker {
    const state = this.currentState;
    switch (state) {
      case "bound":
        return this.target;
      case "linking":
        throw new LinkageError(
          `${this.descriptor} was called while its target is being resolved`,
          this.descriptor
        );
      case "unbound":
        return this.link();
      default:
        return unreachable(state);
    }
  }

  private link(): Invoker {
    this.currentState = "linking";
    try {
      const request = this.request();
      const resolver = this.table.context.findResolver(request.proxyType);
      if (resolver === undefined) {
        throw new LinkageError(
          `${this.table.context.typeName} is not a registered proxy type`,
          this.descriptor
        );
      }

      let resolved: Target | null | undefined;
      try {
        resolved = resolveWith(resolver, request);
      } catch (error) {
        if (error instanceof LinkageError) throw error;
        throw new LinkageError(
          `resolver failed for ${this.descriptor}: ${describeError(error)}`,
          this.descriptor,
          { cause: error }
        );
      }

      const invoker = adapt(request, resolved);
      this.target = invoker;
      this.currentState = "bound";
      this.report("bound");
      log.debug(`bound ${this.table.context.typeName} ${this.descriptor}`);
      return invoker;
    } catch (error) {
      this.currentState = "unbound";
      const reason = describeError(error);
      this.report("failed", reason);
      log.debug(`failed to bind ${this.table.context.typeName} ${this.descriptor}: ${reason}`);
      throw error;
    }
  }

  private request(): LinkRequest {
    const { info, ordinal } = this.method;
    const { delegateType, lookup } = this.table.context;
    const leading = delegateType === undefined
      ? [info.declaringContract.token]
      : [info.declaringContract.token, delegateType];
    return {
      ...info,
      proxyType: this.table.proxyType,
      delegateType,
      targetType: info.methodType.insertParameterTypes(0, ...leading),
      ordinal,
      lookup,
    };
  }

  private report(outcome: LinkageOutcome, reason?: string): void {
    const { info } = this.method;
    globalLinkageTracer.record({
      typeName: this.table.context.typeName,
      contract: info.declaringContract.name,
      method: info.name,
      descriptor: info.methodType.toString(),
      outcome,
      reason,
    });
  }
}

/**
 * Check a resolved target against the request and wrap it in the calling
 * convention of the site.
 */
function adapt(request: LinkRequest, target: Target | null | undefined): Invoker {
  const expected = request.targetType;
  const discardsResult = request.returnType.kind === "void";

  if (target === null || target === undefined) {
    throw new LinkageError(`resolver returned no target for ${request.descriptor}`, request.descriptor);
  }

  if (typeof target === "function") {
    if (target.length !== expected.parameterCount) {
      throw new LinkageError(
        `target of ${request.descriptor} takes ${target.length} arguments, expected ${expected.parameterCount} ${expected.toString()}`,
        request.descriptor
      );
    }
    const fn = target;
    return discardsResult
      ? (...args) => {
          Reflect.apply(fn, undefined, args);
        }
      : (...args) => Reflect.apply(fn, undefined, args);
  }

  if (isTypedTarget(target)) {
    checkTypedTarget(request, target.type);
    const invoke = target.invoke;
    if (discardsResult) {
      return (...args) => {
        Reflect.apply(invoke, undefined, args);
      };
    }
    if (target.type.returnType.kind === "void") {
      const fallback = request.returnType.defaultValue;
      return (...args) => {
        Reflect.apply(invoke, undefined, args);
        return fallback;
      };
    }
    return (...args) => Reflect.apply(invoke, undefined, args);
  }

  throw new LinkageError(
    `resolver returned ${describeValue(target)} for ${request.descriptor}, expected a function or a typed target`,
    request.descriptor
  );
}

function checkTypedTarget(request: LinkRequest, actual: MethodType): void {
  const expected = request.targetType;
  const mismatch = (): LinkageError =>
    new LinkageError(
      `target type ${actual.toString()} does not fit ${expected.toString()} of ${request.descriptor}`,
      request.descriptor
    );

  if (actual.parameterCount !== expected.parameterCount) {
    throw mismatch();
  }
  for (let i = 0; i < expected.parameterCount; i++) {
    if (!isConvertible(expected.parameterType(i), actual.parameterType(i))) {
      throw mismatch();
    }
  }
  if (!isConvertible(actual.returnType, expected.returnType)) {
    throw mismatch();
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "object") {
    return value === null ? "null" : "an object";
  }
  return `a ${typeof value}`;
}

/**
 * The call sites of one generated type, indexed by method ordinal.
 */
export class CallSiteTable {
  readonly sites: readonly CallSite[];
  private type: ProxyClass | undefined;

  constructor(
    readonly context: CallSiteContext,
    methods: readonly AnalyzedMethod[]
  ) {
    for (const [index, method] of methods.entries()) {
      invariant(method.ordinal === index, `${method.info.descriptor} has ordinal ${method.ordinal}, expected ${index}`);
    }
    this.sites = Object.freeze(methods.map((method) => new CallSite(this, method)));
  }

  /**
   * Associate the table with the type emitted for it. Done once, before the
   * type is published.
   */
  attach(type: ProxyClass): void {
    invariant(this.type === undefined, `call sites of ${this.context.typeName} are already attached`);
    this.type = type;
  }

  get proxyType(): ProxyClass {
    invariant(this.type !== undefined, `call sites of ${this.context.typeName} are not attached`);
    return this.type;
  }

  site(ordinal: number): CallSite {
    const site = this.sites[ordinal];
    invariant(site !== undefined, `no call site ${ordinal} in ${this.context.typeName}`);
    return site;
  }
}
