/**
 * Table backend.
 *
 * Generates no source: each method is a closure over its call site, and the
 * delegate sits in a non-writable symbol-keyed slot of the instance.
 */

import { invariant } from "@lazyproxy/core";
import type { AnalyzedMethod } from "../analyzer.js";
import type { CallSite } from "../call-site.js";
import { ProxyBase } from "../proxy-base.js";
import { checkArity, installDefaults } from "./shared.js";
import type { EmitRequest, LoadableType, TypeSynthesisBackend } from "./types.js";

const DELEGATE = Symbol("lazyproxy.delegate");

/**
 * Arguments as the declared parameters see them: missing ones are
 * `undefined`, extra ones are dropped, and a varargs method's trailing
 * arguments are collected into an array.
 */
function shapeArguments(args: readonly unknown[], count: number, isVarargs: boolean): unknown[] {
  if (isVarargs) {
    return [...Array.from({ length: count - 1 }, (_, i) => args[i]), args.slice(count - 1)];
  }
  return Array.from({ length: count }, (_, i) => args[i]);
}

type Forwarder = (this: ProxyBase, ...args: unknown[]) => unknown;

function createForwarder(method: AnalyzedMethod, site: CallSite, hasDelegate: boolean): Forwarder {
  const { info } = method;
  const count = info.parameterTypes.length;

  const forward: Forwarder = hasDelegate
    ? function (this: ProxyBase, ...args: unknown[]): unknown {
        return site.target(this, Reflect.get(this, DELEGATE), ...shapeArguments(args, count, info.isVarargs));
      }
    : function (this: ProxyBase, ...args: unknown[]): unknown {
        return site.target(this, ...shapeArguments(args, count, info.isVarargs));
      };

  Object.defineProperty(forward, "length", { value: info.isVarargs ? count - 1 : count });
  Object.defineProperty(forward, "name", { value: info.name });
  return forward;
}

export const tableBackend: TypeSynthesisBackend = {
  name: "table",

  emit(request: EmitRequest): LoadableType {
    checkArity(request);

    const { enter, sites } = request;
    const hasDelegate = request.delegateType !== undefined;

    const type = class extends ProxyBase {
      constructor(...args: unknown[]) {
        enter(args.length, args[0]);
        super();
        if (hasDelegate) {
          Object.defineProperty(this, DELEGATE, { value: args[0] });
        }
      }
    };
    Object.defineProperty(type, "name", { value: request.typeName });

    for (const method of request.descriptor.methods) {
      const site = sites[method.ordinal];
      invariant(site !== undefined, `no call site for ${method.info.descriptor}`);
      Object.defineProperty(type.prototype, method.info.name, {
        value: createForwarder(method, site, hasDelegate),
        writable: true,
        enumerable: false,
        configurable: true,
      });
    }

    installDefaults(type.prototype, request.descriptor.inheritedDefaults);
    return { type };
  },
};
