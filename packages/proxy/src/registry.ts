/**
 * Proxy Registry - Records the generated types and the resolver of each
 *
 * Entries are keyed weakly by the generated class: a type nobody references
 * any more is reclaimed together with its entry. Entries are append-only.
 */

import { invariant } from "@lazyproxy/core";
import type { ContractDescriptor } from "./analyzer.js";
import type { Lookup } from "./lookup.js";
import type { ContractType } from "./contract.js";
import { ProxyBase, type ProxyClass } from "./proxy-base.js";
import type { Resolver } from "./resolver.js";
import type { TypeToken } from "./types.js";

export interface RegistryEntry {
  readonly type: ProxyClass;
  readonly resolver: Resolver;
  readonly descriptor: ContractDescriptor;
  readonly contracts: readonly ContractType[];
  readonly delegateType: TypeToken | undefined;
  /** Name of the backend that emitted the type */
  readonly backend: string;
  /** Lookup the type was defined with */
  readonly lookup: Lookup;
}

export class ProxyRegistry {
  private readonly entries = new WeakMap<Function, RegistryEntry>();

  /**
   * Record a generated type. A type is published once.
   */
  publish(entry: RegistryEntry): void {
    invariant(!this.entries.has(entry.type), `${entry.type.name} is already published`);
    this.entries.set(entry.type, Object.freeze({ ...entry }));
  }

  /**
   * Whether `type` was generated by `defineProxy` and published here.
   */
  isGeneratedType(type: unknown): boolean {
    return typeof type === "function" && this.entries.has(type);
  }

  /**
   * The resolver `type` was defined with, or `undefined` for a type that was
   * not generated.
   */
  lookupResolver(type: unknown): Resolver | undefined {
    return this.lookupEntry(type)?.resolver;
  }

  lookupEntry(type: unknown): RegistryEntry | undefined {
    return typeof type === "function" ? this.entries.get(type) : undefined;
  }
}

/**
 * Registry every `defineProxy` call publishes to.
 */
export const globalProxyRegistry = new ProxyRegistry();

export function isGeneratedType(type: unknown): boolean {
  return globalProxyRegistry.isGeneratedType(type);
}

export function lookupResolver(type: unknown): Resolver | undefined {
  return globalProxyRegistry.lookupResolver(type);
}

/**
 * Whether `value` is an instance of a published proxy type.
 */
export function isProxyInstance(value: unknown): value is ProxyBase {
  return value instanceof ProxyBase && globalProxyRegistry.isGeneratedType(value.constructor);
}
