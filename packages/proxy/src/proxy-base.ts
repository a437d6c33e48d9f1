/**
 * Base class of every generated proxy type.
 *
 * Universal operations the override policy declines fall through to the
 * identity semantics defined here.
 */

import type { ProxyObject } from "./contract.js";

const identityHashes = new WeakMap<object, number>();
let hashSeed = 0x2545f491;

/**
 * Stable per-object hash, assigned on first request. Non-negative, 31 bits.
 */
export function identityHashCode(value: object): number {
  const existing = identityHashes.get(value);
  if (existing !== undefined) {
    return existing;
  }
  // xorshift32
  hashSeed ^= hashSeed << 13;
  hashSeed ^= hashSeed >>> 17;
  hashSeed ^= hashSeed << 5;
  const hash = (hashSeed >>> 1) & 0x7fffffff;
  identityHashes.set(value, hash);
  return hash;
}

export abstract class ProxyBase implements ProxyObject {
  equals(other: unknown): boolean {
    return this === other;
  }

  hashCode(): number {
    return identityHashCode(this);
  }

  toString(): string {
    return `${this.constructor.name}@${identityHashCode(this).toString(16)}`;
  }
}

/**
 * A generated proxy class. Its constructor takes `()` or `(delegate)`.
 */
export type ProxyClass = new (...args: never[]) => ProxyBase;

export function isProxyClass(value: unknown): value is ProxyClass {
  return typeof value === "function" && value.prototype instanceof ProxyBase;
}
