/**
 * Type synthesis backend interface.
 */

import type { ContractDescriptor } from "../analyzer.js";
import type { CallSite } from "../call-site.js";
import type { ProxyClass } from "../proxy-base.js";
import type { TypeToken } from "../types.js";

/**
 * Called first thing by every generated constructor, with the number of
 * arguments it received and its delegate argument.
 */
export type EnterFunction = (argumentCount: number, delegate: unknown) => void;

export interface EmitRequest {
  readonly typeName: string;
  readonly descriptor: ContractDescriptor;
  readonly delegateType: TypeToken | undefined;
  /** Call sites indexed by method ordinal */
  readonly sites: readonly CallSite[];
  readonly enter: EnterFunction;
}

/**
 * An emitted type, ready to be published.
 */
export interface LoadableType {
  readonly type: ProxyClass;
  /** Generated source, for backends that produce one */
  readonly source?: string;
}

export interface TypeSynthesisBackend {
  readonly name: string;
  emit(request: EmitRequest): LoadableType;
}
