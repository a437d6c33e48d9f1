/**
 * Contracts: run-time descriptions of interface-style types.
 *
 * A contract lists the method signatures a generated proxy implements. The
 * static interface travels as the phantom type parameter of
 * {@link ContractType}, so `defineProxy` can type the instances it creates.
 *
 * @example
 * ```typescript
 * interface IntBinaryOperator {
 *   applyAsInt(left: number, right: number): number;
 * }
 *
 * const IntBinaryOperator = defineContract<IntBinaryOperator>({
 *   name: "IntBinaryOperator",
 *   methods: [abstractMethod("applyAsInt", [Types.int, Types.int], Types.int)],
 * });
 * ```
 *
 * @module
 */

import { ArgumentError } from "@lazyproxy/core";
import { MethodType, Types, referenceToken, type TypeToken } from "./types.js";

/**
 * Body of a default-bodied method. It runs with the proxy as `this`.
 */
export type MethodBody = (this: never, ...args: never[]) => unknown;

/**
 * `module` methods are only visible to lookups of the declaring module.
 */
export type MethodVisibility = "public" | "module";

export interface MethodSignature {
  readonly name: string;
  readonly parameterTypes: readonly TypeToken[];
  readonly returnType: TypeToken;
  readonly isAbstract: boolean;
  readonly isDefaultBodied: boolean;
  /** The last parameter is an array collecting the remaining arguments */
  readonly isVarargs: boolean;
  readonly visibility: MethodVisibility;
  readonly defaultBody?: MethodBody;
}

export interface MethodOptions {
  varargs?: boolean;
  visibility?: MethodVisibility;
}

/**
 * Declare an abstract method: every proxy implements it through its resolver.
 */
export function abstractMethod(
  name: string,
  parameterTypes: readonly TypeToken[],
  returnType: TypeToken,
  options: MethodOptions = {}
): MethodSignature {
  return {
    name,
    parameterTypes: Object.freeze([...parameterTypes]),
    returnType,
    isAbstract: true,
    isDefaultBodied: false,
    isVarargs: options.varargs ?? false,
    visibility: options.visibility ?? "public",
  };
}

/**
 * Declare a method with a default body. A proxy keeps the body unless the
 * override policy or the resolver asks for the method to be resolved.
 */
export function defaultMethod(
  name: string,
  parameterTypes: readonly TypeToken[],
  returnType: TypeToken,
  body: MethodBody,
  options: MethodOptions = {}
): MethodSignature {
  return {
    name,
    parameterTypes: Object.freeze([...parameterTypes]),
    returnType,
    isAbstract: false,
    isDefaultBodied: true,
    isVarargs: options.varargs ?? false,
    visibility: options.visibility ?? "public",
    defaultBody: body,
  };
}

export interface ContractSpec {
  name: string;
  /** Declaring module, checked against the lookup (default: "global") */
  module?: string;
  /** Whether lookups of other modules may see the contract (default: true) */
  exported?: boolean;
  extends?: readonly ContractType[];
  methods: readonly MethodSignature[];
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const tokenOwners = new WeakMap<TypeToken, ContractType>();

/**
 * A run-time contract. Create one with {@link defineContract}.
 *
 * @typeParam T - The interface implemented by proxies of this contract.
 */
export class ContractType<T extends object = object> {
  /** Type-only: the interface this contract describes. */
  declare readonly instanceType: T;

  readonly token: TypeToken<T>;

  private constructor(
    readonly name: string,
    readonly module: string,
    readonly exported: boolean,
    readonly parents: readonly ContractType[],
    readonly methods: readonly MethodSignature[]
  ) {
    this.token = referenceToken<T>("contract", name, (value) => this.isImplementedBy(value));
    tokenOwners.set(this.token, this);
  }

  /** @internal */
  static create<T extends object>(spec: ContractSpec): ContractType<T> {
    return new ContractType<T>(
      spec.name,
      spec.module ?? "global",
      spec.exported ?? true,
      Object.freeze([...(spec.extends ?? [])]),
      Object.freeze([...spec.methods])
    );
  }

  /**
   * Structural check: every abstract method is present as a function.
   */
  isImplementedBy(value: unknown): boolean {
    if ((typeof value !== "object" && typeof value !== "function") || value === null) {
      return false;
    }
    return collectMethods(this).every(
      (method) => !method.signature.isAbstract || typeof Reflect.get(value, method.signature.name) === "function"
    );
  }

  toString(): string {
    return `contract ${this.module}/${this.name}`;
  }
}

/**
 * The contract a `contract` token (or an array of them) refers to.
 */
export function contractOf(token: TypeToken): ContractType | undefined {
  if (token.kind === "array" && token.component) {
    return contractOf(token.component);
  }
  return tokenOwners.get(token);
}

export function isContractType(value: unknown): value is ContractType {
  return value instanceof ContractType;
}

/**
 * Method type of a signature, e.g. `(int,int)int`.
 */
export function signatureType(signature: MethodSignature): MethodType {
  return new MethodType(signature.returnType, signature.parameterTypes);
}

/**
 * Key deduplicating signatures across contracts: name plus method type.
 */
export function signatureKey(signature: MethodSignature): string {
  return `${signature.name}${signatureType(signature).key()}`;
}

function validateSignature(contract: string, signature: MethodSignature): void {
  const where = `${contract}.${signature.name}`;
  if (!IDENTIFIER.test(signature.name) || signature.name === "constructor") {
    throw new ArgumentError(`${where}: '${signature.name}' is not a valid method name`);
  }
  if (signature.returnType === undefined || signature.parameterTypes.some((t) => t === undefined)) {
    throw new ArgumentError(`${where}: parameter and return types are required`);
  }
  if (signature.parameterTypes.some((t) => t.kind === "void")) {
    throw new ArgumentError(`${where}: a parameter cannot be void`);
  }
  if (signature.isVarargs) {
    const last = signature.parameterTypes[signature.parameterTypes.length - 1];
    if (last === undefined || last.kind !== "array") {
      throw new ArgumentError(`${where}: a varargs method must end with an array parameter`);
    }
  }
  if (signature.isDefaultBodied && typeof signature.defaultBody !== "function") {
    throw new ArgumentError(`${where}: a default method needs a body`);
  }
}

/**
 * Define a contract.
 *
 * @throws {ArgumentError} On an invalid name, parent or signature, or when two
 *   methods of the contract share a signature.
 */
export function defineContract<T extends object>(spec: ContractSpec): ContractType<T> {
  if (spec === null || typeof spec !== "object") {
    throw new ArgumentError("a contract spec is required");
  }
  if (typeof spec.name !== "string" || !IDENTIFIER.test(spec.name)) {
    throw new ArgumentError(`'${String(spec.name)}' is not a valid contract name`);
  }
  if (!Array.isArray(spec.methods)) {
    throw new ArgumentError(`${spec.name}: methods must be an array`);
  }
  for (const parent of spec.extends ?? []) {
    if (!isContractType(parent)) {
      throw new ArgumentError(`${spec.name}: can only extend contracts`);
    }
  }

  const keys = new Set<string>();
  for (const signature of spec.methods) {
    validateSignature(spec.name, signature);
    const key = signatureKey(signature);
    if (keys.has(key)) {
      throw new ArgumentError(
        `${spec.name}: ${signature.name}${signatureType(signature).toString()} is declared twice`
      );
    }
    keys.add(key);
  }

  return ContractType.create<T>(spec);
}

// ============================================================================
// Universal operations
// ============================================================================

/**
 * Equality, hashing and textual representation every proxy carries.
 */
export interface ProxyObject {
  equals(other: unknown): boolean;
  hashCode(): number;
  toString(): string;
}

/**
 * Built-in contract declaring the universal operations.
 */
export const ObjectContract: ContractType<ProxyObject> = ContractType.create<ProxyObject>({
  name: "Object",
  module: "lazyproxy",
  methods: [
    abstractMethod("equals", [Types.object], Types.boolean),
    abstractMethod("hashCode", [], Types.int),
    abstractMethod("toString", [], Types.string),
  ],
});

export interface CollectedMethod {
  readonly declaringContract: ContractType;
  readonly signature: MethodSignature;
}

/**
 * All methods of a contract: its own first, then each parent's, depth-first.
 * Duplicates are kept; the analyzer resolves them.
 */
export function collectMethods(contract: ContractType): CollectedMethod[] {
  const result: CollectedMethod[] = [];
  const visited = new Set<ContractType>();

  const visit = (current: ContractType): void => {
    if (visited.has(current)) return;
    visited.add(current);
    for (const signature of current.methods) {
      result.push({ declaringContract: current, signature });
    }
    for (const parent of current.parents) {
      visit(parent);
    }
  };

  visit(contract);
  return result;
}
