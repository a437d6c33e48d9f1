/**
 * Contract Analyzer
 *
 * Turns the contracts of a proxy definition into the ordered set of methods
 * the generated type must implement. Every override decision is taken here,
 * once; nothing downstream re-evaluates the policy.
 */

import { AccessError, ArgumentError } from "@lazyproxy/core";
import {
  ObjectContract,
  collectMethods,
  contractOf,
  isContractType,
  signatureKey,
  signatureType,
  type CollectedMethod,
  type ContractType,
} from "./contract.js";
import type { Lookup } from "./lookup.js";
import { wantsDefaultOverride, type MethodInfo, type OverridePolicy, type Resolver } from "./resolver.js";
import type { TypeToken } from "./types.js";

/**
 * A method selected for synthesis, or a default method kept as is.
 */
export interface AnalyzedMethod {
  readonly info: MethodInfo;
  /** Index into the call-site table; -1 for kept default methods */
  readonly ordinal: number;
}

export interface ContractDescriptor {
  readonly contracts: readonly ContractType[];
  /** Methods that get a trampoline and a call site, in first-seen order */
  readonly methods: readonly AnalyzedMethod[];
  /** Default methods whose body is installed as is */
  readonly inheritedDefaults: readonly AnalyzedMethod[];
  readonly delegateType: TypeToken | undefined;
}

export function describeMethod(info: Pick<MethodInfo, "declaringContract" | "name" | "methodType">): string {
  return `${info.declaringContract.name}.${info.name}${info.methodType.toString()}`;
}

function toMethodInfo(collected: CollectedMethod): MethodInfo {
  const { declaringContract, signature } = collected;
  const methodType = signatureType(signature);
  const isUniversal = declaringContract === ObjectContract;
  return {
    declaringContract,
    name: signature.name,
    methodType,
    parameterTypes: methodType.parameterTypes,
    returnType: signature.returnType,
    isAbstract: signature.isAbstract && !isUniversal,
    isDefault: signature.isDefaultBodied,
    isVarargs: signature.isVarargs,
    isUniversal,
    defaultBody: signature.defaultBody,
    descriptor: describeMethod({ declaringContract, name: signature.name, methodType }),
  };
}

function checkContracts(contracts: readonly unknown[]): asserts contracts is readonly ContractType[] {
  if (contracts.length === 0) {
    throw new ArgumentError("at least one contract is required");
  }
  const seen = new Set<unknown>();
  for (const contract of contracts) {
    if (!isContractType(contract)) {
      throw new ArgumentError(`${String(contract)} is not an interface contract`);
    }
    if (seen.has(contract)) {
      throw new ArgumentError(`${contract.name} is listed more than once`);
    }
    seen.add(contract);
  }
}

function checkAccess(lookup: Lookup, contracts: readonly ContractType[]): void {
  if (!lookup.hasFullPrivilegeAccess()) {
    throw new AccessError(`${lookup.toString()} has no full privilege access`);
  }

  for (const contract of contracts) {
    if (!lookup.canAccess(contract)) {
      throw new AccessError(`${contract.toString()} is not visible from ${lookup.toString()}`);
    }
    for (const { declaringContract, signature } of collectMethods(contract)) {
      if (!lookup.canAccessMethod(declaringContract, signature)) {
        throw new AccessError(
          `${declaringContract.name}.${signature.name} is not visible from ${lookup.toString()}`
        );
      }
      // Contracts named in the signature must be visible too.
      for (const token of [...signature.parameterTypes, signature.returnType]) {
        const referenced = contractOf(token);
        if (referenced !== undefined && !lookup.canAccess(referenced)) {
          throw new AccessError(
            `${referenced.toString()} used by ${declaringContract.name}.${signature.name} is not visible from ${lookup.toString()}`
          );
        }
      }
    }
  }
}

/**
 * Analyze the contracts of a proxy definition.
 *
 * Candidates are the universal operations followed by each contract's
 * methods in input order; the first signature seen wins. Universal
 * operations are selected when `policy` accepts them, default methods when
 * `policy` or the resolver's `overrideDefaultMethod` does, abstract methods
 * always.
 *
 * @throws {ArgumentError} For an empty, duplicated or non-contract input, an
 *   overloaded method name, or a delegate with no method to forward it to.
 * @throws {AccessError} When the lookup cannot see a contract or a method.
 */
export function analyzeContracts(
  lookup: Lookup,
  contracts: readonly unknown[],
  policy: OverridePolicy,
  resolver: Resolver,
  delegateType: TypeToken | undefined
): ContractDescriptor {
  checkContracts(contracts);
  checkAccess(lookup, contracts);

  const candidates: CollectedMethod[] = [
    ...collectMethods(ObjectContract),
    ...contracts.flatMap((contract) => collectMethods(contract)),
  ];

  const byKey = new Map<string, CollectedMethod>();
  const byName = new Map<string, string>();
  for (const candidate of candidates) {
    const key = signatureKey(candidate.signature);
    if (byKey.has(key)) continue;

    const name = candidate.signature.name;
    const other = byName.get(name);
    if (other !== undefined) {
      throw new ArgumentError(
        `${name} is declared with two signatures (${other} and ${signatureType(candidate.signature).toString()}); overloaded methods are not supported`
      );
    }
    byKey.set(key, candidate);
    byName.set(name, signatureType(candidate.signature).toString());
  }

  const methods: AnalyzedMethod[] = [];
  const inheritedDefaults: AnalyzedMethod[] = [];
  for (const candidate of byKey.values()) {
    const info = toMethodInfo(candidate);
    if (info.isUniversal) {
      if (policy(info)) {
        methods.push({ info, ordinal: methods.length });
      }
    } else if (info.isDefault) {
      if (policy(info) || wantsDefaultOverride(resolver, info)) {
        methods.push({ info, ordinal: methods.length });
      } else {
        inheritedDefaults.push({ info, ordinal: -1 });
      }
    } else {
      methods.push({ info, ordinal: methods.length });
    }
  }

  if (delegateType !== undefined && methods.length === 0) {
    throw new ArgumentError(
      `a delegate of type ${delegateType.name} was requested but no method of ${contracts.map((c) => c.name).join(", ")} is resolved`
    );
  }

  return { contracts, methods, inheritedDefaults, delegateType };
}
