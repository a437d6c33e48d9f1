/**
 * Lookups: the requesting context of a proxy definition.
 *
 * A lookup belongs to a module. It sees exported contracts and the contracts
 * of its own module, and only a full-privilege lookup may define proxies.
 * A lookup also scopes the lifetime of the types registered with it.
 */

import type { ContractType, MethodSignature } from "./contract.js";

export class Lookup {
  private readonly retained = new Set<Function>();

  private constructor(
    readonly module: string,
    private readonly fullPrivilege: boolean
  ) {}

  /** @internal */
  static create(module: string, fullPrivilege: boolean): Lookup {
    return new Lookup(module, fullPrivilege);
  }

  hasFullPrivilegeAccess(): boolean {
    return this.fullPrivilege;
  }

  /**
   * A lookup of the same module that can no longer define proxies.
   */
  dropPrivilege(): Lookup {
    return new Lookup(this.module, false);
  }

  canAccess(contract: ContractType): boolean {
    return contract.exported || contract.module === this.module;
  }

  canAccessMethod(contract: ContractType, method: MethodSignature): boolean {
    if (contract.module === this.module) return true;
    return this.canAccess(contract) && method.visibility === "public";
  }

  /**
   * Keep a generated type reachable for as long as this lookup is.
   */
  retain(type: Function): void {
    this.retained.add(type);
  }

  retainedTypes(): Function[] {
    return [...this.retained];
  }

  toString(): string {
    return `lookup(${this.module}${this.fullPrivilege ? "" : ", public"})`;
  }
}

/**
 * A full-privilege lookup for `module`.
 */
export function lookup(module: string): Lookup {
  return Lookup.create(module, true);
}

/**
 * A lookup that sees only exported contracts and cannot define proxies.
 */
export function publicLookup(): Lookup {
  return Lookup.create("<public>", false);
}
