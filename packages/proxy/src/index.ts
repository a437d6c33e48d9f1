/**
 * @lazyproxy/proxy - Runtime proxy types with lazily linked methods
 *
 * This package provides:
 * - Contracts and type tokens describing interface-style types at run time
 * - defineProxy, which synthesizes a class implementing a list of contracts
 * - Per-method call sites bound once through a caller-supplied resolver
 * - Target combinators for building typed targets
 * - The registry of generated types
 */

// Type tokens
export {
  Types,
  MethodType,
  methodType,
  isConvertible,
  sameType,
  referenceToken,
  type TypeKind,
  type TypeToken,
} from "./types.js";

// Contracts
export {
  ContractType,
  ObjectContract,
  abstractMethod,
  defaultMethod,
  defineContract,
  collectMethods,
  contractOf,
  isContractType,
  type CollectedMethod,
  type ContractSpec,
  type MethodBody,
  type MethodOptions,
  type MethodSignature,
  type MethodVisibility,
  type ProxyObject,
} from "./contract.js";

// Lookups
export { Lookup, lookup, publicLookup } from "./lookup.js";

// Contract analysis
export {
  analyzeContracts,
  describeMethod,
  type AnalyzedMethod,
  type ContractDescriptor,
} from "./analyzer.js";

// Resolvers and targets
export {
  OverridePolicies,
  isResolver,
  isTypedTarget,
  type LinkRequest,
  type MethodInfo,
  type OverridePolicy,
  type ResolveFunction,
  type Resolver,
  type ResolverObject,
  type Target,
  type TargetFunction,
  type TypedTarget,
} from "./resolver.js";
export * as targets from "./targets.js";

// Call sites
export {
  CallSite,
  CallSiteTable,
  type CallSiteContext,
  type CallSiteState,
  type Invoker,
} from "./call-site.js";

// Type synthesis
export {
  emitBackend,
  tableBackend,
  resolveBackend,
  generateSource,
  type EmitRequest,
  type LoadableType,
  type TypeSynthesisBackend,
} from "./backend/index.js";
export { ProxyBase, identityHashCode, isProxyClass, type ProxyClass } from "./proxy-base.js";

// Registry
export {
  ProxyRegistry,
  globalProxyRegistry,
  isGeneratedType,
  isProxyInstance,
  lookupResolver,
  type RegistryEntry,
} from "./registry.js";

// Proxy definition
export {
  defineProxy,
  type ContractsInstance,
  type DelegateArgs,
  type ProxyConstructor,
  type ProxyOptions,
} from "./define-proxy.js";
