/**
 * Core module exports for @lazyproxy/core
 *
 * This package provides:
 * - Configuration (defaults, config files, LAZYPROXY_* environment variables)
 * - Error classes shared by every proxy package
 * - Scoped debug logging and linkage tracing
 * - Runtime safety primitives (invariant, unreachable)
 */

// Configuration System
export {
  config,
  defineConfig,
  type LazyproxyConfig,
  type LimitsConfig,
  type BackendName,
} from "./config.js";

// Errors
export {
  ProxyError,
  AccessError,
  ArgumentError,
  LinkageError,
  describeError,
  type ProxyErrorPhase,
} from "./errors.js";

// Logging
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";

// Linkage Tracing
export {
  LinkageTracer,
  globalLinkageTracer,
  type LinkageRecord,
  type LinkageOutcome,
  type TypeSummary,
} from "./linkage-trace.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
