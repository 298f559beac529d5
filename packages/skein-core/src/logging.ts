// Namespaced debug logging and per-call timing.
//
// Output is controlled by the DEBUG environment variable, in the style of
// npm's debug package: DEBUG="skein:*" enables everything, "skein:rpc" only
// call timing, and "-skein:server" excludes a namespace.

import { RpcError, RpcErrorCode } from "@skein/wire";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // escape everything but *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace. Each line is prefixed with the namespace
 * and checked against DEBUG when it is written, so toggling the variable
 * takes effect immediately.
 */
export function createLogger(namespace: string): Logger {
  const emit =
    (sink: (...args: unknown[]) => void) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (!isEnabled(namespace)) return;
      if (data === undefined) {
        sink(`${namespace} ${message}`);
      } else {
        sink(`${namespace} ${message}`, data);
      }
    };

  return {
    debug: emit((...args) => console.log(...args)),
    warn: emit((...args) => console.warn(...args)),
    error: emit((...args) => console.error(...args)),
  };
}

// ============================================================================
// Per-call logging
// ============================================================================

export interface CallRecord {
  serviceMethod: string;
  args: unknown;
  /** performance.now() when the call was issued. */
  startedAt: number;
}

export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/** Observes calls as they are issued and settled. */
export interface CallHooks {
  pre(record: CallRecord): void;
  post(record: CallRecord, outcome: CallOutcome): void;
}

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "skein:rpc".
   */
  namespace?: string;

  /**
   * Log request arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log response values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Create call hooks that log every call with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", method, args? }
 * - Response: { type: "response", method, duration, ok, result?, errorCode?, error? }
 *
 * @example
 * ```typescript
 * // DEBUG=skein:rpc
 * const client = await dial("tcp", "127.0.0.1:1234", { logging: callLogger({ minDuration: 5 }) });
 * ```
 */
export function callLogger(options: LoggingOptions = {}): CallHooks {
  const namespace = options.namespace ?? "skein:rpc";
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(record: CallRecord): void {
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        method: record.serviceMethod,
      };
      if (logArgs && record.args !== undefined) {
        logObj.args = record.args;
      }

      console.log(`→ ${record.serviceMethod}`, logObj);
    },

    post(record: CallRecord, outcome: CallOutcome): void {
      const duration = performance.now() - record.startedAt;
      if (duration < minDuration) return;
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: record.serviceMethod,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults && outcome.value !== undefined) {
          logObj.result = outcome.value;
        }
        console.log(`← ${record.serviceMethod}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      if (error instanceof RpcError) {
        logObj.errorCode = rpcErrorCodeToString(error.code);
      }
      logObj.error = { name: error.name, message: error.message };
      console.log(`← ${record.serviceMethod}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}

/** Convert RPC error code to human-readable string */
function rpcErrorCodeToString(code: number): string {
  switch (code) {
    case RpcErrorCode.USER:
      return "user_error";
    case RpcErrorCode.MALFORMED_NAME:
      return "malformed_name";
    case RpcErrorCode.SERVICE_NOT_FOUND:
      return "service_not_found";
    case RpcErrorCode.METHOD_NOT_FOUND:
      return "method_not_found";
    case RpcErrorCode.INVALID_PAYLOAD:
      return "invalid_payload";
    case RpcErrorCode.DEADLINE_EXCEEDED:
      return "deadline_exceeded";
    default:
      return `error_${code}`;
  }
}
