// Namespaced diagnostics for socket operations.
//
// Debug and info output is controlled by the DEBUG environment variable using
// the same pattern syntax as npm's debug package. Warnings and errors are
// always written. Everything goes to stderr.

/** Structured fields attached to a log line. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly namespace: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /**
   * Returns the current debug pattern list. Defaults to reading
   * `process.env.DEBUG` on every call, so tests and long-running processes
   * can change it at runtime.
   */
  debugPatterns?: () => string | undefined;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isNamespaceEnabled(namespace: string, debug: string | undefined): boolean {
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
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for one namespace.
 *
 * @example
 * ```typescript
 * const log = createLogger("tcp-sock:server");
 * log.debug("listening", { port: 8080 });
 * // DEBUG=tcp-sock:* prints "[tcp-sock:server] listening { port: 8080 }"
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const debugPatterns = options.debugPatterns ?? (() => process.env.DEBUG);

  const write = (message: string, fields: LogFields | undefined): void => {
    const line = `[${namespace}] ${message}`;
    if (fields === undefined) {
      console.error(line);
    } else {
      console.error(line, fields);
    }
  };

  const gated = (message: string, fields: LogFields | undefined): void => {
    if (!isNamespaceEnabled(namespace, debugPatterns())) return;
    write(message, fields);
  };

  return {
    namespace,
    debug: gated,
    info: gated,
    warn: write,
    error: write,
  };
}
