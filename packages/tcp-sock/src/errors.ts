// Structured errors for socket setup.
//
// Only server creation and buffer tuning throw. Client connects and data
// transfer report failure through return values instead.

/** The setup step that failed. */
export type SetupErrorKind = "socket" | "option" | "bind" | "listen" | "buffer";

/** Error codes that mean the address itself could not be claimed. */
const BIND_CODES = new Set(["EADDRINUSE", "EACCES", "EADDRNOTAVAIL", "EPERM"]);

/**
 * Server or buffer setup failed.
 *
 * These indicate misconfiguration (port taken, bad option values) and are not
 * expected to go away on retry.
 */
export class SocketSetupError extends Error {
  constructor(
    public kind: SetupErrorKind,
    message: string,
    /** OS error code, e.g. "EADDRINUSE", when the failure came from the OS. */
    public code?: string,
  ) {
    super(message);
    this.name = "SocketSetupError";
  }

  static socket(err: Error): SocketSetupError {
    return new SocketSetupError("socket", `socket failed: ${err.message}`, errorCode(err));
  }

  static option(message: string): SocketSetupError {
    return new SocketSetupError("option", message);
  }

  /** Classify an error raised while binding or listening on `port`. */
  static listen(port: number, err: Error): SocketSetupError {
    const code = errorCode(err);
    if (code !== undefined && BIND_CODES.has(code)) {
      return new SocketSetupError("bind", `bind failed on port ${port}: ${err.message}`, code);
    }
    return new SocketSetupError("listen", `listen failed on port ${port}: ${err.message}`, code);
  }

  static buffer(message: string): SocketSetupError {
    return new SocketSetupError("buffer", message);
  }
}

/** Extract the OS error code from a Node.js system error, if it has one. */
export function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
