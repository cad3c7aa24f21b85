// Listening sockets.

import net from "node:net";
import { KEEPALIVE_POLICY, isValidPort, type KeepAlivePolicy } from "./constants.ts";
import { SocketSetupError } from "./errors.ts";
import { ConnectionHandle, allocateHandleId } from "./handle.ts";
import { applyKeepAlive } from "./keepalive.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:server");

/** All local IPv4 interfaces. */
export const ANY_ADDRESS = "0.0.0.0";

/**
 * A listening TCP socket.
 *
 * Incoming connections are queued until the caller takes them with
 * `acceptConnection`.
 */
export class ServerHandle {
  readonly id: number;
  /** Keep-alive policy applied to every accepted connection. Frozen. */
  readonly keepAlive: KeepAlivePolicy = KEEPALIVE_POLICY;
  /** Pending-connection backlog passed to listen. */
  readonly backlog: number;

  private server: net.Server;
  private pending: ConnectionHandle[] = [];
  private acceptWaiters: Array<(conn: ConnectionHandle | null) => void> = [];
  private closed = false;

  constructor(server: net.Server, backlog: number) {
    this.id = allocateHandleId();
    this.server = server;
    this.backlog = backlog;

    server.on("connection", (socket: net.Socket) => {
      if (this.closed) {
        socket.destroy();
        return;
      }
      try {
        applyKeepAlive(socket, this.keepAlive);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        log.error(`server ${this.id}: keep-alive setup failed, dropping connection: ${message}`);
        socket.destroy();
        return;
      }
      const conn = new ConnectionHandle(socket, this.keepAlive);
      log.debug(`server ${this.id} accepted connection ${conn.id} from ${conn.remote}`);

      const waiter = this.acceptWaiters.shift();
      if (waiter) {
        waiter(conn);
      } else {
        this.pending.push(conn);
      }
    });

    server.on("error", (err: Error) => {
      log.error(`server ${this.id}: ${err.message}`);
    });
  }

  /** The port the server is bound to (the assigned one when 0 was requested). */
  get port(): number {
    const addr = this.server.address();
    return addr !== null && typeof addr === "object" ? addr.port : 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Take the next accepted connection, waiting for one if none is queued. */
  accept(): Promise<ConnectionHandle | null> {
    const conn = this.pending.shift();
    if (conn) return Promise.resolve(conn);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.acceptWaiters.push(resolve);
    });
  }

  /** Stop listening. Connections not yet accepted are destroyed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const conn of this.pending) {
      conn.close();
    }
    this.pending = [];

    for (const waiter of this.acceptWaiters) {
      waiter(null);
    }
    this.acceptWaiters = [];

    this.server.close((err) => {
      if (err) {
        log.debug(`server ${this.id} close: ${err.message}`);
      }
    });
  }
}

/**
 * Create a server socket listening on `port` on all local interfaces.
 *
 * The socket gets address reuse (Node enables SO_REUSEADDR on every TCP
 * listener on POSIX systems) and listens with a backlog of `maxClients`. Every
 * accepted connection gets the whole keep-alive policy (idle time, probe
 * interval and probe count); one the OS refuses it for is dropped. Pass port 0 for an ephemeral port.
 *
 * Rejects with `SocketSetupError` if any step fails; `kind` names the step.
 */
export function createServerSocket(port: number, maxClients: number): Promise<ServerHandle> {
  if (!isValidPort(port, true)) {
    return Promise.reject(SocketSetupError.option(`invalid port: ${port}`));
  }
  if (!Number.isInteger(maxClients) || maxClients < 0) {
    return Promise.reject(SocketSetupError.option(`invalid backlog: ${maxClients}`));
  }

  let server: net.Server;
  try {
    server = net.createServer({ allowHalfOpen: true });
  } catch (e) {
    const err = e instanceof Error ? e : new Error(String(e));
    return Promise.reject(SocketSetupError.socket(err));
  }

  const handle = new ServerHandle(server, maxClients);

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      handle.close();
      reject(SocketSetupError.listen(port, err));
    };
    server.once("error", onError);

    server.listen({ port, host: ANY_ADDRESS, backlog: maxClients }, () => {
      server.off("error", onError);
      log.debug(`server ${handle.id} listening on ${ANY_ADDRESS}:${handle.port}`, {
        backlog: maxClients,
        keepAlive: handle.keepAlive,
      });
      resolve(handle);
    });
  });
}

/**
 * Take the next connection accepted by `server`.
 *
 * Resolves null if the server is closed before a connection arrives.
 */
export function acceptConnection(server: ServerHandle): Promise<ConnectionHandle | null> {
  return server.accept();
}

/** Stop listening on `server`. Closing twice is a no-op. */
export function closeServer(server: ServerHandle): void {
  server.close();
}
