// tcp-sock - minimal TCP connection management for Node.js
//
// Server and client socket factories, raw byte send/receive with blocking and
// timeout-bounded receive, buffer tuning, and disconnect detection over a
// caller-owned connection table. No framing, pooling or retries.

export {
  BUFFER_SIZE,
  EMPTY_SLOT,
  KEEPALIVE_POLICY,
  MAX_PORT,
  PeekResult,
  SocketStatus,
  type KeepAlivePolicy,
  type PortAvailability,
} from "./constants.ts";
export { SocketSetupError, type SetupErrorKind } from "./errors.ts";
export {
  configureSockets,
  currentSocketConfig,
  defaultSocketConfig,
  socketConfigFromEnv,
  type SocketConfig,
} from "./config.ts";
export { createLogger, isNamespaceEnabled, type Logger, type LogFields } from "./logging.ts";
export type { ConnectionHandle } from "./handle.ts";
export type { KeepAliveState } from "./keepalive.ts";
export {
  ANY_ADDRESS,
  acceptConnection,
  closeServer,
  createServerSocket,
  type ServerHandle,
} from "./server.ts";
export { isPortAvailable } from "./port.ts";
export { createClientSocket } from "./client.ts";
export {
  MAX_TIMEOUT_MS,
  recvMsgBlocking,
  recvMsgTimeout,
  sendMessage,
  splitTimeout,
  timeoutDelayMs,
  type WaitDuration,
} from "./transfer.ts";
export { setSocketBufferSize } from "./buffers.ts";
export {
  checkClientConnections,
  closeHandle,
  handleClientDisconnection,
  peekHandle,
  type ConnectionTable,
  type DisconnectHandler,
} from "./liveness.ts";
