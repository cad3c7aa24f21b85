import { assertBufferSize } from "./config.ts";
import { SocketSetupError } from "./errors.ts";
import type { ConnectionHandle } from "./handle.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:io");

/**
 * Set the receive and transmit buffer sizes of a connected handle.
 *
 * The receive size bounds how many unread bytes are queued before the socket
 * stops reading from the kernel; the transmit size bounds how many bytes
 * `sendMessage` lets wait in the write queue.
 *
 * Throws `SocketSetupError` (kind "buffer") if either size is not a positive
 * integer or the handle is closed.
 */
export function setSocketBufferSize(handle: ConnectionHandle, rxBytes: number, txBytes: number): void {
  if (handle.isClosed) {
    throw SocketSetupError.buffer(`connection ${handle.id} is closed`);
  }
  assertBufferSize("rxBytes", rxBytes);
  assertBufferSize("txBytes", txBytes);

  handle.setCapacities(rxBytes, txBytes);
  log.debug(`connection ${handle.id} buffers set`, { rxBytes, txBytes });
}
