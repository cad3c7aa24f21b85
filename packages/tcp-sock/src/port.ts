import net from "node:net";
import { isValidPort, type PortAvailability } from "./constants.ts";
import { ANY_ADDRESS } from "./server.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:server");

/**
 * Probe whether `port` can be bound on all local interfaces.
 *
 * The probe listener is always closed before the promise resolves. The answer
 * is only a hint: the port can be taken between this check and a later bind,
 * and that bind's outcome is what counts.
 */
export function isPortAvailable(port: number): Promise<PortAvailability> {
  if (!isValidPort(port, true)) {
    log.debug(`port ${port} is not a valid port number`);
    return Promise.resolve("unavailable");
  }

  return new Promise((resolve) => {
    const probe = net.createServer();
    probe.once("error", (err: Error) => {
      log.debug(`port ${port} unavailable: ${err.message}`);
      probe.close(() => resolve("unavailable"));
    });
    probe.listen({ port, host: ANY_ADDRESS, exclusive: true }, () => {
      probe.close(() => resolve("available"));
    });
  });
}
