/**
 * TCP relay from a fixed public port to an internal port.
 *
 * IDE integrations often hard-code where the completion service lives,
 * so the relay sits on that address and forwards raw bytes to the
 * application's own listener. It never looks at the payload, so the
 * same relay carries plaintext HTTP and TLS.
 *
 * Each accepted connection gets its own upstream connection; the pair
 * lives until either side closes or errors.
 */

import net from "node:net";

import { ListenerBindError, silentLogger } from "@localpilot/core";
import type { Logger } from "@localpilot/core";

export interface RelayEndpoint {
  host: string;
  port: number;
}

export interface TcpRelayOptions {
  /** Public address to accept connections on. Port 0 picks a free port. */
  listen: RelayEndpoint;
  /** Internal address each connection is forwarded to. */
  target: RelayEndpoint;
  logger?: Logger;
}

export interface TcpRelay {
  /** Bind the public address. Rejects with ListenerBindError. */
  start: () => Promise<void>;
  /** Stop accepting and tear down every open connection pair. */
  stop: () => Promise<void>;
  /** Bound public port (useful when port 0 is passed). */
  readonly port: number;
  /** Connection pairs currently open. */
  readonly activeConnections: number;
}

function describeEndpoint(endpoint: RelayEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/**
 * Wire two sockets together. An orderly close on one side is passed on
 * as an end (pending bytes are still flushed); an error on one side
 * destroys the other.
 */
function pipePair(
  client: net.Socket,
  upstream: net.Socket,
  logger: Logger,
  onClosed: () => void,
): void {
  let closed = 0;
  const closeOne = (): void => {
    closed++;
    if (closed === 2) onClosed();
  };

  client.pipe(upstream);
  upstream.pipe(client);

  client.on("error", (err) => {
    logger.debug("client socket error", { err });
    upstream.destroy();
  });
  upstream.on("error", (err) => {
    logger.debug("upstream socket error", { err });
    client.destroy();
  });
  client.on("close", (hadError) => {
    if (hadError) upstream.destroy();
    else upstream.end();
    closeOne();
  });
  upstream.on("close", (hadError) => {
    if (hadError) client.destroy();
    else client.end();
    closeOne();
  });
}

export function createTcpRelay(options: TcpRelayOptions): TcpRelay {
  const logger = options.logger ?? silentLogger;
  const sockets = new Set<net.Socket>();
  let pairs = 0;
  let boundPort = options.listen.port;
  let started = false;

  // Half-open on both legs so a FIN from one peer reaches the other
  // without cutting off bytes still flowing the opposite way.
  const server = net.createServer({ allowHalfOpen: true }, (client) => {
    const upstream = net.connect({
      host: options.target.host,
      port: options.target.port,
      allowHalfOpen: true,
    });
    sockets.add(client);
    sockets.add(upstream);
    pairs++;
    logger.debug("connection accepted", {
      from: `${client.remoteAddress}:${client.remotePort}`,
      to: describeEndpoint(options.target),
    });

    pipePair(client, upstream, logger, () => {
      sockets.delete(client);
      sockets.delete(upstream);
      pairs--;
    });
  });

  return {
    get port() {
      return boundPort;
    },

    get activeConnections() {
      return pairs;
    },

    start() {
      return new Promise<void>((resolve, reject) => {
        const onError = (err: Error): void => {
          reject(new ListenerBindError(describeEndpoint(options.listen), { cause: err }));
        };
        server.once("error", onError);

        server.listen(options.listen.port, options.listen.host, () => {
          server.off("error", onError);
          started = true;
          const addr = server.address();
          if (addr && typeof addr === "object") {
            boundPort = addr.port;
          }
          server.on("error", (err) => {
            logger.error("relay listener error", { err });
          });
          logger.info("relay listening", {
            listen: `${options.listen.host}:${boundPort}`,
            target: describeEndpoint(options.target),
          });
          resolve();
        });
      });
    },

    stop() {
      if (!started) return Promise.resolve();
      started = false;
      return new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        sockets.clear();
        server.close(() => resolve());
      });
    },
  };
}
