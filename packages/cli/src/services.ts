/**
 * Start-up and shut-down of everything one localpilot process runs:
 * the application server (plaintext + TLS listeners) and the two relays
 * from the public ports onto those listeners.
 *
 * The listeners bind first so the relays can target the ports they
 * actually got. If any piece fails to start, the pieces already running
 * are stopped before the error is rethrown.
 */

import type { GenerationBackend, Logger } from "@localpilot/core";
import { createServer } from "@localpilot/server";
import type { ResolvedServerConfig, ServerInstance } from "@localpilot/server";
import type { CertificateMaterial } from "@localpilot/tls";
import { createTcpRelay } from "@localpilot/tunnel";
import type { TcpRelay } from "@localpilot/tunnel";

export interface Services {
  server: ServerInstance;
  plainRelay: TcpRelay;
  tlsRelay: TcpRelay;
  stop: () => Promise<void>;
}

export interface ServiceOptions {
  config: ResolvedServerConfig;
  logger: Logger;
  backend?: GenerationBackend;
  certificate?: CertificateMaterial;
}

/** Wildcard bind addresses are not something to connect to. */
export function dialableHost(bindHost: string): string {
  if (bindHost === "0.0.0.0" || bindHost === "") return "127.0.0.1";
  if (bindHost === "::") return "::1";
  return bindHost;
}

export async function startServices(options: ServiceOptions): Promise<Services> {
  const { config, logger } = options;

  const server = createServer({
    config,
    logger: logger.child("server"),
    backend: options.backend,
    certificate: options.certificate,
  });
  await server.start();

  const target = dialableHost(config.bindHost);
  const plainRelay = createTcpRelay({
    listen: { host: config.bindHost, port: config.proxyPort },
    target: { host: target, port: server.port },
    logger: logger.child("relay"),
  });
  const tlsRelay = createTcpRelay({
    listen: { host: config.bindHost, port: config.proxyTlsPort },
    target: { host: target, port: server.tlsPort },
    logger: logger.child("relay-tls"),
  });

  const stop = async (): Promise<void> => {
    await Promise.all([plainRelay.stop(), tlsRelay.stop()]);
    await server.stop();
  };

  try {
    await plainRelay.start();
    await tlsRelay.start();
  } catch (err: unknown) {
    await stop();
    throw err;
  }

  return { server, plainRelay, tlsRelay, stop };
}
