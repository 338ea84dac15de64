/**
 * Application server: the plaintext and TLS listeners behind the relays.
 *
 * Both listeners share one handler chain (request log, request id, route
 * table). The TLS listener speaks TLS 1.3 only and uses the configured
 * certificate files, or a self-issued certificate when none are given.
 */

import http from "node:http";
import https from "node:https";
import type net from "node:net";

import {
  BackendInitError,
  ListenerBindError,
  artifactFilterFactory,
  silentLogger,
} from "@localpilot/core";
import type { GenerationBackend, Logger } from "@localpilot/core";
import { resolveCertificate } from "@localpilot/tls";
import type { CertificateMaterial } from "@localpilot/tls";

import { createCompletionRelay } from "./completion.js";
import type { CompletionRelay } from "./completion.js";
import { resolveConfig } from "./config.js";
import type { ResolvedServerConfig, ServerConfig } from "./config.js";
import { withRequestId, withRequestLog } from "./middleware.js";
import { createOllamaBackend } from "./ollama.js";
import { createRouter } from "./routes.js";

export interface ServerOptions {
  /** Already resolved config, or overrides to resolve from the environment. */
  config?: ResolvedServerConfig | ServerConfig;
  /** Use this backend instead of building the Ollama client. */
  backend?: GenerationBackend;
  /** Use this certificate instead of reading files or issuing one. */
  certificate?: CertificateMaterial;
  logger?: Logger;
}

export interface ServerInstance {
  /** Bind both listeners. Rejects with ListenerBindError or CertificateGenerationError. */
  start: () => Promise<void>;
  /** Close both listeners and drop open connections. */
  stop: () => Promise<void>;
  /** Bound plaintext port (useful when port 0 is passed). */
  readonly port: number;
  /** Bound TLS port. */
  readonly tlsPort: number;
  readonly config: ResolvedServerConfig;
}

function isResolved(config: ResolvedServerConfig | ServerConfig): config is ResolvedServerConfig {
  return typeof config.promptTemplate === "object";
}

function listen(server: net.Server, port: number, host: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(new ListenerBindError(`${host}:${port}`, { cause: err }));
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const addr = server.address();
      resolve(addr && typeof addr === "object" ? addr.port : port);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise<void>((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
    // Streaming responses never drain on their own.
    server.closeAllConnections();
  });
}

/**
 * Create the application server.
 *
 * ```typescript
 * const server = createServer({ config: { port: 0, tlsPort: 0 } });
 * await server.start();
 * ```
 */
export function createServer(options: ServerOptions = {}): ServerInstance {
  const config =
    options.config && isResolved(options.config) ? options.config : resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;

  let relay: CompletionRelay | null = null;
  let backendError: unknown;
  try {
    const backend =
      options.backend ??
      createOllamaBackend({ host: config.ollamaHost, logger: logger.child("ollama") });
    relay = createCompletionRelay({
      backend,
      model: config.model,
      numPredict: config.numPredict,
      template: config.promptTemplate,
      timeoutMs: config.timeoutMs,
      window: { prefixLines: config.prefixLines, suffixLines: config.suffixLines },
      createFilter: artifactFilterFactory(config.artifacts),
      logger: logger.child("completion"),
    });
  } catch (err: unknown) {
    if (!(err instanceof BackendInitError)) throw err;
    backendError = err;
    logger.error("error initializing the backend client", { err });
  }

  const handler = withRequestLog(
    withRequestId(createRouter({ relay, backendError, logger })),
    logger.child("http"),
  );

  const plain = http.createServer(handler);
  let tls: https.Server | null = null;
  let boundPort = config.port;
  let boundTlsPort = config.tlsPort;

  return {
    config,

    get port() {
      return boundPort;
    },

    get tlsPort() {
      return boundTlsPort;
    },

    async start() {
      let material = options.certificate;
      if (!material) {
        const resolved = resolveCertificate(config);
        material = resolved.material;
        logger.info(
          resolved.selfSigned ? "issued self-signed certificate" : "loaded certificate",
          resolved.selfSigned ? { commonName: "localhost" } : { cert: config.certPath },
        );
      }

      tls = https.createServer(
        {
          cert: material.cert,
          key: material.key,
          minVersion: "TLSv1.3",
          maxVersion: "TLSv1.3",
        },
        handler,
      );

      boundPort = await listen(plain, config.port, config.bindHost);
      try {
        boundTlsPort = await listen(tls, config.tlsPort, config.bindHost);
      } catch (err: unknown) {
        await close(plain);
        throw err;
      }

      const listeners: net.Server[] = [plain, tls];
      for (const server of listeners) {
        server.on("error", (err: Error) => logger.error("listener error", { err }));
      }

      logger.info("listening", {
        http: `http://${config.bindHost}:${boundPort}`,
        https: `https://${config.bindHost}:${boundTlsPort}`,
        model: config.model,
      });
    },

    async stop() {
      await Promise.all([close(plain), tls ? close(tls) : Promise.resolve()]);
    },
  };
}
