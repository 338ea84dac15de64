/**
 * Route table for the application listeners.
 *
 * Three API-compatible completion paths share one CompletionRelay. The
 * health and token endpoints answer without touching the backend, so
 * they keep working when the backend could not be set up.
 */

import type http from "node:http";

import { errorBody, silentLogger } from "@localpilot/core";
import type { Logger } from "@localpilot/core";

import type { CompletionRelay } from "./completion.js";
import type { Handler } from "./middleware.js";

export const COMPLETION_PATHS = [
  "/v1/engines/copilot-codex/completions",
  "/v1/engines/chat-control/completions",
  "/v1/engines/gpt-4o-copilot/completions",
] as const;

export const HEALTH_PATH = "/health";
export const TOKEN_PATH = "/copilot_internal/v2/token";

/** Lifetime advertised for the placeholder session token. */
export const TOKEN_TTL_SECONDS = 30 * 60;
const TOKEN_REFRESH_SECONDS = 25 * 60;

export interface RouterOptions {
  /** Null when the backend failed to initialize. */
  relay: CompletionRelay | null;
  /** Why `relay` is null; reported on every completion request. */
  backendError?: unknown;
  logger?: Logger;
  /** Clock for the token stub, in milliseconds. */
  now?: () => number;
}

/**
 * Session token the IDE asks for before completing. Nothing checks it;
 * the shape is what the integrations expect.
 */
export function tokenStub(nowMs: number): {
  token: string;
  expires_at: number;
  refresh_in: number;
} {
  const expiresAt = Math.floor(nowMs / 1000) + TOKEN_TTL_SECONDS;
  return {
    token: `tid=localpilot;exp=${expiresAt}`,
    expires_at: expiresAt,
    refresh_in: TOKEN_REFRESH_SECONDS,
  };
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json",
    "content-length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function pathOf(req: http.IncomingMessage): string {
  const raw = req.url ?? "/";
  const q = raw.indexOf("?");
  return q === -1 ? raw : raw.slice(0, q);
}

function isCompletionPath(path: string): boolean {
  return COMPLETION_PATHS.some((p) => p === path);
}

export function createRouter(options: RouterOptions): Handler {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const { relay, backendError } = options;

  return (req, res) => {
    const path = pathOf(req);

    if (isCompletionPath(path)) {
      if (!relay) {
        req.resume();
        sendJson(res, 500, errorBody(backendError ?? new Error("Backend unavailable")));
        return;
      }
      relay.handle(req, res).catch((err: unknown) => {
        logger.error("completion handler crashed", { path, err });
        if (!res.headersSent) sendJson(res, 500, errorBody(err));
        else if (!res.writableEnded) res.end();
      });
      return;
    }

    if (path === HEALTH_PATH) {
      req.resume();
      res.writeHead(200, { "content-type": "text/plain; charset=utf-8" });
      res.end("OK");
      return;
    }

    if (path === TOKEN_PATH) {
      req.resume();
      sendJson(res, 200, tokenStub(now()));
      return;
    }

    req.resume();
    sendJson(res, 404, { error: { code: "not_found", message: `No route for ${path}` } });
  };
}
