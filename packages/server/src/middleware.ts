/**
 * Request decorators wrapped around every route.
 *
 * Both are stateless: one stamps an `x-request-id` on the response, the
 * other writes a single log line when the response is done.
 */

import { randomUUID } from "node:crypto";
import type http from "node:http";

import type { Logger } from "@localpilot/core";

export type Handler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export const REQUEST_ID_HEADER = "x-request-id";

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

/**
 * Echo a well-formed inbound request id, or mint one. The id is set
 * before the handler runs, so it is on every response.
 */
export function withRequestId(handler: Handler): Handler {
  return (req, res) => {
    const inbound = req.headers[REQUEST_ID_HEADER];
    const id =
      typeof inbound === "string" && REQUEST_ID_PATTERN.test(inbound) ? inbound : randomUUID();
    res.setHeader(REQUEST_ID_HEADER, id);
    handler(req, res);
  };
}

/** Logs `METHOD path -> status (N ms)` once per request. */
export function withRequestLog(handler: Handler, logger: Logger): Handler {
  return (req, res) => {
    const started = performance.now();
    let logged = false;
    const log = (): void => {
      if (logged) return;
      logged = true;
      const ms = Math.round(performance.now() - started);
      const status = res.headersSent ? res.statusCode : 0;
      const line = `${req.method ?? "?"} ${req.url ?? "/"} -> ${status} (${ms} ms)`;
      const requestId = res.getHeader(REQUEST_ID_HEADER);
      const fields = typeof requestId === "string" ? { requestId } : undefined;
      if (res.writableFinished) logger.info(line, fields);
      else logger.warn(`${line} aborted`, fields);
    };
    res.on("finish", log);
    res.on("close", log);
    handler(req, res);
  };
}
