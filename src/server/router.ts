// src/server/router.ts
import http from "http";

export type Handler = (req: http.IncomingMessage, res: http.ServerResponse) => void | Promise<void>;

export function normalizePath(rawUrl: string) {
  const pathOnly = (rawUrl || "/").split("?")[0] || "/";
  return pathOnly.length > 1 ? pathOnly.replace(/\/+$/, "") : pathOnly;
}

export function sendText(res: http.ServerResponse, status: number, text: string) {
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" }).end(text);
}

export function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" }).end(JSON.stringify(body));
}

/** Exact-path dispatch; a handler that throws answers 500. */
export function createRouter(routes: ReadonlyMap<string, Handler>, fallback: Handler): Handler {
  return async (req, res) => {
    const path = normalizePath(req.url || "/");
    const route = routes.get(path) ?? fallback;
    try {
      await route(req, res);
    } catch (e) {
      console.error(`[HTTP] ${req.method ?? "GET"} ${path} failed:`, e);
      if (!res.headersSent) sendText(res, 500, "Internal error");
    }
  };
}
