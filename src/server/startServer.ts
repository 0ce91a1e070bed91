import http from "http";
import { Telegraf } from "telegraf";
import { createRouter, normalizePath, sendText, type Handler } from "./router";

import { healthRoute } from "../routes/healthRoute";
import { makeTelegramRoute } from "../routes/telegramRoute";

type ServerOptions = {
  port: number;
  // Only when running in webhook mode
  webhook?: { bot: Telegraf; path: string };
};

export function startServer(opts: ServerOptions) {
  const routes = new Map<string, Handler>([["/health", healthRoute]]);
  if (opts.webhook) {
    routes.set(normalizePath(opts.webhook.path), makeTelegramRoute(opts.webhook.bot, opts.webhook.path));
  }

  const router = createRouter(routes, (_req, res) => sendText(res, 200, "Bot is running. Use /health for status."));

  const server = http.createServer((req, res) => {
    console.log(`[HTTP] ${req.method ?? "GET"} ${req.url ?? "/"}`);
    void router(req, res);
  });

  server.listen(opts.port, "0.0.0.0", () => {
    console.log(`[HTTP] Listening on port ${opts.port}, routes: ${[...routes.keys()].join(", ")}`);
  });

  return server;
}
