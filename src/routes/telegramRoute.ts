// src/routes/telegramRoute.ts
import { Telegraf } from "telegraf";
import { sendText, type Handler } from "../server/router";

/** Telegram only ever POSTs updates. */
export function makeTelegramRoute(bot: Telegraf, webhookPath: string): Handler {
  const callback = bot.webhookCallback(webhookPath);

  return async (req, res) => {
    if ((req.method || "GET").toUpperCase() !== "POST") {
      res.setHeader("Allow", "POST");
      sendText(res, 405, "Method not allowed");
      return;
    }
    await callback(req, res);
  };
}
