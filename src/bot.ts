import { Telegraf } from "telegraf";

import { SessionDriver, type SessionDriverDeps } from "./driver/sessionDriver";
import { TelegramTransport } from "./transport/telegramTransport";

export function createBot(token: string, deps: Omit<SessionDriverDeps, "transport">) {
  const bot = new Telegraf(token);
  const driver = new SessionDriver({ ...deps, transport: new TelegramTransport(bot.telegram) });

  // Basic update log (helps debugging without being noisy)
  bot.use(async (ctx, next) => {
    console.log("[BOT] Update received:", ctx.updateType);
    return next();
  });

  bot.on("message", async (ctx) => {
    // Intake only happens in DMs
    if (ctx.chat.type !== "private") {
      console.log(`[BOT] Ignoring message from non-private chat ${ctx.chat.id} (${ctx.chat.type})`);
      return;
    }

    const text = "text" in ctx.message ? ctx.message.text : null;

    await driver.handle({ sessionKey: String(ctx.chat.id), text });
  });

  bot.catch((err, ctx) => {
    console.error(`[BOT] Unhandled error for update ${ctx.update.update_id}:`, err);
  });

  return bot;
}
