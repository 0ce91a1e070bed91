import { loadConfig } from "./config";
import { connectDb, disconnectDb } from "./db";
import { createBot } from "./bot";
import { startServer } from "./server/startServer";
import { PollerLock, makeInstanceId } from "./instanceLock";
import { MongoStateStore, mongooseSessionRows } from "./state/mongoStateStore";
import { SheetsLedgerSink } from "./ledger/sheetsLedgerSink";
import { createSheetsAppender } from "./integrations/googleSheets";
import { sleep } from "./utils/timeout";

async function main() {
  const config = loadConfig();
  console.log(`Starting intake bot (${config.env})...`);

  // DB connection
  const conn = await connectDb(config.mongoUri);
  console.log("Connected to MongoDB:", conn.name);

  const bot = createBot(config.botToken, {
    store: new MongoStateStore(mongooseSessionRows(), { maxAttempts: config.storeMaxAttempts }),
    sink: new SheetsLedgerSink(createSheetsAppender(config.google), config.ledger),
    timeouts: config.timeouts
  });

  const me = await bot.telegram.getMe();
  console.log("Bot identity:", `@${me.username}`, me.id);

  // Health endpoint in both modes; the webhook route only when configured
  const server = config.webhook
    ? startServer({ port: config.port, webhook: { bot, path: config.webhook.path } })
    : startServer({ port: config.port });

  let releaseLease: (() => Promise<void>) | null = null;

  if (config.webhook) {
    await bot.telegram.setWebhook(`${config.webhook.url}${config.webhook.path}`);
    console.log("Webhook set.");
  } else {
    // Acquire the polling lease BEFORE launching polling
    const lock = new PollerLock({
      key: "telegram_polling",
      instanceId: config.instanceId ?? makeInstanceId(),
      leaseMs: 60_000,
      renewEveryMs: 20_000
    });
    await lock.acquire();
    releaseLease = () => lock.release();

    console.log("Clearing webhook (if any)...");
    await bot.telegram.deleteWebhook();

    // launch() settles only when polling stops
    bot.launch().catch((e) => {
      console.error("Polling stopped with error:", e);
      process.exit(1);
    });
    console.log("Bot launched (long polling).");
  }

  async function shutdown(signal: string) {
    console.log(`Shutdown signal received: ${signal}`);

    if (!config.webhook) {
      try {
        bot.stop(signal);
      } catch (e) {
        console.error("Bot stop error:", e);
      }
    }

    if (releaseLease) await releaseLease();
    server.close();
    await disconnectDb();

    // Small delay to let logs flush
    await sleep(250);

    process.exit(0);
  }

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("Fatal startup error:", e);
  process.exit(1);
});
