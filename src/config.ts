import "dotenv/config";
import { DateTime } from "luxon";

import type { LedgerDestinations } from "./ledger/sheetsLedgerSink";

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing required env var: ${name}`);
  return value;
}

function getNumberEnv(env: Env, name: string, fallback: number) {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

function requireZone(zone: string) {
  if (!DateTime.now().setZone(zone).isValid) throw new Error(`Invalid LEDGER_TIMEZONE: ${zone}`);
  return zone;
}

export function loadConfig(env: Env = process.env) {
  const destinations: LedgerDestinations = {
    providing_driver: requireEnv(env, "SHEET_ID_PROVIDING_DRIVER"),
    providing_useful_contact: requireEnv(env, "SHEET_ID_PROVIDING_USEFUL_CONTACT"),
    providing_collecting_aid: requireEnv(env, "SHEET_ID_PROVIDING_COLLECTING_AID"),
    need_evacuation: requireEnv(env, "SHEET_ID_NEED_EVACUATION"),
    need_humanitarian_aid: requireEnv(env, "SHEET_ID_NEED_HUMANITARIAN_AID"),
  };

  return Object.freeze({
    botToken: requireEnv(env, "BOT_TOKEN"),
    mongoUri: requireEnv(env, "MONGODB_URI"),
    env: env.NODE_ENV ?? "development",

    google: Object.freeze({
      clientId: requireEnv(env, "GOOGLE_CLIENT_ID"),
      clientSecret: requireEnv(env, "GOOGLE_CLIENT_SECRET"),
      refreshToken: requireEnv(env, "GOOGLE_REFRESH_TOKEN"),
    }),

    ledger: Object.freeze({
      destinations: Object.freeze(destinations),
      range: env.SHEET_RANGE || "Sheet1",
      timezone: requireZone(env.LEDGER_TIMEZONE || "UTC+3"),
    }),

    timeouts: Object.freeze({
      replyMs: getNumberEnv(env, "REPLY_TIMEOUT_MS", 10_000),
      ledgerMs: getNumberEnv(env, "LEDGER_TIMEOUT_MS", 15_000),
    }),

    storeMaxAttempts: getNumberEnv(env, "STORE_MAX_ATTEMPTS", 5),

    webhook: env.WEBHOOK_URL
      ? Object.freeze({ url: env.WEBHOOK_URL, path: env.WEBHOOK_PATH || "/telegram" })
      : null,
    port: getNumberEnv(env, "PORT", 3000),
    instanceId: env.INSTANCE_ID || null,
  });
}

export type AppConfig = ReturnType<typeof loadConfig>;
