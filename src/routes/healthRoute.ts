// src/routes/healthRoute.ts
import mongoose from "mongoose";
import { sendJson, type Handler } from "../server/router";

// 1 = connected
export const healthRoute: Handler = (_req, res) => {
  const dbReady = mongoose.connection.readyState === 1;
  sendJson(res, dbReady ? 200 : 503, { ok: dbReady, db: dbReady ? "connected" : "disconnected" });
};
