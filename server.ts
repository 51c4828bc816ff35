import express from "express";
import type { NextFunction, Request, Response } from "express";
import dotenv from "dotenv";
import type { Server } from "node:http";

import { BybitClient } from "./bybit.js";
import { loadConfig } from "./config.js";
import { SignalEngine } from "./engine.js";
import type { WebhookResult } from "./engine.js";
import { TelegramNotifier } from "./notifier.js";
import { DedupStore } from "./store.js";

dotenv.config();

export interface WebhookHandler {
  handleSignal(rawBody: string): Promise<WebhookResult>;
}

/* -------------------------------------------------------------------------- */
/*                                     APP                                    */
/* -------------------------------------------------------------------------- */

export function createApp(engine: WebhookHandler, now: () => number = Date.now) {
  const app = express();

  app.get("/", (_req, res) => {
    res.type("text/plain").send("✅ Bybit webhook trading server is running");
  });

  app.get("/ping", (_req, res) => {
    res.json({ status: "alive", time: now() / 1000 });
  });

  // Alerts may arrive as text/plain; the engine parses the JSON itself.
  app.post("/webhook", express.text({ type: "*/*" }), async (req, res) => {
    try {
      const raw: unknown = req.body;
      const result = await engine.handleSignal(typeof raw === "string" ? raw : "");
      res.status(result.status).json(result.body);
    } catch (err) {
      console.error("Webhook error:", err);
      if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
    }
  });

  // Body parser rejections (bad charset, oversized body) answer like bad JSON.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 400 && status < 500) {
      console.error("❌ Webhook body rejected:", err instanceof Error ? err.message : String(err));
      res.status(400).json({ error: "Invalid JSON" });
      return;
    }
    console.error("Webhook error:", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

/* -------------------------------------------------------------------------- */
/*                                   STARTUP                                  */
/* -------------------------------------------------------------------------- */

export function start(): Server {
  const config = loadConfig();

  const notifier = new TelegramNotifier({
    token: config.TELEGRAM_TOKEN,
    chatId: config.TELEGRAM_CHAT_ID,
  });
  if (!notifier.enabled) {
    console.warn("TELEGRAM_TOKEN / TELEGRAM_CHAT_ID not set, notifications disabled");
  }

  const client = new BybitClient({
    apiKey: config.BYBIT_API_KEY,
    secret: config.BYBIT_SECRET,
    baseUrl: config.BYBIT_BASE_URL,
    symbol: config.SYMBOL,
    notifier,
  });

  const engine = new SignalEngine({
    market: client,
    executor: client,
    notifier,
    store: new DedupStore(config.DEDUP_RETENTION_SECONDS),
    symbol: config.SYMBOL,
    sizing: { leverage: config.LEVERAGE, slippage: config.SLIPPAGE },
  });

  const app = createApp(engine);
  const server = app.listen(config.PORT, "0.0.0.0", () => {
    console.log(
      `Webhook server running at http://0.0.0.0:${config.PORT}/webhook ` +
        `(symbol=${config.SYMBOL}, leverage=${config.LEVERAGE}, slippage=${config.SLIPPAGE})`
    );
  });

  const shutdown = () => {
    console.log("Shutting down webhook server...");
    server.close(() => {
      console.log("Server closed.");
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  return server;
}

// Run directly: `npx tsx server.ts` or `node dist/server.js`
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    start();
  } catch (err) {
    console.error("Fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  }
}
