/**
 * Webhook execution engine.
 * Turns a TradingView alert into a sized Bybit market order:
 * parse → resolve order id → dedup → balance → price → size → submit → notify.
 */

import * as z from "zod";
import { isOrderAccepted } from "./bybit.js";
import type { MarketDataClient, OrderExecutor, OrderResponse, OrderSide } from "./bybit.js";
import type { Notifier } from "./notifier.js";
import { calculateQuantity, weightFor } from "./sizing.js";
import type { SizingParams } from "./sizing.js";
import type { DedupStore } from "./store.js";

export const SignalSchema = z.object({
  signal: z.string().optional(),
  order_action: z.string().optional(),
  order_id: z.string().optional(),
});

export type Signal = z.infer<typeof SignalSchema>;

export type WebhookResult = {
  status: 200 | 400 | 500;
  body: unknown;
};

export type EngineDeps = {
  market: MarketDataClient;
  executor: OrderExecutor;
  notifier: Notifier;
  store: DedupStore;
  symbol: string;
  sizing: SizingParams;
  now?: () => number;
};

/**
 * "ENTRY SHORT STEP 1" → "Short 1". Signals without STEP, or with STEP but no
 * direction, fall back to the explicit order_id.
 */
export function resolveOrderId(signal: Signal): string {
  const text = (signal.signal ?? "").toUpperCase();
  const explicit = signal.order_id ?? "";
  if (!text.includes("STEP")) return explicit;

  const step = (text.split("STEP").at(-1) ?? "").trim();
  if (text.includes("LONG")) return `Long ${step}`;
  if (text.includes("SHORT")) return `Short ${step}`;
  return explicit;
}

export function formatTimestamp(ms: number): string {
  return `${new Date(ms).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatOrderSummary(fill: {
  side: OrderSide;
  qty: number;
  symbol: string;
  weight: number;
  price: number;
  at: number;
}): string {
  return (
    `✅ Order placed: ${fill.side.toUpperCase()} ${fill.qty} ${fill.symbol}\n` +
    `📊 Weight: ${(fill.weight * 100).toFixed(0)}% | Price: ${fill.price.toFixed(3)} USDT\n` +
    `💰 Notional: ${(fill.qty * fill.price).toFixed(2)} USDT | ⏰ Time: ${formatTimestamp(fill.at)}`
  );
}

function parseSide(action: string): OrderSide | null {
  if (action === "buy" || action === "sell") return action;
  return null;
}

export class SignalEngine {
  readonly #deps: EngineDeps;
  readonly #now: () => number;

  constructor(deps: EngineDeps) {
    this.#deps = deps;
    this.#now = deps.now ?? Date.now;
  }

  async handleSignal(rawBody: string): Promise<WebhookResult> {
    const { market, executor, notifier, store, symbol, sizing } = this.#deps;

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (err) {
      console.error("❌ JSON parse failed:", err instanceof Error ? err.message : String(err));
      return { status: 400, body: { error: "Invalid JSON" } };
    }

    console.log("🚀 Received signal:", payload);

    const parsed = SignalSchema.safeParse(payload);
    if (!parsed.success) {
      return { status: 400, body: { error: "Invalid webhook data" } };
    }

    const action = (parsed.data.order_action ?? "").toLowerCase();
    const orderId = resolveOrderId(parsed.data);
    if (!action || !orderId) {
      return { status: 400, body: { error: "Invalid webhook data" } };
    }

    const side = parseSide(action);
    if (!side) {
      return { status: 400, body: { error: "Invalid order_action" } };
    }

    if (store.checkAndMark(orderId, this.#now() / 1000)) {
      return { status: 200, body: { status: `${orderId} skipped (duplicate second)` } };
    }

    const balance = await market.getBalance();
    if (!Number.isFinite(balance) || balance <= 0) {
      return { status: 500, body: { error: "Insufficient balance or failed to fetch" } };
    }

    const price = await market.getPrice();
    if (price === null || !Number.isFinite(price) || price <= 0) {
      return { status: 500, body: { error: "Price fetch failed" } };
    }

    const qty = calculateQuantity(orderId, balance, price, sizing);
    console.log(`📊 Order qty: ${qty} (balance: ${balance} USDT, price: ${price}, id: ${orderId})`);

    let response: OrderResponse;
    try {
      response = await executor.placeMarketOrder(side, symbol, qty);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("❌ Order failed:", message);
      notifier.notify(`❌ Order failed: ${message}`);
      return { status: 500, body: { error: "Order request failed" } };
    }

    console.log(`✅ Order response: ${response.status} -`, response.data);

    if (!isOrderAccepted(response)) {
      notifier.notify(
        `❌ Order rejected: ${side.toUpperCase()} ${qty} ${symbol} (HTTP ${response.status}) ${JSON.stringify(response.data)}`
      );
      return { status: 500, body: { error: "Order rejected", response: response.data } };
    }

    notifier.notify(
      formatOrderSummary({ side, qty, symbol, weight: weightFor(orderId), price, at: this.#now() })
    );
    return { status: 200, body: response.data };
  }
}
