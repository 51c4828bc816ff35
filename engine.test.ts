import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MarketDataClient, OrderExecutor, OrderResponse, OrderSide } from "./bybit.js";
import { formatOrderSummary, resolveOrderId, SignalEngine } from "./engine.js";
import { DedupStore } from "./store.js";
import { RecordingNotifier } from "./test-helpers.js";

// 2026-01-02 03:04:05.250 UTC
const NOW = Date.UTC(2026, 0, 2, 3, 4, 5) + 250;

class FakeMarket implements MarketDataClient {
  balanceCalls = 0;
  priceCalls = 0;

  constructor(
    private readonly balance: number,
    private readonly price: number | null
  ) {}

  async getBalance(): Promise<number> {
    this.balanceCalls++;
    return this.balance;
  }

  async getPrice(): Promise<number | null> {
    this.priceCalls++;
    return this.price;
  }
}

class FakeExecutor implements OrderExecutor {
  readonly orders: Array<{ side: OrderSide; symbol: string; qty: number }> = [];

  constructor(private readonly reply: OrderResponse | Error) {}

  async placeMarketOrder(side: OrderSide, symbol: string, qty: number): Promise<OrderResponse> {
    this.orders.push({ side, symbol, qty });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

const ACCEPTED: OrderResponse = {
  status: 200,
  data: { retCode: 0, retMsg: "OK", result: { orderId: "abc-1" } },
};

function setup(opts: { balance?: number; price?: number | null; reply?: OrderResponse | Error } = {}) {
  const market = new FakeMarket(opts.balance ?? 1000, opts.price === undefined ? 100 : opts.price);
  const executor = new FakeExecutor(opts.reply ?? ACCEPTED);
  const notifier = new RecordingNotifier();
  const engine = new SignalEngine({
    market,
    executor,
    notifier,
    store: new DedupStore(),
    symbol: "SOLUSDT.P",
    sizing: { leverage: 3, slippage: 0.0035 },
    now: () => NOW,
  });
  return { engine, market, executor, notifier };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveOrderId", () => {
  it("derives Long/Short steps from the signal", () => {
    expect(resolveOrderId({ signal: "ENTRY LONG STEP 1" })).toBe("Long 1");
    expect(resolveOrderId({ signal: "entry short step 3" })).toBe("Short 3");
  });

  it("uses the text after the last STEP", () => {
    expect(resolveOrderId({ signal: "STEP LONG STEP 2" })).toBe("Long 2");
  });

  it("falls back to order_id without STEP or direction", () => {
    expect(resolveOrderId({ signal: "EXIT ALL", order_id: "Short 4" })).toBe("Short 4");
    expect(resolveOrderId({ signal: "STEP 2", order_id: "Long 3" })).toBe("Long 3");
    expect(resolveOrderId({})).toBe("");
  });
});

describe("formatOrderSummary", () => {
  it("reports side, quantity, weight, price, notional and time", () => {
    expect(
      formatOrderSummary({ side: "buy", qty: 20.927, symbol: "SOLUSDT.P", weight: 0.7, price: 100, at: NOW })
    ).toBe(
      "✅ Order placed: BUY 20.927 SOLUSDT.P\n" +
        "📊 Weight: 70% | Price: 100.000 USDT\n" +
        "💰 Notional: 2092.70 USDT | ⏰ Time: 2026-01-02 03:04:05 UTC"
    );
  });
});

describe("SignalEngine.handleSignal", () => {
  it("sizes and places an order for a STEP signal", async () => {
    const { engine, executor, notifier } = setup();

    const result = await engine.handleSignal(
      JSON.stringify({ signal: "ENTRY LONG STEP 1", order_action: "buy" })
    );

    expect(result).toEqual({ status: 200, body: ACCEPTED.data });
    expect(executor.orders).toEqual([{ side: "buy", symbol: "SOLUSDT.P", qty: 20.927 }]);
    expect(notifier.messages).toEqual([
      "✅ Order placed: BUY 20.927 SOLUSDT.P\n" +
        "📊 Weight: 70% | Price: 100.000 USDT\n" +
        "💰 Notional: 2092.70 USDT | ⏰ Time: 2026-01-02 03:04:05 UTC",
    ]);
  });

  it("uses an explicit order_id and normalises the action case", async () => {
    const { engine, executor } = setup();

    await engine.handleSignal(JSON.stringify({ order_action: "SELL", order_id: "Short 2" }));

    // 1000 * 0.4 * 3 / 100.35
    expect(executor.orders).toEqual([{ side: "sell", symbol: "SOLUSDT.P", qty: 11.958 }]);
  });

  it("still places a zero-quantity order for an unknown id", async () => {
    const { engine, executor } = setup();

    const result = await engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 9" }));

    expect(result.status).toBe(200);
    expect(executor.orders).toEqual([{ side: "buy", symbol: "SOLUSDT.P", qty: 0 }]);
  });

  it("rejects malformed JSON without outbound calls", async () => {
    const { engine, market, executor, notifier } = setup();

    await expect(engine.handleSignal("{not json")).resolves.toEqual({
      status: 400,
      body: { error: "Invalid JSON" },
    });
    expect(market.balanceCalls).toBe(0);
    expect(market.priceCalls).toBe(0);
    expect(executor.orders).toEqual([]);
    expect(notifier.messages).toEqual([]);
  });

  it("rejects a body that is not an object", async () => {
    const { engine } = setup();

    await expect(engine.handleSignal("[1,2]")).resolves.toEqual({
      status: 400,
      body: { error: "Invalid webhook data" },
    });
  });

  it("rejects a missing action or id", async () => {
    const { engine, market } = setup();

    await expect(engine.handleSignal(JSON.stringify({ order_id: "Long 1" }))).resolves.toEqual({
      status: 400,
      body: { error: "Invalid webhook data" },
    });
    await expect(engine.handleSignal(JSON.stringify({ order_action: "buy" }))).resolves.toEqual({
      status: 400,
      body: { error: "Invalid webhook data" },
    });
    expect(market.balanceCalls).toBe(0);
  });

  it("rejects an unknown action", async () => {
    const { engine } = setup();

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "close", order_id: "Long 1" }))
    ).resolves.toEqual({ status: 400, body: { error: "Invalid order_action" } });
  });

  it("skips a duplicate within the same second", async () => {
    const { engine, market, executor } = setup();
    const body = JSON.stringify({ signal: "ENTRY SHORT STEP 2", order_action: "sell" });

    await engine.handleSignal(body);
    const second = await engine.handleSignal(body);

    expect(second).toEqual({ status: 200, body: { status: "Short 2 skipped (duplicate second)" } });
    expect(market.balanceCalls).toBe(1);
    expect(market.priceCalls).toBe(1);
    expect(executor.orders).toHaveLength(1);
  });

  it("aborts when the balance is zero", async () => {
    const { engine, market, executor } = setup({ balance: 0 });

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 1" }))
    ).resolves.toEqual({ status: 500, body: { error: "Insufficient balance or failed to fetch" } });
    expect(market.priceCalls).toBe(0);
    expect(executor.orders).toEqual([]);
  });

  it("aborts when the price is missing", async () => {
    const { engine, executor } = setup({ price: null });

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 1" }))
    ).resolves.toEqual({ status: 500, body: { error: "Price fetch failed" } });
    expect(executor.orders).toEqual([]);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    "aborts without ordering when the price is %s",
    async (price) => {
      const { engine, executor, notifier } = setup({ price });

      await expect(
        engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 1" }))
      ).resolves.toEqual({ status: 500, body: { error: "Price fetch failed" } });
      expect(executor.orders).toEqual([]);
      expect(notifier.messages).toEqual([]);
    }
  );

  it("aborts when the balance is not a number", async () => {
    const { engine, market, executor } = setup({ balance: Number.NaN });

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 1" }))
    ).resolves.toEqual({ status: 500, body: { error: "Insufficient balance or failed to fetch" } });
    expect(market.priceCalls).toBe(0);
    expect(executor.orders).toEqual([]);
  });

  it("executes once when identical alerts arrive concurrently", async () => {
    const { engine, market, executor } = setup();
    const body = JSON.stringify({ signal: "ENTRY SHORT STEP 2", order_action: "sell" });

    const results = await Promise.all([
      engine.handleSignal(body),
      engine.handleSignal(body),
      engine.handleSignal(body),
    ]);

    const skipped = { status: 200, body: { status: "Short 2 skipped (duplicate second)" } };
    expect(results.filter((r) => JSON.stringify(r) === JSON.stringify(skipped))).toHaveLength(2);
    expect(results.map((r) => r.status)).toEqual([200, 200, 200]);
    expect(executor.orders).toEqual([{ side: "sell", symbol: "SOLUSDT.P", qty: 11.958 }]);
    expect(market.balanceCalls).toBe(1);
  });

  it("reports a thrown submission error", async () => {
    const { engine, notifier } = setup({ reply: new Error("socket hang up") });

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "buy", order_id: "Long 1" }))
    ).resolves.toEqual({ status: 500, body: { error: "Order request failed" } });
    expect(notifier.messages).toEqual(["❌ Order failed: socket hang up"]);
  });

  it("reports an order the exchange rejected", async () => {
    const rejected = { retCode: 110007, retMsg: "ab not enough for new order" };
    const { engine, notifier } = setup({ reply: { status: 200, data: rejected } });

    await expect(
      engine.handleSignal(JSON.stringify({ order_action: "sell", order_id: "Short 1" }))
    ).resolves.toEqual({ status: 500, body: { error: "Order rejected", response: rejected } });
    // 1000 * 0.3 * 3 / 100.35
    expect(notifier.messages).toEqual([
      `❌ Order rejected: SELL 8.969 SOLUSDT.P (HTTP 200) ${JSON.stringify(rejected)}`,
    ]);
  });
});
