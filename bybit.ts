/**
 * Bybit V5 REST client.
 *
 * Reads the unified-account USDT balance and the last traded price of one
 * instrument, and places signed market orders. Every call is a single attempt
 * with its own timeout. Balance and price failures are soft: they are logged,
 * reported through the notifier and returned as 0 / null.
 */

import axios from "axios";
import type { AxiosInstance } from "axios";
import * as z from "zod";
import { ExchangeError, ExchangeErrorCode, toExchangeError } from "./errors.js";
import type { Notifier } from "./notifier.js";
import { Signer } from "./signer.js";

/* -------------------------------------------------------------------------- */
/*                                  CONSTANTS                                 */
/* -------------------------------------------------------------------------- */

export const BYBIT_API_BASE = "https://api.bybit.com";
const EXCHANGE = "bybit";
const QUOTE_ASSET = "USDT";
const BALANCE_TIMEOUT = 10000;
const PRICE_TIMEOUT = 5000;
const ORDER_TIMEOUT = 10000;

/* -------------------------------------------------------------------------- */
/*                                    TYPES                                   */
/* -------------------------------------------------------------------------- */

export type OrderSide = "buy" | "sell";

export interface OrderResponse {
  status: number;
  data: unknown;
}

export interface MarketDataClient {
  getBalance(): Promise<number>;
  getPrice(): Promise<number | null>;
}

export interface OrderExecutor {
  placeMarketOrder(side: OrderSide, symbol: string, qty: number): Promise<OrderResponse>;
}

export type BybitClientOptions = {
  apiKey: string;
  secret: string;
  symbol: string;
  notifier: Notifier;
  baseUrl?: string;
  http?: AxiosInstance;
  now?: () => number;
};

const retCodeSchema = z.object({
  retCode: z.number().optional(),
  retMsg: z.string().optional(),
});

const walletBalanceSchema = z.object({
  result: z.object({
    list: z
      .array(
        z.object({
          coin: z.array(
            z.object({
              coin: z.string(),
              availableToTrade: z.string().optional(),
            })
          ),
        })
      )
      .min(1),
  }),
});

const tickerSchema = z.object({
  result: z.object({
    list: z.array(z.object({ lastPrice: z.string() })).min(1),
  }),
});

/* -------------------------------------------------------------------------- */
/*                                   CLIENT                                   */
/* -------------------------------------------------------------------------- */

export class BybitClient implements MarketDataClient, OrderExecutor {
  readonly symbol: string;

  readonly #signer: Signer;
  readonly #http: AxiosInstance;
  readonly #notifier: Notifier;
  readonly #now: () => number;

  constructor(options: BybitClientOptions) {
    this.symbol = options.symbol;
    this.#signer = new Signer(options.apiKey, options.secret);
    this.#http = options.http ?? axios.create({ baseURL: options.baseUrl ?? BYBIT_API_BASE });
    this.#notifier = options.notifier;
    this.#now = options.now ?? Date.now;
  }

  async getBalance(): Promise<number> {
    try {
      const params = this.#signer.signParams({ accountType: "UNIFIED" }, this.#now());
      const res = await this.#http.get("/v5/account/wallet-balance", {
        params,
        headers: { "Content-Type": "application/json" },
        timeout: BALANCE_TIMEOUT,
      });
      const data = parseResponse(walletBalanceSchema, res.data);

      const entry = data.result.list[0].coin.find((c) => c.coin === QUOTE_ASSET);
      const available = Number.parseFloat(entry?.availableToTrade ?? "");
      if (!entry || !Number.isFinite(available)) {
        throw new ExchangeError({
          code: ExchangeErrorCode.COIN_NOT_FOUND,
          message: `${QUOTE_ASSET} available balance not found`,
          exchange: EXCHANGE,
        });
      }
      return available;
    } catch (err) {
      this.#softFailure("Balance fetch failed", err);
      return 0;
    }
  }

  async getPrice(): Promise<number | null> {
    try {
      const res = await this.#http.get("/v5/market/tickers", {
        params: { category: "linear", symbol: this.symbol },
        timeout: PRICE_TIMEOUT,
      });
      const data = parseResponse(tickerSchema, res.data);

      const price = Number.parseFloat(data.result.list[0].lastPrice);
      if (!Number.isFinite(price) || price <= 0) {
        throw new ExchangeError({
          code: ExchangeErrorCode.INVALID_RESPONSE,
          message: `Invalid last price for ${this.symbol}`,
          exchange: EXCHANGE,
        });
      }
      return price;
    } catch (err) {
      this.#softFailure("Price fetch failed", err);
      return null;
    }
  }

  /**
   * Submits a signed market order and hands back the raw HTTP status and body.
   * HTTP error statuses resolve normally; only transport failures throw.
   */
  async placeMarketOrder(side: OrderSide, symbol: string, qty: number): Promise<OrderResponse> {
    const body = this.#signer.signParams(
      {
        symbol,
        side: side === "buy" ? "Buy" : "Sell",
        orderType: "Market",
        qty: String(qty),
        timeInForce: "GoodTillCancel",
      },
      this.#now()
    );

    const res = await this.#http.post("/v5/order/create", body, {
      headers: { "Content-Type": "application/json" },
      timeout: ORDER_TIMEOUT,
      validateStatus: () => true,
    });
    return { status: res.status, data: res.data };
  }

  #softFailure(label: string, error: unknown): void {
    const err = toExchangeError(EXCHANGE, error);
    console.error(`❌ ${label}:`, err.message);
    this.#notifier.notify(`❌ ${label}: ${err.message}`);
  }
}

/* -------------------------------------------------------------------------- */
/*                                   HELPERS                                  */
/* -------------------------------------------------------------------------- */

function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const header = retCodeSchema.safeParse(data);
  if (header.success && header.data.retCode !== undefined && header.data.retCode !== 0) {
    throw new ExchangeError({
      code: ExchangeErrorCode.API_ERROR,
      message: `Bybit error ${header.data.retCode}: ${header.data.retMsg ?? "unknown"}`,
      exchange: EXCHANGE,
      originalCode: header.data.retCode,
      originalMessage: header.data.retMsg,
    });
  }
  return schema.parse(data);
}

/**
 * True when an order-create response is an accepted order: a 2xx/3xx status,
 * a JSON object body and a zero (or absent) retCode.
 */
export function isOrderAccepted(response: OrderResponse): boolean {
  if (response.status >= 400) return false;
  if (typeof response.data !== "object" || response.data === null || Array.isArray(response.data)) {
    return false;
  }
  const header = retCodeSchema.safeParse(response.data);
  return header.success && (header.data.retCode === undefined || header.data.retCode === 0);
}
