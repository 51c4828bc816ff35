/**
 * Bybit request signing.
 *
 * The signature is a hex HMAC-SHA256 over every parameter except `sign`,
 * sorted by key and serialized as `k=v` pairs joined with `&`.
 */

import crypto from "node:crypto";

export type RequestParams = Record<string, string>;

export type SignedParams = RequestParams & {
  apiKey: string;
  timestamp: string;
  sign: string;
};

export const SIGNATURE_FIELD = "sign";

export function serializeParams(params: RequestParams): string {
  return Object.keys(params)
    .filter((key) => key !== SIGNATURE_FIELD)
    .sort()
    .map((key) => `${key}=${params[key]}`)
    .join("&");
}

export function generateSignature(secret: string, params: RequestParams): string {
  return crypto
    .createHmac("sha256", secret)
    .update(serializeParams(params))
    .digest("hex");
}

export class Signer {
  readonly #apiKey: string;
  readonly #secret: string;

  constructor(apiKey: string, secret: string) {
    this.#apiKey = apiKey;
    this.#secret = secret;
  }

  get apiKey(): string {
    return this.#apiKey;
  }

  /**
   * Adds `apiKey` and `timestamp` (epoch ms) to the parameters and appends
   * `sign` as the last field.
   */
  signParams(params: RequestParams, timestamp: number): SignedParams {
    const unsigned: RequestParams = {
      ...params,
      apiKey: this.#apiKey,
      timestamp: String(timestamp),
    };
    delete unsigned[SIGNATURE_FIELD];
    return {
      ...unsigned,
      apiKey: this.#apiKey,
      timestamp: String(timestamp),
      sign: generateSignature(this.#secret, unsigned),
    };
  }
}
