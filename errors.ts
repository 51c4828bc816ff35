/**
 * Exchange error taxonomy.
 *
 * Every failure talking to the exchange is normalised to an ExchangeError so
 * callers log and report one shape.
 */

import axios from "axios";
import { ZodError } from "zod";

export enum ExchangeErrorCode {
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",
  API_ERROR = "API_ERROR",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  COIN_NOT_FOUND = "COIN_NOT_FOUND",
  UNKNOWN = "UNKNOWN",
}

export interface ExchangeErrorDetail {
  readonly code: ExchangeErrorCode;
  readonly message: string;
  readonly exchange: string;
  readonly originalCode?: string | number;
  readonly originalMessage?: string;
}

export class ExchangeError extends Error {
  readonly code: ExchangeErrorCode;
  readonly exchange: string;
  readonly originalCode?: string | number;
  readonly originalMessage?: string;

  constructor(detail: ExchangeErrorDetail) {
    super(detail.message);
    this.name = "ExchangeError";
    this.code = detail.code;
    this.exchange = detail.exchange;
    this.originalCode = detail.originalCode;
    this.originalMessage = detail.originalMessage;
  }

  toJSON(): ExchangeErrorDetail {
    return {
      code: this.code,
      message: this.message,
      exchange: this.exchange,
      originalCode: this.originalCode,
      originalMessage: this.originalMessage,
    };
  }
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

/**
 * Create a standardized ExchangeError from any thrown value.
 */
export function toExchangeError(exchange: string, error: unknown): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
    return new ExchangeError({
      code: timedOut ? ExchangeErrorCode.TIMEOUT : ExchangeErrorCode.NETWORK_ERROR,
      message: timedOut ? `Request timeout (${error.message})` : `Network error (${error.message})`,
      exchange,
      originalCode: error.code,
      originalMessage: error.message,
    });
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
    return new ExchangeError({
      code: ExchangeErrorCode.INVALID_RESPONSE,
      message: `Unexpected response at ${where}`,
      exchange,
      originalMessage: issue?.message,
    });
  }

  if (error instanceof Error) {
    return new ExchangeError({
      code: ExchangeErrorCode.UNKNOWN,
      message: error.message,
      exchange,
      originalMessage: error.message,
    });
  }

  return new ExchangeError({
    code: ExchangeErrorCode.UNKNOWN,
    message: String(error),
    exchange,
  });
}
