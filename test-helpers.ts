import axios from "axios";
import type { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from "axios";
import type { Notifier } from "./notifier.js";

export type FakeReply = { status?: number; data: unknown } | Error;

/**
 * Axios instance whose adapter answers in-process from `route`.
 */
export function fakeHttp(route: (config: InternalAxiosRequestConfig) => FakeReply): {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = route(config);
    if (reply instanceof Error) throw reply;
    return {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: "",
      headers: {},
      config,
    };
  };
  return { http: axios.create({ baseURL: "https://bybit.test", adapter }), calls };
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  notify(message: string): void {
    this.messages.push(message);
  }
}
