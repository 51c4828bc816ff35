import * as z from "zod";

const configSchema = z.object({
  BYBIT_API_KEY: z.string().min(1),
  BYBIT_SECRET: z.string().min(1),
  BYBIT_BASE_URL: z.string().url().default("https://api.bybit.com"),
  TELEGRAM_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  SYMBOL: z.string().min(1).default("SOLUSDT.P"),
  LEVERAGE: z.coerce.number().positive().default(3),
  SLIPPAGE: z.coerce.number().min(0).default(0.0035),
  DEDUP_RETENTION_SECONDS: z.coerce.number().int().positive().default(60),
  PORT: z.coerce.number().int().positive().default(8080),
});

export type AppConfig = z.infer<typeof configSchema> & {
  telegramEnabled: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  return {
    ...cfg,
    telegramEnabled: Boolean(cfg.TELEGRAM_TOKEN && cfg.TELEGRAM_CHAT_ID),
  };
}
