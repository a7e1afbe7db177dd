import { z } from "zod";
import {
  DEFAULT_BACKFILL_START_DATE,
  DEFAULT_PRICE_SYMBOL,
} from "./contracts";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

/**
 * Environment schema for the service.
 * Values come from process.env (populated from .env by dotenv in server.ts).
 */
const EnvSchema = z.object({
  ETHERSCAN_API_KEY: z.string().min(1, "ETHERSCAN_API_KEY is required"),
  ETHERSCAN_URL: z.string().url().default("https://api.etherscan.io/api"),
  BINANCE_KLINES_URL: z
    .string()
    .url()
    .default("https://api.binance.com/api/v3/klines"),
  PRICE_SYMBOL: z.string().min(1).default(DEFAULT_PRICE_SYMBOL),
  BACKFILL_START_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "BACKFILL_START_DATE must be YYYY-MM-DD")
    .default(DEFAULT_BACKFILL_START_DATE),
  POLL_INTERVAL_MS: positiveInt(10_000),
  BACKFILL_BATCH_DELAY_MS: nonNegativeInt(1_000),
  TX_PAGE_SIZE: positiveInt(10_000),
  HTTP_TIMEOUT_MS: positiveInt(10_000),
  PORT: positiveInt(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  NODE_ENV: z.string().default("development"),
  RATE_LIMIT_PER_MINUTE: positiveInt(600),
});

export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  etherscan: {
    url: string;
    apiKey: string;
    pageSize: number;
  };
  prices: {
    url: string;
    symbol: string;
  };
  httpTimeoutMs: number;
  /** Unix ms of 00:00 UTC on the first day to backfill */
  backfillStartMs: number;
  backfillBatchDelayMs: number;
  pollIntervalMs: number;
  port: number;
  logLevel: LogLevelName;
  nodeEnv: string;
  rateLimitPerMinute: number;
}

export class ConfigError extends Error {
  code = "INVALID_CONFIG";
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse and validate the environment. Throws ConfigError listing every
 * invalid variable so startup fails before any upstream call is made.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const values = parsed.data;
  const backfillStartMs = Date.parse(`${values.BACKFILL_START_DATE}T00:00:00Z`);
  if (Number.isNaN(backfillStartMs)) {
    throw new ConfigError([
      `BACKFILL_START_DATE: ${values.BACKFILL_START_DATE} is not a valid date`,
    ]);
  }

  return {
    etherscan: {
      url: values.ETHERSCAN_URL,
      apiKey: values.ETHERSCAN_API_KEY,
      pageSize: values.TX_PAGE_SIZE,
    },
    prices: {
      url: values.BINANCE_KLINES_URL,
      symbol: values.PRICE_SYMBOL,
    },
    httpTimeoutMs: values.HTTP_TIMEOUT_MS,
    backfillStartMs,
    backfillBatchDelayMs: values.BACKFILL_BATCH_DELAY_MS,
    pollIntervalMs: values.POLL_INTERVAL_MS,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
    rateLimitPerMinute: values.RATE_LIMIT_PER_MINUTE,
  };
}
