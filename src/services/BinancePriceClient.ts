import axios, { AxiosInstance } from "axios";
import Logger from "bunyan";
import { KlinesResponseSchema } from "../validation/schemas";
import { PricePoint } from "../types/FeeTracker";
import { ONE_DAY_MS, startOfUtcDay } from "../utils/time";
import { errorDetails } from "../utils/errors";

export interface PriceClient {
  priceSeries(startMs: number, endMs: number): Promise<PricePoint[] | null>;
}

export interface BinancePriceClientOptions {
  url: string;
  symbol: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

/**
 * BinancePriceClient - daily ETH/USD candles
 *
 * The klines endpoint returns at most 1000 candles per call, so long ranges
 * are fetched in windows of MAX_WINDOW_DAYS. Windows are requested one after
 * another; the upstream rate limit does not tolerate parallel bursts.
 */
export class BinancePriceClient implements PriceClient {
  static readonly MAX_WINDOW_DAYS = 990;
  private static readonly CANDLE_LIMIT = 1000;

  private logger: Logger;
  private http: AxiosInstance;
  private readonly url: string;
  private readonly symbol: string;

  constructor(logger: Logger, options: BinancePriceClientOptions) {
    this.logger = logger.child({ service: "BinancePriceClient" });
    this.url = options.url;
    this.symbol = options.symbol;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  /**
   * Daily prices with open times in [startMs, endMs], ascending.
   * Returns [] for an empty range and null when any window fails.
   */
  async priceSeries(
    startMs: number,
    endMs: number,
  ): Promise<PricePoint[] | null> {
    const series: PricePoint[] = [];
    const windowMs = BinancePriceClient.MAX_WINDOW_DAYS * ONE_DAY_MS;

    let windowStart = startMs;
    while (windowStart < endMs) {
      const windowEnd = Math.min(endMs, windowStart + windowMs);
      const points = await this.fetchWindow(windowStart, windowEnd);
      if (points === null) {
        return null;
      }
      series.push(...points);
      // endTime is inclusive, so the next window opens on the following day's candle
      windowStart = startOfUtcDay(windowEnd) + ONE_DAY_MS;
    }

    return series;
  }

  private async fetchWindow(
    startMs: number,
    endMs: number,
  ): Promise<PricePoint[] | null> {
    const params = {
      symbol: this.symbol,
      interval: "1d",
      startTime: String(startMs),
      endTime: String(endMs),
      limit: BinancePriceClient.CANDLE_LIMIT,
    };
    this.logger.info({ params }, "Making Binance klines request");

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(this.url, { params });
      body = response.data;
    } catch (error) {
      this.logger.error(
        { params, error: errorDetails(error) },
        "Binance klines request failed",
      );
      return null;
    }

    const parsed = KlinesResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn(
        { params, issues: parsed.error.issues.slice(0, 3) },
        "Malformed Binance klines response",
      );
      return null;
    }

    return parsed.data.map(([timestamp, price]) => ({ timestamp, price }));
  }
}
