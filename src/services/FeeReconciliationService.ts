import Logger from "bunyan";
import { FeeCache } from "../cache/feeCache";
import {
  EngineState,
  EngineStatus,
  FeeRecord,
  PricePoint,
  Transaction,
} from "../types/FeeTracker";
import { RawTransaction } from "../validation/schemas";
import { computeFeeUsd, findPriceAt, parseTransaction } from "../utils/feeMath";
import {
  DataIntegrityError,
  StalePriceError,
  errorDetails,
} from "../utils/errors";
import {
  ONE_DAY_MS,
  delay,
  msUntilNextUtcMidnight,
  startOfUtcDay,
} from "../utils/time";
import { BlockchainClient } from "./EtherscanClient";
import { PriceClient } from "./BinancePriceClient";

export interface FeeReconciliationOptions {
  /** Unix ms of the first day of history to replay */
  backfillStartMs: number;
  pollIntervalMs: number;
  backfillBatchDelayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

// The price refresh fires just after the UTC day boundary
const PRICE_REFRESH_OFFSET_MS = 1000;

/**
 * FeeReconciliationService - keeps the fee cache in step with the chain
 *
 * Lifecycle:
 * 1. Backfill: replay the pool's history up to the current block, pricing each
 *    transaction with the daily candle in effect at its timestamp
 * 2. Steady state: two timers run until stop()
 *    - transaction poll every pollIntervalMs, priced with the cached price
 *    - price refresh once a day after 00:00 UTC
 *
 * Cache mutations happen in synchronous blocks after the network calls of a
 * cycle have resolved. A poll cycle either commits its whole batch together
 * with the new cursor or commits nothing.
 */
export class FeeReconciliationService {
  private logger: Logger;
  private blockchain: BlockchainClient;
  private prices: PriceClient;
  private cache: FeeCache;
  private state: EngineState = "idle";
  private pollTimer: NodeJS.Timeout | null = null;
  private priceTimer: NodeJS.Timeout | null = null;

  private readonly backfillStartMs: number;
  private readonly pollIntervalMs: number;
  private readonly backfillBatchDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    blockchain: BlockchainClient,
    prices: PriceClient,
    cache: FeeCache,
    logger: Logger,
    options: FeeReconciliationOptions,
  ) {
    this.logger = logger.child({ service: "FeeReconciliationService" });
    this.blockchain = blockchain;
    this.prices = prices;
    this.cache = cache;
    this.backfillStartMs = options.backfillStartMs;
    this.pollIntervalMs = options.pollIntervalMs;
    this.backfillBatchDelayMs = options.backfillBatchDelayMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Run the backfill, then arm both steady-state loops.
   * Resolves once the cache is warm (or the service was stopped meanwhile).
   */
  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`Cannot start fee reconciliation from state ${this.state}`);
    }

    this.state = "backfilling";
    const completed = await this.backfill();
    if (!completed || this.isStopped()) {
      this.logger.info("Backfill interrupted by shutdown");
      return;
    }

    // The backfill series may end on the previous day if it ran past midnight
    try {
      await this.refreshPrice();
    } catch (error) {
      this.logger.error(
        { error: errorDetails(error) },
        "Unable to get ETH prices",
      );
    }
    if (this.isStopped()) {
      return;
    }

    this.state = "steady";
    this.logger.info(
      {
        latestBlockSeen: this.cache.getCursor(),
        trackedTransactions: this.cache.size,
      },
      "Backfill complete, starting periodic polling",
    );
    this.schedulePoll(this.pollIntervalMs);
    this.schedulePriceRefresh();
  }

  /**
   * Cancel both loops. In-flight requests are left to finish; their
   * results are discarded.
   */
  stop(): void {
    if (this.isStopped()) {
      return;
    }
    this.state = "stopped";
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.priceTimer) {
      clearTimeout(this.priceTimer);
      this.priceTimer = null;
    }
    this.logger.info("Fee reconciliation stopped");
  }

  isReady(): boolean {
    return this.state === "steady";
  }

  getStatus(): EngineStatus {
    const price = this.cache.getPrice();
    return {
      state: this.state,
      latestBlockSeen: this.cache.getCursor(),
      trackedTransactions: this.cache.size,
      latestPrice: price?.price ?? null,
      latestPriceAsOf: price ? new Date(price.asOf).toISOString() : null,
    };
  }

  /**
   * Replay history up to the current block. Returns false if the service
   * was stopped before the backfill finished.
   */
  async backfill(): Promise<boolean> {
    this.logger.info("Startup polling");

    const latestBlock = await this.fetchUntilPresent(
      () => this.blockchain.latestBlock(),
      "latest block",
    );
    if (latestBlock === null) {
      return false;
    }

    const series = await this.fetchUntilPresent(
      () => this.prices.priceSeries(this.backfillStartMs, this.now()),
      "ETH price series",
    );
    if (series === null) {
      return false;
    }
    if (series.length === 0) {
      throw new Error(
        `No ETH prices available since ${new Date(this.backfillStartMs).toISOString()}`,
      );
    }

    this.logger.info(
      { latestBlock, pricePoints: series.length },
      "Backfilling pool transactions",
    );

    while (this.cache.getCursor() < latestBlock) {
      const cursor = this.cache.getCursor();
      // startblock is inclusive: a block cut off by the previous page is fetched again
      const batch = await this.blockchain.historicalTransactions(
        cursor,
        latestBlock,
      );
      if (this.isStopped()) {
        return false;
      }

      if (batch === null) {
        this.logger.warn(
          { cursor, retryInMs: this.backfillBatchDelayMs },
          "Could not fetch transactions during backfill, retrying",
        );
        await this.sleep(this.backfillBatchDelayMs);
        continue;
      }

      const { records, highestBlock } = this.priceHistoricalBatch(
        batch,
        series,
      );
      const nextCursor = this.nextBackfillCursor(
        cursor,
        latestBlock,
        highestBlock,
        batch.length,
      );
      this.cache.commit(records, nextCursor);

      this.logger.debug(
        { cursor: nextCursor, latestBlock, added: records.length },
        "Backfill batch applied",
      );

      if (nextCursor < latestBlock) {
        await this.sleep(this.backfillBatchDelayMs);
        if (this.isStopped()) {
          return false;
        }
      }
    }

    const latest = series[series.length - 1];
    this.cache.setPrice(latest.price, latest.timestamp);
    return true;
  }

  /**
   * One steady-state poll. Fetches transactions only when the chain has
   * moved past the cursor.
   */
  async pollTransactions(): Promise<void> {
    const latestBlock = await this.blockchain.latestBlock();
    if (latestBlock === null) {
      this.logger.error("Could not get latest block");
      return;
    }

    const cursor = this.cache.getCursor();
    if (latestBlock <= cursor) {
      this.logger.debug({ latestBlock, cursor }, "No new blocks");
      return;
    }

    this.logger.info(
      { latestBlock, latestBlockSeen: cursor },
      "Polling transactions...",
    );
    const batch = await this.blockchain.historicalTransactions(
      cursor + 1,
      latestBlock,
    );
    if (batch === null) {
      this.logger.error(
        { fromBlock: cursor + 1, latestBlock },
        "Could not get transactions",
      );
      return;
    }
    if (this.isStopped()) {
      return;
    }

    const records = this.priceLatestBatch(batch);
    this.cache.commit(records, latestBlock);
    this.logger.info(
      { latestBlockSeen: latestBlock, added: records.length },
      "Transactions committed",
    );
  }

  /**
   * Refresh the cached price when it is more than a day old.
   */
  async refreshPrice(): Promise<void> {
    const now = this.now();
    const current = this.cache.getPrice();
    if (current === null) {
      throw new Error("ETH price has not been initialised");
    }
    if (now <= current.asOf + ONE_DAY_MS) {
      this.logger.debug({ asOf: current.asOf }, "ETH price is current");
      return;
    }

    const series = await this.prices.priceSeries(current.asOf, now);
    if (series === null || series.length === 0) {
      throw new Error("Could not fetch ETH prices");
    }
    if (this.isStopped()) {
      return;
    }

    const latest = series[series.length - 1];
    const asOf = startOfUtcDay(now);
    this.cache.setPrice(latest.price, asOf);
    this.logger.info(
      { price: latest.price, asOf: new Date(asOf).toISOString() },
      "ETH price updated",
    );
  }

  private priceHistoricalBatch(
    batch: RawTransaction[],
    series: PricePoint[],
  ): { records: FeeRecord[]; highestBlock: number } {
    const records: FeeRecord[] = [];
    let highestBlock = 0;
    let skipped = 0;

    for (const raw of batch) {
      let transaction: Transaction;
      try {
        transaction = parseTransaction(raw);
      } catch (error) {
        // History does not change, so retrying the page would fail forever
        if (!(error instanceof DataIntegrityError)) {
          throw error;
        }
        skipped++;
        this.logger.error(
          { error: errorDetails(error) },
          "Skipping invalid transaction during backfill",
        );
        continue;
      }

      highestBlock = Math.max(highestBlock, transaction.blockNumber);
      if (this.cache.has(transaction.hash)) {
        continue;
      }

      const point = findPriceAt(series, transaction.timestamp * 1000);
      if (!point) {
        throw new StalePriceError("No ETH price available", null, transaction.hash);
      }
      records.push({
        hash: transaction.hash,
        feeUsd: computeFeeUsd(transaction, point.price),
      });
    }

    if (skipped > 0) {
      this.logger.warn({ skipped }, "Backfill batch contained invalid transactions");
    }
    return { records, highestBlock };
  }

  private nextBackfillCursor(
    cursor: number,
    latestBlock: number,
    highestBlock: number,
    pageLength: number,
  ): number {
    if (highestBlock > cursor) {
      return Math.min(highestBlock, latestBlock);
    }
    // A short page that stays inside the cursor block ends the history
    if (pageLength < this.blockchain.pageSize) {
      return latestBlock;
    }
    this.logger.error(
      { block: cursor, pageSize: this.blockchain.pageSize },
      "Block holds more transfers than one page, remaining transfers are skipped",
    );
    return cursor + 1;
  }

  // Throws on the first invalid or unpriceable transaction
  private priceLatestBatch(batch: RawTransaction[]): FeeRecord[] {
    const price = this.cache.getPrice();

    return batch.map((raw) => {
      const transaction = parseTransaction(raw);
      if (price === null) {
        throw new StalePriceError("No ETH price available", null, transaction.hash);
      }
      if (transaction.timestamp * 1000 - price.asOf > ONE_DAY_MS) {
        throw new StalePriceError(
          `Stale ETH price: price as of ${new Date(price.asOf).toISOString()} cannot price transaction ${transaction.hash} at ${new Date(transaction.timestamp * 1000).toISOString()}`,
          price.asOf,
          transaction.hash,
        );
      }
      return {
        hash: transaction.hash,
        feeUsd: computeFeeUsd(transaction, price.price),
      };
    });
  }

  private async fetchUntilPresent<T>(
    fetch: () => Promise<T | null>,
    what: string,
  ): Promise<T | null> {
    while (true) {
      const value = await fetch();
      if (this.isStopped()) {
        return null;
      }
      if (value !== null) {
        return value;
      }

      this.logger.warn(
        { retryInMs: this.pollIntervalMs },
        `Could not fetch ${what} for backfill, retrying`,
      );
      await this.sleep(this.pollIntervalMs);
      if (this.isStopped()) {
        return null;
      }
    }
  }

  private schedulePoll(delayMs: number): void {
    if (this.isStopped()) {
      return;
    }
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      this.pollTransactions()
        .catch((error) => {
          this.logger.error(
            { error: errorDetails(error) },
            "Unable to poll transactions",
          );
        })
        .finally(() => this.schedulePoll(this.pollIntervalMs));
    }, delayMs);
    this.pollTimer.unref();
  }

  private schedulePriceRefresh(): void {
    if (this.isStopped()) {
      return;
    }
    const delayMs = msUntilNextUtcMidnight(this.now()) + PRICE_REFRESH_OFFSET_MS;
    this.priceTimer = setTimeout(() => {
      this.priceTimer = null;
      this.refreshPrice()
        .catch((error) => {
          this.logger.error(
            { error: errorDetails(error) },
            "Unable to get ETH prices",
          );
        })
        .finally(() => this.schedulePriceRefresh());
    }, delayMs);
    this.priceTimer.unref();
  }

  private isStopped(): boolean {
    return this.state === "stopped";
  }
}
