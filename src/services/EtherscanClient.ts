import axios, { AxiosInstance } from "axios";
import Logger from "bunyan";
import { TRACKED_POOL } from "../config/contracts";
import {
  LatestBlockResponseSchema,
  RawTransaction,
  TokenTransfersResponseSchema,
} from "../validation/schemas";
import { errorDetails } from "../utils/errors";

type QueryParams = Record<string, string | number>;

export interface BlockchainClient {
  /** Most transfers a single historicalTransactions call returns */
  readonly pageSize: number;
  latestBlock(): Promise<number | null>;
  historicalTransactions(
    fromBlock: number,
    toBlock?: number,
  ): Promise<RawTransaction[] | null>;
}

export interface EtherscanClientOptions {
  url: string;
  apiKey: string;
  /** Transfers returned per request; larger bursts are truncated */
  pageSize: number;
  timeoutMs: number;
  poolAddress?: string;
  tokenAddress?: string;
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * EtherscanClient - block height and pool transfer lookups
 *
 * Upstream failures never throw: a failed request or a body without a usable
 * `result` is logged and reported as null so the caller can retry on its
 * next cycle.
 */
export class EtherscanClient implements BlockchainClient {
  private logger: Logger;
  private http: AxiosInstance;
  private readonly url: string;
  private readonly apiKey: string;
  readonly pageSize: number;
  private readonly poolAddress: string;
  private readonly tokenAddress: string;
  private readonly now: () => number;

  constructor(logger: Logger, options: EtherscanClientOptions) {
    this.logger = logger.child({ service: "EtherscanClient" });
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.pageSize = options.pageSize;
    this.poolAddress = options.poolAddress ?? TRACKED_POOL.poolAddress;
    this.tokenAddress = options.tokenAddress ?? TRACKED_POOL.tokenAddress;
    this.now = options.now ?? Date.now;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });

    this.logger.info(
      { url: this.url, pool: this.poolAddress, pageSize: this.pageSize },
      "EtherscanClient created",
    );
  }

  /**
   * Number of the last block mined at or before the current time.
   */
  async latestBlock(): Promise<number | null> {
    const body = await this.request({
      module: "block",
      action: "getblocknobytime",
      timestamp: String(Math.floor(this.now() / 1000)),
      closest: "before",
    });
    if (body === undefined) {
      return null;
    }

    const parsed = LatestBlockResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ body }, "Latest block response has no usable result");
      return null;
    }

    const latestBlock = Number(parsed.data.result);
    this.logger.info({ latestBlock }, "Latest block");
    return latestBlock;
  }

  /**
   * Pool token transfers from `fromBlock` (inclusive) up to `toBlock`
   * (inclusive, when given), oldest first. One page only.
   */
  async historicalTransactions(
    fromBlock: number,
    toBlock?: number,
  ): Promise<RawTransaction[] | null> {
    const params: QueryParams = {
      module: "account",
      action: "tokentx",
      contractaddress: this.tokenAddress,
      address: this.poolAddress,
      offset: this.pageSize,
      page: 1,
      sort: "asc",
      startblock: fromBlock,
    };
    if (toBlock !== undefined) {
      params.endblock = toBlock;
    }

    const body = await this.request(params);
    if (body === undefined) {
      return null;
    }

    const parsed = TokenTransfersResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn(
        { fromBlock, toBlock, body },
        "Token transfer response has no transaction list",
      );
      return null;
    }

    const transactions = parsed.data.result;
    if (transactions.length >= this.pageSize) {
      this.logger.debug(
        { fromBlock, toBlock, count: transactions.length },
        "Token transfer page is full",
      );
    }
    return transactions;
  }

  // Resolves to undefined on any transport or HTTP error
  private async request(params: QueryParams): Promise<unknown> {
    this.logger.info({ params }, "Making Etherscan request");
    try {
      const response = await this.http.get<unknown>(this.url, {
        params: { ...params, apikey: this.apiKey },
      });
      return response.data ?? undefined;
    } catch (error) {
      this.logger.error(
        { params, error: errorDetails(error) },
        "Etherscan request failed",
      );
      return undefined;
    }
  }
}
