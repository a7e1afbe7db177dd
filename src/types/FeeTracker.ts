import { BigNumber } from "ethers";

export interface PricePoint {
  /** Candle open time, unix ms */
  timestamp: number;
  /** USD price of one ETH */
  price: number;
}

export interface PriceState {
  price: number;
  /** Unix ms the price is valid as of */
  asOf: number;
}

export interface Transaction {
  hash: string;
  /** Wei per unit of gas */
  gasPrice: BigNumber;
  gasUsed: BigNumber;
  blockNumber: number;
  /** Unix seconds */
  timestamp: number;
}

export interface FeeRecord {
  hash: string;
  feeUsd: number;
}

export type EngineState = "idle" | "backfilling" | "steady" | "stopped";

export interface EngineStatus {
  state: EngineState;
  latestBlockSeen: number;
  trackedTransactions: number;
  latestPrice: number | null;
  latestPriceAsOf: string | null;
}
