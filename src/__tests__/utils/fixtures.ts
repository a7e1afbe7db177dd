import { RawTransaction } from "../../validation/schemas";

export const ONE_ETH_WEI = "1000000000000000000";

export function rawTransaction(
  overrides: Partial<RawTransaction> = {},
): RawTransaction {
  return {
    hash: "0xabc123",
    blockNumber: "100",
    timeStamp: "1704067200",
    gasPrice: "100",
    gasUsed: ONE_ETH_WEI,
    ...overrides,
  };
}

/** Kline row as returned by the price API: open time, then open price as a string */
export function kline(openTime: number, price: string): unknown[] {
  return [openTime, price, price, price, price, "1000.0", openTime + 86_399_999];
}
