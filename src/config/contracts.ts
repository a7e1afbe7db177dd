/**
 * Addresses of the tracked pool on Ethereum mainnet.
 *
 * Fees are tracked for every transaction that moved WETH in or out of the
 * Uniswap V3 USDC/WETH 0.05% pool, as reported by the indexer's token
 * transfer listing.
 */
export const TRACKED_POOL = {
  chainId: 1,
  name: "Uniswap V3 USDC/WETH 0.05%",
  poolAddress: "0x88e6A0c2dDD26FEEb64F039a2c41296FcB3f5640",
  tokenAddress: "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2",
} as const;

export type TrackedPool = typeof TRACKED_POOL;

// Gas is paid in ETH; every fee is converted with this kline symbol by default
export const DEFAULT_PRICE_SYMBOL = "ETHUSDT";

// First day of the pool's history (the pool was deployed in May 2021)
export const DEFAULT_BACKFILL_START_DATE = "2021-05-01";
