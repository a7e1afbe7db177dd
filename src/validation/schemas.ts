import { z } from "zod";

/**
 * Schemas for upstream API responses.
 * Anything that fails these is treated as a transient upstream failure.
 */

// GET ?module=block&action=getblocknobytime -> { result: "17000000" }
export const LatestBlockResponseSchema = z.object({
  result: z.union([
    z.string().regex(/^\d+$/, "result must be a block number"),
    z.number().int().nonnegative(),
  ]),
});

const NumericField = z.union([z.string(), z.number()]).nullish();

// Gas and hash fields stay loose here: their integrity is checked when the
// transaction is priced, where a bad value must fail the whole poll cycle.
export const RawTransactionSchema = z.object({
  hash: z.string().nullish(),
  blockNumber: NumericField,
  timeStamp: NumericField,
  gasPrice: NumericField,
  gasUsed: NumericField,
});

export type RawTransaction = z.infer<typeof RawTransactionSchema>;

// The indexer reports errors (rate limits, bad keys) as a string result,
// which fails the array check.
export const TokenTransfersResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  result: z.array(RawTransactionSchema),
});

// Kline rows: [openTime, open, high, low, close, volume, closeTime, ...]
export const KlineSchema = z
  .tuple([z.number().int(), z.coerce.number().finite()])
  .rest(z.unknown());

export const KlinesResponseSchema = z.array(KlineSchema);

// A repeated parameter resolves to its first value
export const TransactionFeeQuerySchema = z.object({
  txn_hash: z
    .union([z.string(), z.array(z.string()).nonempty()])
    .transform((value) => (Array.isArray(value) ? value[0] : value)),
});
