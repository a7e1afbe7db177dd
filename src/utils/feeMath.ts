import { BigNumber, utils } from "ethers";
import { RawTransaction } from "../validation/schemas";
import { PricePoint, Transaction } from "../types/FeeTracker";
import { DataIntegrityError } from "./errors";

type NumericInput = RawTransaction["gasPrice"];

function parseGasField(
  value: NumericInput,
  field: string,
  hash: string,
): BigNumber {
  if (value === null || value === undefined) {
    throw new DataIntegrityError(`Transaction ${hash} has no ${field}`, hash);
  }
  try {
    return BigNumber.from(value);
  } catch {
    throw new DataIntegrityError(
      `Transaction ${hash} has non-integer ${field}: ${value}`,
      hash,
    );
  }
}

function parseSafeInteger(
  value: NumericInput,
  field: string,
  hash: string,
): number {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (
    typeof parsed !== "number" ||
    (typeof value === "string" && value.trim() === "") ||
    !Number.isSafeInteger(parsed)
  ) {
    throw new DataIntegrityError(
      `Transaction ${hash} has invalid ${field}: ${value}`,
      hash,
    );
  }
  return parsed;
}

/**
 * Validate a raw indexer record. The hash is checked first so that a
 * record without one is rejected whatever its gas fields hold.
 */
export function parseTransaction(raw: RawTransaction): Transaction {
  if (raw.hash === null || raw.hash === undefined) {
    throw new DataIntegrityError("Transaction hash found to be null");
  }
  const hash = raw.hash.toLowerCase();

  return {
    hash,
    gasPrice: parseGasField(raw.gasPrice, "gasPrice", hash),
    gasUsed: parseGasField(raw.gasUsed, "gasUsed", hash),
    blockNumber: parseSafeInteger(raw.blockNumber, "blockNumber", hash),
    timestamp: parseSafeInteger(raw.timeStamp, "timeStamp", hash),
  };
}

/** gasPrice × gasUsed in ETH, computed on integers before converting from wei */
export function gasFeeEth(gasPrice: BigNumber, gasUsed: BigNumber): number {
  return parseFloat(utils.formatEther(gasPrice.mul(gasUsed)));
}

export function computeFeeUsd(
  transaction: Pick<Transaction, "gasPrice" | "gasUsed">,
  priceUsd: number,
): number {
  return gasFeeEth(transaction.gasPrice, transaction.gasUsed) * priceUsd;
}

/**
 * Price in effect at `timestampMs`: the last point whose timestamp is not
 * after it. Series must be ascending. A timestamp before the first point
 * falls back to the first point; an empty series yields undefined.
 */
export function findPriceAt(
  series: PricePoint[],
  timestampMs: number,
): PricePoint | undefined {
  if (series.length === 0) {
    return undefined;
  }

  let low = 0;
  let high = series.length - 1;
  let match = -1;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    if (series[mid].timestamp <= timestampMs) {
      match = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return series[match === -1 ? 0 : match];
}
