import { FeeCache } from "../cache/feeCache";

export interface ReadinessProbe {
  isReady(): boolean;
}

/**
 * Read side of the fee tracker. Never touches the network: every answer
 * comes from the in-memory cache filled by FeeReconciliationService.
 */
export class TransactionFeeService {
  private cache: FeeCache;
  private readiness: ReadinessProbe;

  constructor(cache: FeeCache, readiness: ReadinessProbe) {
    this.cache = cache;
    this.readiness = readiness;
  }

  /**
   * USD fee paid by a pool transaction, or null when the hash is missing,
   * the backfill has not finished, or the transaction is unknown.
   */
  getTransactionFee(transactionHash: string | null | undefined): number | null {
    if (transactionHash === null || transactionHash === undefined) {
      return null;
    }
    if (!this.readiness.isReady()) {
      return null;
    }
    return this.cache.get(transactionHash) ?? null;
  }
}
