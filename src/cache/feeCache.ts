/**
 * Fee Cache for the pool fee tracker
 *
 * Holds the computed USD fee of every tracked transaction together with the
 * polling cursor and the price state the fees are derived from. Entries are
 * never evicted; the cache is rebuilt from history on every start.
 *
 * Every method is synchronous, so each mutation completes without yielding
 * to the event loop and readers never see a partially applied batch.
 */

import { FeeRecord, PriceState } from "../types/FeeTracker";

export class FeeCache {
  private fees: Map<string, number> = new Map();
  private latestBlockSeen = 0;
  private priceState: PriceState | null = null;

  private normalize(hash: string): string {
    return hash.toLowerCase();
  }

  put(hash: string, feeUsd: number): void {
    this.fees.set(this.normalize(hash), feeUsd);
  }

  has(hash: string): boolean {
    return this.fees.has(this.normalize(hash));
  }

  /**
   * Look up a fee. Returns undefined for a missing hash, for a cold cache
   * (cursor still at 0) and for unknown transactions.
   */
  get(hash: string | null | undefined): number | undefined {
    if (hash === null || hash === undefined || this.latestBlockSeen === 0) {
      return undefined;
    }
    return this.fees.get(this.normalize(hash));
  }

  /**
   * Apply a fully validated batch and move the cursor in one step.
   */
  commit(records: FeeRecord[], latestBlock: number): void {
    for (const record of records) {
      this.put(record.hash, record.feeUsd);
    }
    this.advanceCursor(latestBlock);
  }

  getCursor(): number {
    return this.latestBlockSeen;
  }

  /** The cursor only moves forward; a lower block is ignored. */
  advanceCursor(block: number): void {
    if (block > this.latestBlockSeen) {
      this.latestBlockSeen = block;
    }
  }

  getPrice(): PriceState | null {
    return this.priceState;
  }

  setPrice(price: number, asOf: number): void {
    this.priceState = { price, asOf };
  }

  get size(): number {
    return this.fees.size;
  }
}
