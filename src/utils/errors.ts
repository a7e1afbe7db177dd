/**
 * Raised when an upstream record cannot be priced: a missing hash, gas
 * fields that are not integers, or a price that cannot be trusted for it.
 * Aborts the current poll cycle without advancing the cursor.
 */
export class DataIntegrityError extends Error {
  code: string = "DATA_INTEGRITY";
  transactionHash?: string;

  constructor(message: string, transactionHash?: string) {
    super(message);
    this.name = "DataIntegrityError";
    this.transactionHash = transactionHash;
  }
}

export class StalePriceError extends DataIntegrityError {
  code = "STALE_PRICE";
  priceAsOf: number | null;

  constructor(
    message: string,
    priceAsOf: number | null,
    transactionHash?: string,
  ) {
    super(message, transactionHash);
    this.name = "StalePriceError";
    this.priceAsOf = priceAsOf;
  }
}

/**
 * Loggable summary of an unknown thrown value. Keeps request configs (and
 * the API keys inside them) out of the logs.
 */
export function errorDetails(
  error: unknown,
): { message: string; name?: string; code?: string } {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { message: error.message, name: error.name, code };
  }
  return { message: String(error) };
}
