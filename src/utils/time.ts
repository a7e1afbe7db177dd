export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export function startOfUtcDay(timestampMs: number): number {
  return timestampMs - (((timestampMs % ONE_DAY_MS) + ONE_DAY_MS) % ONE_DAY_MS);
}

export function msUntilNextUtcMidnight(timestampMs: number): number {
  return startOfUtcDay(timestampMs) + ONE_DAY_MS - timestampMs;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
