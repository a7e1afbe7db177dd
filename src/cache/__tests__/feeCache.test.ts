import { FeeCache } from "../feeCache";

describe("FeeCache", () => {
  let cache: FeeCache;

  beforeEach(() => {
    cache = new FeeCache();
  });

  it("should return undefined for every hash while the cursor is 0", () => {
    cache.put("0x12345", 10);

    expect(cache.get("0x12345")).toBeUndefined();
    expect(cache.get("0xother")).toBeUndefined();
  });

  it("should return undefined for a null or undefined hash", () => {
    cache.commit([{ hash: "0x12345", feeUsd: 10 }], 100);

    expect(cache.get(null)).toBeUndefined();
    expect(cache.get(undefined)).toBeUndefined();
  });

  it("should look up hashes case-insensitively", () => {
    cache.commit([{ hash: "0xABCDE", feeUsd: 12.5 }], 100);
    cache.put("0xfedcb", 3);

    expect(cache.get("0xabcde")).toBe(12.5);
    expect(cache.get("0xFEDCB")).toBe(3);
    expect(cache.has("0xAbCdE")).toBe(true);
  });

  it("should return undefined for unknown hashes once warm", () => {
    cache.commit([{ hash: "0x12345", feeUsd: 1 }], 100);

    expect(cache.get("wrong_hash")).toBeUndefined();
  });

  it("should apply a batch and its cursor together", () => {
    cache.commit(
      [
        { hash: "0xaa", feeUsd: 1 },
        { hash: "0xbb", feeUsd: 2 },
      ],
      250,
    );

    expect(cache.getCursor()).toBe(250);
    expect(cache.size).toBe(2);
    expect(cache.get("0xbb")).toBe(2);
  });

  it("should never move the cursor backwards", () => {
    cache.advanceCursor(300);
    cache.advanceCursor(200);
    cache.commit([], 250);

    expect(cache.getCursor()).toBe(300);
  });

  it("should store the price and its timestamp as one pair", () => {
    expect(cache.getPrice()).toBeNull();

    cache.setPrice(2500.5, 1704067200000);

    expect(cache.getPrice()).toEqual({ price: 2500.5, asOf: 1704067200000 });
  });
});
