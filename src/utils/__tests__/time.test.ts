import { ONE_DAY_MS, msUntilNextUtcMidnight, startOfUtcDay } from "../time";

describe("time utilities", () => {
  it("should truncate a timestamp to 00:00 UTC", () => {
    expect(startOfUtcDay(Date.UTC(2024, 0, 15, 13, 45, 12, 7))).toBe(
      Date.UTC(2024, 0, 15),
    );
  });

  it("should leave a midnight timestamp unchanged", () => {
    expect(startOfUtcDay(Date.UTC(2024, 0, 15))).toBe(Date.UTC(2024, 0, 15));
  });

  it("should count the time left until the next UTC midnight", () => {
    expect(msUntilNextUtcMidnight(Date.UTC(2024, 0, 15, 23))).toBe(3_600_000);
  });

  it("should wait a whole day when called exactly at midnight", () => {
    expect(msUntilNextUtcMidnight(Date.UTC(2024, 0, 15))).toBe(ONE_DAY_MS);
  });
});
