import { EtherscanClient } from "../EtherscanClient";
import { TRACKED_POOL } from "../../config/contracts";
import { createStubHttp, StubReply } from "../../__tests__/utils/stubHttp";
import { createMockLogger } from "../../__tests__/utils/mockLogger";
import { rawTransaction } from "../../__tests__/utils/fixtures";

const NOW = Date.UTC(2024, 0, 1, 12);
const URL = "https://indexer.test/api";

function createClient(replies: StubReply[]) {
  const stub = createStubHttp(replies);
  const client = new EtherscanClient(createMockLogger(), {
    url: URL,
    apiKey: "test-key",
    pageSize: 500,
    timeoutMs: 1000,
    http: stub.http,
    now: () => NOW,
  });
  return { client, stub };
}

describe("EtherscanClient", () => {
  describe("latestBlock", () => {
    it("should query the block closest before now", async () => {
      const { client, stub } = createClient([{ data: { result: "19000000" } }]);

      const latestBlock = await client.latestBlock();

      expect(latestBlock).toBe(19000000);
      expect(stub.requests).toEqual([
        {
          url: URL,
          params: {
            module: "block",
            action: "getblocknobytime",
            timestamp: String(NOW / 1000),
            closest: "before",
            apikey: "test-key",
          },
        },
      ]);
    });

    it("should accept a numeric result", async () => {
      const { client } = createClient([{ data: { result: 100 } }]);

      await expect(client.latestBlock()).resolves.toBe(100);
    });

    it.each([
      ["a null result", { data: { result: null } }],
      ["a missing result", { data: { status: "0" } }],
      ["an error message result", { data: { result: "Max rate limit reached" } }],
      ["a non-object body", { data: "<html>bad gateway</html>" }],
      ["an HTTP error", { status: 502, data: {} }],
      ["a network error", new Error("socket hang up")],
    ])("should return null for %s", async (_label, reply) => {
      const { client, stub } = createClient([reply]);

      await expect(client.latestBlock()).resolves.toBeNull();
      expect(stub.requests).toHaveLength(1);
    });
  });

  describe("historicalTransactions", () => {
    it("should request one ascending page of pool transfers in the block range", async () => {
      const transfers = [
        rawTransaction({ hash: "0xaa", blockNumber: "101" }),
        rawTransaction({ hash: "0xbb", blockNumber: "102" }),
      ];
      const { client, stub } = createClient([{ data: { status: "1", result: transfers } }]);

      const result = await client.historicalTransactions(101, 200);

      expect(result).toEqual(transfers);
      expect(stub.requests[0].params).toEqual({
        module: "account",
        action: "tokentx",
        contractaddress: TRACKED_POOL.tokenAddress,
        address: TRACKED_POOL.poolAddress,
        offset: 500,
        page: 1,
        sort: "asc",
        startblock: 101,
        endblock: 200,
        apikey: "test-key",
      });
    });

    it("should leave out endblock when no upper bound is given", async () => {
      const { client, stub } = createClient([{ data: { result: [] } }]);

      await expect(client.historicalTransactions(0)).resolves.toEqual([]);
      expect(stub.requests[0].params).not.toHaveProperty("endblock");
      expect(stub.requests[0].params.startblock).toBe(0);
    });

    it("should pass through records with a null hash for the caller to reject", async () => {
      const { client } = createClient([
        { data: { result: [rawTransaction({ hash: null })] } },
      ]);

      const result = await client.historicalTransactions(1, 2);

      expect(result).toEqual([rawTransaction({ hash: null })]);
    });

    it.each([
      ["a rate limit message", { data: { status: "0", result: "Max rate limit reached" } }],
      ["a missing result", { data: { message: "NOTOK" } }],
      ["a network error", new Error("ECONNRESET")],
    ])("should return null for %s", async (_label, reply) => {
      const { client } = createClient([reply]);

      await expect(client.historicalTransactions(1, 2)).resolves.toBeNull();
    });
  });
});
