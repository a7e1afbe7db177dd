import { Request, Response } from "express";
import { createTransactionFeeHandler } from "../transactionFee";
import { TransactionFeeService } from "../../services/TransactionFeeService";
import { FeeCache } from "../../cache/feeCache";
import { createMockLogger } from "../../__tests__/utils/mockLogger";

interface MockResponse {
  statusCode: number;
  body: unknown;
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
}

function createMockResponse(): MockResponse {
  return {
    statusCode: 0,
    body: undefined,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(body: unknown) {
      this.body = body;
      return this;
    },
  };
}

function createMockRequest(query: Record<string, unknown>): Request {
  return { headers: {}, query } as unknown as Request;
}

describe("transaction fee endpoint", () => {
  const cache = new FeeCache();
  cache.commit([{ hash: "0xABCDE", feeUsd: 12.75 }], 100);
  const feeService = new TransactionFeeService(cache, { isReady: () => true });
  const handle = createTransactionFeeHandler(feeService, createMockLogger());

  function call(query: Record<string, unknown>): MockResponse {
    const res = createMockResponse();
    handle(createMockRequest(query), res as unknown as Response);
    return res;
  }

  it("should return the fee for a known transaction", () => {
    const res = call({ txn_hash: "0xabcde" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ message: 12.75 });
  });

  it("should reject a request without the hash parameter", () => {
    const res = call({});

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "Missing parameter txn_hash" });
  });

  it("should use the first value of a repeated hash parameter", () => {
    const res = call({ txn_hash: ["0xabcde", "0x12345"] });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ message: 12.75 });
  });

  it("should reject an empty list of hashes as missing", () => {
    const res = call({ txn_hash: [] });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "Missing parameter txn_hash" });
  });

  it("should report unknown transactions as not found", () => {
    const res = call({ txn_hash: "0xdead" });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: "txn_hash=0xdead not found. This is not a valid transaction.",
    });
  });

  it("should report every transaction as not found before the backfill finishes", () => {
    const coldHandle = createTransactionFeeHandler(
      new TransactionFeeService(cache, { isReady: () => false }),
      createMockLogger(),
    );
    const res = createMockResponse();

    coldHandle(createMockRequest({ txn_hash: "0xABCDE" }), res as unknown as Response);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: "txn_hash=0xABCDE not found. This is not a valid transaction.",
    });
  });
});
