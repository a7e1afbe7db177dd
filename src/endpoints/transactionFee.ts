import { Request, Response } from "express";
import Logger from "bunyan";
import { TransactionFeeService } from "../services/TransactionFeeService";
import { TransactionFeeQuerySchema } from "../validation/schemas";

export const TRANSACTION_HASH_PARAM = "txn_hash";

export interface TransactionFeeResponse {
  message: number;
}

export interface TransactionFeeErrorResponse {
  error: string;
}

/**
 * @swagger
 * /transaction_fee:
 *   get:
 *     tags: [Fees]
 *     summary: Get the USD fee paid by a pool transaction
 *     description: |
 *       Returns the gas fee, in USD, paid by a transaction that interacted with
 *       the tracked pool. The fee is gasPrice × gasUsed converted from wei to
 *       ETH and priced with the ETH/USDT daily candle in effect at the time.
 *
 *       Answers come from an in-memory cache; transactions are reported as not
 *       found until the startup backfill has finished.
 *     parameters:
 *       - in: query
 *         name: txn_hash
 *         required: true
 *         schema:
 *           type: string
 *         description: Transaction hash (case-insensitive)
 *     responses:
 *       200:
 *         description: Fee found
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message:
 *                   type: number
 *                   description: Fee in USD
 *             example:
 *               message: 4.2
 *       400:
 *         description: Missing parameter, or transaction not found
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 error:
 *                   type: string
 *             example:
 *               error: "Missing parameter txn_hash"
 */
export function createTransactionFeeHandler(
  feeService: TransactionFeeService,
  logger: Logger,
) {
  return function handleTransactionFee(req: Request, res: Response): void {
    const requestIdHeader = req.headers["x-request-id"];
    const requestId =
      typeof requestIdHeader === "string"
        ? requestIdHeader
        : `transaction-fee-${Date.now()}`;
    const log = logger.child({ requestId, endpoint: "transactionFee" });

    const query = TransactionFeeQuerySchema.safeParse(req.query);
    if (!query.success) {
      log.debug({ query: req.query }, "Transaction fee request without hash");
      res.status(400).json({
        error: `Missing parameter ${TRANSACTION_HASH_PARAM}`,
      } satisfies TransactionFeeErrorResponse);
      return;
    }

    const transactionHash = query.data.txn_hash;
    const fee = feeService.getTransactionFee(transactionHash);
    if (fee === null) {
      log.debug({ transactionHash }, "Transaction fee not found");
      res.status(400).json({
        error: `${TRANSACTION_HASH_PARAM}=${transactionHash} not found. This is not a valid transaction.`,
      } satisfies TransactionFeeErrorResponse);
      return;
    }

    log.debug({ transactionHash, fee }, "Transaction fee found");
    res.status(200).json({ message: fee } satisfies TransactionFeeResponse);
  };
}
