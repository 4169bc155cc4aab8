import type { FillResult, Order } from "@icodex/shared";

import {
  InsufficientAssetError,
  InsufficientFundsError,
  InsufficientLiquidityError,
  InvalidAmountError,
  NotFoundError,
  OracleUnavailableError,
  describeError,
  isDexError,
} from "../errors.js";
import { type BalanceOracle, LAMPORTS_PER_SOL, NATIVE_ASSET } from "../services/balanceOracle.js";
import type { OrderBook } from "./OrderBook.js";

export interface ExecuteRequest {
  icoId: string;
  orderId: string;
  buyer: string;
  amount: number;
  tokenMint: string;
  tokenDecimals: number;
}

export interface FillPlan {
  request: ExecuteRequest;
  order: Order;
  quoteLamports: number;
}

/**
 * SOL cost of `amount` base units at `price` SOL per whole token, rounded up
 * to the next lamport.
 */
export const quoteLamports = (amount: number, price: number, tokenDecimals: number) =>
  Math.ceil((amount / 10 ** tokenDecimals) * price * LAMPORTS_PER_SOL);

/**
 * Validates buy requests against resting orders. Holds no state: the book and
 * the oracle are passed in on every call. A rejection at any step leaves the
 * book untouched; the only mutation is the reduction in `commit`.
 */
export class MatchEngine {
  public plan(book: OrderBook, request: ExecuteRequest): FillPlan {
    const order = book.find(request.icoId, request.orderId);
    if (!order) {
      throw new NotFoundError(request.icoId, request.orderId);
    }
    if (!Number.isSafeInteger(request.amount) || request.amount <= 0) {
      throw new InvalidAmountError(request.amount);
    }
    if (request.amount > order.amount) {
      throw new InsufficientLiquidityError(order.orderId, order.amount, request.amount);
    }

    const quote = quoteLamports(request.amount, order.price, request.tokenDecimals);
    if (!Number.isSafeInteger(quote)) {
      throw new InvalidAmountError(
        request.amount,
        `Cost of ${request.amount} units at price ${order.price} exceeds the largest representable lamport amount`,
      );
    }

    return { request, order, quoteLamports: quote };
  }

  /**
   * Advisory balance check. The buyer must hold the SOL cost and the seller
   * the tokens; no transfer happens here.
   */
  public async precheck(plan: FillPlan, oracle: BalanceOracle): Promise<void> {
    const { request, order } = plan;
    const tokenAsset = { kind: "token" as const, mint: request.tokenMint, decimals: request.tokenDecimals };

    let buyerFunded: boolean;
    let sellerFunded: boolean;
    try {
      [buyerFunded, sellerFunded] = await Promise.all([
        oracle.hasBalance(request.buyer, NATIVE_ASSET, plan.quoteLamports),
        oracle.hasBalance(order.owner, tokenAsset, request.amount),
      ]);
    } catch (error) {
      if (error instanceof OracleUnavailableError) {
        throw error;
      }
      throw new OracleUnavailableError(`Balance oracle failed: ${describeError(error)}`, error);
    }

    if (!buyerFunded) {
      throw new InsufficientFundsError(request.buyer, plan.quoteLamports);
    }
    if (!sellerFunded) {
      throw new InsufficientAssetError(order.owner, request.tokenMint, request.amount);
    }
  }

  /**
   * Applies a checked plan. The plan is rebuilt against the current book first,
   * since the order may have been filled or cancelled while the oracle answered.
   */
  public commit(book: OrderBook, plan: FillPlan): FillResult {
    const current = this.plan(book, plan.request);
    const after = book.reduce(current.request.icoId, current.order.orderId, current.request.amount);

    return {
      orderId: after.orderId,
      filledAmount: current.request.amount,
      remainingAmount: after.amount,
      price: after.price,
      seller: after.owner,
      buyer: current.request.buyer,
      quoteLamports: current.quoteLamports,
    };
  }

  public async execute(book: OrderBook, request: ExecuteRequest, oracle: BalanceOracle): Promise<FillResult> {
    const plan = this.plan(book, request);
    await this.precheck(plan, oracle);
    return this.commit(book, plan);
  }
}

export const isBusinessRejection = (error: unknown) =>
  isDexError(error) && error.kind !== "persistence" && error.kind !== "corrupt_state" && error.kind !== "oracle_unavailable";
