import { randomUUID } from "node:crypto";

import type {
  CancelOrderRequest,
  CancelOrderResult,
  CreateOrderRequest,
  CreateOrderResult,
  ExecuteOrderRequest,
  FillResult,
  GetOrdersRequest,
  GetOrdersResult,
  Order,
  OrderListSort,
  Untrusted,
} from "@icodex/shared";
import type { Logger } from "pino";
import { z } from "zod";

import { ValidationError, isDexError } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import { MatchEngine, isBusinessRejection } from "../matching/MatchEngine.js";
import type { OrderBook } from "../matching/OrderBook.js";
import { orderOperationCounter, restingOrdersGauge } from "../metrics/registry.js";
import type { BalanceOracle } from "./balanceOracle.js";
import type { OrderStore } from "./orderStore.js";
import { SerialExecutor } from "./serialExecutor.js";

export const DEFAULT_LIST_LIMIT = 100;

const BASE58_PUBKEY = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

const icoIdSchema = z.string().trim().min(1, "ico_id must not be empty").max(128);
const pubkeySchema = (field: string) => z.string().regex(BASE58_PUBKEY, `Invalid ${field} public key format`);
const orderIdSchema = z.string().trim().min(1, "order_id must not be empty");
const baseUnitsSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const createOrderSchema = z.object({
  ico_id: icoIdSchema,
  amount: baseUnitsSchema,
  price: z.number().positive().finite(),
  owner: pubkeySchema("owner"),
});

const cancelOrderSchema = z.object({
  ico_id: icoIdSchema,
  order_id: orderIdSchema,
  owner: pubkeySchema("owner"),
});

const executeOrderSchema = z.object({
  ico_id: icoIdSchema,
  order_id: orderIdSchema,
  buyer: pubkeySchema("buyer"),
  amount: baseUnitsSchema,
  token_mint_address: pubkeySchema("token mint"),
  token_decimals: z.number().int().min(0).max(255),
});

const getOrdersSchema = z.object({
  ico_id: icoIdSchema,
  limit: z.number().int().optional(),
});

const validate = <T>(schema: z.ZodType<T>, input: unknown, operation: string): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid ${operation} request`, issues);
  }
  return parsed.data;
};

export interface OperationGatewayOptions {
  book: OrderBook;
  store: OrderStore;
  oracle: BalanceOracle;
  engine?: MatchEngine;
  listSort?: OrderListSort;
  idFactory?: () => string;
  now?: () => number;
  logger?: Logger;
}

type Operation = "create_order" | "cancel_order" | "execute_order" | "get_orders";

/**
 * The four public order book operations. Each validates its input, then runs
 * inside one exclusive section; a mutation counts as done only once the store
 * has written it, and a failed write restores the previous in-memory book.
 */
export class OperationGateway {
  private readonly book: OrderBook;
  private readonly store: OrderStore;
  private readonly oracle: BalanceOracle;
  private readonly engine: MatchEngine;
  private readonly listSort: OrderListSort;
  private readonly idFactory: () => string;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly executor = new SerialExecutor();

  public constructor(options: OperationGatewayOptions) {
    this.book = options.book;
    this.store = options.store;
    this.oracle = options.oracle;
    this.engine = options.engine ?? new MatchEngine();
    this.listSort = options.listSort ?? "insertion";
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: "gateway" });
  }

  public createOrder(request: Untrusted<CreateOrderRequest>): Promise<CreateOrderResult> {
    return this.track("create_order", async () => {
      const input = validate(createOrderSchema, request, "create_order");
      const order: Order = {
        orderId: this.idFactory(),
        icoId: input.ico_id,
        owner: input.owner,
        amount: input.amount,
        price: input.price,
        createdAt: this.now(),
      };

      await this.executor.run(() => this.mutate(() => this.book.insert(order)));
      this.log.info({ icoId: order.icoId, orderId: order.orderId, amount: order.amount, price: order.price, owner: order.owner }, "Created order");
      return { orderId: order.orderId };
    });
  }

  public cancelOrder(request: Untrusted<CancelOrderRequest>): Promise<CancelOrderResult> {
    return this.track("cancel_order", async () => {
      const input = validate(cancelOrderSchema, request, "cancel_order");
      const removed = await this.executor.run(() =>
        this.mutate(() => this.book.remove(input.ico_id, input.order_id, input.owner)),
      );
      this.log.info({ icoId: removed.icoId, orderId: removed.orderId, owner: removed.owner }, "Cancelled order");
      return { cancelled: true, orderId: removed.orderId };
    });
  }

  public executeOrder(request: Untrusted<ExecuteOrderRequest>): Promise<FillResult> {
    return this.track("execute_order", async () => {
      const input = validate(executeOrderSchema, request, "execute_order");
      const executeRequest = {
        icoId: input.ico_id,
        orderId: input.order_id,
        buyer: input.buyer,
        amount: input.amount,
        tokenMint: input.token_mint_address,
        tokenDecimals: input.token_decimals,
      };

      const plan = await this.executor.run(() => this.engine.plan(this.book, executeRequest));
      // the oracle round-trip happens outside the section; commit re-validates
      await this.engine.precheck(plan, this.oracle);
      const fill = await this.executor.run(() => this.mutate(() => this.engine.commit(this.book, plan)));

      this.log.info(
        { icoId: input.ico_id, orderId: fill.orderId, buyer: fill.buyer, filled: fill.filledAmount, remaining: fill.remainingAmount },
        "Executed order; settlement left to the parties",
      );
      return fill;
    });
  }

  public getOrders(request: Untrusted<GetOrdersRequest>): Promise<GetOrdersResult> {
    return this.track("get_orders", async () => {
      const input = validate(getOrdersSchema, request, "get_orders");
      const limit = input.limit ?? DEFAULT_LIST_LIMIT;
      const orders = await this.executor.run(() => this.book.list(input.ico_id, limit, this.listSort));
      return { icoId: input.ico_id, orders };
    });
  }

  private async mutate<T>(apply: () => T): Promise<T> {
    const before = this.book.snapshot();
    const result = apply();
    try {
      await this.store.save(this.book);
    } catch (error) {
      this.book.restore(before);
      this.log.error({ err: error }, "Persisting order book failed; rolled back in-memory change");
      throw error;
    }
    this.refreshGauge(before);
    return result;
  }

  private refreshGauge(before: Record<string, Order[]>) {
    const icoIds = new Set([...Object.keys(before), ...this.book.getIcoIds()]);
    icoIds.forEach((icoId) => {
      restingOrdersGauge.set({ ico_id: icoId }, this.book.list(icoId, Number.MAX_SAFE_INTEGER).length);
    });
  }

  private async track<T>(operation: Operation, run: () => Promise<T>): Promise<T> {
    try {
      const result = await run();
      orderOperationCounter.inc({ operation, result: "ok" });
      return result;
    } catch (error) {
      const kind = isDexError(error) ? error.kind : "internal";
      orderOperationCounter.inc({ operation, result: kind });
      if (isBusinessRejection(error)) {
        this.log.info({ operation, kind, reason: error instanceof Error ? error.message : undefined }, "Request rejected");
      } else {
        this.log.error({ operation, err: error }, "Operation failed");
      }
      throw error;
    }
  }
}
