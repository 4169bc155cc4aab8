import type { FillResult, Order } from "@icodex/shared";
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";

import { withCorrelation } from "../logger.js";
import type { OperationGateway } from "../services/operationGateway.js";

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

const asyncHandler =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const bodyOf = (req: Request): Record<string, unknown> =>
  typeof req.body === "object" && req.body !== null && !Array.isArray(req.body) ? req.body : {};

const parseLimit = (value: unknown) => {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === "string" && value.trim() !== "" ? Number(value) : Number.NaN;
};

export const serializeOrder = (order: Order) => ({
  order_id: order.orderId,
  ico_id: order.icoId,
  owner: order.owner,
  amount: order.amount,
  price: order.price,
  created_at: order.createdAt,
});

export const serializeFill = (fill: FillResult) => ({
  filled_amount: fill.filledAmount,
  remaining_amount: fill.remainingAmount,
  order_id: fill.orderId,
  price: fill.price,
  seller: fill.seller,
  buyer: fill.buyer,
  quote_lamports: fill.quoteLamports,
});

export const createOrderRouter = (gateway: OperationGateway) => {
  const router = Router();

  router.post(
    "/:icoId/orders",
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const result = await gateway.createOrder({
        ico_id: req.params.icoId,
        amount: body.amount,
        price: body.price,
        owner: body.owner,
      });
      withCorrelation(req.correlationId).info({ orderId: result.orderId }, "create_order handled");
      return res.status(201).json({ order_id: result.orderId });
    }),
  );

  router.post(
    "/:icoId/orders/:orderId/cancel",
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const result = await gateway.cancelOrder({
        ico_id: req.params.icoId,
        order_id: req.params.orderId,
        owner: body.owner,
      });
      return res.json({ cancelled: result.cancelled, order_id: result.orderId });
    }),
  );

  router.post(
    "/:icoId/orders/:orderId/execute",
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const fill = await gateway.executeOrder({
        ico_id: req.params.icoId,
        order_id: req.params.orderId,
        buyer: body.buyer,
        amount: body.amount,
        token_mint_address: body.token_mint_address,
        token_decimals: body.token_decimals,
      });
      return res.json(serializeFill(fill));
    }),
  );

  router.get(
    "/:icoId/orders",
    asyncHandler(async (req, res) => {
      const result = await gateway.getOrders({
        ico_id: req.params.icoId,
        limit: parseLimit(req.query.limit),
      });
      return res.json({ ico_id: result.icoId, orders: result.orders.map(serializeOrder) });
    }),
  );

  return router;
};
