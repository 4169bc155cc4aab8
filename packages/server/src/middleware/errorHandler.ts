import type { DexErrorKind, ErrorResponse } from "@icodex/shared";
import type { NextFunction, Request, Response } from "express";

import { isDexError } from "../errors.js";
import { withCorrelation } from "../logger.js";

const statusByKind: Record<DexErrorKind, number> = {
  validation: 400,
  invalid_amount: 400,
  not_owner: 403,
  not_found: 404,
  duplicate_id: 409,
  insufficient_amount: 422,
  insufficient_liquidity: 422,
  insufficient_funds: 422,
  insufficient_asset: 422,
  oracle_unavailable: 503,
  persistence: 500,
  corrupt_state: 500,
};

export const statusForKind = (kind: DexErrorKind) => statusByKind[kind];

const isMalformedJson = (error: unknown) =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const log = withCorrelation(req.correlationId);

  if (isDexError(error)) {
    const body: ErrorResponse = { status: "error", kind: error.kind, message: error.message };
    if (error.details) {
      body.details = error.details;
    }
    return res.status(statusForKind(error.kind)).json(body);
  }

  if (isMalformedJson(error)) {
    const body: ErrorResponse = { status: "error", kind: "validation", message: "Request body is not valid JSON" };
    return res.status(400).json(body);
  }

  log.error({ err: error, path: req.originalUrl }, "Unhandled request error");
  const body: ErrorResponse = { status: "error", kind: "internal", message: "Internal server error" };
  return res.status(500).json(body);
};
