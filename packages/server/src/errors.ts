import type { DexErrorKind } from "@icodex/shared";

/**
 * Base class for every rejection the order book reports.
 * `kind` is the stable discriminant callers branch on; `message` is for humans.
 */
export class DexError extends Error {
  constructor(
    public readonly kind: DexErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DexError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed request. Raised by the gateway before any state is read.
 */
export class ValidationError extends DexError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super("validation", message, issues.length > 0 ? { issues } : undefined);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DexError {
  constructor(icoId: string, orderId: string) {
    super("not_found", `Order ${orderId} not found for ICO ${icoId}`, { icoId, orderId });
    this.name = "NotFoundError";
  }
}

export class NotOwnerError extends DexError {
  constructor(orderId: string, caller: string) {
    super("not_owner", `${caller} is not the owner of order ${orderId}`, { orderId, caller });
    this.name = "NotOwnerError";
  }
}

export class DuplicateIdError extends DexError {
  constructor(orderId: string) {
    super("duplicate_id", `Order id ${orderId} already exists`, { orderId });
    this.name = "DuplicateIdError";
  }
}

export class InvalidAmountError extends DexError {
  constructor(amount: number, message = `Amount must be a positive integer, got ${amount}`) {
    super("invalid_amount", message, { amount });
    this.name = "InvalidAmountError";
  }
}

export class InsufficientAmountError extends DexError {
  constructor(orderId: string, available: number, requested: number) {
    super("insufficient_amount", `Cannot reduce order ${orderId} by ${requested}; only ${available} remaining`, {
      orderId,
      available,
      requested,
    });
    this.name = "InsufficientAmountError";
  }
}

export class InsufficientLiquidityError extends DexError {
  constructor(orderId: string, available: number, requested: number) {
    super(
      "insufficient_liquidity",
      `Not enough tokens available in order ${orderId}. Available: ${available}, Requested: ${requested}`,
      { orderId, available, requested },
    );
    this.name = "InsufficientLiquidityError";
  }
}

export class InsufficientFundsError extends DexError {
  constructor(buyer: string, requiredLamports: number) {
    super("insufficient_funds", `Buyer ${buyer} does not hold ${requiredLamports} lamports`, {
      buyer,
      requiredLamports,
    });
    this.name = "InsufficientFundsError";
  }
}

export class InsufficientAssetError extends DexError {
  constructor(seller: string, mint: string, amount: number) {
    super("insufficient_asset", `Seller ${seller} does not hold ${amount} base units of ${mint}`, {
      seller,
      mint,
      amount,
    });
    this.name = "InsufficientAssetError";
  }
}

/**
 * The balance ledger could not answer. Nothing was mutated; the call may be retried.
 */
export class OracleUnavailableError extends DexError {
  constructor(message: string, cause?: unknown) {
    super("oracle_unavailable", message, undefined, { cause });
    this.name = "OracleUnavailableError";
  }
}

export class PersistenceError extends DexError {
  constructor(message: string, cause?: unknown) {
    super("persistence", message, undefined, { cause });
    this.name = "PersistenceError";
  }
}

export class CorruptStateError extends DexError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("corrupt_state", message, details, { cause });
    this.name = "CorruptStateError";
  }
}

export const isDexError = (value: unknown): value is DexError => value instanceof DexError;

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
