export interface Order {
  orderId: string;
  icoId: string;
  owner: string; // base58 public key of the seller
  amount: number; // remaining base units
  price: number; // SOL per whole token
  createdAt: number;
}

export type OrderListSort = "insertion" | "price";

// ico_id -> live orders, insertion order
export type OrderBookSnapshot = Record<string, Order[]>;

export interface StoredOrderRecord {
  order_id: string;
  owner: string;
  amount: number;
  price: number;
  created_at: number;
}

export type OrderBookFile = Record<string, StoredOrderRecord[]>;

// Shape of a request as it arrives from a transport, before validation
export type Untrusted<T> = { [K in keyof T]?: unknown };

export interface CreateOrderRequest {
  ico_id: string;
  amount: number;
  price: number;
  owner: string;
}

export interface CancelOrderRequest {
  ico_id: string;
  order_id: string;
  owner: string;
}

export interface ExecuteOrderRequest {
  ico_id: string;
  order_id: string;
  buyer: string;
  amount: number;
  token_mint_address: string;
  token_decimals: number;
}

export interface GetOrdersRequest {
  ico_id: string;
  limit?: number;
}

export interface CreateOrderResult {
  orderId: string;
}

export interface CancelOrderResult {
  cancelled: true;
  orderId: string;
}

export interface FillResult {
  orderId: string;
  filledAmount: number;
  remainingAmount: number;
  price: number;
  seller: string;
  buyer: string;
  quoteLamports: number;
}

export interface GetOrdersResult {
  icoId: string;
  orders: Order[];
}

export type DexErrorKind =
  | "validation"
  | "not_found"
  | "not_owner"
  | "duplicate_id"
  | "invalid_amount"
  | "insufficient_amount"
  | "insufficient_liquidity"
  | "insufficient_funds"
  | "insufficient_asset"
  | "oracle_unavailable"
  | "persistence"
  | "corrupt_state";

export interface ErrorResponse {
  status: "error";
  kind: DexErrorKind | "internal";
  message: string;
  details?: Record<string, unknown>;
}
