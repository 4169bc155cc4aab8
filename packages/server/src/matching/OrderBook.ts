import type { Order, OrderBookSnapshot, OrderListSort } from "@icodex/shared";

import { DuplicateIdError, InsufficientAmountError, InvalidAmountError, NotFoundError, NotOwnerError } from "../errors.js";

const cloneOrder = (order: Order): Order => ({ ...order });

const byPrice = (a: Order, b: Order) => a.price - b.price;

/**
 * Live sell orders of every ICO, each market kept in insertion order.
 * Order ids are unique across all markets. Orders handed out are copies.
 */
export class OrderBook {
  private readonly markets = new Map<string, Order[]>();
  // orderId -> icoId for every live order
  private readonly ids = new Map<string, string>();

  public static fromSnapshot(snapshot: OrderBookSnapshot) {
    const book = new OrderBook();
    book.restore(snapshot);
    return book;
  }

  public get size() {
    return this.ids.size;
  }

  public getIcoIds() {
    return Array.from(this.markets.keys());
  }

  public has(orderId: string) {
    return this.ids.has(orderId);
  }

  public find(icoId: string, orderId: string): Order | undefined {
    const order = this.locate(icoId, orderId)?.order;
    return order ? cloneOrder(order) : undefined;
  }

  public insert(order: Order) {
    if (this.ids.has(order.orderId)) {
      throw new DuplicateIdError(order.orderId);
    }

    let market = this.markets.get(order.icoId);
    if (!market) {
      market = [];
      this.markets.set(order.icoId, market);
    }

    market.push(cloneOrder(order));
    this.ids.set(order.orderId, order.icoId);
  }

  public remove(icoId: string, orderId: string, owner: string): Order {
    const located = this.locate(icoId, orderId);
    if (!located) {
      throw new NotFoundError(icoId, orderId);
    }
    if (located.order.owner !== owner) {
      throw new NotOwnerError(orderId, owner);
    }

    this.detach(icoId, located.index);
    return cloneOrder(located.order);
  }

  /**
   * Subtracts `delta` from the order's amount and drops the order once nothing
   * is left. Returns the post-state; a removed order comes back with amount 0.
   */
  public reduce(icoId: string, orderId: string, delta: number): Order {
    const located = this.locate(icoId, orderId);
    if (!located) {
      throw new NotFoundError(icoId, orderId);
    }
    if (!Number.isSafeInteger(delta) || delta <= 0) {
      throw new InvalidAmountError(delta);
    }

    const { order, index } = located;
    if (delta > order.amount) {
      throw new InsufficientAmountError(orderId, order.amount, delta);
    }

    order.amount -= delta;
    if (order.amount === 0) {
      this.detach(icoId, index);
    }

    return cloneOrder(order);
  }

  public list(icoId: string, limit: number, sort: OrderListSort = "insertion"): Order[] {
    const market = this.markets.get(icoId);
    if (!market || limit <= 0) {
      return [];
    }

    // Array.prototype.sort is stable, so equal prices keep insertion order
    const ordered = sort === "price" ? [...market].sort(byPrice) : market;
    return ordered.slice(0, limit).map(cloneOrder);
  }

  public totalAmount(icoId: string) {
    return (this.markets.get(icoId) ?? []).reduce((sum, order) => sum + order.amount, 0);
  }

  public snapshot(): OrderBookSnapshot {
    // fromEntries defines own keys, so an id like "__proto__" stays a market
    return Object.fromEntries([...this.markets].map(([icoId, orders]) => [icoId, orders.map(cloneOrder)]));
  }

  /**
   * Replaces the whole content with `snapshot`. Duplicate ids in the snapshot
   * raise DuplicateIdError and leave the book empty.
   */
  public restore(snapshot: OrderBookSnapshot) {
    this.markets.clear();
    this.ids.clear();
    try {
      for (const orders of Object.values(snapshot)) {
        orders.forEach((order) => this.insert(order));
      }
    } catch (error) {
      this.markets.clear();
      this.ids.clear();
      throw error;
    }
  }

  private locate(icoId: string, orderId: string) {
    const market = this.markets.get(icoId);
    if (!market) {
      return undefined;
    }
    const index = market.findIndex((entry) => entry.orderId === orderId);
    if (index === -1) {
      return undefined;
    }
    return { order: market[index], index };
  }

  private detach(icoId: string, index: number) {
    const market = this.markets.get(icoId);
    if (!market) {
      return;
    }
    const [removed] = market.splice(index, 1);
    if (removed) {
      this.ids.delete(removed.orderId);
    }
    if (market.length === 0) {
      this.markets.delete(icoId);
    }
  }
}
