import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { OracleUnavailableError, PersistenceError } from "../errors.js";
import { OrderBook } from "../matching/OrderBook.js";
import type { Asset, BalanceOracle } from "../services/balanceOracle.js";
import type { OrderStore } from "../services/orderStore.js";

const pad = (prefix: string) => prefix.padEnd(44, "1");

export const SELLER = pad("Se11erAccount");
export const BUYER = pad("BuyerAccount");
export const STRANGER = pad("StrangerAccount");
export const MINT = pad("TokenMint");

export interface BalanceCall {
  principal: string;
  asset: Asset;
  amount: number;
}

/**
 * In-process BalanceOracle. Balances are keyed by principal and asset
 * ("native" or the mint); unknown entries hold nothing.
 */
export class FakeBalanceOracle implements BalanceOracle {
  public readonly calls: BalanceCall[] = [];
  private readonly balances = new Map<string, number>();
  private failure?: Error;
  private gate?: Promise<void>;

  public setBalance(principal: string, asset: "native" | string, amount: number) {
    this.balances.set(`${principal}:${asset}`, amount);
    return this;
  }

  public failWith(error: Error) {
    this.failure = error;
    return this;
  }

  // answers are held back until the returned release function is called
  public hold() {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = undefined;
      release();
    };
  }

  public async hasBalance(principal: string, asset: Asset, amount: number) {
    this.calls.push({ principal, asset, amount });
    if (this.gate) {
      await this.gate;
    }
    if (this.failure) {
      throw this.failure;
    }
    const key = `${principal}:${asset.kind === "native" ? "native" : asset.mint}`;
    return (this.balances.get(key) ?? 0) >= amount;
  }
}

export const fundedOracle = () =>
  new FakeBalanceOracle().setBalance(BUYER, "native", 1_000_000_000_000).setBalance(SELLER, MINT, 1_000_000);

export const unreachableOracle = () => new FakeBalanceOracle().failWith(new OracleUnavailableError("RPC getBalance failed: connect ECONNREFUSED"));

/**
 * OrderStore kept in memory. `failNextSave` makes the next save throw.
 */
export class MemoryOrderStore implements OrderStore {
  public saves = 0;
  private saved = new OrderBook().snapshot();
  private failures = 0;

  public failNextSave(times = 1) {
    this.failures = times;
  }

  public async load() {
    return OrderBook.fromSnapshot(this.saved);
  }

  public async save(book: OrderBook) {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new PersistenceError("Failed to save order book memory: ENOSPC: no space left on device");
    }
    this.saves += 1;
    this.saved = book.snapshot();
  }
}

export const createTempDir = async () => {
  const dir = await mkdtemp(join(tmpdir(), "icodex-"));
  return {
    dir,
    file: (name: string) => join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
};
