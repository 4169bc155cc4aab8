import { describe, expect, it } from "vitest";

import {
  InsufficientAssetError,
  InsufficientFundsError,
  InsufficientLiquidityError,
  InvalidAmountError,
  NotFoundError,
  OracleUnavailableError,
} from "../../errors.js";
import { BUYER, FakeBalanceOracle, MINT, SELLER, fundedOracle } from "../../test-helpers/testUtils.js";
import { MatchEngine, quoteLamports } from "../MatchEngine.js";
import { OrderBook } from "../OrderBook.js";

const createBook = () => {
  const book = new OrderBook();
  book.insert({ orderId: "order-a", icoId: "X", owner: SELLER, amount: 100, price: 1.5, createdAt: 1 });
  return book;
};

const request = (amount: number) => ({
  icoId: "X",
  orderId: "order-a",
  buyer: BUYER,
  amount,
  tokenMint: MINT,
  tokenDecimals: 0,
});

describe("quoteLamports", () => {
  it("scales by token decimals and rounds up to a whole lamport", () => {
    expect(quoteLamports(40, 1.5, 0)).toBe(60_000_000_000);
    expect(quoteLamports(2_500_000, 0.5, 6)).toBe(1_250_000_000);
    expect(quoteLamports(1, 0.25, 9)).toBe(1);
  });
});

describe("MatchEngine", () => {
  it("fills part of an order and reports both parties", async () => {
    const book = createBook();
    const fill = await new MatchEngine().execute(book, request(40), fundedOracle());

    expect(fill).toEqual({
      orderId: "order-a",
      filledAmount: 40,
      remainingAmount: 60,
      price: 1.5,
      seller: SELLER,
      buyer: BUYER,
      quoteLamports: 60_000_000_000,
    });
    expect(book.find("X", "order-a")?.amount).toBe(60);
  });

  it("removes a fully filled order", async () => {
    const book = createBook();
    const fill = await new MatchEngine().execute(book, request(100), fundedOracle());

    expect(fill.remainingAmount).toBe(0);
    expect(book.list("X", 10)).toEqual([]);
  });

  it("asks the oracle for the buyer's SOL and the seller's tokens", async () => {
    const oracle = fundedOracle();
    await new MatchEngine().execute(createBook(), request(40), oracle);

    expect(oracle.calls).toEqual([
      { principal: BUYER, asset: { kind: "native" }, amount: 60_000_000_000 },
      { principal: SELLER, asset: { kind: "token", mint: MINT, decimals: 0 }, amount: 40 },
    ]);
  });

  it("rejects over-fills without touching the order", async () => {
    const book = createBook();
    const oracle = fundedOracle();

    await expect(new MatchEngine().execute(book, request(101), oracle)).rejects.toBeInstanceOf(InsufficientLiquidityError);
    expect(book.find("X", "order-a")?.amount).toBe(100);
    expect(oracle.calls).toEqual([]);
  });

  it("rejects non-positive and fractional amounts", async () => {
    const engine = new MatchEngine();
    const book = createBook();

    expect(() => engine.plan(book, request(0))).toThrow(InvalidAmountError);
    expect(() => engine.plan(book, request(-3))).toThrow(InvalidAmountError);
    expect(() => engine.plan(book, request(1.5))).toThrow(InvalidAmountError);
  });

  it("rejects a fill whose lamport cost is not a safe integer", async () => {
    const engine = new MatchEngine();
    const oracle = fundedOracle();
    const book = new OrderBook();
    book.insert({ orderId: "order-a", icoId: "X", owner: SELLER, amount: 100, price: 1e300, createdAt: 1 });
    book.insert({ orderId: "order-b", icoId: "X", owner: SELLER, amount: 1e9, price: 1e7, createdAt: 2 });

    await expect(engine.execute(book, request(10), oracle)).rejects.toMatchObject({
      kind: "invalid_amount",
      message: "Cost of 10 units at price 1e+300 exceeds the largest representable lamport amount",
    });
    expect(() => engine.plan(book, { ...request(1e9), orderId: "order-b" })).toThrow(InvalidAmountError);
    expect(oracle.calls).toEqual([]);
    expect(book.find("X", "order-a")?.amount).toBe(100);
  });

  it("looks the order up before checking the amount", () => {
    const engine = new MatchEngine();
    expect(() => engine.plan(createBook(), { ...request(0), orderId: "missing" })).toThrow(NotFoundError);
  });

  it("rejects a buyer without enough SOL", async () => {
    const book = createBook();
    const oracle = new FakeBalanceOracle().setBalance(BUYER, "native", 59_999_999_999).setBalance(SELLER, MINT, 1_000);

    await expect(new MatchEngine().execute(book, request(40), oracle)).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(book.find("X", "order-a")?.amount).toBe(100);
  });

  it("rejects a seller who no longer holds the tokens", async () => {
    const book = createBook();
    const oracle = new FakeBalanceOracle().setBalance(BUYER, "native", 60_000_000_000).setBalance(SELLER, MINT, 39);

    await expect(new MatchEngine().execute(book, request(40), oracle)).rejects.toBeInstanceOf(InsufficientAssetError);
    expect(book.find("X", "order-a")?.amount).toBe(100);
  });

  it("fails closed when the oracle throws", async () => {
    const book = createBook();
    const oracle = new FakeBalanceOracle().failWith(new Error("socket hang up"));

    const failure = new MatchEngine().execute(book, request(40), oracle);
    await expect(failure).rejects.toBeInstanceOf(OracleUnavailableError);
    await expect(failure).rejects.toThrow("Balance oracle failed: socket hang up");
    expect(book.find("X", "order-a")?.amount).toBe(100);
  });

  it("re-validates at commit time against the current book", async () => {
    const engine = new MatchEngine();
    const book = createBook();
    const plan = engine.plan(book, request(70));
    await engine.precheck(plan, fundedOracle());

    book.reduce("X", "order-a", 40);

    expect(() => engine.commit(book, plan)).toThrow(InsufficientLiquidityError);
    expect(book.find("X", "order-a")?.amount).toBe(60);
  });
});
