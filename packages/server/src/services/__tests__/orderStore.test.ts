import { readFile, readdir, writeFile } from "node:fs/promises";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CorruptStateError, PersistenceError } from "../../errors.js";
import { OrderBook } from "../../matching/OrderBook.js";
import { createTempDir } from "../../test-helpers/testUtils.js";
import { JsonFileOrderStore } from "../orderStore.js";

const sampleBook = () => {
  const book = new OrderBook();
  book.insert({ orderId: "o-1", icoId: "ICO-A", owner: "seller-1", amount: 100, price: 0.5, createdAt: 1_000 });
  book.insert({ orderId: "o-2", icoId: "ICO-A", owner: "seller-2", amount: 25, price: 0.75, createdAt: 2_000 });
  book.insert({ orderId: "o-3", icoId: "ICO-B", owner: "seller-1", amount: 7, price: 3, createdAt: 3_000 });
  return book;
};

describe("JsonFileOrderStore", () => {
  let temp: Awaited<ReturnType<typeof createTempDir>>;

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("starts from an empty book when no file exists", async () => {
    const store = new JsonFileOrderStore(temp.file("missing.json"));
    const book = await store.load();
    expect(book.size).toBe(0);
  });

  it("writes the ico-keyed layout", async () => {
    const path = temp.file("data/order_book.json");
    await new JsonFileOrderStore(path).save(sampleBook());

    const written = JSON.parse(await readFile(path, "utf8"));
    expect(written).toEqual({
      "ICO-A": [
        { order_id: "o-1", owner: "seller-1", amount: 100, price: 0.5, created_at: 1_000 },
        { order_id: "o-2", owner: "seller-2", amount: 25, price: 0.75, created_at: 2_000 },
      ],
      "ICO-B": [{ order_id: "o-3", owner: "seller-1", amount: 7, price: 3, created_at: 3_000 }],
    });
  });

  it("reloads exactly what it saved", async () => {
    const store = new JsonFileOrderStore(temp.file("book.json"));
    const book = sampleBook();
    book.reduce("ICO-A", "o-1", 40);
    book.remove("ICO-B", "o-3", "seller-1");
    await store.save(book);

    const reloaded = await store.load();
    expect(reloaded.snapshot()).toEqual(book.snapshot());
  });

  it("leaves no temporary files behind", async () => {
    const store = new JsonFileOrderStore(temp.file("book.json"));
    await store.save(sampleBook());
    await store.save(new OrderBook());

    expect(await readdir(temp.dir)).toEqual(["book.json"]);
    expect(JSON.parse(await readFile(temp.file("book.json"), "utf8"))).toEqual({});
  });

  it("fails with PersistenceError when the directory cannot be created", async () => {
    await writeFile(temp.file("blocker"), "not a directory");
    const store = new JsonFileOrderStore(temp.file("blocker/book.json"));

    await expect(store.save(sampleBook())).rejects.toBeInstanceOf(PersistenceError);
  });

  it("keeps the previous content when a save fails", async () => {
    const path = temp.file("book.json");
    const store = new JsonFileOrderStore(path);
    await store.save(sampleBook());
    const before = await readFile(path, "utf8");

    // the existing file sits where this store needs a directory
    const broken = new JsonFileOrderStore(temp.file("book.json/nested.json"));
    await expect(broken.save(new OrderBook())).rejects.toBeInstanceOf(PersistenceError);

    expect(await readFile(path, "utf8")).toBe(before);
  });

  it("refuses a file that is not JSON", async () => {
    const path = temp.file("book.json");
    await writeFile(path, '{"ICO-A": [{"order_id": "o-1"');

    await expect(new JsonFileOrderStore(path).load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  it("refuses records with a non-positive amount", async () => {
    const path = temp.file("book.json");
    await writeFile(
      path,
      JSON.stringify({ "ICO-A": [{ order_id: "o-1", owner: "s", amount: 0, price: 1, created_at: 1 }] }),
    );

    await expect(new JsonFileOrderStore(path).load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  it("loads a market stored under a prototype key", async () => {
    const path = temp.file("book.json");
    await writeFile(path, '{"__proto__": [{"order_id": "o-1", "owner": "s", "amount": 3, "price": 2, "created_at": 5}]}');

    const book = await new JsonFileOrderStore(path).load();
    expect(book.find("__proto__", "o-1")).toEqual({
      orderId: "o-1",
      icoId: "__proto__",
      owner: "s",
      amount: 3,
      price: 2,
      createdAt: 5,
    });
  });

  it("names the market of an invalid record", async () => {
    const path = temp.file("book.json");
    await writeFile(path, JSON.stringify({ "ICO-A": [{ order_id: "o-1", owner: "s", amount: 1.5, price: 1, created_at: 1 }] }));

    await expect(new JsonFileOrderStore(path).load()).rejects.toMatchObject({
      kind: "corrupt_state",
      details: { issues: ["ICO-A.0.amount: Expected integer, received float"] },
    });
  });

  it("refuses a top-level array", async () => {
    const path = temp.file("book.json");
    await writeFile(path, "[]");

    await expect(new JsonFileOrderStore(path).load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  it("refuses duplicate order ids across markets", async () => {
    const path = temp.file("book.json");
    const record = { order_id: "dup", owner: "s", amount: 1, price: 1, created_at: 1 };
    await writeFile(path, JSON.stringify({ "ICO-A": [record], "ICO-B": [record] }));

    const failure = new JsonFileOrderStore(path).load();
    await expect(failure).rejects.toBeInstanceOf(CorruptStateError);
    await expect(failure).rejects.toThrow("contains duplicate order ids");
  });

  it("reports an unreadable path as a persistence failure", async () => {
    // reading a directory fails with EISDIR
    await expect(new JsonFileOrderStore(temp.dir).load()).rejects.toBeInstanceOf(PersistenceError);
  });
});
