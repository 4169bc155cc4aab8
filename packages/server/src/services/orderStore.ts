import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import type { OrderBookFile, OrderBookSnapshot } from "@icodex/shared";
import { z } from "zod";

import { CorruptStateError, DuplicateIdError, PersistenceError, describeError } from "../errors.js";
import { logger } from "../logger.js";
import { OrderBook } from "../matching/OrderBook.js";

const storedOrderSchema = z.object({
  order_id: z.string().min(1),
  owner: z.string().min(1),
  amount: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  price: z.number().positive().finite(),
  created_at: z.number().finite(),
});

// validated as entries: a zod record drops a "__proto__" key
const orderBookEntriesSchema = z.array(z.tuple([z.string().min(1), z.array(storedOrderSchema)]));

export interface OrderStore {
  load(): Promise<OrderBook>;
  save(book: OrderBook): Promise<void>;
}

export const toFileLayout = (snapshot: OrderBookSnapshot): OrderBookFile =>
  Object.fromEntries(
    Object.entries(snapshot).map(([icoId, orders]) => [
      icoId,
      orders.map((order) => ({
        order_id: order.orderId,
        owner: order.owner,
        amount: order.amount,
        price: order.price,
        created_at: order.createdAt,
      })),
    ]),
  );

export const fromFileLayout = (file: OrderBookFile): OrderBookSnapshot =>
  Object.fromEntries(
    Object.entries(file).map(([icoId, records]) => [
      icoId,
      records.map((record) => ({
        orderId: record.order_id,
        icoId,
        owner: record.owner,
        amount: record.amount,
        price: record.price,
        createdAt: record.created_at,
      })),
    ]),
  );

// entry paths start with [entryIndex, 0 | 1]; report them by ico id instead
const describeIssue = (entries: [string, unknown][], issue: z.ZodIssue) => {
  const [index, , ...rest] = issue.path;
  const icoId = typeof index === "number" ? entries[index]?.[0] : undefined;
  const path = [icoId ?? String(index), ...rest].join(".");
  return `${path}: ${issue.message}`;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Keeps the whole book in one JSON file. Saves go to a temporary sibling that
 * is fsynced and renamed over the canonical file, so a crash leaves either the
 * previous or the new content, never a truncated file.
 */
export class JsonFileOrderStore implements OrderStore {
  public constructor(private readonly filePath: string) {}

  public async load(): Promise<OrderBook> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        logger.info({ file: this.filePath }, "Order book file not found, starting with an empty book");
        return new OrderBook();
      }
      throw new PersistenceError(`Failed to read order book ${this.filePath}: ${describeError(error)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError(`Order book ${this.filePath} is not valid JSON`, { file: this.filePath }, error);
    }

    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new CorruptStateError(`Order book ${this.filePath} has an invalid layout`, { file: this.filePath });
    }

    const entries = Object.entries(data);
    const parsed = orderBookEntriesSchema.safeParse(entries);
    if (!parsed.success) {
      throw new CorruptStateError(
        `Order book ${this.filePath} has an invalid layout`,
        { file: this.filePath, issues: parsed.error.issues.map((issue) => describeIssue(entries, issue)) },
        parsed.error,
      );
    }

    try {
      const book = OrderBook.fromSnapshot(fromFileLayout(Object.fromEntries(parsed.data)));
      logger.info({ file: this.filePath, orders: book.size, icos: book.getIcoIds().length }, "Loaded order book");
      return book;
    } catch (error) {
      if (error instanceof DuplicateIdError) {
        throw new CorruptStateError(`Order book ${this.filePath} contains duplicate order ids`, { file: this.filePath }, error);
      }
      throw error;
    }
  }

  public async save(book: OrderBook): Promise<void> {
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`);
    const payload = `${JSON.stringify(toFileLayout(book.snapshot()), null, 2)}\n`;

    try {
      await mkdir(directory, { recursive: true });
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(payload, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (error) {
      await this.discard(tempPath);
      throw new PersistenceError(`Failed to save order book ${this.filePath}: ${describeError(error)}`, error);
    }

    await this.syncDirectory(directory);
    logger.debug({ file: this.filePath, orders: book.size }, "Saved order book");
  }

  private async discard(tempPath: string) {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      logger.warn({ err: error, file: tempPath }, "Failed to remove temporary order book file");
    }
  }

  /**
   * Makes the rename itself durable. Best effort: some platforms and file
   * systems cannot open or fsync a directory, and by this point the new file
   * is already in place, so a failure is logged rather than thrown. On those
   * platforms a power loss right after a save may bring back the previous file.
   */
  private async syncDirectory(directory: string) {
    try {
      const handle = await open(directory, "r");
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      logger.warn({ err: error, directory }, "Could not fsync order book directory");
    }
  }
}
