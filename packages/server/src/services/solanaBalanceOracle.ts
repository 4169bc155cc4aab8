import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import { OracleUnavailableError, describeError } from "../errors.js";
import { logger } from "../logger.js";
import { oracleRequestDuration } from "../metrics/registry.js";
import { type Asset, type BalanceOracle, describeAsset } from "./balanceOracle.js";

const rpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

const rpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string()]),
  result: z.unknown().optional(),
  error: rpcErrorSchema.optional(),
});

const balanceResultSchema = z.object({
  context: z.object({ slot: z.number() }).passthrough(),
  value: z.number().int().nonnegative(),
});

const tokenAccountsResultSchema = z.object({
  context: z.object({ slot: z.number() }).passthrough(),
  value: z.array(
    z.object({
      pubkey: z.string(),
      account: z.object({
        data: z.object({
          parsed: z.object({
            info: z.object({
              mint: z.string(),
              tokenAmount: z.object({
                amount: z.string().regex(/^\d+$/),
                decimals: z.number().int(),
              }),
            }),
          }),
        }),
      }),
    }),
  ),
});

export interface SolanaBalanceOracleOptions {
  endpoint: string;
  timeoutMs: number;
  commitment?: "processed" | "confirmed" | "finalized";
  http?: AxiosInstance;
}

/**
 * BalanceOracle backed by a Solana JSON-RPC node. Native balances come from
 * `getBalance`; token balances sum every account the owner holds for the mint.
 */
export class SolanaBalanceOracle implements BalanceOracle {
  private readonly http: AxiosInstance;
  private readonly commitment: "processed" | "confirmed" | "finalized";
  private nextId = 1;

  public constructor(private readonly options: SolanaBalanceOracleOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
    this.commitment = options.commitment ?? "confirmed";
  }

  public async hasBalance(principal: string, asset: Asset, amount: number): Promise<boolean> {
    const started = performance.now();
    let outcome = "error";
    try {
      const balance = asset.kind === "native" ? await this.getLamports(principal) : await this.getTokenUnits(principal, asset.mint);
      const sufficient = balance >= BigInt(amount);
      outcome = sufficient ? "sufficient" : "insufficient";
      logger.debug({ principal, asset: describeAsset(asset), balance: balance.toString(), amount, sufficient }, "Balance checked");
      return sufficient;
    } finally {
      oracleRequestDuration.observe({ asset: asset.kind, outcome }, (performance.now() - started) / 1000);
    }
  }

  private async getLamports(principal: string) {
    const result = await this.call("getBalance", [principal, { commitment: this.commitment }], balanceResultSchema);
    return BigInt(result.value);
  }

  private async getTokenUnits(principal: string, mint: string) {
    const result = await this.call(
      "getTokenAccountsByOwner",
      [principal, { mint }, { encoding: "jsonParsed", commitment: this.commitment }],
      tokenAccountsResultSchema,
    );
    return result.value.reduce((sum, entry) => sum + BigInt(entry.account.data.parsed.info.tokenAmount.amount), 0n);
  }

  private async call<T>(method: string, params: unknown[], schema: z.ZodType<T>): Promise<T> {
    const id = this.nextId++;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        this.options.endpoint,
        { jsonrpc: "2.0", id, method, params },
        { timeout: this.options.timeoutMs },
      );
      data = response.data;
    } catch (error) {
      logger.warn({ err: error, method }, "Balance oracle request failed");
      throw new OracleUnavailableError(`RPC ${method} failed: ${describeError(error)}`, error);
    }

    const envelope = rpcEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new OracleUnavailableError(`RPC ${method} returned a malformed response`, envelope.error);
    }
    if (envelope.data.error) {
      const { code, message } = envelope.data.error;
      throw new OracleUnavailableError(`RPC ${method} error ${code}: ${message}`);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new OracleUnavailableError(`RPC ${method} returned an unexpected result`, result.error);
    }
    return result.data;
  }
}
