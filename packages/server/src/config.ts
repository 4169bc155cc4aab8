import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import type { OrderListSort } from "@icodex/shared";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const envFile = process.env.ENV_FILE;

const candidateEnvPaths = envFile
  ? [envFile]
  : [
      resolve(process.cwd(), ".env"),
      resolve(__dirname, "../.env"),
      resolve(__dirname, "../../.env"),
      resolve(__dirname, "../../../.env"),
    ];

candidateEnvPaths.forEach((candidate) => {
  if (existsSync(candidate)) {
    loadEnv({ path: candidate, override: false });
  }
});

const envSchema = z.object({
  PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  ORDER_BOOK_FILE: z.string().optional(),
  RPC_ENDPOINT: z.string().url().optional(),
  RPC_TIMEOUT_MS: z.string().optional(),
  ORDER_LIST_SORT: z.enum(["insertion", "price"]).optional(),
  SERVICE_NAME: z.string().optional(),
  FRONTEND_URL: z.string().optional(),
});

const parsed = envSchema.parse(process.env);

const isTestEnvironment = process.env.NODE_ENV === "test";

const parseIntOr = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }
  const parsedValue = Number.parseInt(value, 10);
  return Number.isNaN(parsedValue) ? fallback : parsedValue;
};

type Config = {
  port: number;
  logLevel?: string;
  orderBookFile: string;
  rpcEndpoint: string;
  rpcTimeoutMs: number;
  orderListSort: OrderListSort;
  serviceName: string;
  frontendUrl?: string;
  isTestEnvironment: boolean;
};

export const config: Config = {
  port: parseIntOr(parsed.PORT, 4000),
  logLevel: parsed.LOG_LEVEL,
  orderBookFile: resolve(process.cwd(), parsed.ORDER_BOOK_FILE ?? "data/order_book.json"),
  rpcEndpoint: parsed.RPC_ENDPOINT ?? "http://localhost:8899",
  rpcTimeoutMs: Math.max(parseIntOr(parsed.RPC_TIMEOUT_MS, 10_000), 100),
  orderListSort: parsed.ORDER_LIST_SORT ?? "insertion",
  serviceName: parsed.SERVICE_NAME ?? "icodex",
  frontendUrl: parsed.FRONTEND_URL,
  isTestEnvironment,
};
