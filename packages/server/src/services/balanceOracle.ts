export const LAMPORTS_PER_SOL = 1_000_000_000;

export type Asset = { kind: "native" } | { kind: "token"; mint: string; decimals: number };

export const NATIVE_ASSET: Asset = { kind: "native" };

/**
 * Answers whether a principal holds at least `amount` of an asset, in the
 * asset's base units (lamports for native SOL). Implementations must throw
 * when the ledger cannot be reached rather than answer `true`.
 */
export interface BalanceOracle {
  hasBalance(principal: string, asset: Asset, amount: number): Promise<boolean>;
}

export const describeAsset = (asset: Asset) => (asset.kind === "native" ? "native" : asset.mint);
