import type { TokenMeta, MarketTick } from "./types.js";

export type Quote = {
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string;
  /** SOL per whole token, derived from the quoted amounts. */
  price: number;
  fetchedAt: number;
  raw: unknown;
};

export type UnsignedSwap = {
  /** Base64 serialized versioned transaction. */
  transaction: string;
  lastValidBlockHeight: number;
};

export type TokenHolding = {
  mint: string;
  amountBaseUnits: bigint;
  decimals: number;
};

export interface Signer {
  readonly publicKey: string;
  signAndSubmit(unsigned: UnsignedSwap): Promise<string>;
}

export interface MarketDataPort {
  balance(owner: string): Promise<number>;
  holdings(owner: string): Promise<Map<string, TokenHolding>>;
  quote(inputMint: string, outputMint: string, amountBaseUnits: bigint): Promise<Quote>;
  buildSwap(quote: Quote, owner: string): Promise<UnsignedSwap>;
  tick(mint: string): Promise<MarketTick>;
  priceHistory?(mint: string): Promise<number[]>;
}

export interface DiscoveryFeed {
  poll(): Promise<TokenMeta[]>;
}

export type ModelAction = "buy" | "sell" | "hold";

export type ModelScoreRequest = {
  mint: string;
  prices: number[];
  volume: number;
  held: boolean;
  unrealizedPnlPct: number | null;
};

export type ModelScore = {
  action: ModelAction;
  confidence: number;
  reasoning?: string;
};

export interface ModelScorer {
  score(request: ModelScoreRequest): Promise<ModelScore>;
}
