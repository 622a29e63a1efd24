import type { TradeReason } from "./trade_reasons.js";

export type TokenLifecycleState = "discovered" | "held" | "disposed";

export type DiscoverySource = "pumpfun" | "profile" | "boost" | "whitelist" | "manual";

export type TokenMeta = {
  mint: string;
  source: DiscoverySource;
  discoveredAt: number;
  symbol?: string;
};

export type Position = {
  mint: string;
  entryPrice: number;
  notionalSol: number;
  currentPrice: number;
  peakPrice: number;
  priceHistory: number[];
  trailingStopArmed: boolean;
  openedAt: number;
  lastUpdateAt: number;
  unrealizedPnlPct: number;
  volatility: number;
};

export type RugUrgency = "low" | "medium" | "high";

export type RugReason =
  | "extreme_price_drop"
  | "volume_collapse"
  | "repeated_sharp_drops"
  | "liquidity_removal";

export type RugAnalysis = {
  isRugPull: boolean;
  confidence: number;
  urgency: RugUrgency;
  reasons: RugReason[];
};

export type MarketState = "trending" | "choppy" | "unknown";

export type ExitRecommendation = {
  shouldExit: boolean;
  reason: string;
};

export type TradeAction = "buy" | "sell";

export type TradeIntent = {
  mint: string;
  action: TradeAction;
  forced: boolean;
  reason: TradeReason;
  referencePrice: number;
  sizeMultiplier: number;
  detail?: string;
};

export type SwapResult = {
  mint: string;
  action: TradeAction;
  success: boolean;
  executedPrice: number;
  signature: string | null;
  attempts: number;
  failureReason?: string;
};

export type MarketTick = {
  price: number;
  volume: number;
  /** Pool quote-side reserves, when the source reports them. */
  liquidity?: number;
};
