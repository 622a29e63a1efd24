import type { MarketState, TokenMeta, TradeIntent, TradeAction } from "../types.js";
import type { ModelScore, ModelScoreRequest } from "../ports.js";
import type { TradeReason } from "../trade_reasons.js";

export type StrategyKind = "oscillator" | "priority" | "model";

export type TokenSnapshot = {
  mint: string;
  /** Observed prices, oldest first. The last entry is the current tick. */
  prices: number[];
  volume: number;
  held: boolean;
  position: { entryPrice: number; unrealizedPnlPct: number } | null;
  marketState: MarketState;
};

export type StrategyEvent =
  | { kind: "discovered"; meta: TokenMeta; snapshot: TokenSnapshot }
  | { kind: "tick"; snapshot: TokenSnapshot };

/** Everything a strategy may consult beyond the snapshot it is handed. */
export interface StrategyRuntime {
  now(): number;
  isWhitelisted(mint: string): boolean;
  heldCount(): number;
  readonly maxConcurrentPositions: number;
  scoreToken(request: ModelScoreRequest): Promise<ModelScore>;
}

export interface TradingStrategy {
  readonly kind: StrategyKind;
  /** When true the orchestrator skips the freshness/rug/trend gate for candidates. */
  readonly bypassValidation: boolean;
  decide(event: StrategyEvent, runtime: StrategyRuntime): Promise<TradeIntent | null>;
}

export function strategyIntent(
  snapshot: TokenSnapshot,
  action: TradeAction,
  reason: TradeReason,
  detail?: string
): TradeIntent {
  return {
    mint: snapshot.mint,
    action,
    forced: false,
    reason,
    referencePrice: snapshot.prices[snapshot.prices.length - 1] ?? 0,
    sizeMultiplier: 1,
    detail,
  };
}

export function hasCapacity(runtime: StrategyRuntime): boolean {
  return runtime.heldCount() < runtime.maxConcurrentPositions;
}
