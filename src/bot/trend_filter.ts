import { clamp } from "./math.js";
import type { MarketState } from "./types.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export type TrendFilterSettings = {
  minSamples: number;
  lookback: number;
  trendingThreshold: number;
  /** Share of consecutive deltas that flip sign before a series counts as choppy. */
  chopReversalRatio: number;
  blockWhenChoppy: boolean;
  choppySizeMultiplier: number;
};

export const DEFAULT_TREND_SETTINGS: TrendFilterSettings = {
  minSamples: 3,
  lookback: 20,
  trendingThreshold: 0.6,
  chopReversalRatio: 0.6,
  blockWhenChoppy: true,
  choppySizeMultiplier: 0.5,
};

const lastState = new Map<string, MarketState>();

function deltas(prices: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < prices.length; i++) out.push(prices[i] - prices[i - 1]);
  return out;
}

/** Net move over total absolute movement; 0 for a flat or single-point series. */
export function calculateTrendStrength(prices: number[]): number {
  const d = deltas(prices);
  const travelled = d.reduce((sum, x) => sum + Math.abs(x), 0);
  if (travelled === 0) return 0;
  const net = prices[prices.length - 1] - prices[0];
  return clamp(Math.abs(net) / travelled, 0, 1);
}

export function reversalRatio(prices: number[]): number {
  const moves = deltas(prices).filter((x) => x !== 0);
  if (moves.length < 2) return 0;
  let flips = 0;
  for (let i = 1; i < moves.length; i++) {
    if (Math.sign(moves[i]) !== Math.sign(moves[i - 1])) flips++;
  }
  return flips / (moves.length - 1);
}

export function analyzeMarket(
  mint: string,
  prices: number[],
  settings: TrendFilterSettings = DEFAULT_TREND_SETTINGS
): MarketState {
  let next: MarketState;
  const window = prices.slice(-settings.lookback);

  if (window.length < settings.minSamples) {
    next = "unknown";
  } else if (deltas(window).every((x) => x === 0)) {
    next = "unknown";
  } else {
    const strength = calculateTrendStrength(window);
    const reversals = reversalRatio(window);
    next = strength >= settings.trendingThreshold && reversals < settings.chopReversalRatio
      ? "trending"
      : "choppy";
  }

  const prev = lastState.get(mint);
  lastState.set(mint, next);
  if (prev !== next) {
    logger.debug({ mint: shortMint(mint), from: prev ?? "none", to: next }, "TREND: State changed");
  }
  return next;
}

export function getMarketState(mint: string): MarketState {
  return lastState.get(mint) ?? "unknown";
}

export function shouldAllowTrade(
  mint: string,
  settings: TrendFilterSettings = DEFAULT_TREND_SETTINGS
): boolean {
  if (getMarketState(mint) !== "choppy") return true;
  return !settings.blockWhenChoppy;
}

export function getPositionSizeMultiplier(
  mint: string,
  settings: TrendFilterSettings = DEFAULT_TREND_SETTINGS
): number {
  if (getMarketState(mint) === "choppy" && shouldAllowTrade(mint, settings)) {
    return settings.choppySizeMultiplier;
  }
  return 1;
}

export function forgetTrendState(mint: string): void {
  lastState.delete(mint);
}

export function clearTrendState(): void {
  lastState.clear();
}
