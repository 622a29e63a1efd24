import { rsi } from "../math.js";
import { TRADE_REASONS } from "../trade_reasons.js";
import type { TradeIntent } from "../types.js";
import {
  hasCapacity,
  strategyIntent,
  type StrategyEvent,
  type StrategyRuntime,
  type TradingStrategy,
} from "./types.js";

export type OscillatorSettings = {
  period: number;
  oversold: number;
  overbought: number;
  neutral: number;
  /** Sell on an upward cross of the neutral line while in profit. */
  neutralCrossTakeProfit: boolean;
  /** Only take the neutral-cross exit while the position is in profit. */
  neutralCrossRequiresProfit: boolean;
  /** Ticks back to compare price and RSI when looking for bearish divergence. */
  divergenceLookback: number;
  divergencePriceRisePct: number;
  divergenceRsiDrop: number;
};

export const DEFAULT_OSCILLATOR_SETTINGS: OscillatorSettings = {
  period: 14,
  oversold: 30,
  overbought: 70,
  neutral: 50,
  neutralCrossTakeProfit: true,
  neutralCrossRequiresProfit: false,
  divergenceLookback: 5,
  divergencePriceRisePct: 0.01,
  divergenceRsiDrop: 2,
};

/**
 * RSI strategy. Every signal is derived from the price series alone, so the
 * same prices give the same intents no matter how far apart the ticks were.
 */
export function createOscillatorStrategy(
  overrides: Partial<OscillatorSettings> = {}
): TradingStrategy {
  const s: OscillatorSettings = { ...DEFAULT_OSCILLATOR_SETTINGS, ...overrides };

  async function decide(event: StrategyEvent, runtime: StrategyRuntime): Promise<TradeIntent | null> {
    const snap = event.snapshot;
    const prices = snap.prices;
    const current = rsi(prices, s.period);
    if (current === null) return null;
    const previous = rsi(prices.slice(0, -1), s.period);

    if (!snap.held) {
      if (!hasCapacity(runtime)) return null;
      if (event.kind === "discovered") {
        return current <= s.oversold
          ? strategyIntent(snap, "buy", TRADE_REASONS.BUY_OVERSOLD, `rsi=${current.toFixed(1)}`)
          : null;
      }
      if (previous !== null && previous > s.oversold && current <= s.oversold) {
        return strategyIntent(snap, "buy", TRADE_REASONS.BUY_OVERSOLD_CROSS, `rsi=${current.toFixed(1)}`);
      }
      return null;
    }

    if (previous === null) return null;

    if (previous < s.overbought && current >= s.overbought) {
      return strategyIntent(snap, "sell", TRADE_REASONS.SELL_OVERBOUGHT, `rsi=${current.toFixed(1)}`);
    }

    if (prices.length > s.divergenceLookback) {
      const lastPrice = prices[prices.length - 1];
      const pastPrice = prices[prices.length - 1 - s.divergenceLookback];
      const pastRsi = rsi(prices.slice(0, -s.divergenceLookback), s.period);
      const priceChange = pastPrice > 0 ? lastPrice / pastPrice - 1 : 0;
      if (pastRsi !== null && priceChange > s.divergencePriceRisePct && pastRsi - current > s.divergenceRsiDrop) {
        return strategyIntent(
          snap,
          "sell",
          TRADE_REASONS.SELL_BEARISH_DIVERGENCE,
          `price +${(priceChange * 100).toFixed(1)}% rsi ${pastRsi.toFixed(1)}->${current.toFixed(1)}`
        );
      }
    }

    const profitOk = !s.neutralCrossRequiresProfit || (snap.position?.unrealizedPnlPct ?? 0) > 0;
    if (s.neutralCrossTakeProfit && profitOk && previous <= s.neutral && current > s.neutral) {
      return strategyIntent(snap, "sell", TRADE_REASONS.SELL_NEUTRAL_CROSS, `rsi=${current.toFixed(1)}`);
    }

    return null;
  }

  return { kind: "oscillator", bypassValidation: false, decide };
}
