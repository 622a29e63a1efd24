import { TRADE_REASONS } from "../trade_reasons.js";
import type { DiscoverySource, TradeIntent } from "../types.js";
import {
  hasCapacity,
  strategyIntent,
  type StrategyEvent,
  type StrategyRuntime,
  type TradingStrategy,
} from "./types.js";

export type PrioritySettings = {
  preferredSources: DiscoverySource[];
  requireWhitelist: boolean;
};

export const DEFAULT_PRIORITY_SETTINGS: PrioritySettings = {
  preferredSources: ["pumpfun"],
  requireWhitelist: false,
};

// Buys on discovery only. Exits are left to the protective layers.
export function createPriorityStrategy(overrides: Partial<PrioritySettings> = {}): TradingStrategy {
  const s: PrioritySettings = { ...DEFAULT_PRIORITY_SETTINGS, ...overrides };

  async function decide(event: StrategyEvent, runtime: StrategyRuntime): Promise<TradeIntent | null> {
    if (event.kind !== "discovered" || event.snapshot.held) return null;
    if (!hasCapacity(runtime)) return null;

    const mint = event.meta.mint;
    const whitelisted = runtime.isWhitelisted(mint);
    if (s.requireWhitelist && !whitelisted) return null;

    if (s.preferredSources.includes(event.meta.source)) {
      return strategyIntent(event.snapshot, "buy", TRADE_REASONS.BUY_PRIORITY_SOURCE, event.meta.source);
    }
    if (whitelisted) {
      return strategyIntent(event.snapshot, "buy", TRADE_REASONS.BUY_WHITELIST);
    }
    return null;
  }

  return { kind: "priority", bypassValidation: false, decide };
}
