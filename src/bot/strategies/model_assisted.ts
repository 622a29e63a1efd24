import { TRADE_REASONS } from "../trade_reasons.js";
import type { TradeIntent } from "../types.js";
import type { ModelScore } from "../ports.js";
import { errorMessage } from "../errors.js";
import { logger } from "../../utils/logger.js";
import { shortMint } from "../../utils/mint.js";
import {
  hasCapacity,
  strategyIntent,
  type StrategyEvent,
  type StrategyRuntime,
  type TradingStrategy,
} from "./types.js";

export type ModelAssistedSettings = {
  confidenceThreshold: number;
  /**
   * The scoring model does its own due diligence on a token, so candidates
   * skip the freshness/rug/trend gate unless this is turned off.
   */
  bypassValidation: boolean;
};

export const DEFAULT_MODEL_SETTINGS: ModelAssistedSettings = {
  confidenceThreshold: 0.7,
  bypassValidation: true,
};

export function createModelAssistedStrategy(
  overrides: Partial<ModelAssistedSettings> = {}
): TradingStrategy {
  const s: ModelAssistedSettings = { ...DEFAULT_MODEL_SETTINGS, ...overrides };

  async function decide(event: StrategyEvent, runtime: StrategyRuntime): Promise<TradeIntent | null> {
    const snap = event.snapshot;
    if (!snap.held && !hasCapacity(runtime)) return null;

    let score: ModelScore;
    try {
      score = await runtime.scoreToken({
        mint: snap.mint,
        prices: snap.prices,
        volume: snap.volume,
        held: snap.held,
        unrealizedPnlPct: snap.position?.unrealizedPnlPct ?? null,
      });
    } catch (err) {
      logger.warn({ mint: shortMint(snap.mint), err: errorMessage(err) }, "MODEL: Scoring failed, no intent");
      return null;
    }

    if (score.confidence < s.confidenceThreshold) return null;
    const detail = `confidence=${score.confidence.toFixed(2)}${score.reasoning ? ` ${score.reasoning}` : ""}`;

    if (score.action === "buy" && !snap.held) {
      return strategyIntent(snap, "buy", TRADE_REASONS.BUY_MODEL, detail);
    }
    if (score.action === "sell" && snap.held && event.kind === "tick") {
      return strategyIntent(snap, "sell", TRADE_REASONS.SELL_MODEL, detail);
    }
    return null;
  }

  return { kind: "model", bypassValidation: s.bypassValidation, decide };
}
