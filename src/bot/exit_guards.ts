import type { ExitRecommendation, Position } from "./types.js";

export type ExitGuardSettings = {
  trailingDistancePct: number;
  hardStopEnabled: boolean;
  hardStopLossPct: number;
};

export const DEFAULT_EXIT_GUARD_SETTINGS: ExitGuardSettings = {
  trailingDistancePct: 0.1,
  hardStopEnabled: true,
  hardStopLossPct: 0.25,
};

export function evaluateTrailingStop(
  position: Position,
  settings: ExitGuardSettings = DEFAULT_EXIT_GUARD_SETTINGS
): ExitRecommendation {
  if (!position.trailingStopArmed) {
    return { shouldExit: false, reason: "Trailing stop not armed" };
  }
  const stopPrice = position.peakPrice * (1 - settings.trailingDistancePct);
  if (position.currentPrice <= stopPrice) {
    const fromPeakPct = (1 - position.currentPrice / position.peakPrice) * 100;
    return {
      shouldExit: true,
      reason: `Trailing stop hit: ${fromPeakPct.toFixed(1)}% below peak ${position.peakPrice}`,
    };
  }
  return { shouldExit: false, reason: "Above trailing stop" };
}

export function evaluateHardStop(
  position: Position,
  settings: ExitGuardSettings = DEFAULT_EXIT_GUARD_SETTINGS
): ExitRecommendation {
  if (!settings.hardStopEnabled) {
    return { shouldExit: false, reason: "Hard stop disabled" };
  }
  if (position.unrealizedPnlPct <= -settings.hardStopLossPct) {
    return {
      shouldExit: true,
      reason: `Hard stop loss: ${(position.unrealizedPnlPct * 100).toFixed(1)}%`,
    };
  }
  return { shouldExit: false, reason: "Within loss limit" };
}
