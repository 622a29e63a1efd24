import type { ExitRecommendation, Position } from "./types.js";

export type TimeExitSettings = {
  enabled: boolean;
  minHoldMs: number;
  maxUnprofitableHoldMs: number;
};

export const DEFAULT_TIME_EXIT_SETTINGS: TimeExitSettings = {
  enabled: true,
  minHoldMs: 60_000,
  maxUnprofitableHoldMs: 30 * 60_000,
};

const NO_EXIT: ExitRecommendation = { shouldExit: false, reason: "No time-based exit needed" };

/**
 * Only losing positions age out. Profit taking belongs to the strategy
 * and the trailing stop.
 */
export function analyzeTimeBasedExit(
  position: Position,
  settings: TimeExitSettings = DEFAULT_TIME_EXIT_SETTINGS,
  now: number = Date.now()
): ExitRecommendation {
  if (!settings.enabled) return NO_EXIT;

  const ageMs = now - position.openedAt;
  if (ageMs < settings.minHoldMs) return NO_EXIT;

  if (ageMs >= settings.maxUnprofitableHoldMs && position.unrealizedPnlPct < 0) {
    const minutes = Math.floor(ageMs / 60_000);
    return {
      shouldExit: true,
      reason: `Position unprofitable after ${minutes}m (${(position.unrealizedPnlPct * 100).toFixed(1)}%)`,
    };
  }

  return NO_EXIT;
}
