import { RingBuffer } from "./ring_buffer.js";
import { clamp, mean } from "./math.js";
import type { RugAnalysis, RugReason, RugUrgency } from "./types.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export type RugDetectorSettings = {
  windowSize: number;
  retentionMs: number;
  /** Single-tick drop (fraction) that is treated as a rug. */
  extremeDropPct: number;
  /** Volume falling by this fraction versus the recent average. */
  volumeCollapsePct: number;
  volumeLookback: number;
  sharpDropPct: number;
  sharpDropWindow: number;
  liquidityDropPct: number;
  liquidityRemovalUrgent: boolean;
};

export const DEFAULT_RUG_SETTINGS: RugDetectorSettings = {
  windowSize: 20,
  retentionMs: 5 * 60_000,
  extremeDropPct: 0.45,
  volumeCollapsePct: 0.9,
  volumeLookback: 3,
  sharpDropPct: 0.08,
  sharpDropWindow: 5,
  liquidityDropPct: 0.3,
  liquidityRemovalUrgent: true,
};

type Rule = {
  reason: RugReason;
  severity: number;
  urgent: boolean;
};

const SEVERITY: Record<RugReason, number> = {
  extreme_price_drop: 0.8,
  volume_collapse: 0.4,
  repeated_sharp_drops: 0.4,
  liquidity_removal: 0.6,
};

type Sample = { price: number; volume: number; ts: number };
type LiquiditySnapshot = { reserves: number; ts: number };

type RugState = {
  samples: RingBuffer<Sample>;
  liquidity: RingBuffer<LiquiditySnapshot>;
};

const state = new Map<string, RugState>();

function stateFor(mint: string, settings: RugDetectorSettings): RugState {
  let s = state.get(mint);
  if (!s) {
    s = {
      samples: new RingBuffer<Sample>(settings.windowSize),
      liquidity: new RingBuffer<LiquiditySnapshot>(settings.windowSize),
    };
    state.set(mint, s);
  }
  return s;
}

function liquidityRemoved(s: RugState, settings: RugDetectorSettings, now: number): boolean {
  const snaps = s.liquidity.toArray().filter((x) => now - x.ts <= settings.retentionMs);
  if (snaps.length < 2) return false;
  const prev = snaps[snaps.length - 2].reserves;
  const cur = snaps[snaps.length - 1].reserves;
  return prev > 0 && (prev - cur) / prev >= settings.liquidityDropPct;
}

function sharpDropsRepeated(prices: number[], settings: RugDetectorSettings): boolean {
  const recent = prices.slice(-(settings.sharpDropWindow + 1));
  const changes = recent.length - 1;
  if (changes < 2) return false;
  let drops = 0;
  for (let i = 1; i < recent.length; i++) {
    const prev = recent[i - 1];
    if (prev > 0 && (prev - recent[i]) / prev >= settings.sharpDropPct) drops++;
  }
  return drops * 2 >= changes;
}

/**
 * Records a tick and scores it against the samples still inside the
 * retention horizon. The first tick for a mint never flags.
 */
export function analyzeTick(
  mint: string,
  price: number,
  volume: number,
  settings: RugDetectorSettings = DEFAULT_RUG_SETTINGS,
  now: number = Date.now()
): RugAnalysis {
  const s = stateFor(mint, settings);
  const prior = s.samples.toArray().filter((x) => now - x.ts <= settings.retentionMs);
  s.samples.push({ price, volume, ts: now });

  const fired: Rule[] = [];
  const last = prior[prior.length - 1];

  if (last && last.price > 0 && (last.price - price) / last.price >= settings.extremeDropPct) {
    fired.push({ reason: "extreme_price_drop", severity: SEVERITY.extreme_price_drop, urgent: true });
  }

  const recentVolumes = prior.slice(-settings.volumeLookback).map((x) => x.volume);
  if (recentVolumes.length > 0) {
    const avg = mean(recentVolumes);
    if (avg > 0 && volume <= avg * (1 - settings.volumeCollapsePct)) {
      fired.push({ reason: "volume_collapse", severity: SEVERITY.volume_collapse, urgent: false });
    }
  }

  if (sharpDropsRepeated([...prior.map((x) => x.price), price], settings)) {
    fired.push({ reason: "repeated_sharp_drops", severity: SEVERITY.repeated_sharp_drops, urgent: false });
  }

  if (liquidityRemoved(s, settings, now)) {
    fired.push({
      reason: "liquidity_removal",
      severity: SEVERITY.liquidity_removal,
      urgent: settings.liquidityRemovalUrgent,
    });
  }

  let urgency: RugUrgency = "low";
  if (fired.some((r) => r.urgent)) urgency = "high";
  else if (fired.length > 0) urgency = "medium";

  const analysis: RugAnalysis = {
    isRugPull: fired.length > 0,
    confidence: clamp(fired.reduce((sum, r) => sum + r.severity, 0), 0, 1),
    urgency,
    reasons: fired.map((r) => r.reason),
  };

  if (analysis.isRugPull) {
    logger.warn({
      mint: shortMint(mint),
      price,
      volume,
      confidence: analysis.confidence,
      urgency,
      reasons: analysis.reasons,
    }, "RUG: Suspicious activity");
  }

  return analysis;
}

/** Pool reserves (quote side) for the liquidity-removal rule. */
export function recordLiquidity(
  mint: string,
  reserves: number,
  settings: RugDetectorSettings = DEFAULT_RUG_SETTINGS,
  now: number = Date.now()
): void {
  stateFor(mint, settings).liquidity.push({ reserves, ts: now });
}

/** Drops samples past the retention horizon and forgets mints with nothing left. */
export function cleanupRugState(
  settings: RugDetectorSettings = DEFAULT_RUG_SETTINGS,
  now: number = Date.now()
): number {
  let removed = 0;
  for (const [mint, s] of state) {
    s.samples.retain((x) => now - x.ts <= settings.retentionMs);
    s.liquidity.retain((x) => now - x.ts <= settings.retentionMs);
    if (s.samples.size === 0 && s.liquidity.size === 0) {
      state.delete(mint);
      removed++;
    }
  }
  return removed;
}

export function getRugTrackedCount(): number {
  return state.size;
}

export function clearRugDetectorState(): void {
  state.clear();
}
