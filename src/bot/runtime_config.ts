import type { Env } from "./config.js";
import { DEFAULT_EXECUTION_SETTINGS, type ExecutionSettings } from "./execution.js";
import { DEFAULT_EXIT_GUARD_SETTINGS, type ExitGuardSettings } from "./exit_guards.js";
import { DEFAULT_POSITION_BOOK_SETTINGS, type PositionBookSettings } from "./position_book.js";
import { DEFAULT_RUG_SETTINGS, type RugDetectorSettings } from "./rug_detector.js";
import type { StrategySettings } from "./strategies/index.js";
import { DEFAULT_TIME_EXIT_SETTINGS, type TimeExitSettings } from "./time_exit.js";
import { DEFAULT_REGISTRY_SETTINGS, type RegistrySettings } from "./token_registry.js";
import { DEFAULT_VALIDATION_SETTINGS, type ValidationSettings } from "./token_validation.js";
import { DEFAULT_TREND_SETTINGS, type TrendFilterSettings } from "./trend_filter.js";
import { logger } from "../utils/logger.js";

export type LoopSettings = {
  loopMs: number;
  maxParallelTokens: number;
  maxConcurrentPositions: number;
  /** Ask the market port for prior prices the first time a token is seen. */
  seedPriceHistory: boolean;
};

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  loopMs: 30_000,
  maxParallelTokens: 8,
  maxConcurrentPositions: 5,
  seedPriceHistory: true,
};

export type RuntimeConfig = {
  loop: LoopSettings;
  positionBook: PositionBookSettings;
  rug: RugDetectorSettings;
  trend: TrendFilterSettings;
  timeExit: TimeExitSettings;
  exitGuards: ExitGuardSettings;
  execution: ExecutionSettings;
  validation: ValidationSettings;
  registry: RegistrySettings;
  strategy: StrategySettings;
};

export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    loop: { ...DEFAULT_LOOP_SETTINGS },
    positionBook: { ...DEFAULT_POSITION_BOOK_SETTINGS },
    rug: { ...DEFAULT_RUG_SETTINGS },
    trend: { ...DEFAULT_TREND_SETTINGS },
    timeExit: { ...DEFAULT_TIME_EXIT_SETTINGS },
    exitGuards: { ...DEFAULT_EXIT_GUARD_SETTINGS },
    execution: { ...DEFAULT_EXECUTION_SETTINGS },
    validation: { ...DEFAULT_VALIDATION_SETTINGS },
    registry: { ...DEFAULT_REGISTRY_SETTINGS },
    strategy: { kind: "oscillator" },
  };
}

/** Policy thresholds come from the environment; anything unset keeps its module default. */
export function buildRuntimeConfig(env: Env): RuntimeConfig {
  const base = defaultRuntimeConfig();
  const config: RuntimeConfig = {
    ...base,
    loop: {
      ...base.loop,
      loopMs: env.LOOP_SECONDS * 1000,
      maxParallelTokens: env.MAX_PARALLEL_TOKENS,
      maxConcurrentPositions: env.MAX_POSITIONS,
    },
    positionBook: { ...base.positionBook, trailingActivationPct: env.TRAILING_ACTIVATION_PCT },
    rug: {
      ...base.rug,
      extremeDropPct: env.RUG_EXTREME_DROP_PCT,
      volumeCollapsePct: env.RUG_VOLUME_COLLAPSE_PCT,
    },
    trend: { ...base.trend, blockWhenChoppy: env.BLOCK_WHEN_CHOPPY },
    timeExit: {
      ...base.timeExit,
      minHoldMs: env.MIN_HOLD_SECONDS * 1000,
      maxUnprofitableHoldMs: env.MAX_UNPROFITABLE_HOLD_MINUTES * 60_000,
    },
    exitGuards: {
      ...base.exitGuards,
      trailingDistancePct: env.TRAILING_DISTANCE_PCT,
      hardStopLossPct: env.HARD_STOP_LOSS_PCT,
    },
    execution: { ...base.execution, mode: env.EXECUTION_MODE, buyAmountSol: env.BUY_AMOUNT_SOL },
    validation: { maxTokenAgeMs: env.MAX_TOKEN_AGE_MINUTES * 60_000 },
    registry: {
      ...base.registry,
      sellOnPriceMissing: env.SELL_ON_PRICE_MISSING,
      maxPriceMisses: env.PRICE_MISS_MAX,
      priceMissWindowMs: env.PRICE_MISS_WINDOW_SECONDS * 1000,
    },
    strategy: {
      kind: env.STRATEGY,
      oscillator: {
        period: env.RSI_PERIOD,
        oversold: env.RSI_OVERSOLD,
        overbought: env.RSI_OVERBOUGHT,
        neutralCrossTakeProfit: env.RSI_NEUTRAL_TAKE_PROFIT,
      },
      priority: {
        preferredSources: env.PREFERRED_SOURCES,
        requireWhitelist: env.REQUIRE_WHITELIST,
      },
      model: {
        confidenceThreshold: env.MODEL_CONFIDENCE_THRESHOLD,
        bypassValidation: env.MODEL_BYPASS_VALIDATION,
      },
    },
  };

  logger.info({
    strategy: config.strategy.kind,
    mode: config.execution.mode,
    loopSeconds: env.LOOP_SECONDS,
    maxPositions: config.loop.maxConcurrentPositions,
    buyAmountSol: config.execution.buyAmountSol,
  }, "CONFIG: Runtime config built");

  return config;
}
