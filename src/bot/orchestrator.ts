import { ConfigError, errorMessage } from "./errors.js";
import { executeIntent } from "./execution.js";
import { evaluateHardStop, evaluateTrailingStop } from "./exit_guards.js";
import { isPositiveFinite } from "./math.js";
import type { DiscoveryFeed, MarketDataPort, ModelScorer, Signer } from "./ports.js";
import {
  configurePositionBook,
  getPosition,
  getPositionCount,
  openPosition,
  removePosition,
  updatePosition,
} from "./position_book.js";
import { analyzeTick, cleanupRugState, recordLiquidity } from "./rug_detector.js";
import type { RuntimeConfig } from "./runtime_config.js";
import type { StrategyRuntime, TokenSnapshot, TradingStrategy } from "./strategies/index.js";
import { analyzeTimeBasedExit } from "./time_exit.js";
import {
  expireTokens,
  getToken,
  getTrackedTokenCount,
  listTokens,
  recordObservation,
  recordPriceMiss,
  registerToken,
  transitionToken,
  type TokenRecord,
} from "./token_registry.js";
import { validateCandidate } from "./token_validation.js";
import { TRADE_REASONS, type TradeReason } from "./trade_reasons.js";
import { analyzeMarket, forgetTrendState, getPositionSizeMultiplier, shouldAllowTrade } from "./trend_filter.js";
import type { MarketState, MarketTick, Position, RugAnalysis, SwapResult, TradeIntent } from "./types.js";
import { getWhitelistSize, snapshotWhitelist } from "./whitelist.js";
import { runWithConcurrency, withKeyLock } from "../utils/concurrency.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export type OrchestratorDeps = {
  market: MarketDataPort;
  signer: Signer;
  discovery: DiscoveryFeed;
  strategy: TradingStrategy;
  scorer?: ModelScorer;
  now?: () => number;
  wait?: (ms: number) => Promise<void>;
};

export type TradeCounters = {
  buys: number;
  sells: number;
  failed: number;
  forcedExits: number;
};

export type OrchestratorStatus = {
  running: boolean;
  uptimeMs: number;
  activeTokenCount: number;
  trackedTokenCount: number;
  counters: TradeCounters;
  balanceSol: number | null;
  strategy: string | null;
  whitelistSize: number;
  lastCycleAt: number | null;
};

let deps: OrchestratorDeps | null = null;
let config: RuntimeConfig | null = null;
let isRunning = false;
let startedAt = 0;
let loopTimer: NodeJS.Timeout | null = null;
let cycleInFlight: Promise<void> | null = null;
let pendingBuys = 0;
let lastBalanceSol: number | null = null;
let lastCycleAt: number | null = null;
let counters: TradeCounters = { buys: 0, sells: 0, failed: 0, forcedExits: 0 };

type Wiring = { deps: OrchestratorDeps; config: RuntimeConfig; clock: () => number };

function wiring(): Wiring {
  if (!deps || !config) {
    throw new ConfigError("orchestrator used before initOrchestrator()");
  }
  return { deps, config, clock: deps.now ?? Date.now };
}

export function initOrchestrator(nextDeps: OrchestratorDeps, nextConfig: RuntimeConfig): void {
  if (isRunning) {
    throw new ConfigError("cannot re-initialise a running orchestrator");
  }
  deps = nextDeps;
  config = nextConfig;
  configurePositionBook(nextConfig.positionBook);
}

function buildRuntime(w: Wiring, whitelist: ReadonlySet<string>): StrategyRuntime {
  const scorer = w.deps.scorer;
  return {
    now: w.clock,
    isWhitelisted: (mint) => whitelist.has(mint),
    heldCount: () => getPositionCount() + pendingBuys,
    maxConcurrentPositions: w.config.loop.maxConcurrentPositions,
    scoreToken: (request) =>
      scorer
        ? scorer.score(request)
        : Promise.reject(new ConfigError("no model scorer configured")),
  };
}

function snapshotFor(rec: TokenRecord, position: Position | undefined, marketState: MarketState): TokenSnapshot {
  const mint = rec.meta.mint;
  return {
    mint,
    prices: rec.prices.toArray(),
    volume: rec.lastVolume,
    held: rec.state === "held",
    position: position
      ? { entryPrice: position.entryPrice, unrealizedPnlPct: position.unrealizedPnlPct }
      : null,
    marketState,
  };
}

function isMalformedTick(tick: MarketTick): boolean {
  return !isPositiveFinite(tick.price) || !Number.isFinite(tick.volume) || tick.volume < 0;
}

function forcedSell(mint: string, price: number, reason: TradeReason, detail: string): TradeIntent {
  return { mint, action: "sell", forced: true, reason, referencePrice: price, sizeMultiplier: 1, detail };
}

/** Protective layers in priority order; the first that fires wins. */
function protectiveExit(w: Wiring, position: Position, rug: RugAnalysis): TradeIntent | null {
  const { mint, currentPrice } = position;
  if (rug.isRugPull && rug.urgency === "high") {
    return forcedSell(mint, currentPrice, TRADE_REASONS.SELL_RUG_PULL, rug.reasons.join(","));
  }
  const hard = evaluateHardStop(position, w.config.exitGuards);
  if (hard.shouldExit) return forcedSell(mint, currentPrice, TRADE_REASONS.SELL_HARD_STOP, hard.reason);
  const trailing = evaluateTrailingStop(position, w.config.exitGuards);
  if (trailing.shouldExit) return forcedSell(mint, currentPrice, TRADE_REASONS.SELL_TRAILING_STOP, trailing.reason);
  const timed = analyzeTimeBasedExit(position, w.config.timeExit, w.clock());
  if (timed.shouldExit) return forcedSell(mint, currentPrice, TRADE_REASONS.SELL_TIMEOUT, timed.reason);
  return null;
}

async function trade(w: Wiring, intent: TradeIntent): Promise<void> {
  const mint = intent.mint;
  const isBuy = intent.action === "buy";
  if (isBuy) pendingBuys++;
  let result: SwapResult;
  try {
    result = await executeIntent(
      intent,
      { market: w.deps.market, signer: w.deps.signer, wait: w.deps.wait },
      w.config.execution
    );
  } finally {
    if (isBuy) pendingBuys--;
  }

  if (!result.success) {
    counters.failed++;
    logger.warn({
      mint: shortMint(mint),
      action: intent.action,
      reason: intent.reason,
      failure: result.failureReason,
    }, "ORCHESTRATOR: Trade failed, lifecycle unchanged");
    return;
  }

  const now = w.clock();
  if (isBuy) {
    const entryPrice = isPositiveFinite(result.executedPrice) ? result.executedPrice : intent.referencePrice;
    const notional = w.config.execution.buyAmountSol * intent.sizeMultiplier;
    try {
      openPosition(mint, entryPrice, notional, now);
    } catch (err) {
      logger.error({ mint: shortMint(mint), err: errorMessage(err) }, "ORCHESTRATOR: Position book rejected open");
      return;
    }
    transitionToken(mint, "held", now);
    counters.buys++;
  } else {
    removePosition(mint);
    transitionToken(mint, "disposed", now);
    forgetTrendState(mint);
    counters.sells++;
    if (intent.forced) counters.forcedExits++;
  }

  logger.info({
    mint: shortMint(mint),
    action: intent.action,
    forced: intent.forced,
    reason: intent.reason,
    price: result.executedPrice,
    sig: result.signature,
  }, "ORCHESTRATOR: Trade committed");
}

async function seedHistory(w: Wiring, rec: TokenRecord): Promise<void> {
  const fetchHistory = w.deps.market.priceHistory;
  if (!w.config.loop.seedPriceHistory || !fetchHistory || rec.prices.size > 0) return;
  try {
    const history = await fetchHistory.call(w.deps.market, rec.meta.mint);
    for (const p of history) {
      if (isPositiveFinite(p)) rec.prices.push(p);
    }
  } catch (err) {
    logger.debug({ mint: shortMint(rec.meta.mint), err: errorMessage(err) }, "ORCHESTRATOR: No seed history");
  }
}

type Observation = {
  price: number;
  rug: RugAnalysis;
  marketState: MarketState;
};

async function evaluateHeld(w: Wiring, rec: TokenRecord, obs: Observation, runtime: StrategyRuntime): Promise<void> {
  const mint = rec.meta.mint;
  let position: Position;
  try {
    position = updatePosition(mint, obs.price, w.clock());
  } catch (err) {
    logger.error({ mint: shortMint(mint), err: errorMessage(err) }, "ORCHESTRATOR: Held token has no position");
    return;
  }

  const forced = protectiveExit(w, position, obs.rug);
  if (forced) {
    logger.warn({ mint: shortMint(mint), reason: forced.reason, detail: forced.detail }, "ORCHESTRATOR: Forced exit");
    await trade(w, forced);
    return;
  }

  const intent = await w.deps.strategy.decide({ kind: "tick", snapshot: snapshotFor(rec, position, obs.marketState) }, runtime);
  rec.evaluations++;
  if (intent && intent.action === "sell") {
    await trade(w, intent);
  }
}

async function evaluateCandidate(
  w: Wiring,
  rec: TokenRecord,
  obs: Observation,
  runtime: StrategyRuntime,
  whitelist: ReadonlySet<string>
): Promise<void> {
  const mint = rec.meta.mint;
  const snapshot = snapshotFor(rec, undefined, obs.marketState);
  const firstLook = rec.evaluations === 0;
  rec.evaluations++;

  // High-urgency rug signals block entry even for strategies that skip the gate.
  if (obs.rug.urgency === "high") return;

  if (!w.deps.strategy.bypassValidation) {
    const verdict = validateCandidate({
      meta: rec.meta,
      price: obs.price,
      rug: obs.rug,
      trendAllows: shouldAllowTrade(mint, w.config.trend),
      whitelisted: whitelist.has(mint),
      now: w.clock(),
    }, w.config.validation);
    if (!verdict.ok) {
      logger.debug({ mint: shortMint(mint), reasons: verdict.reasons }, "ORCHESTRATOR: Candidate rejected");
      return;
    }
  }

  const intent = await w.deps.strategy.decide(
    firstLook ? { kind: "discovered", meta: rec.meta, snapshot } : { kind: "tick", snapshot },
    runtime
  );
  if (!intent || intent.action !== "buy") return;
  // Capacity is reserved synchronously from here until trade() bumps pendingBuys.
  if (getPositionCount() + pendingBuys >= w.config.loop.maxConcurrentPositions) {
    logger.debug({ mint: shortMint(mint) }, "ORCHESTRATOR: At capacity, buy dropped");
    return;
  }

  await trade(w, { ...intent, sizeMultiplier: intent.sizeMultiplier * getPositionSizeMultiplier(mint, w.config.trend) });
}

// A held token with no usable price cannot be protected, so enough misses force it out.
async function handlePriceMiss(w: Wiring, rec: TokenRecord): Promise<void> {
  const mint = rec.meta.mint;
  const tripped = recordPriceMiss(mint, w.config.registry, w.clock());
  const position = getPosition(mint);
  if (!tripped || rec.state !== "held" || !position) return;

  const detail = `${rec.priceMisses} price misses`;
  logger.warn({ mint: shortMint(mint), misses: rec.priceMisses }, "ORCHESTRATOR: Price unavailable, forcing exit");
  await trade(w, forcedSell(mint, position.currentPrice, TRADE_REASONS.SELL_PRICE_UNAVAILABLE, detail));
}

async function evaluateToken(w: Wiring, mint: string, runtime: StrategyRuntime, whitelist: ReadonlySet<string>): Promise<void> {
  const rec = getToken(mint);
  if (!rec || rec.state === "disposed") return;

  let tick: MarketTick;
  try {
    tick = await w.deps.market.tick(mint);
  } catch (err) {
    logger.warn({ mint: shortMint(mint), err: errorMessage(err) }, "ORCHESTRATOR: Tick unavailable, skipping");
    await handlePriceMiss(w, rec);
    return;
  }
  if (isMalformedTick(tick)) {
    logger.warn({ mint: shortMint(mint), price: tick.price, volume: tick.volume }, "ORCHESTRATOR: Malformed tick, skipping");
    await handlePriceMiss(w, rec);
    return;
  }

  const now = w.clock();
  await seedHistory(w, rec);
  recordObservation(mint, tick.price, tick.volume, now);
  if (tick.liquidity !== undefined && Number.isFinite(tick.liquidity)) {
    recordLiquidity(mint, tick.liquidity, w.config.rug, now);
  }
  const obs: Observation = {
    price: tick.price,
    rug: analyzeTick(mint, tick.price, tick.volume, w.config.rug, now),
    marketState: analyzeMarket(mint, rec.prices.toArray(), w.config.trend),
  };

  if (rec.state === "held") {
    await evaluateHeld(w, rec, obs, runtime);
  } else {
    await evaluateCandidate(w, rec, obs, runtime, whitelist);
  }
}

async function cycle(w: Wiring): Promise<void> {
  const now = w.clock();
  const whitelist = snapshotWhitelist();

  try {
    const found = await w.deps.discovery.poll();
    for (const meta of found) registerToken(meta, w.config.registry, now);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "ORCHESTRATOR: Discovery poll failed");
  }
  for (const mint of whitelist) {
    registerToken({ mint, source: "whitelist", discoveredAt: now }, w.config.registry, now);
  }

  const monitored = listTokens()
    .filter((r) => r.state !== "disposed")
    .map((r) => r.meta.mint);
  const runtime = buildRuntime(w, whitelist);

  const results = await runWithConcurrency(monitored, w.config.loop.maxParallelTokens, (mint) =>
    withKeyLock(mint, () => evaluateToken(w, mint, runtime, whitelist))
  );
  results.forEach((r, i) => {
    if (!r.ok) {
      logger.error({ mint: shortMint(monitored[i]), err: errorMessage(r.error) }, "ORCHESTRATOR: Token evaluation failed");
    }
  });

  try {
    lastBalanceSol = await w.deps.market.balance(w.deps.signer.publicKey);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "ORCHESTRATOR: Balance refresh failed");
  }

  const end = w.clock();
  cleanupRugState(w.config.rug, end);
  for (const mint of expireTokens(w.config.registry, end, whitelist)) {
    forgetTrendState(mint);
  }
  lastCycleAt = end;

  logger.debug({ monitored: monitored.length, held: getPositionCount(), durationMs: end - now }, "ORCHESTRATOR: Cycle complete");
}

/** Runs one scheduling cycle. Errors are logged, never thrown. */
export async function runCycle(): Promise<void> {
  const w = wiring();
  try {
    await cycle(w);
  } catch (err) {
    logger.error({ err: errorMessage(err) }, "ORCHESTRATOR: Cycle failed");
  }
}

function scheduleCycle(): void {
  if (cycleInFlight) {
    logger.debug("ORCHESTRATOR: Previous cycle still running, skipping tick");
    return;
  }
  cycleInFlight = runCycle().finally(() => {
    cycleInFlight = null;
  });
}

export async function startOrchestrator(nextDeps: OrchestratorDeps, nextConfig: RuntimeConfig): Promise<void> {
  if (isRunning) {
    logger.warn("ORCHESTRATOR: Already running");
    return;
  }
  initOrchestrator(nextDeps, nextConfig);
  const w = wiring();
  isRunning = true;
  startedAt = w.clock();

  logger.info({
    strategy: w.deps.strategy.kind,
    loopMs: w.config.loop.loopMs,
    mode: w.config.execution.mode,
    wallet: shortMint(w.deps.signer.publicKey),
  }, "ORCHESTRATOR: Started");

  scheduleCycle();
  loopTimer = setInterval(scheduleCycle, w.config.loop.loopMs);
}

/** Stops scheduling and waits for the in-flight cycle, including any swaps, to finish. */
export async function stopOrchestrator(): Promise<void> {
  if (!isRunning) return;
  isRunning = false;
  if (loopTimer) {
    clearInterval(loopTimer);
    loopTimer = null;
  }
  if (cycleInFlight) {
    await cycleInFlight;
  }
  logger.info({ counters }, "ORCHESTRATOR: Stopped");
}

/** Operator-requested exit for a held token, serialized with cycle work on the same mint. */
export async function requestManualExit(mint: string): Promise<boolean> {
  const w = wiring();
  return withKeyLock(mint, async () => {
    const rec = getToken(mint);
    const position = getPosition(mint);
    if (!rec || rec.state !== "held" || !position) return false;
    await trade(w, forcedSell(mint, position.currentPrice, TRADE_REASONS.SELL_MANUAL, "operator request"));
    return getToken(mint)?.state === "disposed";
  });
}

export function getOrchestratorStatus(): OrchestratorStatus {
  const clock = deps?.now ?? Date.now;
  return {
    running: isRunning,
    uptimeMs: isRunning ? clock() - startedAt : 0,
    activeTokenCount: listTokens().filter((r) => r.state !== "disposed").length,
    trackedTokenCount: getTrackedTokenCount(),
    counters: { ...counters },
    balanceSol: lastBalanceSol,
    strategy: deps?.strategy.kind ?? null,
    whitelistSize: getWhitelistSize(),
    lastCycleAt,
  };
}

export function resetOrchestrator(): void {
  if (loopTimer) clearInterval(loopTimer);
  loopTimer = null;
  isRunning = false;
  cycleInFlight = null;
  deps = null;
  config = null;
  pendingBuys = 0;
  lastBalanceSol = null;
  lastCycleAt = null;
  counters = { buys: 0, sells: 0, failed: 0, forcedExits: 0 };
}
