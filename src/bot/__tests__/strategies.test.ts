import { describe, it, expect, vi } from "vitest";
import {
  createStrategy,
  createOscillatorStrategy,
  createPriorityStrategy,
  createModelAssistedStrategy,
  type StrategyEvent,
  type StrategyRuntime,
  type TokenSnapshot,
} from "../strategies/index.js";
import type { ModelScore, ModelScoreRequest } from "../ports.js";
import type { TokenMeta } from "../types.js";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const FALLING = [1.0, 0.9, 0.8, 0.7, 0.6];
const RALLY = [1.0, 0.9, 0.8, 0.7, 0.6, 0.61, 0.62, 0.63, 0.64, 1.2];

function makeRuntime(overrides: Partial<StrategyRuntime> = {}): StrategyRuntime {
  return {
    now: () => 0,
    isWhitelisted: () => false,
    heldCount: () => 0,
    maxConcurrentPositions: 5,
    scoreToken: async () => ({ action: "hold", confidence: 0 }),
    ...overrides,
  };
}

function snapshot(prices: number[], held = false, unrealizedPnlPct = 0): TokenSnapshot {
  return {
    mint: "MINT_A",
    prices,
    volume: 1000,
    held,
    position: held ? { entryPrice: prices[0], unrealizedPnlPct } : null,
    marketState: "unknown",
  };
}

function discovered(prices: number[], meta: Partial<TokenMeta> = {}): StrategyEvent {
  return {
    kind: "discovered",
    meta: { mint: "MINT_A", source: "profile", discoveredAt: 0, ...meta },
    snapshot: snapshot(prices),
  };
}

function tick(prices: number[], held = false, unrealizedPnlPct = 0): StrategyEvent {
  return { kind: "tick", snapshot: snapshot(prices, held, unrealizedPnlPct) };
}

describe("oscillator strategy", () => {
  const strategy = createOscillatorStrategy({ period: 3 });

  it("buys a discovered token that is already oversold", async () => {
    const intent = await strategy.decide(discovered(FALLING), makeRuntime());

    expect(intent?.action).toBe("buy");
    expect(intent?.reason).toBe("oversold_buy");
    expect(intent?.forced).toBe(false);
    expect(intent?.referencePrice).toBe(0.6);
  });

  it("skips a discovered token that is not oversold", async () => {
    expect(await strategy.decide(discovered([0.6, 0.7, 0.8, 0.9, 1.0]), makeRuntime())).toBeNull();
  });

  it("needs enough history for the oscillator", async () => {
    expect(await strategy.decide(discovered([1.0, 0.9]), makeRuntime())).toBeNull();
  });

  it("buys on a tick that crosses below oversold", async () => {
    // rsi goes from about 66.7 to about 26.7
    const intent = await strategy.decide(tick([1.0, 1.1, 1.2, 1.1, 0.8]), makeRuntime());

    expect(intent?.action).toBe("buy");
    expect(intent?.reason).toBe("oversold_cross_buy");
  });

  it("does not buy on a tick that stays oversold without crossing", async () => {
    expect(await strategy.decide(tick(FALLING), makeRuntime())).toBeNull();
  });

  it("does not buy without capacity", async () => {
    const runtime = makeRuntime({ heldCount: () => 5 });
    expect(await strategy.decide(discovered(FALLING), runtime)).toBeNull();
  });

  it("sells when the oscillator crosses above overbought", async () => {
    // rsi goes from about 28.9 to about 93.6
    const intent = await strategy.decide(tick(RALLY, true, 1.0), makeRuntime());

    expect(intent?.action).toBe("sell");
    expect(intent?.reason).toBe("overbought_exit");
  });

  it("sells on bearish divergence", async () => {
    const divergent = createOscillatorStrategy({ period: 3, divergenceLookback: 2 });
    // price +1.3% over two ticks while rsi falls from about 85.7 to about 77.7
    const intent = await divergent.decide(tick([1.0, 0.9, 1.2, 1.5, 1.4, 1.52], true, 0.52), makeRuntime());

    expect(intent?.action).toBe("sell");
    expect(intent?.reason).toBe("bearish_divergence_exit");
  });

  describe("neutral cross", () => {
    // rsi goes from about 38.5 to about 54.3
    const prices = [1.0, 0.9, 0.8, 0.7, 0.6, 0.65, 0.7, 0.75];

    it("takes profit when crossing the midpoint in profit", async () => {
      const intent = await strategy.decide(tick(prices, true, 0.25), makeRuntime());
      expect(intent?.reason).toBe("neutral_cross_exit");
    });

    it("exits on the cross regardless of profit", async () => {
      const intent = await strategy.decide(tick(prices, true, -0.0625), makeRuntime());
      expect(intent?.action).toBe("sell");
      expect(intent?.reason).toBe("neutral_cross_exit");
    });

    it("can hold a losing position through the cross when profit is required", async () => {
      const gated = createOscillatorStrategy({ period: 3, neutralCrossRequiresProfit: true });
      expect(await gated.decide(tick(prices, true, -0.0625), makeRuntime())).toBeNull();
      expect((await gated.decide(tick(prices, true, 0.25), makeRuntime()))?.reason).toBe("neutral_cross_exit");
    });

    it("can be switched off", async () => {
      const noNeutral = createOscillatorStrategy({ period: 3, neutralCrossTakeProfit: false });
      expect(await noNeutral.decide(tick(prices, true, 0.25), makeRuntime())).toBeNull();
    });
  });

  it("produces the same intents regardless of the clock", async () => {
    const events: StrategyEvent[] = [
      discovered(FALLING),
      tick([1.0, 1.1, 1.2, 1.1, 0.8]),
      tick(RALLY, true, 1.0),
      tick(RALLY.slice(0, 9), true, 0.05),
      tick([1.0, 1.0, 1.0, 1.0, 1.0, 1.0], true, 0),
    ];
    const early = makeRuntime({ now: () => 0 });
    const late = makeRuntime({ now: () => 10 * 365 * 24 * 3_600_000 });

    for (const event of events) {
      const a = await strategy.decide(event, early);
      const b = await strategy.decide(event, late);
      expect(a).toEqual(b);
    }
  });

  it("never sells a long-held position whose oscillator is quiet", async () => {
    const intent = await strategy.decide(tick(RALLY.slice(0, 9), true, 0.05), makeRuntime({ now: () => Number.MAX_SAFE_INTEGER }));
    expect(intent).toBeNull();
  });
});

describe("priority strategy", () => {
  const strategy = createPriorityStrategy();

  it("buys tokens from a preferred source on discovery", async () => {
    const intent = await strategy.decide(discovered([1.0], { source: "pumpfun" }), makeRuntime());

    expect(intent?.action).toBe("buy");
    expect(intent?.reason).toBe("priority_source_buy");
  });

  it("buys whitelisted tokens from any source", async () => {
    const runtime = makeRuntime({ isWhitelisted: (mint) => mint === "MINT_A" });
    const intent = await strategy.decide(discovered([1.0], { source: "profile" }), runtime);

    expect(intent?.reason).toBe("whitelist_buy");
  });

  it("ignores other tokens", async () => {
    expect(await strategy.decide(discovered([1.0], { source: "boost" }), makeRuntime())).toBeNull();
  });

  it("requires whitelist membership when configured", async () => {
    const strict = createPriorityStrategy({ requireWhitelist: true });
    expect(await strict.decide(discovered([1.0], { source: "pumpfun" }), makeRuntime())).toBeNull();
  });

  it("respects capacity", async () => {
    const runtime = makeRuntime({ heldCount: () => 2, maxConcurrentPositions: 2 });
    expect(await strategy.decide(discovered([1.0], { source: "pumpfun" }), runtime)).toBeNull();
  });

  it("leaves exits to the protective layers", async () => {
    expect(await strategy.decide(tick([1.0, 5.0, 0.1], true, -0.9), makeRuntime())).toBeNull();
  });
});

describe("model-assisted strategy", () => {
  function scoring(score: ModelScore) {
    return vi.fn(async (_request: ModelScoreRequest): Promise<ModelScore> => score);
  }

  it("buys when the model is confident", async () => {
    const scoreToken = scoring({ action: "buy", confidence: 0.9, reasoning: "volume" });
    const intent = await createModelAssistedStrategy().decide(discovered([1.0, 1.1]), makeRuntime({ scoreToken }));

    expect(intent?.reason).toBe("model_buy");
    expect(intent?.detail).toBe("confidence=0.90 volume");
    expect(scoreToken).toHaveBeenCalledWith({
      mint: "MINT_A",
      prices: [1.0, 1.1],
      volume: 1000,
      held: false,
      unrealizedPnlPct: null,
    });
  });

  it("ignores verdicts below the confidence threshold", async () => {
    const runtime = makeRuntime({ scoreToken: scoring({ action: "buy", confidence: 0.5 }) });
    expect(await createModelAssistedStrategy().decide(discovered([1.0]), runtime)).toBeNull();
  });

  it("sells a held token on a confident sell", async () => {
    const runtime = makeRuntime({ scoreToken: scoring({ action: "sell", confidence: 0.8 }) });
    const intent = await createModelAssistedStrategy().decide(tick([1.0, 1.2], true, 0.2), runtime);

    expect(intent?.action).toBe("sell");
    expect(intent?.reason).toBe("model_exit");
  });

  it("does not act on a sell verdict for a token it does not hold", async () => {
    const runtime = makeRuntime({ scoreToken: scoring({ action: "sell", confidence: 0.95 }) });
    expect(await createModelAssistedStrategy().decide(tick([1.0]), runtime)).toBeNull();
  });

  it("yields no intent when the scorer fails", async () => {
    const runtime = makeRuntime({ scoreToken: async () => { throw new Error("scorer down"); } });
    expect(await createModelAssistedStrategy().decide(discovered([1.0]), runtime)).toBeNull();
  });

  it("bypasses validation unless switched off", () => {
    expect(createModelAssistedStrategy().bypassValidation).toBe(true);
    expect(createModelAssistedStrategy({ bypassValidation: false }).bypassValidation).toBe(false);
    expect(createOscillatorStrategy().bypassValidation).toBe(false);
    expect(createPriorityStrategy().bypassValidation).toBe(false);
  });
});

describe("createStrategy", () => {
  it("builds each variant from settings", () => {
    expect(createStrategy({ kind: "oscillator" }).kind).toBe("oscillator");
    expect(createStrategy({ kind: "priority" }).kind).toBe("priority");
    expect(createStrategy({ kind: "model", model: { bypassValidation: false } }).bypassValidation).toBe(false);
  });
});
