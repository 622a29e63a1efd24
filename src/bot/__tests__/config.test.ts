import { describe, it, expect, vi } from "vitest";
import { loadEnv } from "../config.js";
import { ConfigError } from "../errors.js";
import { buildRuntimeConfig, defaultRuntimeConfig } from "../runtime_config.js";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const BASE = { BOT_WALLET_PRIVATE_KEY: "test-secret" };

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv(BASE);
    expect(env.EXECUTION_MODE).toBe("paper");
    expect(env.STRATEGY).toBe("oscillator");
    expect(env.LOOP_SECONDS).toBe(30);
    expect(env.PREFERRED_SOURCES).toEqual(["pumpfun"]);
    expect(env.WHITELIST_MINTS).toEqual([]);
    expect(env.MODEL_BYPASS_VALIDATION).toBe(true);
    expect(env.SOLANA_RPC_URL).toBe("https://api.mainnet-beta.solana.com");
  });

  it("parses lists, numbers and booleans", () => {
    const env = loadEnv({
      ...BASE,
      WHITELIST_MINTS: " MINT_A, ,MINT_B ",
      PREFERRED_SOURCES: "pumpfun,boost",
      MAX_POSITIONS: "2",
      BLOCK_WHEN_CHOPPY: "off",
      SOLANA_RPC_URL: "http://localhost:8899",
    });
    expect(env.WHITELIST_MINTS).toEqual(["MINT_A", "MINT_B"]);
    expect(env.PREFERRED_SOURCES).toEqual(["pumpfun", "boost"]);
    expect(env.MAX_POSITIONS).toBe(2);
    expect(env.BLOCK_WHEN_CHOPPY).toBe(false);
    expect(env.SOLANA_RPC_URL).toBe("http://localhost:8899");
  });

  it("turns a bare key into a hosted RPC url", () => {
    expect(loadEnv({ ...BASE, SOLANA_RPC_URL: "test-key" }).SOLANA_RPC_URL)
      .toBe("https://mainnet.helius-rpc.com/?api-key=test-key");
  });

  it("names every invalid key", () => {
    expect(() => loadEnv({ EXECUTION_MODE: "yolo", MAX_POSITIONS: "0" })).toThrow(ConfigError);
    try {
      loadEnv({ EXECUTION_MODE: "yolo", MAX_POSITIONS: "0" });
    } catch (err) {
      const message = err instanceof Error ? err.message : "";
      expect(message).toContain("BOT_WALLET_PRIVATE_KEY");
      expect(message).toContain("EXECUTION_MODE");
      expect(message).toContain("MAX_POSITIONS");
    }
  });

  it("rejects unknown discovery sources", () => {
    expect(() => loadEnv({ ...BASE, PREFERRED_SOURCES: "pumpfun,telegram" })).toThrow(ConfigError);
  });

  it("rejects inverted RSI bands", () => {
    expect(() => loadEnv({ ...BASE, RSI_OVERSOLD: "70", RSI_OVERBOUGHT: "30" }))
      .toThrow("RSI_OVERSOLD must be below RSI_OVERBOUGHT");
  });
});

describe("buildRuntimeConfig", () => {
  it("maps environment units onto module settings", () => {
    const config = buildRuntimeConfig(loadEnv({
      ...BASE,
      EXECUTION_MODE: "live",
      STRATEGY: "priority",
      LOOP_SECONDS: "10",
      MAX_TOKEN_AGE_MINUTES: "5",
      MIN_HOLD_SECONDS: "30",
      BUY_AMOUNT_SOL: "0.2",
      PRICE_MISS_MAX: "3",
      PRICE_MISS_WINDOW_SECONDS: "60",
    }));
    expect(config.loop.loopMs).toBe(10_000);
    expect(config.validation.maxTokenAgeMs).toBe(300_000);
    expect(config.timeExit.minHoldMs).toBe(30_000);
    expect(config.registry.maxPriceMisses).toBe(3);
    expect(config.registry.priceMissWindowMs).toBe(60_000);
    expect(config.execution).toEqual({ mode: "live", buyAmountSol: 0.2, maxAttempts: 3, retryDelayMs: 1000 });
    expect(config.strategy.kind).toBe("priority");
    expect(config.strategy.priority).toEqual({ preferredSources: ["pumpfun"], requireWhitelist: false });
  });

  it("matches the module defaults when nothing is set", () => {
    const built = buildRuntimeConfig(loadEnv(BASE));
    const defaults = defaultRuntimeConfig();
    expect(built.rug).toEqual(defaults.rug);
    expect(built.trend).toEqual(defaults.trend);
    expect(built.exitGuards).toEqual(defaults.exitGuards);
    expect(built.timeExit).toEqual(defaults.timeExit);
    expect(built.loop).toEqual(defaults.loop);
    expect(built.registry).toEqual(defaults.registry);
  });
});
