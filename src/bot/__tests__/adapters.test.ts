import { describe, it, expect, vi } from "vitest";
import { classifySource, getBestPair, pairToTick, type TokenPair } from "../dexscreener.js";
import { quotePrice } from "../market_data.js";
import { MINT_SOL } from "../config.js";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function pair(overrides: Partial<TokenPair> = {}): TokenPair {
  return {
    chainId: "solana",
    dexId: "raydium",
    pairAddress: "PAIR_1",
    baseToken: { address: "MINT_A", symbol: "AAA" },
    priceNative: "0.00042",
    volume: { m5: 12.5 },
    liquidity: { usd: 1000, quote: 5 },
    ...overrides,
  };
}

describe("quotePrice", () => {
  it("prices a buy as SOL spent per token received", () => {
    expect(quotePrice(MINT_SOL, "50000000", "1000000", 6)).toBe(0.05);
  });

  it("prices a sell as SOL received per token spent", () => {
    expect(quotePrice("MINT_A", "2000000", "100000000", 6)).toBe(0.05);
  });

  it("returns 0 when no tokens are involved", () => {
    expect(quotePrice(MINT_SOL, "50000000", "0", 6)).toBe(0);
  });
});

describe("dexscreener helpers", () => {
  it("reads a tick in SOL with five-minute volume and quote-side liquidity", () => {
    expect(pairToTick(pair())).toEqual({ price: 0.00042, volume: 12.5, liquidity: 5 });
  });

  it("treats missing volume as zero", () => {
    expect(pairToTick(pair({ volume: {}, liquidity: undefined }))).toEqual({
      price: 0.00042,
      volume: 0,
      liquidity: undefined,
    });
  });

  it("picks the pair with the deepest USD liquidity", () => {
    const shallow = pair({ pairAddress: "SHALLOW", liquidity: { usd: 10 } });
    const deep = pair({ pairAddress: "DEEP", liquidity: { usd: 5000 } });
    expect(getBestPair([shallow, deep])?.pairAddress).toBe("DEEP");
    expect(getBestPair([])).toBeNull();
  });

  it("labels pump venues as pumpfun", () => {
    expect(classifySource(pair({ dexId: "pumpswap" }), "profile")).toBe("pumpfun");
    expect(classifySource(pair(), "boost")).toBe("boost");
    expect(classifySource(null, "profile")).toBe("profile");
  });
});
