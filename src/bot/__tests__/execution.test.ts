import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  executeIntent,
  clearPaperHoldings,
  getPaperHolding,
  DEFAULT_EXECUTION_SETTINGS,
  type ExecutionSettings,
} from "../execution.js";
import { QuoteExpiredError } from "../errors.js";
import { MINT_SOL } from "../config.js";
import type { MarketDataPort, Quote, Signer, TokenHolding, UnsignedSwap } from "../ports.js";
import type { TradeIntent } from "../types.js";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const LIVE: ExecutionSettings = { ...DEFAULT_EXECUTION_SETTINGS, mode: "live", buyAmountSol: 0.1, retryDelayMs: 10 };

function makeQuote(inputMint: string, outputMint: string, amount: bigint, price: number): Quote {
  return {
    inputMint,
    outputMint,
    inAmount: amount.toString(),
    outAmount: "1",
    price,
    fetchedAt: 42,
    raw: null,
  };
}

function makeMarket(opts: { holdings?: Map<string, TokenHolding>; quoteFailures?: number } = {}) {
  let quoteFailures = opts.quoteFailures ?? 0;
  let quotes = 0;
  const quote = vi.fn(async (inputMint: string, outputMint: string, amount: bigint): Promise<Quote> => {
    if (quoteFailures > 0) {
      quoteFailures--;
      throw new Error("fetch failed");
    }
    quotes++;
    return makeQuote(inputMint, outputMint, amount, 0.001 * quotes);
  });
  const buildSwap = vi.fn(async (q: Quote): Promise<UnsignedSwap> => ({
    transaction: `tx-for-${q.price}`,
    lastValidBlockHeight: 100,
  }));
  const market: MarketDataPort = {
    balance: async () => 1,
    holdings: async () => opts.holdings ?? new Map(),
    quote,
    buildSwap,
    tick: async () => ({ price: 1, volume: 1 }),
  };
  return { market, quote, buildSwap };
}

function makeSigner(impl: (unsigned: UnsignedSwap) => Promise<string>) {
  const signAndSubmit = vi.fn(impl);
  const signer: Signer = { publicKey: "WALLET_1", signAndSubmit };
  return { signer, signAndSubmit };
}

const BUY: TradeIntent = {
  mint: "MINT_A",
  action: "buy",
  forced: false,
  reason: "oversold_buy",
  referencePrice: 0.001,
  sizeMultiplier: 1,
};

const SELL: TradeIntent = { ...BUY, action: "sell", reason: "overbought_exit" };

const wait = vi.fn(async (_ms: number) => {});

describe("executeIntent", () => {
  beforeEach(() => {
    clearPaperHoldings();
  });

  it("quotes the configured SOL amount for a buy and submits it", async () => {
    const { market, quote } = makeMarket();
    const { signer, signAndSubmit } = makeSigner(async () => "SIG_1");

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(quote).toHaveBeenCalledWith(MINT_SOL, "MINT_A", 100_000_000n);
    expect(signAndSubmit).toHaveBeenCalledWith({ transaction: "tx-for-0.001", lastValidBlockHeight: 100 });
    expect(result).toEqual({
      mint: "MINT_A",
      action: "buy",
      success: true,
      executedPrice: 0.001,
      signature: "SIG_1",
      attempts: 1,
    });
  });

  it("scales the buy by the size multiplier", async () => {
    const { market, quote } = makeMarket();
    const { signer } = makeSigner(async () => "SIG_1");

    await executeIntent({ ...BUY, sizeMultiplier: 0.5 }, { market, signer, wait }, LIVE);

    expect(quote).toHaveBeenCalledWith(MINT_SOL, "MINT_A", 50_000_000n);
  });

  it("sells the whole wallet balance of the token", async () => {
    const holdings = new Map([["MINT_A", { mint: "MINT_A", amountBaseUnits: 123_456n, decimals: 6 }]]);
    const { market, quote } = makeMarket({ holdings });
    const { signer } = makeSigner(async () => "SIG_2");

    const result = await executeIntent(SELL, { market, signer, wait }, LIVE);

    expect(quote).toHaveBeenCalledWith("MINT_A", MINT_SOL, 123_456n);
    expect(result.success).toBe(true);
  });

  it("fails a sell with nothing to sell without quoting", async () => {
    const { market, quote } = makeMarket();
    const { signer } = makeSigner(async () => "SIG_2");

    const result = await executeIntent(SELL, { market, signer, wait }, LIVE);

    expect(result.success).toBe(false);
    expect(result.failureReason).toBe("no token balance to sell");
    expect(quote).not.toHaveBeenCalled();
  });

  it("requotes when the submitted quote went stale", async () => {
    const { market, quote } = makeMarket();
    let calls = 0;
    const { signer, signAndSubmit } = makeSigner(async () => {
      calls++;
      if (calls === 1) throw new QuoteExpiredError();
      if (calls === 2) throw new Error("Blockhash not found");
      return "SIG_3";
    });

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
    expect(result.executedPrice).toBe(0.003);
    expect(quote).toHaveBeenCalledTimes(3);
    expect(signAndSubmit).toHaveBeenLastCalledWith({ transaction: "tx-for-0.003", lastValidBlockHeight: 100 });
  });

  it("gives up after the attempt budget of stale quotes", async () => {
    const { market } = makeMarket();
    const { signer, signAndSubmit } = makeSigner(async () => {
      throw new QuoteExpiredError();
    });

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(signAndSubmit).toHaveBeenCalledTimes(3);
    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.failureReason).toBe("attempts exhausted: quote expired before submission");
  });

  it("treats a signer rejection as terminal", async () => {
    const { market, quote } = makeMarket();
    const { signer, signAndSubmit } = makeSigner(async () => {
      throw new Error("insufficient funds for rent");
    });

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(signAndSubmit).toHaveBeenCalledTimes(1);
    expect(quote).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      mint: "MINT_A",
      action: "buy",
      success: false,
      executedPrice: 0,
      signature: null,
      attempts: 1,
      failureReason: "insufficient funds for rent",
    });
  });

  it("retries transient quote failures", async () => {
    const { market, quote } = makeMarket({ quoteFailures: 2 });
    const { signer } = makeSigner(async () => "SIG_4");

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(quote).toHaveBeenCalledTimes(3);
    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
  });

  it("reports persistent quote failures instead of throwing", async () => {
    const { market } = makeMarket({ quoteFailures: 5 });
    const { signer, signAndSubmit } = makeSigner(async () => "SIG_5");

    const result = await executeIntent(BUY, { market, signer, wait }, LIVE);

    expect(signAndSubmit).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    expect(result.failureReason).toBe("attempts exhausted: quote failed: fetch failed");
  });

  it("never signs in paper mode", async () => {
    const { market, buildSwap } = makeMarket();
    const { signer, signAndSubmit } = makeSigner(async () => "SIG_6");

    const result = await executeIntent(BUY, { market, signer, wait }, { ...LIVE, mode: "paper" });

    expect(signAndSubmit).not.toHaveBeenCalled();
    expect(buildSwap).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
    expect(result.signature).toBe("paper-MINT_A-42");
  });

  it("sells what a paper buy credited, ignoring the real wallet", async () => {
    const { market, quote } = makeMarket();
    const { signer, signAndSubmit } = makeSigner(async () => "SIG_7");
    const paper = { ...LIVE, mode: "paper" as const };

    await executeIntent(BUY, { market, signer, wait }, paper);
    expect(getPaperHolding("MINT_A")).toBe(1n);

    const sold = await executeIntent(SELL, { market, signer, wait }, paper);

    expect(sold.success).toBe(true);
    expect(quote).toHaveBeenLastCalledWith("MINT_A", MINT_SOL, 1n);
    expect(getPaperHolding("MINT_A")).toBe(0n);
    expect(signAndSubmit).not.toHaveBeenCalled();
  });

  it("fails a paper sell with no paper buy behind it", async () => {
    const holdings = new Map([["MINT_A", { mint: "MINT_A", amountBaseUnits: 500n, decimals: 6 }]]);
    const { market, quote } = makeMarket({ holdings });
    const { signer } = makeSigner(async () => "SIG_8");

    const result = await executeIntent(SELL, { market, signer, wait }, { ...LIVE, mode: "paper" });

    expect(result.failureReason).toBe("no token balance to sell");
    expect(quote).not.toHaveBeenCalled();
  });
});
