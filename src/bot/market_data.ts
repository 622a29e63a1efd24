import type { Connection } from "@solana/web3.js";
import { MINT_SOL } from "./config.js";
import { getBatchTokens, getBestPair, pairToTick } from "./dexscreener.js";
import { QuoteExpiredError, ValidationError } from "./errors.js";
import type { JupiterClient } from "./jupiter.js";
import type { MarketDataPort, Quote, TokenHolding, UnsignedSwap } from "./ports.js";
import { getSolBalance, getTokenDecimals, getTokenHoldings } from "./solana.js";
import type { MarketTick } from "./types.js";

const SOL_DECIMALS = 9;
const TICK_TTL_MS = 5_000;

function toUnits(amount: string, decimals: number): number {
  return Number(amount) / 10 ** decimals;
}

/**
 * SOL per whole token. Buys spend SOL for tokens, sells the reverse.
 */
export function quotePrice(
  inputMint: string,
  inAmount: string,
  outAmount: string,
  tokenDecimals: number
): number {
  const solIn = inputMint === MINT_SOL;
  const sol = toUnits(solIn ? inAmount : outAmount, SOL_DECIMALS);
  const tokens = toUnits(solIn ? outAmount : inAmount, tokenDecimals);
  return tokens > 0 ? sol / tokens : 0;
}

export type SolanaMarketDataOptions = {
  connection: Connection;
  jupiter: JupiterClient;
  /** Quotes older than this are refused when building a swap. */
  maxQuoteAgeMs: number;
  now?: () => number;
};

/** MarketDataPort over Solana RPC, the Jupiter aggregator and DexScreener pairs. */
export function createSolanaMarketData(opts: SolanaMarketDataOptions): MarketDataPort {
  const clock = opts.now ?? Date.now;
  const rawQuotes = new WeakMap<Quote, Awaited<ReturnType<JupiterClient["quote"]>>>();

  return {
    balance: (owner: string): Promise<number> => getSolBalance(opts.connection, owner),

    holdings: (owner: string): Promise<Map<string, TokenHolding>> => getTokenHoldings(opts.connection, owner),

    async quote(inputMint: string, outputMint: string, amountBaseUnits: bigint): Promise<Quote> {
      const tokenMint = inputMint === MINT_SOL ? outputMint : inputMint;
      const [response, decimals] = await Promise.all([
        opts.jupiter.quote(inputMint, outputMint, amountBaseUnits),
        getTokenDecimals(opts.connection, tokenMint),
      ]);
      const quote: Quote = {
        inputMint: response.inputMint,
        outputMint: response.outputMint,
        inAmount: response.inAmount,
        outAmount: response.outAmount,
        price: quotePrice(response.inputMint, response.inAmount, response.outAmount, decimals),
        fetchedAt: clock(),
        raw: response,
      };
      rawQuotes.set(quote, response);
      return quote;
    },

    async buildSwap(quote: Quote, owner: string): Promise<UnsignedSwap> {
      const response = rawQuotes.get(quote);
      if (!response) {
        throw new ValidationError("quote", "not issued by this market data port");
      }
      if (clock() - quote.fetchedAt > opts.maxQuoteAgeMs) {
        throw new QuoteExpiredError(`quote is ${clock() - quote.fetchedAt}ms old`);
      }
      const swap = await opts.jupiter.swapTx(response, owner);
      return { transaction: swap.swapTransaction, lastValidBlockHeight: swap.lastValidBlockHeight };
    },

    async tick(mint: string): Promise<MarketTick> {
      const pairs = await getBatchTokens([mint], TICK_TTL_MS);
      const best = getBestPair(pairs.get(mint) ?? []);
      if (!best) {
        throw new ValidationError("tick", `no pair listed for ${mint}`);
      }
      return pairToTick(best);
    },
  };
}
