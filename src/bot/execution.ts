import { MINT_SOL } from "./config.js";
import { errorMessage, isStaleQuoteError } from "./errors.js";
import type { MarketDataPort, Quote, Signer, UnsignedSwap } from "./ports.js";
import type { SwapResult, TradeIntent } from "./types.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";
import { sleep } from "../utils/sleep.js";

export type ExecutionMode = "live" | "paper";

export type ExecutionSettings = {
  mode: ExecutionMode;
  buyAmountSol: number;
  maxAttempts: number;
  retryDelayMs: number;
};

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  mode: "paper",
  buyAmountSol: 0.05,
  maxAttempts: 3,
  retryDelayMs: 1000,
};

export type ExecutionDeps = {
  market: MarketDataPort;
  signer: Signer;
  wait?: (ms: number) => Promise<void>;
};

const LAMPORTS_PER_SOL = 1_000_000_000;

// Token amounts credited by paper buys; the real wallet never receives them.
const paperHoldings = new Map<string, bigint>();

function baseUnits(amount: string): bigint {
  return /^\d+$/.test(amount) ? BigInt(amount) : 0n;
}

export function getPaperHolding(mint: string): bigint {
  return paperHoldings.get(mint) ?? 0n;
}

export function clearPaperHoldings(): void {
  paperHoldings.clear();
}

function failed(intent: TradeIntent, attempts: number, failureReason: string): SwapResult {
  return {
    mint: intent.mint,
    action: intent.action,
    success: false,
    executedPrice: 0,
    signature: null,
    attempts,
    failureReason,
  };
}

async function resolveAmount(
  intent: TradeIntent,
  deps: ExecutionDeps,
  settings: ExecutionSettings
): Promise<bigint> {
  if (intent.action === "buy") {
    const sol = settings.buyAmountSol * intent.sizeMultiplier;
    return BigInt(Math.floor(sol * LAMPORTS_PER_SOL));
  }
  if (settings.mode === "paper") return getPaperHolding(intent.mint);
  const holdings = await deps.market.holdings(deps.signer.publicKey);
  return holdings.get(intent.mint)?.amountBaseUnits ?? 0n;
}

/**
 * Quotes, builds and submits one swap. A stale quote is retried with a
 * fresh one; quote and build failures are retried as transient. A signer
 * or chain rejection ends the attempt loop. Never throws.
 */
export async function executeIntent(
  intent: TradeIntent,
  deps: ExecutionDeps,
  settings: ExecutionSettings = DEFAULT_EXECUTION_SETTINGS
): Promise<SwapResult> {
  const wait = deps.wait ?? sleep;
  const mintLog = shortMint(intent.mint);

  let amount: bigint;
  try {
    amount = await resolveAmount(intent, deps, settings);
  } catch (err) {
    logger.error({ mint: mintLog, action: intent.action, err: errorMessage(err) }, "EXECUTION: Could not size trade");
    return failed(intent, 0, `sizing failed: ${errorMessage(err)}`);
  }
  if (amount <= 0n) {
    return failed(intent, 0, intent.action === "sell" ? "no token balance to sell" : "buy amount is zero");
  }

  const [inputMint, outputMint] = intent.action === "buy"
    ? [MINT_SOL, intent.mint]
    : [intent.mint, MINT_SOL];

  let lastError = "no attempts made";
  for (let attempt = 1; attempt <= settings.maxAttempts; attempt++) {
    let quote: Quote;
    try {
      quote = await deps.market.quote(inputMint, outputMint, amount);
    } catch (err) {
      lastError = `quote failed: ${errorMessage(err)}`;
      logger.warn({ mint: mintLog, attempt, err: errorMessage(err) }, "EXECUTION: Quote attempt failed");
      if (attempt < settings.maxAttempts) await wait(settings.retryDelayMs * attempt);
      continue;
    }

    if (settings.mode === "paper") {
      if (intent.action === "buy") {
        paperHoldings.set(intent.mint, getPaperHolding(intent.mint) + baseUnits(quote.outAmount));
      } else {
        paperHoldings.delete(intent.mint);
      }
      logger.info({ mint: mintLog, action: intent.action, price: quote.price, reason: intent.reason }, "EXECUTION: Paper swap");
      return {
        mint: intent.mint,
        action: intent.action,
        success: true,
        executedPrice: quote.price,
        signature: `paper-${mintLog}-${quote.fetchedAt}`,
        attempts: attempt,
      };
    }

    let unsigned: UnsignedSwap;
    try {
      unsigned = await deps.market.buildSwap(quote, deps.signer.publicKey);
    } catch (err) {
      lastError = `swap build failed: ${errorMessage(err)}`;
      logger.warn({ mint: mintLog, attempt, err: errorMessage(err) }, "EXECUTION: Swap build attempt failed");
      if (attempt < settings.maxAttempts) await wait(settings.retryDelayMs * attempt);
      continue;
    }

    try {
      const signature = await deps.signer.signAndSubmit(unsigned);
      logger.info({
        mint: mintLog,
        action: intent.action,
        price: quote.price,
        attempt,
        sig: signature,
        reason: intent.reason,
      }, "EXECUTION: Swap confirmed");
      return {
        mint: intent.mint,
        action: intent.action,
        success: true,
        executedPrice: quote.price,
        signature,
        attempts: attempt,
      };
    } catch (err) {
      lastError = errorMessage(err);
      if (!isStaleQuoteError(err)) {
        logger.error({ mint: mintLog, action: intent.action, attempt, err: lastError }, "EXECUTION: Swap rejected");
        return failed(intent, attempt, lastError);
      }
      logger.warn({ mint: mintLog, attempt, err: lastError }, "EXECUTION: Quote went stale, requoting");
      if (attempt < settings.maxAttempts) await wait(settings.retryDelayMs * attempt);
    }
  }

  logger.error({ mint: mintLog, action: intent.action, attempts: settings.maxAttempts, err: lastError }, "EXECUTION: Attempts exhausted");
  return failed(intent, settings.maxAttempts, `attempts exhausted: ${lastError}`);
}
