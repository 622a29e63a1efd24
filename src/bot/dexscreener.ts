import { z } from "zod";
import type { DiscoveryFeed } from "./ports.js";
import type { DiscoverySource, MarketTick, TokenMeta } from "./types.js";
import { logger } from "../utils/logger.js";

const DEXSCREENER_BASE = "https://api.dexscreener.com";
const CACHE_TTL_MS = 60_000;
const BATCH_SIZE = 30;

type CacheEntry = { data: unknown; expiresAt: number };
const cache = new Map<string, CacheEntry>();

function getCached(key: string): unknown {
  const entry = cache.get(key);
  if (!entry) return undefined;
  if (Date.now() > entry.expiresAt) {
    cache.delete(key);
    return undefined;
  }
  return entry.data;
}

function setCached(key: string, data: unknown, ttlMs: number): void {
  const now = Date.now();
  // Batch keys carry mint lists and rarely repeat, so expired entries go on write.
  for (const [k, entry] of cache) {
    if (now > entry.expiresAt) cache.delete(k);
  }
  cache.set(key, { data, expiresAt: now + ttlMs });
}

export function getDexCacheSize(): number {
  return cache.size;
}

export function clearDexCache(): void {
  cache.clear();
}

async function dexFetch<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, ttlMs = CACHE_TTL_MS): Promise<T | null> {
  let raw = getCached(endpoint);

  if (raw === undefined) {
    const res = await fetch(`${DEXSCREENER_BASE}${endpoint}`, {
      headers: {
        "Accept": "application/json",
      },
    });
    if (!res.ok) {
      logger.warn({ status: res.status, endpoint }, "DexScreener API error");
      return null;
    }
    raw = await res.json();
    setCached(endpoint, raw, ttlMs);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ endpoint, issues: parsed.error.issues.length }, "DexScreener response did not match schema");
    return null;
  }
  return parsed.data;
}

const tokenListingSchema = z.object({
  chainId: z.string(),
  tokenAddress: z.string(),
  icon: z.string().nullish(),
});

export type TokenListing = z.infer<typeof tokenListingSchema>;

const tokenPairSchema = z.object({
  chainId: z.string(),
  dexId: z.string(),
  pairAddress: z.string(),
  baseToken: z.object({
    address: z.string(),
    symbol: z.string().default(""),
  }),
  priceNative: z.string(),
  volume: z.object({ m5: z.number().default(0) }).partial().default({}),
  liquidity: z.object({ usd: z.number().optional(), quote: z.number().optional() }).optional(),
  pairCreatedAt: z.number().optional(),
});

export type TokenPair = z.infer<typeof tokenPairSchema>;

export async function getTokenProfiles(): Promise<TokenListing[]> {
  const data = await dexFetch("/token-profiles/latest/v1", z.array(tokenListingSchema), 60_000);
  if (!data) return [];
  return data.filter((t) => t.chainId === "solana");
}

export async function getBoostedTokens(): Promise<TokenListing[]> {
  const data = await dexFetch("/token-boosts/latest/v1", z.array(tokenListingSchema), 60_000);
  if (!data) return [];
  return data.filter((t) => t.chainId === "solana");
}

export async function getBatchTokens(mints: string[], ttlMs = 30_000): Promise<Map<string, TokenPair[]>> {
  const result = new Map<string, TokenPair[]>();
  if (mints.length === 0) return result;

  for (let i = 0; i < mints.length; i += BATCH_SIZE) {
    const addresses = mints.slice(i, i + BATCH_SIZE).join(",");
    const data = await dexFetch(`/tokens/v1/solana/${addresses}`, z.array(tokenPairSchema), ttlMs);
    if (!data) continue;
    for (const pair of data) {
      const mint = pair.baseToken.address;
      const list = result.get(mint) ?? [];
      list.push(pair);
      result.set(mint, list);
    }
  }

  return result;
}

export function getBestPair(pairs: TokenPair[]): TokenPair | null {
  if (pairs.length === 0) return null;
  return pairs.reduce((best, p) => {
    const bestLiq = best.liquidity?.usd ?? 0;
    const pLiq = p.liquidity?.usd ?? 0;
    return pLiq > bestLiq ? p : best;
  }, pairs[0]);
}

/** SOL-denominated price and five-minute volume from the deepest pair. */
export function pairToTick(pair: TokenPair): MarketTick {
  return {
    price: parseFloat(pair.priceNative),
    volume: pair.volume.m5 ?? 0,
    liquidity: pair.liquidity?.quote,
  };
}

export function classifySource(pair: TokenPair | null, fallback: DiscoverySource): DiscoverySource {
  return pair && pair.dexId.startsWith("pump") ? "pumpfun" : fallback;
}

export type DexScreenerFeedOptions = {
  maxPerPoll: number;
  now?: () => number;
};

/**
 * Polls the latest profiles and boosts. Each poll is independent; the
 * consumer deduplicates.
 */
export function createDexScreenerFeed(opts: DexScreenerFeedOptions): DiscoveryFeed {
  const clock = opts.now ?? Date.now;
  return {
    async poll(): Promise<TokenMeta[]> {
      const [profiles, boosted] = await Promise.all([getTokenProfiles(), getBoostedTokens()]);

      const sources = new Map<string, DiscoverySource>();
      for (const p of profiles) sources.set(p.tokenAddress, "profile");
      for (const b of boosted) {
        if (!sources.has(b.tokenAddress)) sources.set(b.tokenAddress, "boost");
      }

      const mints = Array.from(sources.keys()).slice(0, opts.maxPerPoll);
      if (mints.length === 0) return [];

      const pairsMap = await getBatchTokens(mints);
      const now = clock();
      const metas: TokenMeta[] = [];
      for (const mint of mints) {
        const best = getBestPair(pairsMap.get(mint) ?? []);
        if (!best) continue;
        metas.push({
          mint,
          source: classifySource(best, sources.get(mint) ?? "profile"),
          discoveredAt: best.pairCreatedAt ?? now,
          symbol: best.baseToken.symbol || undefined,
        });
      }

      logger.debug({ listed: mints.length, priced: metas.length }, "DexScreener discovery poll");
      return metas;
    },
  };
}
