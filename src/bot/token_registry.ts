import { RingBuffer } from "./ring_buffer.js";
import type { TokenLifecycleState, TokenMeta } from "./types.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export type TokenRecord = {
  meta: TokenMeta;
  state: TokenLifecycleState;
  prices: RingBuffer<number>;
  lastVolume: number;
  updatedAt: number;
  /** Strategy evaluations so far; zero means the discovery event is still due. */
  evaluations: number;
  /** Failed or malformed ticks since the last good one, counted inside the miss window. */
  priceMisses: number;
  firstMissAt: number | null;
};

export type RegistrySettings = {
  priceCapacity: number;
  discoveredTtlMs: number;
  disposedRetentionMs: number;
  /** Force a sell of a held token whose price keeps going missing. */
  sellOnPriceMissing: boolean;
  maxPriceMisses: number;
  priceMissWindowMs: number;
};

export const DEFAULT_REGISTRY_SETTINGS: RegistrySettings = {
  priceCapacity: 120,
  discoveredTtlMs: 10 * 60_000,
  disposedRetentionMs: 10 * 60_000,
  sellOnPriceMissing: true,
  maxPriceMisses: 5,
  priceMissWindowMs: 5 * 60_000,
};

const records = new Map<string, TokenRecord>();

/**
 * Registers a token once. Returns null while any record exists for the
 * mint, disposed ones included, so a re-entry waits for retention expiry.
 */
export function registerToken(
  meta: TokenMeta,
  settings: RegistrySettings = DEFAULT_REGISTRY_SETTINGS,
  now: number = Date.now()
): TokenRecord | null {
  if (records.has(meta.mint)) return null;

  const rec: TokenRecord = {
    meta,
    state: "discovered",
    prices: new RingBuffer<number>(settings.priceCapacity),
    lastVolume: 0,
    updatedAt: now,
    evaluations: 0,
    priceMisses: 0,
    firstMissAt: null,
  };
  records.set(meta.mint, rec);
  logger.info({ mint: shortMint(meta.mint), source: meta.source }, "REGISTRY: Token discovered");
  return rec;
}

export function getToken(mint: string): TokenRecord | undefined {
  return records.get(mint);
}

export function transitionToken(mint: string, next: TokenLifecycleState, now: number = Date.now()): void {
  const rec = records.get(mint);
  if (!rec) return;
  const prev = rec.state;
  rec.state = next;
  rec.updatedAt = now;
  logger.info({ mint: shortMint(mint), from: prev, to: next }, "REGISTRY: Lifecycle transition");
}

export function recordObservation(mint: string, price: number, volume: number, now: number = Date.now()): void {
  const rec = records.get(mint);
  if (!rec) return;
  rec.prices.push(price);
  rec.lastVolume = volume;
  rec.updatedAt = now;
  rec.priceMisses = 0;
  rec.firstMissAt = null;
}

/**
 * Counts a tick that could not be used. A miss outside the window starts a
 * new count. Returns true once the count reaches `maxPriceMisses` and
 * selling on missing prices is enabled.
 */
export function recordPriceMiss(
  mint: string,
  settings: RegistrySettings = DEFAULT_REGISTRY_SETTINGS,
  now: number = Date.now()
): boolean {
  const rec = records.get(mint);
  if (!rec) return false;
  if (rec.firstMissAt === null || now - rec.firstMissAt > settings.priceMissWindowMs) {
    rec.priceMisses = 1;
    rec.firstMissAt = now;
  } else {
    rec.priceMisses++;
  }
  return settings.sellOnPriceMissing && rec.priceMisses >= settings.maxPriceMisses;
}

export function listTokens(state?: TokenLifecycleState): TokenRecord[] {
  const all = Array.from(records.values());
  return state ? all.filter((r) => r.state === state) : all;
}

/**
 * Forgets discovered tokens that were never bought within the TTL and
 * disposed tokens past retention. Held tokens and pinned (whitelisted)
 * candidates are never expired.
 */
export function expireTokens(
  settings: RegistrySettings = DEFAULT_REGISTRY_SETTINGS,
  now: number = Date.now(),
  pinned: ReadonlySet<string> = new Set()
): string[] {
  const expired: string[] = [];
  for (const [mint, rec] of records) {
    if (pinned.has(mint) && rec.state === "discovered") continue;
    const age = now - rec.updatedAt;
    const discoveredAge = now - rec.meta.discoveredAt;
    if (rec.state === "discovered" && discoveredAge > settings.discoveredTtlMs) {
      expired.push(mint);
    } else if (rec.state === "disposed" && age > settings.disposedRetentionMs) {
      expired.push(mint);
    }
  }
  for (const mint of expired) records.delete(mint);
  if (expired.length > 0) {
    logger.debug({ count: expired.length }, "REGISTRY: Expired stale tokens");
  }
  return expired;
}

export function getTrackedTokenCount(): number {
  return records.size;
}

export function clearTokenRegistry(): void {
  records.clear();
}
