import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

const whitelist = new Set<string>();

export function seedWhitelist(mints: string[]): void {
  for (const m of mints) whitelist.add(m);
}

export function addToWhitelist(mint: string): boolean {
  if (whitelist.has(mint)) return false;
  whitelist.add(mint);
  logger.info({ mint: shortMint(mint), size: whitelist.size }, "WHITELIST: Added");
  return true;
}

export function removeFromWhitelist(mint: string): boolean {
  const removed = whitelist.delete(mint);
  if (removed) logger.info({ mint: shortMint(mint), size: whitelist.size }, "WHITELIST: Removed");
  return removed;
}

export function isWhitelisted(mint: string): boolean {
  return whitelist.has(mint);
}

/** Copy taken at cycle start; later writes show up on the next cycle. */
export function snapshotWhitelist(): ReadonlySet<string> {
  return new Set(whitelist);
}

export function getWhitelistSize(): number {
  return whitelist.size;
}

export function clearWhitelist(): void {
  whitelist.clear();
}
