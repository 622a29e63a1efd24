import { AlreadyHeldError, NotFoundError, ValidationError } from "./errors.js";
import { isPositiveFinite, simpleReturns, std } from "./math.js";
import { RingBuffer } from "./ring_buffer.js";
import type { Position } from "./types.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export type PositionBookSettings = {
  historyCapacity: number;
  /** Gain (fraction of entry) at which the trailing stop arms. */
  trailingActivationPct: number;
};

export const DEFAULT_POSITION_BOOK_SETTINGS: PositionBookSettings = {
  historyCapacity: 120,
  trailingActivationPct: 0.2,
};

type PositionRecord = {
  mint: string;
  entryPrice: number;
  notionalSol: number;
  currentPrice: number;
  peakPrice: number;
  history: RingBuffer<number>;
  trailingStopArmed: boolean;
  openedAt: number;
  lastUpdateAt: number;
};

const positions = new Map<string, PositionRecord>();
let settings: PositionBookSettings = { ...DEFAULT_POSITION_BOOK_SETTINGS };

export function configurePositionBook(next: Partial<PositionBookSettings>): void {
  settings = { ...settings, ...next };
}

function snapshot(rec: PositionRecord): Position {
  const priceHistory = rec.history.toArray();
  return {
    mint: rec.mint,
    entryPrice: rec.entryPrice,
    notionalSol: rec.notionalSol,
    currentPrice: rec.currentPrice,
    peakPrice: rec.peakPrice,
    priceHistory,
    trailingStopArmed: rec.trailingStopArmed,
    openedAt: rec.openedAt,
    lastUpdateAt: rec.lastUpdateAt,
    unrealizedPnlPct: rec.currentPrice / rec.entryPrice - 1,
    volatility: std(simpleReturns(priceHistory)),
  };
}

export function openPosition(
  mint: string,
  entryPrice: number,
  notionalSol: number,
  now: number = Date.now()
): Position {
  if (positions.has(mint)) throw new AlreadyHeldError(mint);
  if (!isPositiveFinite(entryPrice)) throw new ValidationError("entryPrice", `must be positive, got ${entryPrice}`);
  if (!isPositiveFinite(notionalSol)) throw new ValidationError("notionalSol", `must be positive, got ${notionalSol}`);

  const history = new RingBuffer<number>(settings.historyCapacity);
  history.push(entryPrice);
  const rec: PositionRecord = {
    mint,
    entryPrice,
    notionalSol,
    currentPrice: entryPrice,
    peakPrice: entryPrice,
    history,
    trailingStopArmed: false,
    openedAt: now,
    lastUpdateAt: now,
  };
  positions.set(mint, rec);

  logger.info({ mint: shortMint(mint), entryPrice, notionalSol }, "POSITIONS: Opened");
  return snapshot(rec);
}

export function updatePosition(mint: string, price: number, now: number = Date.now()): Position {
  const rec = positions.get(mint);
  if (!rec) throw new NotFoundError(mint);
  if (!isPositiveFinite(price)) throw new ValidationError("price", `must be positive, got ${price}`);

  rec.currentPrice = price;
  rec.history.push(price);
  rec.lastUpdateAt = now;
  if (price > rec.peakPrice) rec.peakPrice = price;

  if (!rec.trailingStopArmed && price / rec.entryPrice - 1 >= settings.trailingActivationPct) {
    rec.trailingStopArmed = true;
    logger.info({
      mint: shortMint(mint),
      gainPct: ((price / rec.entryPrice - 1) * 100).toFixed(1),
    }, "POSITIONS: Trailing stop armed");
  }

  return snapshot(rec);
}

export function removePosition(mint: string): Position | undefined {
  const rec = positions.get(mint);
  if (!rec) return undefined;
  positions.delete(mint);
  logger.info({ mint: shortMint(mint) }, "POSITIONS: Removed");
  return snapshot(rec);
}

export function getPosition(mint: string): Position | undefined {
  const rec = positions.get(mint);
  return rec ? snapshot(rec) : undefined;
}

export function hasPosition(mint: string): boolean {
  return positions.has(mint);
}

export function getAllPositions(): Position[] {
  return Array.from(positions.values(), snapshot);
}

export function getPositionCount(): number {
  return positions.size;
}

export function clearPositions(): void {
  positions.clear();
  settings = { ...DEFAULT_POSITION_BOOK_SETTINGS };
}
