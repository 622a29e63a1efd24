import { isPositiveFinite } from "./math.js";
import type { RugAnalysis, TokenMeta } from "./types.js";

export type ValidationSettings = {
  maxTokenAgeMs: number;
};

export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = {
  maxTokenAgeMs: 10 * 60_000,
};

export type CandidateInput = {
  meta: TokenMeta;
  price: number;
  rug: RugAnalysis;
  trendAllows: boolean;
  whitelisted: boolean;
  now: number;
};

export type ValidationResult = {
  ok: boolean;
  reasons: string[];
};

/** Basic gate for tokens that are not yet held. */
export function validateCandidate(
  input: CandidateInput,
  settings: ValidationSettings = DEFAULT_VALIDATION_SETTINGS
): ValidationResult {
  const reasons: string[] = [];
  const ageMs = input.now - input.meta.discoveredAt;

  if (!input.whitelisted && ageMs > settings.maxTokenAgeMs) {
    reasons.push(`stale: discovered ${Math.round(ageMs / 1000)}s ago`);
  }
  if (!isPositiveFinite(input.price)) {
    reasons.push("no usable price");
  }
  if (input.rug.isRugPull) {
    reasons.push(`rug suspected: ${input.rug.reasons.join(",")}`);
  }
  if (!input.trendAllows) {
    reasons.push("choppy market");
  }

  return { ok: reasons.length === 0, reasons };
}
