import { fetch as undiciFetch } from "undici";
import { z } from "zod";
import type { ModelScore, ModelScoreRequest, ModelScorer } from "./ports.js";

const scoreSchema = z.object({
  action: z.enum(["buy", "sell", "hold"]),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().optional(),
});

export type HttpModelScorerOptions = {
  url: string;
  apiKey: string;
  timeoutMs: number;
};

/** Posts the token snapshot to an external scoring service and validates the verdict. */
export function createHttpModelScorer(opts: HttpModelScorerOptions): ModelScorer {
  return {
    async score(request: ModelScoreRequest): Promise<ModelScore> {
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
        "Accept": "application/json",
      };
      if (opts.apiKey) headers["Authorization"] = `Bearer ${opts.apiKey}`;

      const res = await undiciFetch(opts.url, {
        method: "POST",
        headers,
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
      if (!res.ok) {
        throw new Error(`model scorer returned ${res.status}: ${await res.text()}`);
      }
      return scoreSchema.parse(await res.json());
    },
  };
}
