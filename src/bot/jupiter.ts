import { fetch as undiciFetch, Agent } from "undici";
import { z } from "zod";

const agent = new Agent({
  keepAliveTimeout: 30000,
  keepAliveMaxTimeout: 60000,
  connect: {
    timeout: 30000,
  },
});

const quoteResponseSchema = z
  .object({
    inputMint: z.string(),
    inAmount: z.string(),
    outputMint: z.string(),
    outAmount: z.string(),
    otherAmountThreshold: z.string(),
    swapMode: z.enum(["ExactIn", "ExactOut"]),
    slippageBps: z.number(),
    priceImpactPct: z.string(),
    routePlan: z.array(z.unknown()),
    contextSlot: z.number().optional(),
  })
  .passthrough();

export type QuoteResponse = z.infer<typeof quoteResponseSchema>;

const swapResponseSchema = z.object({
  swapTransaction: z.string(),
  lastValidBlockHeight: z.number(),
  prioritizationFeeLamports: z.number().optional(),
});

export type SwapResponse = z.infer<typeof swapResponseSchema>;

export type JupiterOptions = {
  baseUrl: string;
  apiKey: string;
  slippageBps: number;
};

function headers(apiKey: string): Record<string, string> {
  const h: Record<string, string> = {
    "Content-Type": "application/json",
    "Accept": "application/json",
  };
  if (apiKey) {
    h["x-api-key"] = apiKey;
  }
  return h;
}

export function createJupiterClient(opts: JupiterOptions) {
  async function quote(inputMint: string, outputMint: string, amount: bigint): Promise<QuoteResponse> {
    const url = new URL(`${opts.baseUrl}/swap/v1/quote`);
    url.searchParams.set("inputMint", inputMint);
    url.searchParams.set("outputMint", outputMint);
    url.searchParams.set("amount", amount.toString());
    url.searchParams.set("slippageBps", String(opts.slippageBps));
    url.searchParams.set("swapMode", "ExactIn");

    // Single request: executeIntent owns the retry budget for quotes.
    const res = await undiciFetch(url.toString(), { headers: headers(opts.apiKey), dispatcher: agent });
    if (!res.ok) {
      throw new Error(`Jup quote failed ${res.status}: ${await res.text()}`);
    }
    return quoteResponseSchema.parse(await res.json());
  }

  async function swapTx(quoteResponse: QuoteResponse, userPublicKey: string): Promise<SwapResponse> {
    const res = await undiciFetch(`${opts.baseUrl}/swap/v1/swap`, {
      method: "POST",
      headers: headers(opts.apiKey),
      body: JSON.stringify({
        quoteResponse,
        userPublicKey,
        wrapAndUnwrapSol: true,
        dynamicComputeUnitLimit: true,
        dynamicSlippage: false,
        prioritizationFeeLamports: {
          priorityLevelWithMaxLamports: { priorityLevel: "medium", maxLamports: 1_000_000, global: false },
        },
      }),
      dispatcher: agent,
    });
    if (!res.ok) throw new Error(`Jup swap failed ${res.status}: ${await res.text()}`);
    return swapResponseSchema.parse(await res.json());
  }

  return { quote, swapTx };
}

export type JupiterClient = ReturnType<typeof createJupiterClient>;
