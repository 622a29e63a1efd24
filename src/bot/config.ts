import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseBool } from "./parse_bool.js";

export const MINT_SOL = "So11111111111111111111111111111111111111112";

function buildRpcUrl(raw: string): string {
  if (raw.startsWith("http://") || raw.startsWith("https://")) {
    return raw;
  }
  if (raw.length > 0) {
    return `https://mainnet.helius-rpc.com/?api-key=${raw}`;
  }
  return "https://api.mainnet-beta.solana.com";
}

const bool = (fallback: boolean) =>
  z.unknown().transform((v) => parseBool(v, fallback));

const mintList = z
  .string()
  .default("")
  .transform((raw) => raw.split(",").map((m) => m.trim()).filter((m) => m.length > 0));

const sourceList = z
  .string()
  .default("pumpfun")
  .transform((raw) => raw.split(",").map((m) => m.trim()).filter((m) => m.length > 0))
  .pipe(z.array(z.enum(["pumpfun", "profile", "boost", "whitelist", "manual"])));

const schema = z.object({
  ENV_NAME: z.string().default("dev"),
  SOLANA_RPC_URL: z.string().default(""),
  BOT_WALLET_PRIVATE_KEY: z.string({ required_error: "BOT_WALLET_PRIVATE_KEY is required" }).min(1, "BOT_WALLET_PRIVATE_KEY is required"),

  JUP_BASE_URL: z.string().url().default("https://lite-api.jup.ag"),
  JUP_API_KEY: z.string().default(""),
  MAX_SLIPPAGE_BPS: z.coerce.number().int().min(1).max(2000).default(300),

  EXECUTION_MODE: z.enum(["paper", "live"]).default("paper"),
  STRATEGY: z.enum(["oscillator", "priority", "model"]).default("oscillator"),
  LOOP_SECONDS: z.coerce.number().int().min(5).max(3600).default(30),
  MAX_PARALLEL_TOKENS: z.coerce.number().int().min(1).max(64).default(8),
  MAX_POSITIONS: z.coerce.number().int().min(1).max(100).default(5),
  BUY_AMOUNT_SOL: z.coerce.number().min(0.001).max(100).default(0.05),

  WHITELIST_MINTS: mintList,
  PREFERRED_SOURCES: sourceList,
  REQUIRE_WHITELIST: bool(false),
  MAX_TOKEN_AGE_MINUTES: z.coerce.number().min(1).max(24 * 60).default(10),
  SELL_ON_PRICE_MISSING: bool(true),
  PRICE_MISS_MAX: z.coerce.number().int().min(1).max(100).default(5),
  PRICE_MISS_WINDOW_SECONDS: z.coerce.number().int().min(10).default(300),

  MODEL_SCORER_URL: z.preprocess((v) => (v === "" ? undefined : v), z.string().url().optional()),
  MODEL_SCORER_API_KEY: z.string().default(""),
  MODEL_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  MODEL_BYPASS_VALIDATION: bool(true),

  RSI_PERIOD: z.coerce.number().int().min(2).max(100).default(14),
  RSI_OVERSOLD: z.coerce.number().min(1).max(99).default(30),
  RSI_OVERBOUGHT: z.coerce.number().min(1).max(99).default(70),
  RSI_NEUTRAL_TAKE_PROFIT: bool(true),

  RUG_EXTREME_DROP_PCT: z.coerce.number().min(0.05).max(0.99).default(0.45),
  RUG_VOLUME_COLLAPSE_PCT: z.coerce.number().min(0.05).max(0.99).default(0.9),
  BLOCK_WHEN_CHOPPY: bool(true),

  TRAILING_ACTIVATION_PCT: z.coerce.number().min(0).max(10).default(0.2),
  TRAILING_DISTANCE_PCT: z.coerce.number().min(0.01).max(0.9).default(0.1),
  HARD_STOP_LOSS_PCT: z.coerce.number().min(0.01).max(0.99).default(0.25),
  MIN_HOLD_SECONDS: z.coerce.number().min(0).default(60),
  MAX_UNPROFITABLE_HOLD_MINUTES: z.coerce.number().min(1).default(30),
});

export type Env = z.infer<typeof schema>;

/** Parses the process environment. Any problem is a ConfigError naming every bad key. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = schema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid environment: ${problems}`);
  }
  const parsed = result.data;
  if (parsed.RSI_OVERSOLD >= parsed.RSI_OVERBOUGHT) {
    throw new ConfigError("invalid environment: RSI_OVERSOLD must be below RSI_OVERBOUGHT");
  }
  return {
    ...parsed,
    SOLANA_RPC_URL: buildRpcUrl(parsed.SOLANA_RPC_URL),
  };
}
