import { loadEnv } from "./config.js";
import { createDexScreenerFeed } from "./dexscreener.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createJupiterClient } from "./jupiter.js";
import { createSolanaMarketData } from "./market_data.js";
import { createHttpModelScorer } from "./model_scorer.js";
import { getOrchestratorStatus, startOrchestrator, stopOrchestrator } from "./orchestrator.js";
import { buildRuntimeConfig } from "./runtime_config.js";
import { createConnection, createKeypairSigner, loadKeypair } from "./solana.js";
import { createStrategy } from "./strategies/index.js";
import { seedWhitelist } from "./whitelist.js";
import { logger, setLoggerContext } from "../utils/logger.js";

const QUOTE_MAX_AGE_MS = 20_000;
const MODEL_TIMEOUT_MS = 15_000;
const DISCOVERY_BATCH = 60;

async function main(): Promise<void> {
  const env = loadEnv();
  const keypair = loadKeypair(env.BOT_WALLET_PRIVATE_KEY);
  const publicKey = keypair.publicKey.toBase58();
  setLoggerContext({ envName: env.ENV_NAME, walletLabel: `${publicKey.slice(0, 4)}...${publicKey.slice(-4)}` });

  const config = buildRuntimeConfig(env);
  if (config.strategy.kind === "model" && !env.MODEL_SCORER_URL) {
    throw new ConfigError("STRATEGY=model needs MODEL_SCORER_URL");
  }

  const connection = createConnection(env.SOLANA_RPC_URL);
  const jupiter = createJupiterClient({
    baseUrl: env.JUP_BASE_URL,
    apiKey: env.JUP_API_KEY,
    slippageBps: env.MAX_SLIPPAGE_BPS,
  });

  seedWhitelist(env.WHITELIST_MINTS);

  await startOrchestrator(
    {
      market: createSolanaMarketData({ connection, jupiter, maxQuoteAgeMs: QUOTE_MAX_AGE_MS }),
      signer: createKeypairSigner(connection, keypair),
      discovery: createDexScreenerFeed({ maxPerPoll: DISCOVERY_BATCH }),
      strategy: createStrategy(config.strategy),
      scorer: env.MODEL_SCORER_URL
        ? createHttpModelScorer({ url: env.MODEL_SCORER_URL, apiKey: env.MODEL_SCORER_API_KEY, timeoutMs: MODEL_TIMEOUT_MS })
        : undefined,
    },
    config
  );

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down, waiting for in-flight work");
    stopOrchestrator()
      .then(() => {
        logger.info({ status: getOrchestratorStatus() }, "Shutdown complete");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal({ err: err.message }, "Configuration error");
  } else {
    logger.fatal({ err: errorMessage(err) }, "Fatal startup error");
  }
  process.exit(1);
});
