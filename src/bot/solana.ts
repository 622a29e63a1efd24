import { Connection, Keypair, PublicKey, VersionedTransaction } from "@solana/web3.js";
import { getMint, TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID } from "@solana/spl-token";
import bs58 from "bs58";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { Signer, TokenHolding, UnsignedSwap } from "./ports.js";
import { logger } from "../utils/logger.js";
import { shortMint } from "../utils/mint.js";

export function createConnection(rpcUrl: string): Connection {
  return new Connection(rpcUrl, {
    commitment: "confirmed",
    confirmTransactionInitialTimeout: 60_000,
  });
}

export function loadKeypair(secret: string): Keypair {
  // Expect base58 of secretKey bytes (Uint8Array)
  try {
    return Keypair.fromSecretKey(bs58.decode(secret));
  } catch (err) {
    throw new ConfigError(`BOT_WALLET_PRIVATE_KEY is not a valid base58 secret key: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function createKeypairSigner(connection: Connection, keypair: Keypair): Signer {
  return {
    publicKey: keypair.publicKey.toBase58(),
    async signAndSubmit(unsigned: UnsignedSwap): Promise<string> {
      const tx = VersionedTransaction.deserialize(Buffer.from(unsigned.transaction, "base64"));
      tx.sign([keypair]);

      const sig = await connection.sendRawTransaction(tx.serialize(), {
        skipPreflight: true,
        maxRetries: 3,
      });

      const confirmation = await connection.confirmTransaction(
        {
          signature: sig,
          blockhash: tx.message.recentBlockhash,
          lastValidBlockHeight: unsigned.lastValidBlockHeight,
        },
        "confirmed"
      );
      if (confirmation.value.err) {
        throw new Error(`transaction ${sig} failed on chain: ${JSON.stringify(confirmation.value.err)}`);
      }
      return sig;
    },
  };
}

export async function getSolBalance(connection: Connection, owner: string): Promise<number> {
  const lamports = await connection.getBalance(new PublicKey(owner), "confirmed");
  return lamports / 1e9;
}

const parsedTokenAccount = z.object({
  type: z.literal("account"),
  info: z.object({
    mint: z.string(),
    tokenAmount: z.object({
      amount: z.string(),
      decimals: z.number(),
    }),
  }),
});

/** Token balances across the SPL Token and Token-2022 programs, in base units. */
export async function getTokenHoldings(connection: Connection, owner: string): Promise<Map<string, TokenHolding>> {
  const holdings = new Map<string, TokenHolding>();
  const ownerPk = new PublicKey(owner);

  for (const programId of [TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID]) {
    const accounts = await connection.getParsedTokenAccountsByOwner(ownerPk, { programId });
    for (const { account } of accounts.value) {
      const parsed = parsedTokenAccount.safeParse(account.data.parsed);
      if (!parsed.success) continue;
      const { mint, tokenAmount } = parsed.data.info;
      const amount = BigInt(tokenAmount.amount);
      if (amount === 0n) continue;
      const existing = holdings.get(mint);
      holdings.set(mint, {
        mint,
        amountBaseUnits: (existing?.amountBaseUnits ?? 0n) + amount,
        decimals: tokenAmount.decimals,
      });
    }
  }
  return holdings;
}

const decimalsCache = new Map<string, number>();

export async function getTokenDecimals(connection: Connection, mint: string): Promise<number> {
  const cached = decimalsCache.get(mint);
  if (cached !== undefined) return cached;

  const mintPk = new PublicKey(mint);
  let lastError: unknown;
  for (const programId of [TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID]) {
    try {
      const info = await getMint(connection, mintPk, "confirmed", programId);
      decimalsCache.set(mint, info.decimals);
      return info.decimals;
    } catch (err) {
      lastError = err;
    }
  }
  logger.warn({ mint: shortMint(mint), err: String(lastError) }, "Mint lookup failed under both token programs");
  throw lastError;
}
