// Log-friendly mint prefix.
export function shortMint(mint: string): string {
  return mint.slice(0, 8);
}
