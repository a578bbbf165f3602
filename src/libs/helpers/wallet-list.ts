import { readJSON } from "../../utils/file-operations";
import { InvalidInputError } from "../../utils/errors";
import { parseAddress } from "../../utils/bytes";

/**
 * Reads a JSON array of wallet addresses. Entries are validated but kept as
 * given; duplicates (case-insensitive) are dropped, first one wins.
 */
export async function loadWalletList(path: string): Promise<string[]> {
  const content = await readJSON(path);
  if (!Array.isArray(content)) {
    throw new InvalidInputError(`${path} must contain a JSON array of addresses`);
  }
  return dedupeWallets(
    content.map((wallet, i) => {
      if (typeof wallet !== "string") {
        throw new InvalidInputError(`${path}[${i}] is not a string`);
      }
      return wallet;
    }),
  );
}

export function dedupeWallets(wallets: readonly string[]): string[] {
  const seen = new Set<string>();
  return wallets.filter((wallet) => {
    parseAddress(wallet);
    const key = wallet.toLowerCase();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
