import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dedupeWallets, loadWalletList } from "../src/libs/helpers/wallet-list";
import { InvalidInputError } from "../src/utils/errors";

const LOWER = "0x1c7d4b196cb0c7b01d743fbc6116a902379c7238";
const CHECKSUMMED = "0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238";
const ONE = "0x0000000000000000000000000000000000000001";

describe("wallet lists", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stem-state-wallets-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeList = async (content: unknown) => {
    const file = path.join(dir, "wallets.json");
    await fs.writeFile(file, JSON.stringify(content));
    return file;
  };

  it("drops case-insensitive duplicates, keeping the first spelling", () => {
    expect(dedupeWallets([CHECKSUMMED, ONE, LOWER])).toEqual([CHECKSUMMED, ONE]);
  });

  it("rejects malformed addresses", () => {
    expect(() => dedupeWallets([ONE, "0xnot-an-address"])).toThrow(InvalidInputError);
  });

  it("loads a JSON array of addresses", async () => {
    expect(await loadWalletList(await writeList([ONE, LOWER, ONE]))).toEqual([ONE, LOWER]);
  });

  it("rejects documents that are not arrays of strings", async () => {
    await expect(loadWalletList(await writeList({ wallets: [ONE] }))).rejects.toThrow(InvalidInputError);
    await expect(loadWalletList(await writeList([ONE, 1]))).rejects.toThrow(
      `${path.join(dir, "wallets.json")}[1] is not a string`,
    );
  });

  it("ships a valid list for the usdc-sepolia preset", async () => {
    const wallets = await loadWalletList(
      fileURLToPath(new URL("../data/wallets/usdc-sepolia.json", import.meta.url)),
    );
    expect(wallets.length).toBeGreaterThan(0);
  });
});
