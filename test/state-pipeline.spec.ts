import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Hex } from "viem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runStatePipeline } from "../src/libs/helpers/state-pipeline";
import { decodeStateFile } from "../src/libs/state-format/state-file";
import { StateStoreReader } from "../src/libs/state-format/state-reader";
import { decodeStemIndex } from "../src/libs/state-format/stem-index";
import { computeMappingSlot } from "../src/libs/ubt/slot";
import { computeStem, computeStorageTreeIndex } from "../src/libs/ubt/tree-index";
import { parseAddress, toHex } from "../src/utils/bytes";
import { EmptyResultError, InvalidInputError } from "../src/utils/errors";
import { fileExists, readBytes, readJSON } from "../src/utils/file-operations";
import type { BlockTag, StorageFetcher } from "../src/utils/rpc";

const CONTRACT = "0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238";
const WALLET = "0x0000000000000000000000000000000000000001";
const SLOT = computeMappingSlot(parseAddress(WALLET), 9);

class FakeChain implements StorageFetcher {
  readonly blockTags: BlockTag[] = [];
  blockNumberCalls = 0;

  constructor(
    private readonly storage: Record<string, Hex>,
    private readonly head = 1234n,
  ) {}

  async getStorageAt(_contract: Hex, slot: Hex, blockTag: BlockTag): Promise<Hex> {
    this.blockTags.push(blockTag);
    return this.storage[slot] ?? "0x0";
  }

  async blockNumber(): Promise<bigint> {
    this.blockNumberCalls++;
    return this.head;
  }
}

describe("runStatePipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stem-state-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes a single-entry store for one funded wallet", async () => {
    const chain = new FakeChain({ [toHex(SLOT)]: "0x7b" });
    const { blockNumber, store, paths } = await runStatePipeline(chain, {
      contract: CONTRACT,
      mappingSlot: 9n,
      wallets: [WALLET],
      chainId: 11155111n,
      outputDir: dir,
      walletMapping: true,
    });

    expect(blockNumber).toBe(1234n);
    expect(chain.blockNumberCalls).toBe(1);
    expect(chain.blockTags).toEqual([1234n]);
    expect(store.entries).toHaveLength(1);

    const { header, entries } = decodeStateFile(await readBytes(paths.state));
    expect(header.entryCount).toBe(1n);
    expect(header.blockNumber).toBe(1234n);
    expect(header.chainId).toBe(11155111n);
    expect(header.blockHash).toEqual(new Uint8Array(32));
    expect(entries[0].address).toEqual(parseAddress(CONTRACT));
    expect(entries[0].treeIndex).toEqual(computeStorageTreeIndex(SLOT));
    expect(entries[0].value[31]).toBe(0x7b);
    expect(entries[0].value.subarray(0, 31)).toEqual(new Uint8Array(31));

    const stemIndex = decodeStemIndex(await readBytes(paths.stemIndex));
    expect(stemIndex).toEqual([
      { stem: computeStem(parseAddress(CONTRACT), computeStorageTreeIndex(SLOT)), offset: 0n },
    ]);

    expect(paths.walletMapping).toBe(path.join(dir, "wallet-mapping.json"));
    expect(await readJSON(path.join(dir, "wallet-mapping.json"))).toEqual({
      block: 1234,
      blockHash: `0x${"00".repeat(32)}`,
      chainId: 11155111,
      contract: CONTRACT,
      mappingSlot: 9,
      entries: 1,
      wallets: { [WALLET]: 0 },
    });

    const reader = await StateStoreReader.open(dir);
    reader.verify();
    expect(reader.lookupStorage(parseAddress(CONTRACT), SLOT)?.index).toBe(0);
  });

  it("reads every wallet at an explicit block without asking for the head", async () => {
    const chain = new FakeChain({ [toHex(SLOT)]: "0x01" });
    const { blockNumber } = await runStatePipeline(chain, {
      contract: CONTRACT,
      mappingSlot: 9n,
      wallets: [WALLET, "0x0000000000000000000000000000000000000002"],
      chainId: 1n,
      outputDir: dir,
      block: 500n,
    });
    expect(blockNumber).toBe(500n);
    expect(chain.blockNumberCalls).toBe(0);
    expect(chain.blockTags).toEqual([500n, 500n]);
  });

  it("pins block zero when it is requested explicitly", async () => {
    const chain = new FakeChain({ [toHex(SLOT)]: "0x01" }, 9999n);
    const { blockNumber, store } = await runStatePipeline(chain, {
      contract: CONTRACT,
      mappingSlot: 9n,
      wallets: [WALLET],
      chainId: 1n,
      outputDir: dir,
      block: 0n,
    });
    expect(blockNumber).toBe(0n);
    expect(store.header.blockNumber).toBe(0n);
    expect(chain.blockNumberCalls).toBe(0);
    expect(chain.blockTags).toEqual([0n]);
  });

  it("writes one entry for a wallet listed twice", async () => {
    const chain = new FakeChain({ [toHex(SLOT)]: "0x7b" });
    const { store } = await runStatePipeline(chain, {
      contract: CONTRACT,
      mappingSlot: 9n,
      wallets: [WALLET, WALLET],
      chainId: 1n,
      outputDir: dir,
      walletMapping: true,
    });
    expect(store.entries).toHaveLength(1);
    expect(chain.blockTags).toEqual([1234n]);
    expect(await readJSON(path.join(dir, "wallet-mapping.json"))).toMatchObject({
      entries: 1,
      wallets: { [WALLET]: 0 },
    });
  });

  it("writes the resolved block hash", async () => {
    const chain = new FakeChain({ [toHex(SLOT)]: "0x01" });
    const hash = new Uint8Array(32).fill(0xcd);
    await runStatePipeline(chain, {
      contract: CONTRACT,
      mappingSlot: 9n,
      wallets: [WALLET],
      chainId: 1n,
      outputDir: dir,
      resolveBlockHash: async () => hash,
    });
    const { header } = decodeStateFile(await readBytes(path.join(dir, "state.bin")));
    expect(header.blockHash).toEqual(hash);
  });

  it("creates no files when every balance is zero", async () => {
    const outputDir = path.join(dir, "out");
    await expect(
      runStatePipeline(new FakeChain({}), {
        contract: CONTRACT,
        mappingSlot: 9n,
        wallets: [WALLET],
        chainId: 1n,
        outputDir,
        walletMapping: true,
      }),
    ).rejects.toThrow(EmptyResultError);
    expect(await fileExists(outputDir)).toBe(false);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("refuses an empty wallet list", async () => {
    const chain = new FakeChain({});
    await expect(
      runStatePipeline(chain, { contract: CONTRACT, mappingSlot: 9n, wallets: [], chainId: 1n, outputDir: dir }),
    ).rejects.toThrow(InvalidInputError);
    expect(chain.blockNumberCalls).toBe(0);
  });
});
