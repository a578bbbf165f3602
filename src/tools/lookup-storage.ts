#!/usr/bin/env tsx
// Finds a wallet's balance record in a state store the way a PIR client would:
// derive the slot and tree key locally, then binary search the stem index.
//
// Ex: npm run lookup-storage -- --dir ./usdc-demo --preset usdc-sepolia --wallet 0x...01

import {
  BaseTool,
  InvalidInputError,
  StateStoreReader,
  assertMappingSlot,
  computeMappingSlot,
  computeStem,
  computeStorageTreeIndex,
  formatAmount,
  getSubindex,
  getTokenPreset,
  parseAddress,
  runTool,
  toHex,
  wordToBigInt,
  type CLIOptions,
  type ToolContext,
} from "../index";

interface LookupStorageOptions extends CLIOptions {
  dir: string;
  contract: string;
  mappingSlot: bigint;
  decimals: number;
  wallet: string;
}

class LookupStorageTool extends BaseTool {
  private readonly options: LookupStorageOptions;

  constructor(options: LookupStorageOptions, context: ToolContext) {
    super(
      {
        name: "lookup-storage",
        description: "Look up a wallet's mapping entry in a state store",
      },
      context,
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const { logger } = this.context;
    const contract = parseAddress(this.options.contract);
    const wallet = parseAddress(this.options.wallet);

    const slot = computeMappingSlot(wallet, this.options.mappingSlot);
    const treeIndex = computeStorageTreeIndex(slot);
    logger.info(`Derived coordinates for ${this.options.wallet}`, {
      slot: toHex(slot),
      treeIndex: toHex(treeIndex),
      stem: toHex(computeStem(contract, treeIndex)),
      subindex: getSubindex(treeIndex),
    });

    const reader = await StateStoreReader.open(this.options.dir);
    const stemOffset = reader.stemIndex.lookupStemOffset(contract, treeIndex);
    const found = reader.lookup(contract, treeIndex);
    if (!found) {
      logger.warn(
        stemOffset === undefined
          ? `Stem not present in ${reader.stemIndex.count} indexed stems`
          : `Stem found at ${stemOffset} but no entry with subindex ${getSubindex(treeIndex)}`,
      );
      return;
    }

    const raw = wordToBigInt(found.entry.value);
    logger.info(`#${reader.header.blockNumber} - ${this.options.wallet}`, {
      index: found.index,
      stemOffset,
      raw,
      amount: formatAmount(raw, this.options.decimals),
    });
  }
}

await runTool({
  toolClass: LookupStorageTool,
  requiresRpc: false,
  parseOptions: (argv) => {
    const preset = typeof argv.preset === "string" ? getTokenPreset(argv.preset) : undefined;
    const contract = typeof argv.contract === "string" ? argv.contract : preset?.contract;
    const mappingSlot =
      typeof argv["mapping-slot"] === "number" ? assertMappingSlot(argv["mapping-slot"]) : preset?.mappingSlot;
    if (!contract || mappingSlot === undefined) {
      throw new InvalidInputError("Either --preset or both --contract and --mapping-slot are required");
    }
    return {
      dir: String(argv.dir),
      contract,
      mappingSlot,
      decimals: typeof argv.decimals === "number" ? argv.decimals : preset?.decimals ?? 0,
      wallet: String(argv.wallet),
    };
  },
  yargsOptions: {
    dir: {
      type: "string",
      description: "Directory holding state.bin and stem-index.bin",
      demandOption: true,
    },
    preset: {
      type: "string",
      description: "Known token (sets contract, mapping slot and decimals)",
    },
    contract: {
      type: "string",
      description: "Address of the token contract",
    },
    "mapping-slot": {
      type: "number",
      description: "Storage slot of the balances mapping",
    },
    decimals: {
      type: "number",
      description: "Token decimals, for display",
    },
    wallet: {
      type: "string",
      description: "Wallet to look up",
      demandOption: true,
    },
  },
});
