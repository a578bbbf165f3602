#!/usr/bin/env tsx
// Snapshots a token's balances mapping into state.bin + stem-index.bin
//
// Ex: npm run build-state-store -- --preset usdc-sepolia --output ./usdc-demo --wallet-mapping

import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  BaseTool,
  CHAIN_IDS,
  InvalidInputError,
  getChain,
  getTokenPreset,
  loadWalletList,
  dedupeWallets,
  parseWord,
  runStatePipeline,
  runTool,
  type CLIOptions,
  type ToolContext,
} from "../index";

const ROOT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");

interface BuildStateStoreOptions extends CLIOptions {
  contract: string;
  mappingSlot: bigint;
  decimals: number;
  wallets: string[];
  walletsFile?: string;
  chainId: bigint;
  block?: bigint;
  blockHash: boolean;
  output: string;
  concurrency: number;
  walletMapping: boolean;
}

function parseBigIntArg(value: unknown, name: string): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
    return BigInt(value);
  }
  throw new InvalidInputError(`--${name} must be a non-negative integer, got ${String(value)}`);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function parseOptions(argv: Record<string, unknown>): BuildStateStoreOptions {
  const preset = optionalString(argv.preset) ? getTokenPreset(String(argv.preset)) : undefined;
  const chain = getChain(optionalString(argv.chain) ?? preset?.chain ?? "sepolia");

  const contract = optionalString(argv.contract) ?? preset?.contract;
  if (!contract) {
    throw new InvalidInputError("--contract or --preset is required");
  }
  const mappingSlotArg = argv["mapping-slot"] ?? preset?.mappingSlot;
  if (mappingSlotArg === undefined) {
    throw new InvalidInputError("--mapping-slot or --preset is required");
  }

  const walletsArg = Array.isArray(argv.wallets) ? argv.wallets.map(String) : [];
  const walletsFile =
    optionalString(argv["wallets-file"]) ??
    (walletsArg.length === 0 && preset?.walletsFile ? path.join(ROOT_DIR, preset.walletsFile) : undefined);

  const block = argv.block === undefined ? undefined : parseBigIntArg(argv.block, "block");
  const concurrency = Number(argv.concurrency);
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError(`--concurrency must be a positive integer`);
  }

  return {
    url: optionalString(argv.url),
    chain,
    timeout: typeof argv.timeout === "number" ? argv.timeout : undefined,
    contract,
    mappingSlot:
      typeof mappingSlotArg === "bigint" ? mappingSlotArg : parseBigIntArg(mappingSlotArg, "mapping-slot"),
    decimals: typeof argv.decimals === "number" ? argv.decimals : preset?.decimals ?? 0,
    wallets: dedupeWallets(walletsArg),
    walletsFile,
    chainId: argv["chain-id"] === undefined ? CHAIN_IDS[chain] : parseBigIntArg(argv["chain-id"], "chain-id"),
    block,
    blockHash: argv["block-hash"] === true,
    output: optionalString(argv.output) ?? "state-store",
    concurrency,
    walletMapping: argv["wallet-mapping"] === true,
  };
}

class BuildStateStoreTool extends BaseTool {
  private readonly options: BuildStateStoreOptions;

  constructor(options: BuildStateStoreOptions, context: ToolContext) {
    super(
      {
        name: "build-state-store",
        description: "Snapshot a balances mapping into a stem-sorted state file",
      },
      context,
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const rpc = this.ensureRpc();
    const { logger } = this.context;
    const wallets = this.options.walletsFile
      ? dedupeWallets([...this.options.wallets, ...(await loadWalletList(this.options.walletsFile))])
      : this.options.wallets;

    const { blockNumber, extraction, store, paths } = await runStatePipeline(rpc, {
      contract: this.options.contract,
      mappingSlot: this.options.mappingSlot,
      wallets,
      chainId: this.options.chainId,
      outputDir: this.options.output,
      block: this.options.block,
      resolveBlockHash: this.options.blockHash
        ? async (block) => parseWord(await rpc.getBlockHash(block), "Block hash")
        : undefined,
      concurrency: this.options.concurrency,
      decimals: this.options.decimals,
      walletMapping: this.options.walletMapping,
      logger,
    });

    logger.info(`Summary for block #${blockNumber}`, {
      wallets: wallets.length,
      entries: store.entries.length,
      stems: store.stemIndex.length,
      zero: extraction.outcomes.filter(({ status }) => status === "zero").length,
      failed: extraction.failures.length,
      files: paths,
    });
  }
}

await runTool({
  toolClass: BuildStateStoreTool,
  parseOptions,
  yargsOptions: {
    preset: {
      type: "string",
      description: "Known token (sets chain, contract, mapping slot, decimals and wallets file)",
    },
    contract: {
      type: "string",
      description: "Address of the token contract",
    },
    "mapping-slot": {
      type: "string",
      description: "Storage slot of the balances mapping",
    },
    decimals: {
      type: "number",
      description: "Token decimals, for display",
    },
    wallets: {
      type: "array",
      string: true,
      description: "Wallet addresses to snapshot",
    },
    "wallets-file": {
      type: "string",
      description: "JSON file with an array of wallet addresses",
    },
    "chain-id": {
      type: "string",
      description: "Chain id written in the header (defaults to the chain's)",
    },
    block: {
      type: "string",
      description: "Block number to read at (defaults to latest)",
    },
    "block-hash": {
      type: "boolean",
      default: false,
      description: "Fetch the block hash for the header instead of zero-filling it",
    },
    output: {
      type: "string",
      default: "state-store",
      description: "Output directory",
    },
    concurrency: {
      type: "number",
      default: 4,
      description: "Concurrent storage requests",
    },
    "wallet-mapping": {
      type: "boolean",
      default: false,
      description: "Also write wallet-mapping.json",
    },
  },
});
