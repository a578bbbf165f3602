import { InvalidInputError } from "../../utils/errors";
import { numberWithCommas } from "../../utils/functions";
import { silentLogger, type Logger } from "../../utils/logger";
import type { StorageFetcher } from "../../utils/rpc";
import { extractMappingValues, type MappingExtraction } from "./balance-extractor";
import { StateStoreBuilder, type BuiltStateStore } from "./state-builder";
import { writeStateStore, type StateStorePaths } from "./state-writer";

export interface StatePipelineOptions {
  contract: string;
  mappingSlot: bigint;
  wallets: readonly string[];
  chainId: bigint;
  outputDir: string;
  /** defaults to the node's latest block number, fetched once for every read */
  block?: bigint;
  /** resolves the header block hash; zero-filled when absent */
  resolveBlockHash?: (blockNumber: bigint) => Promise<Uint8Array>;
  concurrency?: number;
  decimals?: number;
  walletMapping?: boolean;
  logger?: Logger;
}

export interface StatePipelineResult {
  blockNumber: bigint;
  extraction: MappingExtraction;
  store: BuiltStateStore;
  paths: StateStorePaths;
}

/**
 * wallet list -> mapping slots -> values at one block -> sorted state store on disk
 */
export async function runStatePipeline(
  fetcher: StorageFetcher,
  options: StatePipelineOptions,
): Promise<StatePipelineResult> {
  const logger = options.logger ?? silentLogger;
  if (options.wallets.length === 0) {
    throw new InvalidInputError("No wallets to query");
  }

  const blockNumber = options.block ?? (await fetcher.blockNumber());
  logger.info(`Checking ${options.wallets.length} wallets at block #${blockNumber}`);

  const extraction = await extractMappingValues(fetcher, {
    contract: options.contract,
    mappingSlot: options.mappingSlot,
    wallets: options.wallets,
    blockTag: blockNumber,
    concurrency: options.concurrency,
    decimals: options.decimals,
    logger,
  });
  if (extraction.failures.length > 0) {
    logger.warn(`${extraction.failures.length} wallet(s) skipped after fetch failures`);
  }

  const blockHash = options.resolveBlockHash ? await options.resolveBlockHash(blockNumber) : undefined;
  const store = new StateStoreBuilder({ chainId: options.chainId, blockNumber, blockHash })
    .addAll(extraction.records)
    .build();

  const paths = await writeStateStore(
    store,
    options.outputDir,
    options.walletMapping ? { contract: options.contract, mappingSlot: options.mappingSlot } : undefined,
  );

  logger.info(
    `Wrote ${numberWithCommas(store.entries.length)} entries ` +
      `(${numberWithCommas(store.stemIndex.length)} stems) to ${paths.state}`,
  );
  logger.info(`Wrote stem index to ${paths.stemIndex}`);
  if (paths.walletMapping) {
    logger.info(`Wrote wallet mapping to ${paths.walletMapping}`);
  }

  return { blockNumber, extraction, store, paths };
}
