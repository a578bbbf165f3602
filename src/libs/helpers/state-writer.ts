import path from "node:path";
import { toHex } from "../../utils/bytes";
import { toJSON, writeFilesAtomic, type StagedFile } from "../../utils/file-operations";
import {
  STATE_FILE_NAME,
  STEM_INDEX_FILE_NAME,
  WALLET_MAPPING_FILE_NAME,
} from "../state-format/state-reader";
import type { BuiltStateStore } from "./state-builder";

export interface WalletMappingMetadata {
  contract: string;
  mappingSlot: bigint;
}

export interface StateStorePaths {
  state: string;
  stemIndex: string;
  walletMapping?: string;
}

function toJsonNumber(value: bigint): number | string {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}

export function walletMappingDocument(store: BuiltStateStore, metadata: WalletMappingMetadata) {
  return {
    block: toJsonNumber(store.header.blockNumber),
    blockHash: toHex(store.header.blockHash),
    chainId: toJsonNumber(store.header.chainId),
    contract: metadata.contract,
    mappingSlot: toJsonNumber(metadata.mappingSlot),
    entries: store.entries.length,
    wallets: Object.fromEntries(
      store.walletPositions.map(({ wallet, index }) => [wallet.toLowerCase(), index]),
    ),
  };
}

/**
 * Writes state.bin, stem-index.bin and optionally wallet-mapping.json. All
 * files are staged first; none shows up at its final path unless every one
 * of them was written.
 */
export async function writeStateStore(
  store: BuiltStateStore,
  outputDir: string,
  walletMapping?: WalletMappingMetadata,
): Promise<StateStorePaths> {
  const paths: StateStorePaths = {
    state: path.join(outputDir, STATE_FILE_NAME),
    stemIndex: path.join(outputDir, STEM_INDEX_FILE_NAME),
  };
  const files: StagedFile[] = [
    { path: paths.state, data: store.stateFile },
    { path: paths.stemIndex, data: store.stemIndexFile },
  ];
  if (walletMapping) {
    paths.walletMapping = path.join(outputDir, WALLET_MAPPING_FILE_NAME);
    files.push({ path: paths.walletMapping, data: toJSON(walletMappingDocument(store, walletMapping)) });
  }

  await writeFilesAtomic(files);
  return paths;
}
