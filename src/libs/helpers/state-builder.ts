import Debug from "debug";
import type { Hex } from "viem";
import { ADDRESS_LENGTH, assertLength, compareBytes, isZeroBytes, WORD_LENGTH } from "../../utils/bytes";
import { EmptyResultError, InvalidInputError } from "../../utils/errors";
import { computeStem, computeStorageTreeIndex, getSubindex } from "../ubt/tree-index";
import {
  createStateHeader,
  encodeStateFile,
  type StateHeader,
  type StorageEntry,
} from "../state-format/state-file";
import { buildStemIndex, encodeStemIndex, type StemIndexEntry } from "../state-format/stem-index";

const debug = Debug("stem-state:builder");

export interface StateStoreBuilderOptions {
  chainId: bigint;
  blockNumber: bigint;
  blockHash?: Uint8Array;
}

export interface StorageRecord {
  /** contract owning the storage */
  address: Uint8Array;
  slot: Uint8Array;
  value: Uint8Array;
  /** wallet the slot was derived from, if any */
  wallet?: Hex;
}

export interface DerivedEntry extends StorageEntry {
  slot: Uint8Array;
  stem: Uint8Array;
  wallet?: Hex;
}

export interface WalletPosition {
  wallet: Hex;
  index: number;
}

export interface BuiltStateStore {
  header: StateHeader;
  /** sorted by stem, then subindex, then insertion order */
  entries: DerivedEntry[];
  stemIndex: StemIndexEntry[];
  stateFile: Uint8Array;
  stemIndexFile: Uint8Array;
  walletPositions: WalletPosition[];
}

export function compareEntries(a: DerivedEntry, b: DerivedEntry): number {
  return compareBytes(a.stem, b.stem) || getSubindex(a.treeIndex) - getSubindex(b.treeIndex);
}

/**
 * Collects storage records and lays them out as a stem-sorted state file
 * plus its stem index.
 */
export class StateStoreBuilder {
  private readonly entries: DerivedEntry[] = [];

  constructor(private readonly options: StateStoreBuilderOptions) {
    if (options.blockHash) {
      assertLength(options.blockHash, WORD_LENGTH, "Block hash");
    }
  }

  get size(): number {
    return this.entries.length;
  }

  add(record: StorageRecord): this {
    assertLength(record.address, ADDRESS_LENGTH, "Contract address");
    assertLength(record.slot, WORD_LENGTH, "Storage slot");
    assertLength(record.value, WORD_LENGTH, "Storage value");
    if (isZeroBytes(record.value)) {
      throw new InvalidInputError(`Zero value for slot of ${record.wallet ?? "unknown wallet"}`);
    }

    const treeIndex = computeStorageTreeIndex(record.slot);
    this.entries.push({
      address: record.address,
      treeIndex,
      value: record.value,
      slot: record.slot,
      stem: computeStem(record.address, treeIndex),
      wallet: record.wallet,
    });
    return this;
  }

  addAll(records: Iterable<StorageRecord>): this {
    for (const record of records) {
      this.add(record);
    }
    return this;
  }

  build(): BuiltStateStore {
    if (this.entries.length === 0) {
      throw new EmptyResultError();
    }

    // Array.prototype.sort is stable: equal keys keep insertion order
    const entries = [...this.entries].sort(compareEntries);
    const header = createStateHeader(
      entries.length,
      this.options.blockNumber,
      this.options.chainId,
      this.options.blockHash,
    );
    const stemIndex = buildStemIndex(entries.map(({ stem }) => stem));
    debug(`Built ${entries.length} entries over ${stemIndex.length} stems`);

    const walletPositions: WalletPosition[] = [];
    entries.forEach(({ wallet }, index) => {
      if (wallet) {
        walletPositions.push({ wallet, index });
      }
    });

    return {
      header,
      entries,
      stemIndex,
      stateFile: encodeStateFile(header, entries),
      stemIndexFile: encodeStemIndex(stemIndex),
      walletPositions,
    };
  }
}
