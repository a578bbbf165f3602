import path from "node:path";
import { readBytes } from "../../utils/file-operations";
import { bytesEqual, compareBytes, toHex } from "../../utils/bytes";
import { StateFormatError } from "../../utils/errors";
import {
  computeStem,
  computeStorageTreeIndex,
  computeTreeKey,
  getSubindex,
  STEM_LENGTH,
} from "../ubt/tree-index";
import { decodeStateFile, type StateHeader, type StorageEntry } from "./state-file";
import { StemIndex } from "./stem-index";

export const STATE_FILE_NAME = "state.bin";
export const STEM_INDEX_FILE_NAME = "stem-index.bin";
export const WALLET_MAPPING_FILE_NAME = "wallet-mapping.json";

export interface StateLookupResult {
  index: number;
  entry: StorageEntry;
}

/**
 * Read side of a state store: the decoded state file plus its stem index.
 */
export class StateStoreReader {
  constructor(
    readonly header: StateHeader,
    readonly entries: readonly StorageEntry[],
    readonly stemIndex: StemIndex,
  ) {}

  static fromBytes(stateData: Uint8Array, stemIndexData: Uint8Array): StateStoreReader {
    const { header, entries } = decodeStateFile(stateData);
    return new StateStoreReader(header, entries, StemIndex.fromBytes(stemIndexData));
  }

  static async open(dir: string): Promise<StateStoreReader> {
    const [stateData, stemIndexData] = await Promise.all([
      readBytes(path.join(dir, STATE_FILE_NAME)),
      readBytes(path.join(dir, STEM_INDEX_FILE_NAME)),
    ]);
    return StateStoreReader.fromBytes(stateData, stemIndexData);
  }

  stemAt(index: number): Uint8Array {
    const { address, treeIndex } = this.entries[index];
    return computeStem(address, treeIndex);
  }

  /** Walks the stem's group from its first entry until the subindex matches */
  lookup(address: Uint8Array, treeIndex: Uint8Array): StateLookupResult | undefined {
    const stem = computeStem(address, treeIndex);
    const offset = this.stemIndex.findStem(stem);
    if (offset === undefined) {
      return undefined;
    }
    const subindex = getSubindex(treeIndex);
    for (let i = Number(offset); i < this.entries.length; i++) {
      const entry = this.entries[i];
      if (!bytesEqual(computeStem(entry.address, entry.treeIndex), stem)) {
        break;
      }
      if (getSubindex(entry.treeIndex) === subindex && bytesEqual(entry.address, address)) {
        return { index: i, entry };
      }
    }
    return undefined;
  }

  lookupStorage(address: Uint8Array, slot: Uint8Array): StateLookupResult | undefined {
    return this.lookup(address, computeStorageTreeIndex(slot));
  }

  /**
   * Checks that entries are ordered by tree key and that every stem resolves
   * through the index to an entry carrying that stem.
   */
  verify(): void {
    let previous: Uint8Array | undefined;
    const stems = new Set<string>();
    this.entries.forEach((entry, i) => {
      const key = computeTreeKey(entry.address, entry.treeIndex);
      if (previous && compareBytes(previous, key) > 0) {
        throw new StateFormatError("entries-not-sorted", `State entries out of order at ${i}`);
      }
      previous = key;
      stems.add(toHex(key.subarray(0, STEM_LENGTH)));
    });

    if (stems.size !== this.stemIndex.count) {
      throw new StateFormatError(
        "index-mismatch",
        `Stem index has ${this.stemIndex.count} stems, state file has ${stems.size}`,
      );
    }
    for (const { stem, offset } of this.stemIndex.entries) {
      const at = Number(offset);
      if (at >= this.entries.length || !bytesEqual(this.stemAt(at), stem)) {
        throw new StateFormatError("index-mismatch", `Stem index offset ${offset} does not match its stem`);
      }
      if (at > 0 && bytesEqual(this.stemAt(at - 1), stem)) {
        throw new StateFormatError(
          "index-mismatch",
          `Stem index offset ${offset} is not the first entry of its stem`,
        );
      }
    }
  }
}
