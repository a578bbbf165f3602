import { compareBytes } from "../../utils/bytes";
import { EncodingInvariantError, StateFormatError } from "../../utils/errors";
import { computeStem, computeStorageTreeIndex, STEM_LENGTH } from "../ubt/tree-index";

export const STEM_INDEX_HEADER_SIZE = 8;
/** stem (31) + entry index (8) */
export const STEM_INDEX_ENTRY_SIZE = STEM_LENGTH + 8;

export interface StemIndexEntry {
  stem: Uint8Array;
  /** position of the stem's first entry in the sorted state file */
  offset: bigint;
}

/**
 * One entry per distinct stem, pointing at its first occurrence. The input
 * must already be sorted by stem.
 */
export function buildStemIndex(sortedStems: Iterable<Uint8Array>): StemIndexEntry[] {
  const index: StemIndexEntry[] = [];
  let position = 0n;
  for (const stem of sortedStems) {
    if (stem.length !== STEM_LENGTH) {
      throw new EncodingInvariantError(`Stem must be ${STEM_LENGTH} bytes, got ${stem.length}`);
    }
    const last = index[index.length - 1];
    const order = last ? compareBytes(stem, last.stem) : 1;
    if (order < 0) {
      throw new EncodingInvariantError(`Entries are not sorted by stem at position ${position}`);
    }
    if (order > 0) {
      index.push({ stem, offset: position });
    }
    position++;
  }
  return index;
}

export function stemIndexSize(count: number): number {
  return STEM_INDEX_HEADER_SIZE + count * STEM_INDEX_ENTRY_SIZE;
}

export function encodeStemIndex(entries: readonly StemIndexEntry[]): Uint8Array {
  const out = new Uint8Array(stemIndexSize(entries.length));
  const view = new DataView(out.buffer);
  view.setBigUint64(0, BigInt(entries.length), true);
  entries.forEach(({ stem, offset }, i) => {
    if (stem.length !== STEM_LENGTH) {
      throw new EncodingInvariantError(`Stem must be ${STEM_LENGTH} bytes, got ${stem.length}`);
    }
    if (i > 0 && compareBytes(entries[i - 1].stem, stem) >= 0) {
      throw new EncodingInvariantError(`Stem index is not strictly ascending at ${i}`);
    }
    const at = STEM_INDEX_HEADER_SIZE + i * STEM_INDEX_ENTRY_SIZE;
    out.set(stem, at);
    view.setBigUint64(at + STEM_LENGTH, offset, true);
  });
  return out;
}

export function decodeStemIndex(data: Uint8Array): StemIndexEntry[] {
  if (data.length < STEM_INDEX_HEADER_SIZE) {
    throw new StateFormatError("index-too-short", "Data too short for stem index header");
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const count = view.getBigUint64(0, true);
  const expected = BigInt(STEM_INDEX_HEADER_SIZE) + count * BigInt(STEM_INDEX_ENTRY_SIZE);
  if (BigInt(data.length) < expected) {
    throw new StateFormatError(
      "index-too-short",
      `Data too short: expected ${expected} bytes, got ${data.length}`,
    );
  }

  const entries: StemIndexEntry[] = [];
  for (let i = 0; i < Number(count); i++) {
    const at = STEM_INDEX_HEADER_SIZE + i * STEM_INDEX_ENTRY_SIZE;
    const stem = data.slice(at, at + STEM_LENGTH);
    if (i > 0 && compareBytes(entries[i - 1].stem, stem) >= 0) {
      throw new StateFormatError("index-not-sorted", "Stem index not sorted");
    }
    entries.push({ stem, offset: view.getBigUint64(at + STEM_LENGTH, true) });
  }
  return entries;
}

/**
 * In-memory stem table with O(log N) lookup of a stem's first entry index.
 */
export class StemIndex {
  constructor(readonly entries: readonly StemIndexEntry[]) {}

  static fromBytes(data: Uint8Array): StemIndex {
    return new StemIndex(decodeStemIndex(data));
  }

  get count(): number {
    return this.entries.length;
  }

  findStem(stem: Uint8Array): bigint | undefined {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const order = compareBytes(this.entries[mid].stem, stem);
      if (order === 0) {
        return this.entries[mid].offset;
      }
      if (order < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return undefined;
  }

  lookupStemOffset(address: Uint8Array, treeIndex: Uint8Array): bigint | undefined {
    return this.findStem(computeStem(address, treeIndex));
  }

  lookupStorageStemOffset(address: Uint8Array, slot: Uint8Array): bigint | undefined {
    return this.lookupStemOffset(address, computeStorageTreeIndex(slot));
  }
}
