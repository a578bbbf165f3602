import { blake3 } from "@noble/hashes/blake3";
import { concat } from "viem";
import { ADDRESS_LENGTH, assertLength, padAddress, WORD_LENGTH } from "../../utils/bytes";
import { InvalidInputError } from "../../utils/errors";
import { Uint256 } from "./uint256";

// Unified binary tree (EIP-7864) account layout
export const STEM_LENGTH = 31;
export const STEM_SUBTREE_WIDTH = 256;
export const BASIC_DATA_LEAF_KEY = 0;
export const CODE_HASH_LEAF_KEY = 1;
export const HEADER_STORAGE_OFFSET = 64;
export const CODE_OFFSET = 128;

// 256^31: pushes every non-header slot out of the account stem
export const MAIN_STORAGE_OFFSET = Uint256.fromBigInt(1n << 248n);

const HEADER_STORAGE_LIMIT = Uint256.fromBigInt(BigInt(HEADER_STORAGE_OFFSET));

function headerTreeIndex(subindex: number): Uint8Array {
  const treeIndex = new Uint8Array(WORD_LENGTH);
  treeIndex[STEM_LENGTH] = subindex;
  return treeIndex;
}

export function getStemPos(treeIndex: Uint8Array): Uint8Array {
  assertLength(treeIndex, WORD_LENGTH, "Tree index");
  return treeIndex.slice(0, STEM_LENGTH);
}

export function getSubindex(treeIndex: Uint8Array): number {
  assertLength(treeIndex, WORD_LENGTH, "Tree index");
  return treeIndex[STEM_LENGTH];
}

/**
 * Tree index of a storage slot.
 *
 * Slots below 64 live in the account stem at subindex 64 + slot. Any other
 * slot is offset by 2^248 (wrapping at 2^256): the high 31 bytes of the sum
 * are the stem position and the low byte the subindex.
 */
export function computeStorageTreeIndex(slot: Uint8Array): Uint8Array {
  const value = Uint256.fromBytes(slot);
  if (value.lt(HEADER_STORAGE_LIMIT)) {
    return headerTreeIndex(HEADER_STORAGE_OFFSET + slot[STEM_LENGTH]);
  }
  return value.wrappingAdd(MAIN_STORAGE_OFFSET).toBytes();
}

export function computeBasicDataTreeIndex(): Uint8Array {
  return headerTreeIndex(BASIC_DATA_LEAF_KEY);
}

export function computeCodeHashTreeIndex(): Uint8Array {
  return headerTreeIndex(CODE_HASH_LEAF_KEY);
}

export function computeCodeChunkTreeIndex(chunkId: number): Uint8Array {
  if (!Number.isSafeInteger(chunkId) || chunkId < 0) {
    throw new InvalidInputError(`Invalid code chunk id: ${chunkId}`);
  }
  const pos = BigInt(CODE_OFFSET) + BigInt(chunkId);
  const width = BigInt(STEM_SUBTREE_WIDTH);
  const stemPos = Uint256.fromBigInt(pos / width).toBytes();
  // stemPos fits in the low bytes; shift it up one byte to leave room for the subindex
  const treeIndex = new Uint8Array(WORD_LENGTH);
  treeIndex.set(stemPos.subarray(1), 0);
  treeIndex[STEM_LENGTH] = Number(pos % width);
  return treeIndex;
}

/** blake3(pad32(address) || treeIndex[0..31])[0..31] */
export function computeStem(address: Uint8Array, treeIndex: Uint8Array): Uint8Array {
  assertLength(address, ADDRESS_LENGTH, "Address");
  const stemPos = getStemPos(treeIndex);
  return blake3(concat([padAddress(address), stemPos])).slice(0, STEM_LENGTH);
}

/** stem || subindex */
export function computeTreeKey(address: Uint8Array, treeIndex: Uint8Array): Uint8Array {
  const key = new Uint8Array(WORD_LENGTH);
  key.set(computeStem(address, treeIndex), 0);
  key[STEM_LENGTH] = getSubindex(treeIndex);
  return key;
}

export function computeStorageTreeKey(address: Uint8Array, slot: Uint8Array): Uint8Array {
  return computeTreeKey(address, computeStorageTreeIndex(slot));
}
