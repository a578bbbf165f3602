import { ADDRESS_LENGTH, WORD_LENGTH } from "../../utils/bytes";
import { EncodingInvariantError, StateFormatError } from "../../utils/errors";

export const STATE_MAGIC = new TextEncoder().encode("PIR2");
export const STATE_FORMAT_VERSION = 1;
export const STATE_HEADER_SIZE = 64;
/** contract address (20) + tree index (32) + value (32) */
export const STATE_ENTRY_SIZE = ADDRESS_LENGTH + WORD_LENGTH + WORD_LENGTH;

const MAX_U64 = (1n << 64n) - 1n;

export interface StateHeader {
  magic: Uint8Array;
  version: number;
  entrySize: number;
  entryCount: bigint;
  blockNumber: bigint;
  chainId: bigint;
  /** zero-filled when unknown */
  blockHash: Uint8Array;
}

export interface StorageEntry {
  address: Uint8Array;
  treeIndex: Uint8Array;
  value: Uint8Array;
}

export interface StateFile {
  header: StateHeader;
  entries: StorageEntry[];
}

export function createStateHeader(
  entryCount: bigint | number,
  blockNumber: bigint | number,
  chainId: bigint | number,
  blockHash: Uint8Array = new Uint8Array(WORD_LENGTH),
): StateHeader {
  return {
    magic: STATE_MAGIC.slice(),
    version: STATE_FORMAT_VERSION,
    entrySize: STATE_ENTRY_SIZE,
    entryCount: BigInt(entryCount),
    blockNumber: BigInt(blockNumber),
    chainId: BigInt(chainId),
    blockHash,
  };
}

function checkU64(value: bigint, field: string) {
  if (value < 0n || value > MAX_U64) {
    throw new EncodingInvariantError(`${field} does not fit in u64: ${value}`);
  }
}

function checkWidth(bytes: Uint8Array, width: number, field: string) {
  if (bytes.length !== width) {
    throw new EncodingInvariantError(`${field} must be ${width} bytes, got ${bytes.length}`);
  }
}

export function hasStateMagic(data: Uint8Array): boolean {
  return data.length >= STATE_MAGIC.length && STATE_MAGIC.every((b, i) => data[i] === b);
}

export function encodeStateHeader(
  header: StateHeader,
  out: Uint8Array = new Uint8Array(STATE_HEADER_SIZE),
): Uint8Array {
  checkWidth(header.magic, STATE_MAGIC.length, "Magic");
  checkWidth(header.blockHash, WORD_LENGTH, "Block hash");
  if (header.entrySize !== STATE_ENTRY_SIZE) {
    throw new EncodingInvariantError(
      `Entry size ${header.entrySize} does not match the ${STATE_ENTRY_SIZE}-byte entry layout`,
    );
  }
  checkU64(header.entryCount, "Entry count");
  checkU64(header.blockNumber, "Block number");
  checkU64(header.chainId, "Chain id");

  const view = new DataView(out.buffer, out.byteOffset, STATE_HEADER_SIZE);
  out.set(header.magic, 0);
  view.setUint16(4, header.version, true);
  view.setUint16(6, header.entrySize, true);
  view.setBigUint64(8, header.entryCount, true);
  view.setBigUint64(16, header.blockNumber, true);
  view.setBigUint64(24, header.chainId, true);
  out.set(header.blockHash, 32);
  return out;
}

export function decodeStateHeader(data: Uint8Array): StateHeader {
  if (data.length < STATE_HEADER_SIZE) {
    throw new StateFormatError(
      "header-too-short",
      `Header too short: need ${STATE_HEADER_SIZE} bytes, got ${data.length}`,
    );
  }
  if (!hasStateMagic(data)) {
    throw new StateFormatError(
      "invalid-magic",
      `Invalid magic: expected PIR2, got 0x${Buffer.from(data.subarray(0, 4)).toString("hex")}`,
    );
  }
  const view = new DataView(data.buffer, data.byteOffset, STATE_HEADER_SIZE);
  const version = view.getUint16(4, true);
  if (version !== STATE_FORMAT_VERSION) {
    throw new StateFormatError("unsupported-version", `Unsupported state format version ${version}`);
  }
  const entrySize = view.getUint16(6, true);
  if (entrySize !== STATE_ENTRY_SIZE) {
    throw new StateFormatError(
      "unsupported-entry-size",
      `Unsupported entry size ${entrySize}, expected ${STATE_ENTRY_SIZE}`,
    );
  }
  return {
    magic: data.slice(0, 4),
    version,
    entrySize,
    entryCount: view.getBigUint64(8, true),
    blockNumber: view.getBigUint64(16, true),
    chainId: view.getBigUint64(24, true),
    blockHash: data.slice(32, 64),
  };
}

export function encodeStorageEntry(
  entry: StorageEntry,
  out: Uint8Array = new Uint8Array(STATE_ENTRY_SIZE),
  offset = 0,
): Uint8Array {
  checkWidth(entry.address, ADDRESS_LENGTH, "Entry address");
  checkWidth(entry.treeIndex, WORD_LENGTH, "Entry tree index");
  checkWidth(entry.value, WORD_LENGTH, "Entry value");
  if (offset < 0 || offset + STATE_ENTRY_SIZE > out.length) {
    throw new EncodingInvariantError(`Entry at offset ${offset} overruns a ${out.length}-byte buffer`);
  }
  out.set(entry.address, offset);
  out.set(entry.treeIndex, offset + ADDRESS_LENGTH);
  out.set(entry.value, offset + ADDRESS_LENGTH + WORD_LENGTH);
  return out;
}

export function decodeStorageEntry(data: Uint8Array, offset = 0): StorageEntry {
  if (data.length - offset < STATE_ENTRY_SIZE) {
    throw new StateFormatError(
      "entry-too-short",
      `Entry too short: need ${STATE_ENTRY_SIZE} bytes, got ${Math.max(0, data.length - offset)}`,
    );
  }
  return {
    address: data.slice(offset, offset + ADDRESS_LENGTH),
    treeIndex: data.slice(offset + ADDRESS_LENGTH, offset + ADDRESS_LENGTH + WORD_LENGTH),
    value: data.slice(offset + ADDRESS_LENGTH + WORD_LENGTH, offset + STATE_ENTRY_SIZE),
  };
}

export function stateFileSize(entryCount: number): number {
  return STATE_HEADER_SIZE + entryCount * STATE_ENTRY_SIZE;
}

/** Header followed by every entry, in the order given */
export function encodeStateFile(header: StateHeader, entries: readonly StorageEntry[]): Uint8Array {
  if (header.entryCount !== BigInt(entries.length)) {
    throw new EncodingInvariantError(
      `Header declares ${header.entryCount} entries but ${entries.length} were given`,
    );
  }
  const out = new Uint8Array(stateFileSize(entries.length));
  encodeStateHeader(header, out);
  entries.forEach((entry, i) => encodeStorageEntry(entry, out, STATE_HEADER_SIZE + i * STATE_ENTRY_SIZE));
  return out;
}

export function decodeStateFile(data: Uint8Array): StateFile {
  const header = decodeStateHeader(data);
  const expected = BigInt(STATE_HEADER_SIZE) + header.entryCount * BigInt(STATE_ENTRY_SIZE);
  if (BigInt(data.length) !== expected) {
    throw new StateFormatError(
      "size-mismatch",
      `File size mismatch: expected ${expected} bytes, got ${data.length}`,
    );
  }
  const entries: StorageEntry[] = [];
  for (let i = 0; i < Number(header.entryCount); i++) {
    entries.push(decodeStorageEntry(data, STATE_HEADER_SIZE + i * STATE_ENTRY_SIZE));
  }
  return { header, entries };
}
