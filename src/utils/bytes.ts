import { bytesToHex, hexToBytes, isAddress, isHex, pad, size, type Hex } from "viem";
import { InvalidInputError } from "./errors";

export const ADDRESS_LENGTH = 20;
export const WORD_LENGTH = 32;

export function assertLength(bytes: Uint8Array, length: number, label: string): void {
  if (bytes.length !== length) {
    throw new InvalidInputError(`${label} must be ${length} bytes, got ${bytes.length}`);
  }
}

// Unsigned lexicographic order, shorter prefix first
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

export function isZeroBytes(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}

/** Left-pads a 20-byte address into a 32-byte word */
export function padAddress(address: Uint8Array): Uint8Array {
  assertLength(address, ADDRESS_LENGTH, "Address");
  return pad(address, { size: WORD_LENGTH });
}

export function parseAddress(value: string): Uint8Array {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidInputError(`Invalid address: ${value}`);
  }
  return hexToBytes(value);
}

/**
 * Parses a storage word as returned by eth_getStorageAt. Short values are
 * left-padded to 32 bytes.
 */
export function parseWord(value: string, label = "Storage word"): Uint8Array {
  if (!isHex(value, { strict: true })) {
    throw new InvalidInputError(`${label} is not a hex string: ${value}`);
  }
  if (size(value) > WORD_LENGTH) {
    throw new InvalidInputError(`${label} exceeds ${WORD_LENGTH} bytes: ${value}`);
  }
  // odd-length hex ("0x7b" vs "0x07b") is normalised before padding
  const even: Hex = value.length % 2 === 0 ? value : `0x0${value.slice(2)}`;
  return hexToBytes(pad(even, { size: WORD_LENGTH }));
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes);
}

export function wordToBigInt(word: Uint8Array): bigint {
  return word.length === 0 ? 0n : BigInt(toHex(word));
}
