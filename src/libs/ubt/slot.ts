import { concat, keccak256, numberToBytes } from "viem";
import { ADDRESS_LENGTH, assertLength, padAddress, WORD_LENGTH } from "../../utils/bytes";
import { InvalidInputError } from "../../utils/errors";

const MAX_UINT256 = (1n << 256n) - 1n;

export function assertMappingSlot(mappingSlot: number | bigint): bigint {
  if (typeof mappingSlot === "number" && !Number.isSafeInteger(mappingSlot)) {
    throw new InvalidInputError(`Mapping slot must be an integer, got ${mappingSlot}`);
  }
  const slot = BigInt(mappingSlot);
  if (slot < 0n || slot > MAX_UINT256) {
    throw new InvalidInputError(`Mapping slot out of range: ${mappingSlot}`);
  }
  return slot;
}

/**
 * Storage key of `mapping(address => ...)` entry `wallet`, for the mapping
 * declared at `mappingSlot`: keccak256(pad32(wallet) || uint256(mappingSlot)).
 */
export function computeMappingSlot(wallet: Uint8Array, mappingSlot: number | bigint): Uint8Array {
  assertLength(wallet, ADDRESS_LENGTH, "Wallet address");
  const slot = assertMappingSlot(mappingSlot);
  return keccak256(concat([padAddress(wallet), numberToBytes(slot, { size: WORD_LENGTH })]), "bytes");
}
