import { assertLength, WORD_LENGTH } from "../../utils/bytes";
import { InvalidInputError } from "../../utils/errors";

const LIMB_BITS = 64n;
const LIMB_MASK = (1n << LIMB_BITS) - 1n;
const LIMB_COUNT = 4;

export type Limbs = readonly [bigint, bigint, bigint, bigint];

/**
 * Fixed-width 256-bit unsigned integer stored as four 64-bit limbs, least
 * significant limb first. Arithmetic wraps modulo 2^256 unless the
 * overflowing variant is used.
 */
export class Uint256 {
  static readonly ZERO = new Uint256([0n, 0n, 0n, 0n]);
  static readonly MAX = new Uint256([LIMB_MASK, LIMB_MASK, LIMB_MASK, LIMB_MASK]);

  private constructor(readonly limbs: Limbs) {}

  static fromBigInt(value: bigint): Uint256 {
    if (value < 0n || value >> 256n !== 0n) {
      throw new InvalidInputError(`Value does not fit in 256 bits: ${value}`);
    }
    return new Uint256([
      value & LIMB_MASK,
      (value >> 64n) & LIMB_MASK,
      (value >> 128n) & LIMB_MASK,
      (value >> 192n) & LIMB_MASK,
    ]);
  }

  /** Reads a 32-byte big-endian word */
  static fromBytes(bytes: Uint8Array): Uint256 {
    assertLength(bytes, WORD_LENGTH, "Uint256 input");
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return new Uint256([
      view.getBigUint64(24, false),
      view.getBigUint64(16, false),
      view.getBigUint64(8, false),
      view.getBigUint64(0, false),
    ]);
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(WORD_LENGTH);
    const view = new DataView(out.buffer);
    for (let i = 0; i < LIMB_COUNT; i++) {
      view.setBigUint64((LIMB_COUNT - 1 - i) * 8, this.limbs[i], false);
    }
    return out;
  }

  toBigInt(): bigint {
    return this.limbs.reduceRight((acc, limb) => (acc << LIMB_BITS) | limb, 0n);
  }

  isZero(): boolean {
    return this.limbs.every((limb) => limb === 0n);
  }

  lt(other: Uint256): boolean {
    for (let i = LIMB_COUNT - 1; i >= 0; i--) {
      if (this.limbs[i] !== other.limbs[i]) {
        return this.limbs[i] < other.limbs[i];
      }
    }
    return false;
  }

  eq(other: Uint256): boolean {
    return this.limbs.every((limb, i) => limb === other.limbs[i]);
  }

  /** Adds limb by limb, carrying from the least significant limb upwards */
  overflowingAdd(other: Uint256): [Uint256, boolean] {
    let carry = 0n;
    const out: bigint[] = [];
    for (let i = 0; i < LIMB_COUNT; i++) {
      const sum = this.limbs[i] + other.limbs[i] + carry;
      out.push(sum & LIMB_MASK);
      carry = sum >> LIMB_BITS;
    }
    return [new Uint256([out[0], out[1], out[2], out[3]]), carry !== 0n];
  }

  wrappingAdd(other: Uint256): Uint256 {
    return this.overflowingAdd(other)[0];
  }

  toString(): string {
    return `0x${this.toBigInt().toString(16).padStart(64, "0")}`;
  }
}
