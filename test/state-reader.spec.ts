import { describe, expect, it } from "vitest";
import { StateStoreBuilder, type StorageRecord } from "../src/libs/helpers/state-builder";
import { StateStoreReader } from "../src/libs/state-format/state-reader";
import { encodeStemIndex, StemIndex } from "../src/libs/state-format/stem-index";
import { computeMappingSlot } from "../src/libs/ubt/slot";
import { parseAddress } from "../src/utils/bytes";
import { StateFormatError } from "../src/utils/errors";

const CONTRACT = parseAddress("0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238");
const OTHER_CONTRACT = parseAddress("0x00000000000000000000000000000000000000aa");

const walletAt = (i: number) => parseAddress(`0x${(i + 1).toString(16).padStart(40, "0")}`);

const valueOf = (n: number) => {
  const bytes = new Uint8Array(32);
  bytes[31] = n;
  return bytes;
};

function buildReader(records: StorageRecord[]) {
  const store = new StateStoreBuilder({ chainId: 1n, blockNumber: 7n }).addAll(records).build();
  return { store, reader: StateStoreReader.fromBytes(store.stateFile, store.stemIndexFile) };
}

const balanceRecords = (count: number): StorageRecord[] =>
  Array.from({ length: count }, (_, i) => ({
    address: CONTRACT,
    slot: computeMappingSlot(walletAt(i), 9),
    value: valueOf(i + 1),
  }));

// Two slots that differ only in their last byte share a stem
function sharedStemRecords(): StorageRecord[] {
  const first = new Uint8Array(32);
  first[0] = 0x42;
  const second = first.slice();
  second[31] = 0x07;
  return [
    { address: CONTRACT, slot: first, value: valueOf(1) },
    { address: CONTRACT, slot: second, value: valueOf(2) },
  ];
}

describe("StateStoreReader", () => {
  it("finds every stored slot", () => {
    const records = balanceRecords(10);
    const { reader } = buildReader(records);
    for (const record of records) {
      const found = reader.lookupStorage(record.address, record.slot);
      expect(found?.entry.value).toEqual(record.value);
    }
  });

  it("misses wallets that were not stored", () => {
    const { reader } = buildReader(balanceRecords(4));
    expect(reader.lookupStorage(CONTRACT, computeMappingSlot(walletAt(99), 9))).toBeUndefined();
  });

  it("misses the same slot under another contract", () => {
    const records = balanceRecords(1);
    const { reader } = buildReader(records);
    expect(reader.lookupStorage(OTHER_CONTRACT, records[0].slot)).toBeUndefined();
  });

  it("resolves every subindex of a shared stem", () => {
    const records = sharedStemRecords();
    const { reader } = buildReader(records);
    expect(reader.stemIndex.count).toBe(1);
    expect(reader.lookupStorage(CONTRACT, records[0].slot)?.index).toBe(0);
    expect(reader.lookupStorage(CONTRACT, records[1].slot)?.index).toBe(1);

    const absent = records[0].slot.slice();
    absent[31] = 0x03;
    expect(reader.lookupStorage(CONTRACT, absent)).toBeUndefined();
  });

  it("verifies a store it built", () => {
    const { reader } = buildReader([...balanceRecords(12), ...sharedStemRecords()]);
    expect(() => reader.verify()).not.toThrow();
  });

  it("rejects entries out of order", () => {
    const { reader } = buildReader(balanceRecords(6));
    const shuffled = new StateStoreReader(reader.header, [...reader.entries].reverse(), reader.stemIndex);
    let error: unknown;
    try {
      shuffled.verify();
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(StateFormatError);
    expect(error).toMatchObject({ reason: "entries-not-sorted" });
  });

  it("rejects an index missing a stem", () => {
    const { store, reader } = buildReader(balanceRecords(3));
    const truncated = new StemIndex(store.stemIndex.slice(1));
    expect(() => new StateStoreReader(reader.header, reader.entries, truncated).verify()).toThrow(StateFormatError);
  });

  it("rejects an index pointing past the first entry of a stem", () => {
    const { store, reader } = buildReader(sharedStemRecords());
    const shifted = StemIndex.fromBytes(encodeStemIndex([{ stem: store.stemIndex[0].stem, offset: 1n }]));
    expect(() => new StateStoreReader(reader.header, reader.entries, shifted).verify()).toThrow(
      "Stem index offset 1 is not the first entry of its stem",
    );
  });
});
