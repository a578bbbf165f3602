import { getAddress, type Hex } from "viem";
import { isZeroBytes, parseAddress, parseWord, toHex, wordToBigInt } from "../../utils/bytes";
import { FetchFailureError } from "../../utils/errors";
import { formatAmount, promiseConcurrent } from "../../utils/functions";
import { silentLogger, type Logger } from "../../utils/logger";
import type { BlockTag, StorageFetcher } from "../../utils/rpc";
import { assertMappingSlot, computeMappingSlot } from "../ubt/slot";

export interface MappingExtractionOptions {
  contract: string;
  mappingSlot: number | bigint;
  wallets: readonly string[];
  blockTag?: BlockTag;
  concurrency?: number;
  /** only used to format amounts in the logs */
  decimals?: number;
  logger?: Logger;
}

export interface MappingRecord {
  wallet: Hex;
  address: Uint8Array;
  slot: Uint8Array;
  value: Uint8Array;
}

export type WalletOutcome =
  | { wallet: Hex; status: "found"; slot: Hex; value: bigint }
  | { wallet: Hex; status: "zero"; slot: Hex }
  | { wallet: Hex; status: "failed"; slot: Hex; error: FetchFailureError };

export interface MappingExtraction {
  records: MappingRecord[];
  outcomes: WalletOutcome[];
  failures: FetchFailureError[];
}

/**
 * Reads `mapping(address => uint256)` entries for a list of wallets. Every
 * wallet and the contract are validated before the first request. Repeated
 * wallets (in any casing) are fetched once. A wallet whose fetch fails is
 * logged and skipped; zero values are dropped.
 */
export async function extractMappingValues(
  fetcher: StorageFetcher,
  options: MappingExtractionOptions,
): Promise<MappingExtraction> {
  const logger = options.logger ?? silentLogger;
  const contract = parseAddress(options.contract);
  const contractHex = getAddress(toHex(contract));
  const mappingSlot = assertMappingSlot(options.mappingSlot);
  const blockTag = options.blockTag ?? "latest";
  const decimals = options.decimals ?? 0;

  const targets = new Map<Hex, { wallet: Hex; slot: Uint8Array }>();
  for (const input of options.wallets) {
    const bytes = parseAddress(input);
    const wallet = getAddress(toHex(bytes));
    if (!targets.has(wallet)) {
      targets.set(wallet, { wallet, slot: computeMappingSlot(bytes, mappingSlot) });
    }
  }

  let done = 0;
  const results = await promiseConcurrent(
    options.concurrency ?? 4,
    async ({ wallet, slot }): Promise<{ outcome: WalletOutcome; record?: MappingRecord }> => {
      const slotHex = toHex(slot);
      const progress = () => `[${++done}/${targets.size}]`;
      try {
        const value = parseWord(await fetcher.getStorageAt(contractHex, slotHex, blockTag));
        if (isZeroBytes(value)) {
          logger.info(`${progress()} ${wallet} has no balance`);
          return { outcome: { wallet, status: "zero", slot: slotHex } };
        }
        const amount = wordToBigInt(value);
        logger.info(`${progress()} ${wallet} = ${formatAmount(amount, decimals)}`);
        return {
          outcome: { wallet, status: "found", slot: slotHex, value: amount },
          record: { wallet, address: contract, slot, value },
        };
      } catch (cause) {
        const error = new FetchFailureError(wallet, cause);
        logger.warn(`${progress()} ${error.message}`);
        return { outcome: { wallet, status: "failed", slot: slotHex, error } };
      }
    },
    [...targets.values()],
  );

  const records: MappingRecord[] = [];
  const failures: FetchFailureError[] = [];
  for (const { outcome, record } of results) {
    if (record) {
      records.push(record);
    } else if (outcome.status === "failed") {
      failures.push(outcome.error);
    }
  }

  return { records, outcomes: results.map(({ outcome }) => outcome), failures };
}
