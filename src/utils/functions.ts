import pMap from "p-map";
import { formatUnits } from "viem";

export const promiseConcurrent = <T, R>(
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R> | R,
  list: readonly T[],
): Promise<R[]> => pMap(list, mapper, { concurrency: concurrency });

export const numberWithCommas = (x: number | bigint | string) => {
  return x.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ",");
};

// 123n @ 6 decimals => "0.000123"
export const formatAmount = (raw: bigint, decimals: number) => {
  const [whole, fraction] = formatUnits(raw, decimals).split(".");
  return fraction ? `${numberWithCommas(whole)}.${fraction}` : numberWithCommas(whole);
};
