import type { Options } from "yargs";
import { InvalidInputError } from "./errors";

export type CHAIN_NAME = "mainnet" | "sepolia";

export const CHAIN_IDS: { [name in CHAIN_NAME]: bigint } = {
  mainnet: 1n,
  sepolia: 11155111n,
};

export const CHAIN_HTTP_URLS: { [name in CHAIN_NAME]: string } = {
  mainnet: "https://eth.drpc.org",
  sepolia: "https://sepolia.drpc.org",
};

export const CHAIN_NAMES = Object.keys(CHAIN_IDS).filter(isKnownChain);

export interface TokenPreset {
  chain: CHAIN_NAME;
  contract: `0x${string}`;
  /** storage slot of the balances mapping */
  mappingSlot: bigint;
  decimals: number;
  symbol: string;
  walletsFile?: string;
}

export const TOKEN_PRESETS: { [name: string]: TokenPreset } = {
  "usdc-sepolia": {
    chain: "sepolia",
    contract: "0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238",
    mappingSlot: 9n,
    decimals: 6,
    symbol: "USDC",
    walletsFile: "data/wallets/usdc-sepolia.json",
  },
};

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

export const RPC_URL_ENV = "STEM_TOOLS_RPC_URL";

export type RpcOptions = {
  url: Options & { type: "string" };
  chain: Options & { type: "string" };
  timeout: Options & { type: "number" };
};

export type RpcArgv = {
  url?: string;
  chain?: string;
  timeout?: number;
};

export const RPC_YARGS_OPTIONS: RpcOptions = {
  url: {
    type: "string",
    description: `JSON-RPC url (defaults to $${RPC_URL_ENV}, then the chain's public endpoint)`,
    string: true,
  },
  chain: {
    type: "string",
    choices: CHAIN_NAMES,
    description: "Known chain (defaults to sepolia)",
    string: true,
  },
  timeout: {
    type: "number",
    default: DEFAULT_RPC_TIMEOUT_MS,
    description: "Timeout of a single RPC request, in milliseconds",
  },
};

export function isKnownChain(name: string): name is CHAIN_NAME {
  return name in CHAIN_HTTP_URLS;
}

export function getChain(name: string): CHAIN_NAME {
  if (!isKnownChain(name)) {
    throw new InvalidInputError(`Unknown chain ${name}, expecting ${CHAIN_NAMES.join(", ")}`);
  }
  return name;
}

// Supports providing an URL or a known chain
export function resolveRpcUrl(argv: RpcArgv, env: NodeJS.ProcessEnv = process.env): string {
  const url = argv.url || env[RPC_URL_ENV] || CHAIN_HTTP_URLS[getChain(argv.chain || "sepolia")];
  try {
    new URL(url);
  } catch {
    throw new InvalidInputError(`Invalid RPC url: ${url}`);
  }
  return url;
}

export function getTokenPreset(name: string): TokenPreset {
  const preset = TOKEN_PRESETS[name];
  if (!preset) {
    throw new InvalidInputError(
      `Unknown preset ${name}, expecting ${Object.keys(TOKEN_PRESETS).join(", ")}`,
    );
  }
  return preset;
}
