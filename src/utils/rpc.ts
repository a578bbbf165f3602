import Debug from "debug";
import { request, type Dispatcher } from "undici";
import { hexToBigInt, isHex, numberToHex, type Hex } from "viem";
import { RpcError } from "./errors";
import { DEFAULT_RPC_TIMEOUT_MS } from "./chains";

const debug = Debug("stem-state:rpc");

export type BlockTag = "latest" | "safe" | "finalized" | "earliest" | "pending" | bigint;

export interface RpcClientConfig {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** undici dispatcher, mostly to plug a MockAgent in tests */
  dispatcher?: Dispatcher;
}

/**
 * What the extractor needs from a node. Implemented by JsonRpcClient, and by
 * in-process fakes in tests.
 */
export interface StorageFetcher {
  getStorageAt(contract: Hex, slot: Hex, blockTag: BlockTag): Promise<Hex>;
  blockNumber(): Promise<bigint>;
}

interface JsonRpcResponse {
  jsonrpc?: string;
  id?: number | string | null;
  result?: unknown;
  error?: { code?: number; message?: string; data?: unknown };
}

function isJsonRpcResponse(body: unknown): body is JsonRpcResponse {
  return typeof body === "object" && body !== null && ("result" in body || "error" in body);
}

export function toBlockParam(blockTag: BlockTag): string {
  return typeof blockTag === "bigint" ? numberToHex(blockTag) : blockTag;
}

export class JsonRpcClient implements StorageFetcher {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly dispatcher?: Dispatcher;
  private nextId = 1;

  constructor(config: RpcClientConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.headers = config.headers ?? {};
    this.dispatcher = config.dispatcher;
  }

  async send(method: string, params: unknown[]): Promise<unknown> {
    const id = this.nextId++;
    debug(`-> ${method} #${id} %o`, params);

    let body: unknown;
    try {
      const response = await request(this.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...this.headers },
        body: JSON.stringify({ jsonrpc: "2.0", method, params, id }),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      if (response.statusCode < 200 || response.statusCode >= 300) {
        await response.body.dump();
        throw new RpcError(`${method}: HTTP ${response.statusCode}`, method, {
          status: response.statusCode,
        });
      }
      body = await response.body.json();
    } catch (error) {
      if (error instanceof RpcError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new RpcError(`${method}: ${reason}`, method, error);
    }

    if (!isJsonRpcResponse(body)) {
      throw new RpcError(`${method}: malformed JSON-RPC response`, method, body);
    }
    if (body.error) {
      throw new RpcError(
        `${method}: RPC error ${body.error.code ?? "?"} ${body.error.message ?? ""}`.trim(),
        method,
        body.error,
      );
    }
    debug(`<- ${method} #${id} %o`, body.result);
    return body.result;
  }

  private async sendHex(method: string, params: unknown[]): Promise<Hex> {
    const result = await this.send(method, params);
    if (!isHex(result, { strict: true })) {
      throw new RpcError(`${method}: expected a hex result, got ${JSON.stringify(result)}`, method, result);
    }
    return result;
  }

  async getStorageAt(contract: Hex, slot: Hex, blockTag: BlockTag = "latest"): Promise<Hex> {
    return this.sendHex("eth_getStorageAt", [contract, slot, toBlockParam(blockTag)]);
  }

  async blockNumber(): Promise<bigint> {
    return hexToBigInt(await this.sendHex("eth_blockNumber", []));
  }

  async chainId(): Promise<bigint> {
    return hexToBigInt(await this.sendHex("eth_chainId", []));
  }

  async getBlockHash(blockTag: BlockTag): Promise<Hex> {
    const block = await this.send("eth_getBlockByNumber", [toBlockParam(blockTag), false]);
    if (typeof block !== "object" || block === null || !("hash" in block)) {
      throw new RpcError(`eth_getBlockByNumber: no block ${toBlockParam(blockTag)}`, "eth_getBlockByNumber");
    }
    const { hash } = block;
    if (!isHex(hash, { strict: true })) {
      throw new RpcError("eth_getBlockByNumber: block has no hash", "eth_getBlockByNumber", block);
    }
    return hash;
  }
}
