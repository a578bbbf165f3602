import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RpcError } from "../src/utils/errors";
import { JsonRpcClient, toBlockParam } from "../src/utils/rpc";

const ORIGIN = "http://rpc.test";

describe("JsonRpcClient", () => {
  let agent: MockAgent;
  let client: JsonRpcClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new JsonRpcClient({ url: `${ORIGIN}/`, timeoutMs: 1_000, dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  const expectCall = (method: string, params: unknown[]) =>
    agent.get(ORIGIN).intercept({
      path: "/",
      method: "POST",
      body: (body: string) => {
        const request: unknown = JSON.parse(body);
        return (
          typeof request === "object" &&
          request !== null &&
          "method" in request &&
          request.method === method &&
          "params" in request &&
          JSON.stringify(request.params) === JSON.stringify(params)
        );
      },
    });

  it("sends eth_getStorageAt with the pinned block", async () => {
    expectCall("eth_getStorageAt", ["0x00000000000000000000000000000000000000aa", "0x09", "0x64"]).reply(200, {
      jsonrpc: "2.0",
      id: 1,
      result: "0x7b",
    });
    await expect(client.getStorageAt("0x00000000000000000000000000000000000000aa", "0x09", 100n)).resolves.toBe(
      "0x7b",
    );
  });

  it("decodes the block number", async () => {
    expectCall("eth_blockNumber", []).reply(200, { jsonrpc: "2.0", id: 1, result: "0x1b4" });
    await expect(client.blockNumber()).resolves.toBe(436n);
  });

  it("reads the block hash", async () => {
    const hash = `0x${"ab".repeat(32)}`;
    expectCall("eth_getBlockByNumber", ["0x10", false]).reply(200, {
      jsonrpc: "2.0",
      id: 1,
      result: { number: "0x10", hash },
    });
    await expect(client.getBlockHash(16n)).resolves.toBe(hash);
  });

  it("fails on a missing block", async () => {
    expectCall("eth_getBlockByNumber", ["0x10", false]).reply(200, { jsonrpc: "2.0", id: 1, result: null });
    await expect(client.getBlockHash(16n)).rejects.toThrow("eth_getBlockByNumber: no block 0x10");
  });

  it("surfaces JSON-RPC errors", async () => {
    expectCall("eth_getStorageAt", ["0x00000000000000000000000000000000000000aa", "0x09", "latest"]).reply(200, {
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32000, message: "header not found" },
    });
    const error = await client
      .getStorageAt("0x00000000000000000000000000000000000000aa", "0x09")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({
      message: "eth_getStorageAt: RPC error -32000 header not found",
      method: "eth_getStorageAt",
      code: 3,
    });
  });

  it("surfaces HTTP failures", async () => {
    expectCall("eth_blockNumber", []).reply(500, "upstream unavailable");
    await expect(client.blockNumber()).rejects.toThrow("eth_blockNumber: HTTP 500");
  });

  it("rejects a result that is not hex", async () => {
    expectCall("eth_blockNumber", []).reply(200, { jsonrpc: "2.0", id: 1, result: 436 });
    await expect(client.blockNumber()).rejects.toThrow("eth_blockNumber: expected a hex result, got 436");
  });

  it("rejects a body that is not a JSON-RPC response", async () => {
    expectCall("eth_chainId", []).reply(200, { jsonrpc: "2.0", id: 1 });
    await expect(client.chainId()).rejects.toThrow("eth_chainId: malformed JSON-RPC response");
  });

  it("wraps transport errors", async () => {
    expectCall("eth_chainId", []).replyWithError(new Error("socket hang up"));
    await expect(client.chainId()).rejects.toBeInstanceOf(RpcError);
  });
});

describe("toBlockParam", () => {
  it("encodes numbers as quantities and passes tags through", () => {
    expect(toBlockParam(0n)).toBe("0x0");
    expect(toBlockParam(255n)).toBe("0xff");
    expect(toBlockParam("finalized")).toBe("finalized");
  });
});
