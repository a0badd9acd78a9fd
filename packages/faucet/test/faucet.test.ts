/**
 * Faucet HTTP tests: POST /faucet status/body mapping, GET /health, CORS.
 * The node is an in-process fake; nothing leaves the process.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { keccak256 } from "viem";
import { createFaucetApp } from "../src/index.ts";
import { ONE_ETH, createFakeChain, stubLogger } from "./fake-chain.ts";

const RECIPIENT = "0xdbF03B407c01E7cD3CBea99509d93f8DDDC8C6FB";

let fake: ReturnType<typeof createFakeChain>;
let app: ReturnType<typeof createFaucetApp>;

async function postFaucet(body: unknown): Promise<Response> {
  return await app.request("/faucet", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  fake = createFakeChain();
  app = createFaucetApp({
    chain: fake.chain,
    params: { tokensPerRequest: ONE_ETH, gasPrice: 1_000_000_000n, gasLimit: 21_000n },
    logger: stubLogger(),
  });
});

describe("GET /health", () => {
  it("returns healthy with an RFC 3339 timestamp", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("healthy");
    expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("does not depend on the node", async () => {
    fake.chain.getChainId.mockRejectedValue(new Error("down"));

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(fake.chain.getChainId).not.toHaveBeenCalled();
  });
});

describe("POST /faucet", () => {
  it("returns 200 with the transaction hash on success", async () => {
    const res = await postFaucet({ address: RECIPIENT });

    expect(res.status).toBe(200);
    expect(fake.state.submitted).toHaveLength(1);
    expect(await res.json()).toEqual({ transaction_hash: keccak256(fake.state.submitted[0]) });
  });

  it("returns 400 Invalid address for a checksum-invalid address", async () => {
    const res = await postFaucet({ address: "0xdbf03B407c01E7cD3CBea99509d93f8DDDC8C6FB" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid address" });
    expect(fake.chain.getBalance).not.toHaveBeenCalled();
  });

  it("returns 400 Invalid address when the address field is missing", async () => {
    const res = await postFaucet({});

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid address" });
  });

  it("returns 400 Invalid address when the address is not a string", async () => {
    const res = await postFaucet({ address: 42 });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid address" });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await postFaucet("not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("returns 400 for a JSON body that is not an object", async () => {
    const res = await postFaucet([RECIPIENT]);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("returns 400 when the recipient already has a balance", async () => {
    fake.state.balances.set(RECIPIENT, 5n);

    const res = await postFaucet({ address: RECIPIENT });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Receiver already has a balance greater than 0" });
    expect(fake.state.submitted).toHaveLength(0);
  });

  it("returns 400 when the operator balance is zero", async () => {
    fake.state.operatorBalance = 0n;

    const res = await postFaucet({ address: RECIPIENT });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Insufficient balance" });
    expect(fake.state.submitted).toHaveLength(0);
  });

  it("returns 500 with the node error text when a lookup fails", async () => {
    fake.chain.getTransactionCount.mockRejectedValueOnce(new Error("connection reset"));

    const res = await postFaucet({ address: RECIPIENT });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Failed to get nonce: connection reset" });
  });

  it("returns 500 when the broadcast is rejected", async () => {
    fake.chain.sendRawTransaction.mockRejectedValueOnce(new Error("replacement underpriced"));

    const res = await postFaucet({ address: RECIPIENT });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Failed to send transaction: replacement underpriced",
    });
  });

  it("allows cross-origin callers", async () => {
    const res = await app.request("/faucet", {
      method: "POST",
      headers: { "Content-Type": "application/json", Origin: "https://wallet.example" },
      body: JSON.stringify({ address: RECIPIENT }),
    });

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("rejects GET with 404", async () => {
    const res = await app.request("/faucet");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});
