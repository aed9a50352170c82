import { Buffer } from "node:buffer";
import { Dispatcher, MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  type ClientProfile,
  DEFAULT_TIMEOUT_MS,
  UndiciClientFactory,
  UndiciHttpClient,
  WirecallError,
  agentOptions,
  createDedicatedClient,
  effectiveTimeout,
} from "../src/index.js";

const ORIGIN = "http://api.test";

/** Accepts every request and never answers it. */
class HangingDispatcher extends Dispatcher {
  dispatch(): boolean {
    return true;
  }
}

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

describe("effectiveTimeout", () => {
  test("keeps positive values and falls back otherwise", () => {
    expect(effectiveTimeout(250)).toBe(250);
    expect(effectiveTimeout(0)).toBe(DEFAULT_TIMEOUT_MS);
    expect(effectiveTimeout(-5)).toBe(DEFAULT_TIMEOUT_MS);
    expect(effectiveTimeout(undefined)).toBe(DEFAULT_TIMEOUT_MS);
  });
});

describe("agentOptions", () => {
  test("leaves the defaults alone without a profile", () => {
    expect(agentOptions({})).toEqual({});
  });

  test("verifies the server by default when a certificate is given", () => {
    expect(
      agentOptions({ certificate: { pfx: new Uint8Array([7, 8]), passphrase: "test-secret" } }),
    ).toEqual({
      connect: { pfx: Buffer.from([7, 8]), passphrase: "test-secret", rejectUnauthorized: true },
    });
  });

  test("carries connection limits and an opt-out of server verification", () => {
    const options = agentOptions({
      connections: 4,
      keepAliveTimeoutMs: 2_000,
      certificate: { pfx: new Uint8Array([7]), rejectUnauthorized: false },
    });

    expect(options.connections).toBe(4);
    expect(options.keepAliveTimeout).toBe(2_000);
    expect(options.connect).toEqual({
      pfx: Buffer.from([7]),
      passphrase: undefined,
      rejectUnauthorized: false,
    });
  });
});

describe("UndiciHttpClient", () => {
  test("sends the request through its dispatcher", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/ok", method: "GET" })
      .reply(200, "hello", { headers: { "content-type": "text/plain" } });

    const client = new UndiciHttpClient(agent);
    const response = await client.send({
      method: "GET",
      url: new URL(`${ORIGIN}/ok`),
      headers: [],
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/plain");
    expect(await response.text()).toBe("hello");
  });

  test("reports a timeout with the method and url", async () => {
    const client = new UndiciHttpClient(new HangingDispatcher(), 20);
    const sent = client.send({ method: "GET", url: new URL(`${ORIGIN}/slow`), headers: [] });

    await expect(sent).rejects.toBeInstanceOf(WirecallError);
    await expect(sent).rejects.toThrow("Request timed out after 20 ms: GET http://api.test/slow");
  });
});

describe("UndiciClientFactory", () => {
  test("creates one dispatcher per client name", () => {
    const createDispatcher = vi.fn((_profile: ClientProfile) => agent);
    const factory = new UndiciClientFactory({
      profiles: { billing: { timeoutMs: 1_000 } },
      createDispatcher,
    });

    factory.createClient("billing");
    factory.createClient("billing");
    factory.createClient();

    expect(createDispatcher).toHaveBeenCalledTimes(2);
    expect(createDispatcher).toHaveBeenNthCalledWith(1, { timeoutMs: 1_000 });
    expect(createDispatcher).toHaveBeenNthCalledWith(2, {});
    expect(factory.pooledClientCount).toBe(2);
  });

  test("closes pooled dispatchers", async () => {
    const first = new MockAgent();
    const second = new MockAgent();
    const closeFirst = vi.spyOn(first, "close");
    const closeSecond = vi.spyOn(second, "close");
    const pending = [first, second];
    const factory = new UndiciClientFactory({
      createDispatcher: () => pending.shift() ?? new MockAgent(),
    });

    factory.createClient("a");
    factory.createClient("b");
    await factory.close();

    expect(closeFirst).toHaveBeenCalledTimes(1);
    expect(closeSecond).toHaveBeenCalledTimes(1);
    expect(factory.pooledClientCount).toBe(0);
  });
});

describe("createDedicatedClient", () => {
  test("closes the dispatcher it owns", async () => {
    agent.get(ORIGIN).intercept({ path: "/once", method: "GET" }).reply(204, "");
    const closeSpy = vi.spyOn(agent, "close");

    const client = createDedicatedClient({ timeoutMs: 1_000 }, () => agent);
    const response = await client.send({
      method: "GET",
      url: new URL(`${ORIGIN}/once`),
      headers: [],
    });
    await client.close();

    expect(response.status).toBe(204);
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});
