import { MockAgent } from "undici";
import { afterEach, describe, expect, it } from "vitest";
import { BrokerClient } from "../relay/broker-client.js";
import { BrokerRelayTransport } from "./broker-relay.js";

const ORIGIN = "https://bridge.test";
const COMMAND_PATH = "/api/devices/controller-1/command";

describe("BrokerRelayTransport", () => {
  let agent: MockAgent;

  function setup(token: string | null = "test-secret") {
    agent = new MockAgent();
    agent.disableNetConnect();
    const api = agent.get(ORIGIN);
    const sent: unknown[] = [];
    const accept = (times = 1) =>
      api
        .intercept({ path: COMMAND_PATH, method: "POST" })
        .reply(200, ({ body }) => {
          sent.push(JSON.parse(String(body)));
          return { command: "ok" };
        })
        .times(times);
    const clock = { t: 0 };
    const client = new BrokerClient({ baseUrl: ORIGIN, token: token ?? undefined, dispatcher: agent });
    const transport = new BrokerRelayTransport({ client, deviceId: "controller-1", now: () => clock.t });
    return { api, transport, sent, accept, clock };
  }

  afterEach(async () => {
    await agent.close();
  });

  it("serves reads from what it sent until the cache expires", async () => {
    const { transport, sent, accept, clock } = setup();
    accept();

    expect(await transport.getState()).toBeNull();
    expect(await transport.setState({ on: true, brightness: 100 })).toBe(true);
    expect(sent).toEqual([{ action: "setState", payload: { on: true, bri: 100 } }]);

    clock.t = 1999;
    expect(await transport.getState()).toEqual({ on: true, bri: 100 });
    clock.t = 2000;
    expect(await transport.getState()).toBeNull();
  });

  it("merges later writes into the cache", async () => {
    const { transport, accept } = setup();
    accept(2);
    await transport.setState({ on: true, brightness: 100 });
    await transport.applyJson({ bri: 50, seg: [{ id: 0, n: "Roofline", start: 0, stop: 80 }] });

    expect(await transport.getState()).toEqual({ on: true, bri: 50, seg: [{ id: 0, n: "Roofline", start: 0, stop: 80 }] });
    expect((await transport.fetchSegments()).map((s) => s.name)).toEqual(["Roofline"]);
  });

  it("leaves the cache alone when a send fails", async () => {
    const { api, transport } = setup();
    api.intercept({ path: COMMAND_PATH, method: "POST" }).reply(500, "");
    expect(await transport.setState({ on: false })).toBe(false);
    expect(await transport.getState()).toBeNull();
  });

  it("sends config as its own action", async () => {
    const { transport, sent, accept } = setup();
    accept(2);
    expect(await transport.applyConfig({ hw: { led: { total: 300 } } })).toBe(true);
    expect(await transport.configureSyncSender()).toBe(true);
    expect(sent).toEqual([
      { action: "setConfig", payload: { hw: { led: { total: 300 } } } },
      { action: "setConfig", payload: { udpn: { send: true }, ddp: { en: true, port: 4048 } } },
    ]);
  });

  it("does nothing when the bridge is not signed in", async () => {
    const { transport } = setup(null);
    expect(transport.isReady).toBe(false);
    expect(await transport.setState({ on: true })).toBe(false);
    expect(await transport.applyConfig({})).toBe(false);
  });

  it("degrades the capabilities the bridge lacks", async () => {
    const { transport } = setup();
    expect(await transport.uploadLedMap("{}")).toBe(false);
    expect(await transport.supportsRgbw()).toBe(false);
    expect(await transport.getTotalLedCount()).toBeNull();
    expect(await transport.loadPreset(0)).toBe(false);
  });
});
