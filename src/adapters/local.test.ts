import { MockAgent } from "undici";
import { afterEach, describe, expect, it } from "vitest";
import { LocalTransport } from "./local.js";

const HOST = "192.168.1.50";
const ORIGIN = `http://${HOST}`;

let agent: MockAgent;

function setup() {
  agent = new MockAgent();
  agent.disableNetConnect();
  const device = agent.get(ORIGIN);
  const transport = new LocalTransport(HOST, { dispatcher: agent });
  const sent: unknown[] = [];
  const acceptState = (times = 1) =>
    device
      .intercept({ path: "/json/state", method: "POST" })
      .reply(200, ({ body }) => {
        sent.push(JSON.parse(String(body)));
        return { success: true };
      })
      .times(times);
  return { device, transport, sent, acceptState };
}

describe("LocalTransport", () => {
  afterEach(async () => {
    await agent.close();
  });

  it("writes one state payload and reads it back", async () => {
    const { device, transport, sent, acceptState } = setup();
    acceptState();
    const state = { on: true, bri: 128, seg: [{ id: 0, col: [[255, 0, 0, 0]] }] };
    device.intercept({ path: "/json/state", method: "GET" }).reply(200, state);

    expect(
      await transport.setState({ on: true, brightness: 128, color: { r: 255, g: 0, b: 0 }, forceZeroWhite: true })
    ).toBe(true);
    expect(sent).toEqual([{ on: true, bri: 128, seg: [{ id: 0, col: [[255, 0, 0, 0]] }] }]);
    expect(await transport.getState()).toEqual(state);
  });

  it("normalizes pattern payloads before sending", async () => {
    const { transport, sent, acceptState } = setup();
    acceptState();
    expect(await transport.applyJson({ seg: [{ id: 0, fx: 42, gp: 2 }] })).toBe(true);
    expect(sent).toEqual([{ seg: [{ id: 0, fx: 42, grp: 2, spc: 0, of: 0 }] }]);
  });

  it("resolves false or null when the device does not answer", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/json/state", method: "GET" }).replyWithError(new Error("connect ECONNREFUSED"));
    device.intercept({ path: "/json/state", method: "POST" }).reply(500, "");

    expect(await transport.getState()).toBeNull();
    expect(await transport.setState({ on: false })).toBe(false);
  });

  it("treats a non-object body as malformed", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/json/state", method: "GET" }).reply(200, "not json");
    expect(await transport.getState()).toBeNull();
  });

  it("rejects preset ids outside 1..250 without a network call", async () => {
    const { transport, sent, acceptState } = setup();
    acceptState();

    expect(await transport.loadPreset(0)).toBe(false);
    expect(await transport.loadPreset(251)).toBe(false);
    expect(await transport.savePreset(300, { on: true })).toBe(false);
    expect(agent.pendingInterceptors()).toHaveLength(1);

    expect(await transport.loadPreset(1)).toBe(true);
    expect(sent).toEqual([{ ps: 1 }]);
  });

  it("saves presets with slot and name", async () => {
    const { transport, sent, acceptState } = setup();
    acceptState();
    expect(await transport.savePreset(250, { on: true, bri: 90 }, "Night")).toBe(true);
    expect(sent).toEqual([{ on: true, bri: 90, psave: 250, n: "Night" }]);
  });

  it("caches RGBW support only after the device answered", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/json/info", method: "GET" }).replyWithError(new Error("timeout"));
    device.intercept({ path: "/json/info", method: "GET" }).reply(200, { leds: { count: 120, rgbw: true } });

    expect(await transport.supportsRgbw()).toBe(false);
    expect(await transport.supportsRgbw()).toBe(true);
    // answered from the cache; no interceptor is left
    expect(await transport.supportsRgbw()).toBe(true);
  });

  it("reads the total LED count", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/json/info", method: "GET" }).reply(200, { leds: { count: 120 } });
    expect(await transport.getTotalLedCount()).toBe(120);
  });

  it("fetches segments from the state", async () => {
    const { device, transport } = setup();
    device
      .intercept({ path: "/json/state", method: "GET" })
      .reply(200, { seg: [{ id: 0, n: "Eaves", start: 0, stop: 60 }, { id: 1, start: 60, stop: 90 }] });
    const segments = await transport.fetchSegments();
    expect(segments.map((s) => s.name)).toEqual(["Eaves", "Channel 2"]);
  });

  it("skips empty segment updates", async () => {
    const { transport } = setup();
    expect(await transport.applyToSegments({ ids: [] })).toBe(true);
    expect(await transport.updateSegmentConfig(1, {})).toBe(true);
  });

  it("configures the sync sender in two writes", async () => {
    const { transport, sent, acceptState } = setup();
    acceptState(2);
    expect(await transport.configureSyncSender({ targets: ["192.168.1.51"] })).toBe(true);
    expect(sent).toEqual([{ udpn: { send: true } }, { ddp: { en: true, port: 4048, targets: ["192.168.1.51"] } }]);
  });

  it("posts config to /json/cfg", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/json/cfg", method: "POST" }).reply(200, { success: true });
    expect(await transport.applyConfig({ hw: { led: { total: 300 } } })).toBe(true);
  });

  it("uploads the ledmap through the file editor", async () => {
    const { device, transport } = setup();
    device.intercept({ path: "/edit", method: "POST" }).reply(200, "OK");
    device.intercept({ path: "/edit", method: "POST" }).reply(500, "");
    expect(await transport.uploadLedMap('{"map":[0,1,2]}')).toBe(true);
    expect(await transport.uploadLedMap('{"map":[0,1,2]}')).toBe(false);
  });

  it("accepts a host with a scheme", () => {
    agent = new MockAgent();
    expect(new LocalTransport("http://wled.local/").baseUrl).toBe("http://wled.local");
  });
});
