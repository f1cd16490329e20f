import { MockAgent } from "undici";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BrokerClient } from "../relay/broker-client.js";
import { MemoryCommandStore } from "../relay/command-store.js";
import { TransportSelector, type SessionState } from "./selector.js";

const HOST = "192.168.1.50";

const BASE: SessionState = {
  host: HOST,
  connectivity: "local",
  demoMode: false,
  remoteAccessEnabled: false,
  brokerRelayEnabled: false,
};

const REMOTE: SessionState = {
  ...BASE,
  connectivity: "remote",
  remoteAccessEnabled: true,
  userId: "user-1",
  controllerId: "controller-1",
};

function deps(token: string | null = "test-secret") {
  return {
    commandStore: new MemoryCommandStore(),
    brokerClient: new BrokerClient({ baseUrl: "https://bridge.test", token: token ?? undefined }),
  };
}

describe("TransportSelector", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("uses the simulated device in demo mode", () => {
    const selector = new TransportSelector({ ...BASE, host: undefined, demoMode: true });
    expect(selector.current()?.kind).toBe("simulated");
  });

  it("has no transport without a host", async () => {
    const selector = new TransportSelector({ ...BASE, host: undefined });
    expect(selector.current()).toBeNull();
    expect(await selector.getState()).toBeNull();
    expect(await selector.setState({ on: true })).toBe(false);
    expect(await selector.fetchSegments()).toEqual([]);
    expect(await selector.getTotalLedCount()).toBeNull();
  });

  it("reuses the local transport until the host changes", () => {
    const selector = new TransportSelector(BASE);
    const first = selector.current();
    expect(first?.kind).toBe("local");
    expect(selector.current()).toBe(first);

    selector.updateSession({ host: "192.168.1.51" });
    const second = selector.current();
    expect(second?.kind).toBe("local");
    expect(second).not.toBe(first);
  });

  it("prefers the broker relay when it is enabled and signed in", () => {
    const selector = new TransportSelector({ ...REMOTE, brokerRelayEnabled: true }, deps());
    expect(selector.current()?.kind).toBe("broker-relay");
  });

  it("falls back to the relay queue", () => {
    expect(new TransportSelector({ ...REMOTE, brokerRelayEnabled: true }, deps(null)).current()?.kind).toBe(
      "relay-queue"
    );
    expect(new TransportSelector(REMOTE, deps()).current()?.kind).toBe("relay-queue");
  });

  it("has no remote transport without identifiers or remote access", () => {
    expect(new TransportSelector({ ...REMOTE, userId: undefined }, deps()).current()).toBeNull();
    expect(new TransportSelector({ ...REMOTE, remoteAccessEnabled: false }, deps()).current()).toBeNull();
    expect(new TransportSelector(REMOTE).current()).toBeNull();
  });

  it("has no transport when offline", () => {
    expect(new TransportSelector({ ...BASE, connectivity: "offline" }).current()).toBeNull();
  });

  describe("auto connectivity", () => {
    let agent: MockAgent;

    afterEach(async () => {
      await agent.close();
    });

    it("tries the device directly until probed", async () => {
      agent = new MockAgent();
      agent.disableNetConnect();
      const device = agent.get(`http://${HOST}`);
      device.intercept({ path: "/json/info", method: "GET" }).reply(200, { leds: { count: 60 } });
      device.intercept({ path: "/json/info", method: "GET" }).replyWithError(new Error("EHOSTUNREACH"));

      const selector = new TransportSelector({ ...REMOTE, connectivity: "auto" }, { ...deps(), dispatcher: agent });
      expect(selector.current()?.kind).toBe("local");

      expect(await selector.probeConnectivity()).toBe("local");
      expect(selector.current()?.kind).toBe("local");

      expect(await selector.probeConnectivity()).toBe("remote");
      expect(selector.current()?.kind).toBe("relay-queue");
      expect(selector.status()).toEqual({
        transport: "relay-queue",
        connectivity: "auto",
        resolvedConnectivity: "remote",
        streaming: false,
        host: HOST,
      });

      selector.updateSession({ host: "192.168.1.60" });
      expect(selector.status().resolvedConnectivity).toBeNull();
    });
  });

  it("skips color and effect writes while streaming", async () => {
    vi.useFakeTimers();
    const selector = new TransportSelector({ ...BASE, demoMode: true });

    expect(await selector.startStream({ palette: [[255, 120, 0]], pixelCount: 10 })).toBe(true);
    expect(selector.isStreaming).toBe(true);

    expect(await selector.setState({ brightness: 5 })).toBe(false);
    expect(await selector.applyJson({ bri: 5 })).toBe(false);
    expect(await selector.applyToSegments({ ids: [0], fx: 3 })).toBe(false);
    expect(await selector.loadPreset(1)).toBe(false);
    expect((await selector.getState())?.bri).toBe(180);

    expect(await selector.renameSegment(0, "Porch")).toBe(true);
    expect(await selector.applyConfig({ id: { name: "Porch" } })).toBe(true);

    selector.stopStream();
    expect(selector.isStreaming).toBe(false);
    expect(await selector.setState({ brightness: 5 })).toBe(true);
    expect((await selector.getState())?.bri).toBe(5);
    selector.dispose();
  });

  it("replaces a running stream", async () => {
    vi.useFakeTimers();
    const selector = new TransportSelector({ ...BASE, demoMode: true });
    await selector.startStream({ palette: [[255, 0, 0]], pixelCount: 4 });
    expect(await selector.startStream({ palette: [[0, 0, 255]], pixelCount: 4 })).toBe(true);
    expect(selector.status().streaming).toBe(true);
    selector.dispose();
    expect(selector.isStreaming).toBe(false);
  });

  it("lets only the latest stream request take effect", async () => {
    vi.useFakeTimers();
    const selector = new TransportSelector({ ...BASE, demoMode: true });

    const overlapping = Promise.all([
      selector.startStream({ palette: [[255, 0, 0]], pixelCount: 4 }),
      selector.startStream({ palette: [[0, 255, 0]], pixelCount: 4 }),
    ]);
    await expect(overlapping).resolves.toEqual([false, true]);
    expect(selector.isStreaming).toBe(true);

    const starting = selector.startStream({ palette: [[0, 0, 255]], pixelCount: 4 });
    selector.stopStream();
    await expect(starting).resolves.toBe(false);
    expect(selector.isStreaming).toBe(false);
    selector.dispose();
  });
});
