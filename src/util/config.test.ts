import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      host: undefined,
      connectivity: "auto",
      demoMode: false,
      remoteAccessEnabled: false,
      brokerRelayEnabled: false,
      userId: undefined,
      controllerId: undefined,
      webhookUrl: undefined,
      queueUrl: undefined,
      queueToken: undefined,
      brokerUrl: undefined,
      brokerToken: undefined,
      streamPort: 4048,
      rateRps: 5,
    });
  });

  it("trims text, reads flags and coerces numbers", () => {
    const config = loadConfig({
      WLED_HOST: " 192.168.1.50 ",
      WLED_CONNECTIVITY: "remote",
      WLED_DEMO_MODE: "1",
      WLED_REMOTE_ACCESS: "TRUE",
      WLED_BROKER_RELAY: "no",
      WLED_USER_ID: "   ",
      WLED_STREAM_PORT: "5000",
      WLED_RATE_RPS: "2.5",
    });
    expect(config.host).toBe("192.168.1.50");
    expect(config.connectivity).toBe("remote");
    expect(config.demoMode).toBe(true);
    expect(config.remoteAccessEnabled).toBe(true);
    expect(config.brokerRelayEnabled).toBe(false);
    expect(config.userId).toBeUndefined();
    expect(config.streamPort).toBe(5000);
    expect(config.rateRps).toBe(2.5);
  });

  it("rejects unknown connectivity and bad ports", () => {
    expect(() => loadConfig({ WLED_CONNECTIVITY: "lan" })).toThrow();
    expect(() => loadConfig({ WLED_STREAM_PORT: "70000" })).toThrow();
  });
});
