import { MockAgent } from "undici";
import { afterEach, describe, expect, it, vi } from "vitest";
import { HEADER_LENGTH } from "../protocol/frame-codec.js";
import { PaletteFlowGenerator } from "../protocol/palette-flow.js";
import { StreamController, StreamTransport, type DatagramSocket } from "./stream.js";

const HOST = "192.168.1.50";

class FakeSocket implements DatagramSocket {
  sent: Array<{ msg: Uint8Array; port: number; address: string }> = [];
  closed = false;
  failBind = false;
  throwOnSend = false;
  bindDelayMs = 0;
  private onError: ((err: Error) => void) | null = null;

  bind(_port: number, callback: () => void): this {
    if (this.failBind) this.onError?.(new Error("EADDRINUSE"));
    else if (this.bindDelayMs > 0) setTimeout(callback, this.bindDelayMs);
    else callback();
    return this;
  }

  once(_event: "error", listener: (err: Error) => void): this {
    this.onError = listener;
    return this;
  }

  on(_event: "error", _listener: (err: Error) => void): this {
    return this;
  }

  send(msg: Uint8Array, port: number, address: string, callback: (err: Error | null) => void): void {
    if (this.throwOnSend) throw new Error("EBADF");
    this.sent.push({ msg: Uint8Array.from(msg), port, address });
    callback(null);
  }

  close(): this {
    this.closed = true;
    return this;
  }
}

function setup(configure: (socket: FakeSocket) => void = () => {}) {
  const sockets: FakeSocket[] = [];
  const transport = new StreamTransport(HOST, {
    socketFactory: () => {
      const socket = new FakeSocket();
      configure(socket);
      sockets.push(socket);
      return socket;
    },
  });
  return { transport, sockets };
}

function header(packet: Uint8Array): number[] {
  return Array.from(packet.subarray(0, HEADER_LENGTH));
}

describe("StreamTransport", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends one datagram per frame with an increasing sequence", async () => {
    const { transport, sockets } = setup();
    expect(await transport.start()).toBe(true);

    expect(transport.sendFrame(new Uint8Array(300))).toBe(true);
    expect(transport.sendFrame(new Uint8Array(300))).toBe(true);

    const sent = sockets[0].sent;
    expect(sent.map((s) => [s.port, s.address])).toEqual([
      [4048, HOST],
      [4048, HOST],
    ]);
    expect(header(sent[0].msg)).toEqual([0x41, 0x4c, 0x56, 0x01, 0x01, 0, 0x01, 0x2c, 0, 0, 0, 0]);
    expect(header(sent[1].msg)).toEqual([0x41, 0x4c, 0x56, 0x01, 0x01, 1, 0x01, 0x2c, 0, 0, 0, 0]);
    expect(sent[0].msg.length).toBe(HEADER_LENGTH + 300);
    expect(transport.sequence).toBe(2);
  });

  it("packs RGBW frames and channel offsets", async () => {
    const { transport, sockets } = setup();
    await transport.start();
    transport.sendFrame(new Uint8Array(8), { channelOffset: 600, rgbw: true });
    expect(header(sockets[0].sent[0].msg)).toEqual([0x41, 0x4c, 0x56, 0x01, 0x11, 0, 0x00, 0x08, 0, 0, 0x02, 0x58]);
  });

  it("wraps the sequence after 256 frames", async () => {
    const { transport, sockets } = setup();
    await transport.start();
    for (let i = 0; i < 257; i++) transport.sendFrame(new Uint8Array(3));
    expect(sockets[0].sent[255].msg[5]).toBe(255);
    expect(sockets[0].sent[256].msg[5]).toBe(0);
  });

  it("drops frames while stopped", () => {
    const { transport } = setup();
    expect(transport.sendFrame(new Uint8Array(3))).toBe(false);
    expect(transport.sequence).toBe(0);
  });

  it("counts simulated frames without a socket", async () => {
    const factory = vi.fn(() => new FakeSocket());
    const transport = new StreamTransport(HOST, { simulate: true, socketFactory: factory });
    expect(await transport.start()).toBe(true);
    expect(transport.sendFrame(new Uint8Array(3))).toBe(true);
    expect(transport.sendFrame(new Uint8Array(3))).toBe(true);
    expect(transport.sequence).toBe(2);
    expect(factory).not.toHaveBeenCalled();
    expect(await transport.getLedCount()).toBe(150);
    expect(await transport.getLedCount(60)).toBe(60);
  });

  it("closes the stream when a send throws", async () => {
    const { transport, sockets } = setup();
    await transport.start();
    sockets[0].throwOnSend = true;
    expect(transport.sendFrame(new Uint8Array(3))).toBe(false);
    expect(transport.isRunning).toBe(false);
    expect(sockets[0].closed).toBe(true);
  });

  it("reports a failed bind", async () => {
    const { transport, sockets } = setup((socket) => {
      socket.failBind = true;
    });
    expect(await transport.start()).toBe(false);
    expect(transport.isRunning).toBe(false);
    expect(sockets[0].closed).toBe(true);
  });

  it("shares a pending bind and discards it after stop", async () => {
    vi.useFakeTimers();
    const { transport, sockets } = setup((socket) => {
      socket.bindDelayMs = 5;
    });

    const first = transport.start();
    const second = transport.start();
    transport.stop();
    await vi.advanceTimersByTimeAsync(5);

    await expect(first).resolves.toBe(false);
    await expect(second).resolves.toBe(false);
    expect(sockets).toHaveLength(1);
    expect(sockets[0].closed).toBe(true);
    expect(transport.isRunning).toBe(false);
  });

  describe("getLedCount", () => {
    let agent: MockAgent;

    afterEach(async () => {
      await agent.close();
    });

    it("asks the device and falls back when it does not answer", async () => {
      agent = new MockAgent();
      agent.disableNetConnect();
      const device = agent.get(`http://${HOST}`);
      device.intercept({ path: "/json/info", method: "GET" }).reply(200, { leds: { count: 90 } });
      device.intercept({ path: "/json/info", method: "GET" }).replyWithError(new Error("EHOSTUNREACH"));

      const transport = new StreamTransport(HOST, { dispatcher: agent });
      expect(await transport.getLedCount(150)).toBe(90);
      expect(await transport.getLedCount(150)).toBe(150);
    });
  });
});

describe("StreamController", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function generator() {
    return new PaletteFlowGenerator({ palette: [[255, 0, 0], [0, 0, 255]], pixelCount: 10 });
  }

  it("emits frames at a fixed period until stopped", async () => {
    vi.useFakeTimers();
    const { transport, sockets } = setup();
    const controller = new StreamController(transport, { now: () => Date.now() });

    expect(await controller.start(generator())).toBe(true);
    expect(controller.isActive).toBe(true);
    await vi.advanceTimersByTimeAsync(48);
    expect(sockets[0].sent).toHaveLength(3);
    expect(sockets[0].sent[0].msg.length).toBe(HEADER_LENGTH + 30);

    controller.stop();
    expect(controller.isActive).toBe(false);
    expect(sockets[0].closed).toBe(true);
    await vi.advanceTimersByTimeAsync(100);
    expect(sockets[0].sent).toHaveLength(3);
  });

  it("stops the previous session before starting another", async () => {
    vi.useFakeTimers();
    const { transport, sockets } = setup();
    const controller = new StreamController(transport, { now: () => Date.now() });

    await controller.start(generator());
    await controller.start(generator());
    expect(sockets).toHaveLength(2);
    expect(sockets[0].closed).toBe(true);
    expect(sockets[1].closed).toBe(false);

    await vi.advanceTimersByTimeAsync(16);
    expect(sockets[0].sent).toHaveLength(0);
    expect(sockets[1].sent).toHaveLength(1);
    controller.stop();
  });

  it("keeps a single session when starts overlap", async () => {
    vi.useFakeTimers();
    const { transport, sockets } = setup((socket) => {
      socket.bindDelayMs = 5;
    });
    const controller = new StreamController(transport, { now: () => Date.now() });

    const both = Promise.all([controller.start(generator()), controller.start(generator())]);
    await vi.advanceTimersByTimeAsync(5);
    await expect(both).resolves.toEqual([false, true]);
    expect(sockets).toHaveLength(2);
    expect(sockets[0].closed).toBe(true);
    expect(sockets[1].closed).toBe(false);

    await vi.advanceTimersByTimeAsync(16);
    expect(sockets[1].sent).toHaveLength(1);

    controller.stop();
    expect(sockets.filter((socket) => !socket.closed)).toHaveLength(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("ends the session when a frame cannot be sent", async () => {
    vi.useFakeTimers();
    const { transport, sockets } = setup();
    const controller = new StreamController(transport, { now: () => Date.now() });

    await controller.start(generator());
    sockets[0].throwOnSend = true;
    await vi.advanceTimersByTimeAsync(16);
    expect(controller.isActive).toBe(false);
    expect(transport.isRunning).toBe(false);
  });
});
