import dgram from "node:dgram";
import type { Dispatcher } from "undici";
import { encodeFrame } from "../protocol/frame-codec.js";
import type { PaletteFlowGenerator } from "../protocol/palette-flow.js";
import { readLedsInfo } from "../protocol/segments.js";
import { describeError } from "../util/errors.js";
import { getJson, joinUrl } from "../util/http.js";
import { createModuleLogger } from "../util/logger.js";
import { monotonicNow, type Clock } from "../util/timing.js";

const logger = createModuleLogger("StreamTransport");

export const STREAM_PORT = 4048;
export const STREAM_FPS = 60;
const INFO_TIMEOUT_MS = 3000;

/** The part of a UDP socket the stream uses. */
export interface DatagramSocket {
  bind(port: number, callback: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  send(msg: Uint8Array, port: number, address: string, callback: (err: Error | null) => void): void;
  close(): unknown;
}

export type SocketFactory = () => DatagramSocket;

export type StreamTransportOptions = {
  port?: number;
  /** No socket; frames are counted and dropped. */
  simulate?: boolean;
  socketFactory?: SocketFactory;
  dispatcher?: Dispatcher;
};

/**
 * UDP pixel streaming: one datagram per frame, no acknowledgement and no
 * retransmission. A lost frame is superseded by the next one.
 */
export class StreamTransport {
  readonly host: string;
  readonly port: number;
  private simulate: boolean;
  private socketFactory: SocketFactory;
  private dispatcher?: Dispatcher;
  private socket: DatagramSocket | null = null;
  private running = false;
  private seq = 0;
  private opening: Promise<boolean> | null = null;
  /** Bumped by stop(); a bind that finishes under an older epoch is discarded. */
  private epoch = 0;

  constructor(host: string, opts: StreamTransportOptions = {}) {
    this.host = host;
    this.port = opts.port ?? STREAM_PORT;
    this.simulate = opts.simulate ?? false;
    this.socketFactory = opts.socketFactory ?? (() => dgram.createSocket("udp4"));
    this.dispatcher = opts.dispatcher;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Next sequence number to be sent. */
  get sequence(): number {
    return this.seq;
  }

  /**
   * Binds an ephemeral UDP socket. Resolves false when binding fails or stop()
   * is called before the bind completes. Calls made while a bind is pending
   * share it.
   */
  async start(): Promise<boolean> {
    if (this.running) return true;
    if (!this.opening) {
      const opening = this.open(this.epoch).then((ok) => {
        if (this.opening === opening) this.opening = null;
        return ok;
      });
      this.opening = opening;
    }
    return this.opening;
  }

  private async open(epoch: number): Promise<boolean> {
    if (this.simulate) {
      this.running = true;
      logger.info("stream started (simulated)");
      return true;
    }
    const socket = this.socketFactory();
    try {
      await new Promise<void>((resolve, reject) => {
        socket.once("error", reject);
        socket.bind(0, () => resolve());
      });
    } catch (e) {
      logger.error(`socket bind failed: ${describeError(e)}`);
      this.closeSocket(socket);
      return false;
    }
    if (epoch !== this.epoch) {
      logger.debug("stream stopped while binding");
      this.closeSocket(socket);
      return false;
    }
    socket.on("error", (err) => logger.warn(`socket error: ${describeError(err)}`));
    this.socket = socket;
    this.running = true;
    logger.info(`stream started toward ${this.host}:${this.port}`);
    return true;
  }

  stop(): void {
    const wasRunning = this.running;
    this.running = false;
    this.epoch++;
    this.opening = null;
    if (this.socket) {
      this.closeSocket(this.socket);
      this.socket = null;
    }
    if (wasRunning) logger.info("stream stopped");
  }

  private closeSocket(socket: DatagramSocket): void {
    try {
      socket.close();
    } catch (e) {
      logger.debug(`socket close: ${describeError(e)}`);
    }
  }

  /**
   * Sends one frame of packed RGB or RGBW bytes. The sequence advances on
   * every call while running, including simulated frames, so receiver-side
   * gaps are diagnostic only. A send that throws releases the socket.
   */
  sendFrame(data: Uint8Array, opts: { channelOffset?: number; rgbw?: boolean } = {}): boolean {
    if (!this.running) return false;
    const sequence = this.seq;
    this.seq = (this.seq + 1) & 0xff;
    if (this.simulate || !this.socket) {
      if (sequence % 30 === 0) logger.trace(`simulated frame seq=${sequence} bytes=${data.length}`);
      return true;
    }
    try {
      const packet = encodeFrame(data, { offset: opts.channelOffset ?? 0, rgbw: opts.rgbw ?? false, sequence });
      this.socket.send(packet, this.port, this.host, (err) => {
        if (err) logger.debug(`frame ${sequence} not sent: ${describeError(err)}`);
      });
      return true;
    } catch (e) {
      logger.error(`frame send failed, closing stream: ${describeError(e)}`);
      this.stop();
      return false;
    }
  }

  /** LED count from `/json/info`, or `fallback` when the device does not answer. */
  async getLedCount(fallback: number | null = null): Promise<number | null> {
    if (this.simulate) return fallback ?? 150;
    try {
      const info = await getJson(joinUrl(`http://${this.host}`, "/json/info"), {
        timeoutMs: INFO_TIMEOUT_MS,
        dispatcher: this.dispatcher,
      });
      return readLedsInfo(info).count ?? fallback;
    } catch (e) {
      logger.warn(`LED count query failed: ${describeError(e)}`);
      return fallback;
    }
  }
}

export type StreamControllerOptions = {
  fps?: number;
  now?: Clock;
};

/**
 * Fixed-rate frame loop. Each tick measures wall-clock time since the last
 * one, so animation speed does not depend on the frame rate achieved.
 */
export class StreamController {
  readonly transport: StreamTransport;
  private fps: number;
  private now: Clock;
  private timer: NodeJS.Timeout | null = null;
  private lastTick = 0;
  private generator: PaletteFlowGenerator | null = null;
  private session = 0;

  constructor(transport: StreamTransport, opts: StreamControllerOptions = {}) {
    this.transport = transport;
    this.fps = opts.fps ?? STREAM_FPS;
    this.now = opts.now ?? monotonicNow;
  }

  get isActive(): boolean {
    return this.timer !== null;
  }

  /**
   * Stops any running session before starting the new one. Resolves false
   * when a later start() or stop() overtakes this one while the socket binds.
   */
  async start(generator: PaletteFlowGenerator): Promise<boolean> {
    this.stop();
    const session = this.session;
    const started = await this.transport.start();
    if (session !== this.session) return false;
    if (!started) return false;
    this.generator = generator;
    this.lastTick = this.now();
    this.timer = setInterval(() => this.tick(), Math.floor(1000 / this.fps));
    return true;
  }

  private tick(): void {
    const gen = this.generator;
    if (!gen) return;
    const now = this.now();
    const dt = (now - this.lastTick) / 1000;
    this.lastTick = now;
    const sent = this.transport.sendFrame(gen.nextFrame(dt), { channelOffset: 0, rgbw: gen.rgbw });
    if (!sent) this.stop();
  }

  stop(): void {
    this.session++;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.generator = null;
    this.transport.stop();
  }
}
