import type { Dispatcher } from "undici";
import { PaletteFlowGenerator, type PaletteEntry } from "../protocol/palette-flow.js";
import type { BrokerClient } from "../relay/broker-client.js";
import type { CommandStore } from "../relay/command-store.js";
import type { ConnectivitySetting } from "../util/config.js";
import { describeError } from "../util/errors.js";
import { getJson, joinUrl } from "../util/http.js";
import { createModuleLogger } from "../util/logger.js";
import type {
  DeviceState,
  DeviceTransport,
  JsonObject,
  Segment,
  SegmentBounds,
  SegmentUpdate,
  SetStateOptions,
  StatePayload,
  SyncSenderOptions,
  TransportKind,
} from "../util/types.js";
import { BrokerRelayTransport } from "./broker-relay.js";
import { LocalTransport } from "./local.js";
import { RelayQueueTransport } from "./relay-queue.js";
import { SimulatedTransport } from "./simulated.js";
import { STREAM_PORT, StreamController, StreamTransport, type SocketFactory } from "./stream.js";

const logger = createModuleLogger("TransportSelector");

const PROBE_TIMEOUT_MS = 3000;
export const DEFAULT_STREAM_PIXELS = 150;

export type Connectivity = Exclude<ConnectivitySetting, "auto">;

export type SessionState = {
  host?: string;
  connectivity: ConnectivitySetting;
  demoMode: boolean;
  remoteAccessEnabled: boolean;
  brokerRelayEnabled: boolean;
  userId?: string;
  controllerId?: string;
  controllerIp?: string;
  webhookUrl?: string;
};

export type TransportSelectorOptions = {
  /** Backs the relay queue; without one the queue is never selected. */
  commandStore?: CommandStore;
  /** Backs the broker relay; without one the broker is never selected. */
  brokerClient?: BrokerClient;
  streamPort?: number;
  dispatcher?: Dispatcher;
  socketFactory?: SocketFactory;
};

export type StreamStartOptions = {
  palette: PaletteEntry[];
  speed?: number;
  spread?: number;
  /** Defaults to the device's reported RGBW support. */
  rgbw?: boolean;
  /** Defaults to the device's reported LED count. */
  pixelCount?: number;
};

export type SelectorStatus = {
  transport: TransportKind | null;
  connectivity: ConnectivitySetting;
  resolvedConnectivity: Connectivity | null;
  streaming: boolean;
  host: string | null;
};

type Cached<T> = { key: string; transport: T };

/**
 * Routes every contract call to the transport that fits the current session.
 * Also owns the pixel stream; while it runs, color and effect writes over the
 * JSON path are skipped so the two paths never fight over the same pixels.
 */
export class TransportSelector implements Omit<DeviceTransport, "kind"> {
  private sessionState: SessionState;
  private opts: TransportSelectorOptions;
  private resolved: Connectivity | null = null;
  private local: Cached<LocalTransport> | null = null;
  private relay: Cached<RelayQueueTransport> | null = null;
  private broker: Cached<BrokerRelayTransport> | null = null;
  private simulated: SimulatedTransport | null = null;
  private stream: Cached<StreamController> | null = null;
  /** Bumped by every start or stop request; an older start that is still preparing gives up. */
  private streamRequest = 0;

  constructor(session: SessionState, opts: TransportSelectorOptions = {}) {
    this.sessionState = { ...session };
    this.opts = opts;
  }

  get session(): Readonly<SessionState> {
    return this.sessionState;
  }

  updateSession(patch: Partial<SessionState>): void {
    const prev = this.sessionState;
    this.sessionState = { ...prev, ...patch };
    if (prev.host !== this.sessionState.host || prev.connectivity !== this.sessionState.connectivity) {
      this.resolved = null;
    }
  }

  get isStreaming(): boolean {
    return this.stream?.transport.isActive ?? false;
  }

  private effectiveConnectivity(): ConnectivitySetting {
    const { connectivity } = this.sessionState;
    return connectivity === "auto" ? this.resolved ?? "auto" : connectivity;
  }

  /** The transport the next call goes to, or null when none applies. */
  current(): DeviceTransport | null {
    const s = this.sessionState;
    if (s.demoMode) return (this.simulated ??= new SimulatedTransport());
    if (!s.host) return null;

    switch (this.effectiveConnectivity()) {
      case "local":
        return this.localFor(s.host);
      case "remote":
        if (!s.remoteAccessEnabled) return null;
        return this.remoteTransport();
      case "offline":
        return null;
      default:
        return this.localFor(s.host);
    }
  }

  private remoteTransport(): DeviceTransport | null {
    const s = this.sessionState;
    const client = this.opts.brokerClient;
    if (s.brokerRelayEnabled && client?.isAuthenticated && s.controllerId) {
      return this.brokerFor(client, s.controllerId);
    }
    if (this.opts.commandStore && s.userId && s.controllerId) {
      return this.relayFor(this.opts.commandStore, s.userId, s.controllerId);
    }
    logger.debug("remote access has no usable relay");
    return null;
  }

  private localFor(host: string): LocalTransport {
    if (this.local?.key !== host) {
      this.local?.transport.dispose();
      this.local = { key: host, transport: new LocalTransport(host, { dispatcher: this.opts.dispatcher }) };
    }
    return this.local.transport;
  }

  private relayFor(store: CommandStore, userId: string, controllerId: string): RelayQueueTransport {
    const { controllerIp, webhookUrl } = this.sessionState;
    const key = [userId, controllerId, controllerIp ?? "", webhookUrl ?? ""].join("|");
    if (this.relay?.key !== key) {
      this.relay?.transport.dispose();
      this.relay = {
        key,
        transport: new RelayQueueTransport({ store, userId, controllerId, controllerIp, webhookUrl }),
      };
    }
    return this.relay.transport;
  }

  private brokerFor(client: BrokerClient, deviceId: string): BrokerRelayTransport {
    if (this.broker?.key !== deviceId) {
      this.broker?.transport.dispose();
      this.broker = { key: deviceId, transport: new BrokerRelayTransport({ client, deviceId }) };
    }
    return this.broker.transport;
  }

  /**
   * Resolves `auto` connectivity by asking the device directly. A device that
   * answers is local; otherwise remote when remote access is on, else offline.
   */
  async probeConnectivity(): Promise<Connectivity> {
    const s = this.sessionState;
    let reachable = false;
    if (s.demoMode) {
      reachable = true;
    } else if (s.host) {
      const base = /^https?:\/\//.test(s.host) ? s.host : `http://${s.host}`;
      try {
        await getJson(joinUrl(base, "/json/info"), { timeoutMs: PROBE_TIMEOUT_MS, dispatcher: this.opts.dispatcher });
        reachable = true;
      } catch (e) {
        logger.debug(`probe of ${s.host} failed: ${describeError(e)}`);
      }
    }
    this.resolved = reachable ? "local" : s.remoteAccessEnabled ? "remote" : "offline";
    logger.info(`connectivity resolved to ${this.resolved}`);
    return this.resolved;
  }

  status(): SelectorStatus {
    return {
      transport: this.current()?.kind ?? null,
      connectivity: this.sessionState.connectivity,
      resolvedConnectivity: this.resolved,
      streaming: this.isStreaming,
      host: this.sessionState.host ?? null,
    };
  }

  private streamingGuard(operation: string): boolean {
    if (!this.isStreaming) return false;
    logger.info(`${operation} skipped while the pixel stream is active`);
    return true;
  }

  private streamFor(host: string): StreamController {
    const simulate = this.sessionState.demoMode;
    const key = `${host}|${simulate}`;
    if (this.stream?.key !== key) {
      this.stream?.transport.stop();
      const transport = new StreamTransport(host, {
        port: this.opts.streamPort ?? STREAM_PORT,
        simulate,
        socketFactory: this.opts.socketFactory,
        dispatcher: this.opts.dispatcher,
      });
      this.stream = { key, transport: new StreamController(transport) };
    }
    return this.stream.transport;
  }

  /** Starts a palette-flow stream, replacing any running one. */
  async startStream(options: StreamStartOptions): Promise<boolean> {
    const host = this.sessionState.host ?? (this.sessionState.demoMode ? "demo" : undefined);
    if (!host) {
      logger.warn("no device host to stream to");
      return false;
    }
    const controller = this.streamFor(host);
    controller.stop();
    const request = ++this.streamRequest;
    const pixelCount =
      options.pixelCount ?? (await controller.transport.getLedCount(DEFAULT_STREAM_PIXELS)) ?? DEFAULT_STREAM_PIXELS;
    const rgbw = options.rgbw ?? (await this.supportsRgbw());
    const generator = new PaletteFlowGenerator({
      palette: options.palette,
      pixelCount,
      rgbw,
      speed: options.speed,
      spread: options.spread,
    });
    if (request !== this.streamRequest || this.stream?.transport !== controller) {
      logger.debug("stream start superseded");
      return false;
    }
    return controller.start(generator);
  }

  stopStream(): void {
    this.streamRequest++;
    this.stream?.transport.stop();
  }

  async getState(): Promise<DeviceState | null> {
    return (await this.current()?.getState()) ?? null;
  }

  async setState(options: SetStateOptions): Promise<boolean> {
    if (this.streamingGuard("setState")) return false;
    return (await this.current()?.setState(options)) ?? false;
  }

  async applyJson(payload: StatePayload): Promise<boolean> {
    if (this.streamingGuard("applyJson")) return false;
    return (await this.current()?.applyJson(payload)) ?? false;
  }

  async applyConfig(cfg: JsonObject): Promise<boolean> {
    return (await this.current()?.applyConfig(cfg)) ?? false;
  }

  async uploadLedMap(jsonContent: string): Promise<boolean> {
    return (await this.current()?.uploadLedMap(jsonContent)) ?? false;
  }

  async configureSyncReceiver(): Promise<boolean> {
    return (await this.current()?.configureSyncReceiver()) ?? false;
  }

  async configureSyncSender(options?: SyncSenderOptions): Promise<boolean> {
    return (await this.current()?.configureSyncSender(options)) ?? false;
  }

  async supportsRgbw(): Promise<boolean> {
    return (await this.current()?.supportsRgbw()) ?? false;
  }

  async getTotalLedCount(): Promise<number | null> {
    return (await this.current()?.getTotalLedCount()) ?? null;
  }

  async fetchSegments(): Promise<Segment[]> {
    return (await this.current()?.fetchSegments()) ?? [];
  }

  async renameSegment(id: number, name: string): Promise<boolean> {
    return (await this.current()?.renameSegment(id, name)) ?? false;
  }

  async applyToSegments(update: SegmentUpdate): Promise<boolean> {
    if (this.streamingGuard("applyToSegments")) return false;
    return (await this.current()?.applyToSegments(update)) ?? false;
  }

  async updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean> {
    return (await this.current()?.updateSegmentConfig(segmentId, bounds)) ?? false;
  }

  async savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean> {
    return (await this.current()?.savePreset(presetId, state, presetName)) ?? false;
  }

  async loadPreset(presetId: number): Promise<boolean> {
    if (this.streamingGuard("loadPreset")) return false;
    return (await this.current()?.loadPreset(presetId)) ?? false;
  }

  /** Stops the stream and releases every cached transport. */
  dispose(): void {
    this.stopStream();
    this.local?.transport.dispose();
    this.relay?.transport.dispose();
    this.broker?.transport.dispose();
    this.simulated?.dispose();
    this.local = null;
    this.relay = null;
    this.broker = null;
    this.stream = null;
    this.simulated = null;
  }
}
