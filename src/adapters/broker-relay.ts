import { normalizePayload } from "../protocol/normalize.js";
import {
  SYNC_RECEIVER_PAYLOAD,
  buildLoadPresetPayload,
  buildRenamePayload,
  buildSavePresetPayload,
  buildSegmentBoundsPayload,
  buildSegmentsPayload,
  buildSetStatePayload,
  buildSyncSenderPayloads,
  isValidPresetId,
  segmentsFromState,
} from "../protocol/segments.js";
import type { BrokerClient } from "../relay/broker-client.js";
import { UnsupportedCapabilityError } from "../util/errors.js";
import { createModuleLogger } from "../util/logger.js";
import { monotonicNow, type Clock } from "../util/timing.js";
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
} from "../util/types.js";

const logger = createModuleLogger("BrokerRelayTransport");

export const BROKER_CACHE_TTL_MS = 2000;

export type BrokerRelayTransportOptions = {
  client: BrokerClient;
  deviceId: string;
  cacheTtlMs?: number;
  now?: Clock;
};

/**
 * Relay through the backend's message-broker bridge. Writes are
 * fire-and-forget toward the device, so reads are served from a cache built
 * from the payloads this instance sent. Read-after-write is only as accurate
 * as that cache and expires after the TTL; on a miss `getState` resolves null
 * rather than waiting for the device.
 */
export class BrokerRelayTransport implements DeviceTransport {
  readonly kind = "broker-relay";
  readonly deviceId: string;
  private client: BrokerClient;
  private cacheTtlMs: number;
  private now: Clock;
  private cachedState: DeviceState | undefined;
  private cacheTime = 0;

  constructor(opts: BrokerRelayTransportOptions) {
    this.client = opts.client;
    this.deviceId = opts.deviceId;
    this.cacheTtlMs = opts.cacheTtlMs ?? BROKER_CACHE_TTL_MS;
    this.now = opts.now ?? monotonicNow;
  }

  get isReady(): boolean {
    return this.client.isAuthenticated;
  }

  private updateCache(sent: StatePayload): void {
    this.cachedState = { ...this.cachedState, ...structuredClone(sent) };
    this.cacheTime = this.now();
  }

  private async sendState(payload: StatePayload): Promise<boolean> {
    if (!this.isReady) {
      logger.warn("backend bridge is not authenticated");
      return false;
    }
    const body = normalizePayload(payload);
    const result = await this.client.sendWledState(this.deviceId, body);
    if (result.success) this.updateCache(body);
    return result.success;
  }

  async getState(): Promise<DeviceState | null> {
    if (this.cachedState && this.now() - this.cacheTime < this.cacheTtlMs) {
      return structuredClone(this.cachedState);
    }
    logger.debug("state cache is empty or stale");
    return null;
  }

  async setState(options: SetStateOptions): Promise<boolean> {
    return this.sendState(buildSetStatePayload(options));
  }

  async applyJson(payload: StatePayload): Promise<boolean> {
    return this.sendState(payload);
  }

  /** Sent as its own `setConfig` action, mirroring the device's state/config split. */
  async applyConfig(cfg: JsonObject): Promise<boolean> {
    if (!this.isReady) {
      logger.warn("backend bridge is not authenticated");
      return false;
    }
    return (await this.client.sendCommand(this.deviceId, "setConfig", cfg)).success;
  }

  async uploadLedMap(_jsonContent: string): Promise<boolean> {
    logger.info(new UnsupportedCapabilityError(this.kind, "ledmap upload").message);
    return false;
  }

  async configureSyncReceiver(): Promise<boolean> {
    return this.applyConfig(SYNC_RECEIVER_PAYLOAD);
  }

  async configureSyncSender(options: SyncSenderOptions = {}): Promise<boolean> {
    const [udp, ddp] = buildSyncSenderPayloads(options);
    return this.applyConfig({ ...udp, ...ddp });
  }

  // The bridge has no device-info query.
  async supportsRgbw(): Promise<boolean> {
    return false;
  }

  async getTotalLedCount(): Promise<number | null> {
    return null;
  }

  async fetchSegments(): Promise<Segment[]> {
    return segmentsFromState(await this.getState());
  }

  async renameSegment(id: number, name: string): Promise<boolean> {
    return this.sendState(buildRenamePayload(id, name));
  }

  async applyToSegments(update: SegmentUpdate): Promise<boolean> {
    if (update.ids.length === 0) return true;
    return this.sendState(buildSegmentsPayload(update));
  }

  async updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean> {
    const payload = buildSegmentBoundsPayload(segmentId, bounds);
    return payload ? this.sendState(payload) : true;
  }

  async savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.sendState(buildSavePresetPayload(presetId, state, presetName));
  }

  async loadPreset(presetId: number): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.sendState(buildLoadPresetPayload(presetId));
  }

  dispose(): void {
    this.cachedState = undefined;
    this.cacheTime = 0;
  }
}
