import { Blob } from "node:buffer";
import { FormData, type Dispatcher } from "undici";
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
  readLedsInfo,
  segmentsFromState,
} from "../protocol/segments.js";
import { describeError } from "../util/errors.js";
import { getJson, joinUrl, postForm, postJson } from "../util/http.js";
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
} from "../util/types.js";

const logger = createModuleLogger("LocalTransport");

export const LOCAL_TIMEOUTS = {
  state: 5000,
  info: 5000,
  config: 15000,
  upload: 5000,
} as const;

export type LocalTransportOptions = {
  dispatcher?: Dispatcher;
  timeouts?: Partial<typeof LOCAL_TIMEOUTS>;
};

/** Direct HTTP/JSON control of a device on the same network. */
export class LocalTransport implements DeviceTransport {
  readonly kind = "local";
  readonly baseUrl: string;
  private dispatcher?: Dispatcher;
  private timeouts: typeof LOCAL_TIMEOUTS;
  private rgbwCache: boolean | undefined;

  constructor(host: string, opts: LocalTransportOptions = {}) {
    this.baseUrl = /^https?:\/\//.test(host) ? host.replace(/\/+$/, "") : `http://${host}`;
    this.dispatcher = opts.dispatcher;
    this.timeouts = { ...LOCAL_TIMEOUTS, ...opts.timeouts };
  }

  private url(path: string) {
    return joinUrl(this.baseUrl, path);
  }

  async getState(): Promise<DeviceState | null> {
    try {
      return await getJson(this.url("/json/state"), { timeoutMs: this.timeouts.state, dispatcher: this.dispatcher });
    } catch (e) {
      logger.warn(`getState failed: ${describeError(e)}`);
      return null;
    }
  }

  private async postState(payload: StatePayload): Promise<boolean> {
    const body = normalizePayload(payload);
    logger.debug("POST /json/state", { payload: body });
    try {
      await postJson(this.url("/json/state"), body, { timeoutMs: this.timeouts.state, dispatcher: this.dispatcher });
      return true;
    } catch (e) {
      logger.warn(`POST /json/state failed: ${describeError(e)}`);
      return false;
    }
  }

  async setState(options: SetStateOptions): Promise<boolean> {
    return this.postState(buildSetStatePayload(options));
  }

  async applyJson(payload: StatePayload): Promise<boolean> {
    return this.postState(payload);
  }

  async applyConfig(cfg: JsonObject): Promise<boolean> {
    logger.debug("POST /json/cfg", { cfg });
    try {
      await postJson(this.url("/json/cfg"), cfg, { timeoutMs: this.timeouts.config, dispatcher: this.dispatcher });
      return true;
    } catch (e) {
      logger.warn(`POST /json/cfg failed: ${describeError(e)}`);
      return false;
    }
  }

  /** Uploads `ledmap.json` through the device's file editor endpoint. */
  async uploadLedMap(jsonContent: string): Promise<boolean> {
    const form = new FormData();
    form.append("data", new Blob([jsonContent], { type: "application/json" }), "ledmap.json");
    form.append("path", "/ledmap.json");
    try {
      await postForm(this.url("/edit"), form, { timeoutMs: this.timeouts.upload, dispatcher: this.dispatcher });
      return true;
    } catch (e) {
      logger.warn(`ledmap upload failed: ${describeError(e)}`);
      return false;
    }
  }

  async configureSyncReceiver(): Promise<boolean> {
    const ok = await this.postState(SYNC_RECEIVER_PAYLOAD);
    if (!ok) logger.warn(`configureSyncReceiver failed for ${this.baseUrl}`);
    return ok;
  }

  async configureSyncSender(options: SyncSenderOptions = {}): Promise<boolean> {
    const [udp, ddp] = buildSyncSenderPayloads(options);
    const udpOk = await this.postState(udp);
    const ddpOk = await this.postState(ddp);
    if (!(udpOk && ddpOk)) logger.warn(`configureSyncSender partially failed for ${this.baseUrl}`);
    return udpOk && ddpOk;
  }

  private async getInfo(): Promise<JsonObject | null> {
    try {
      return await getJson(this.url("/json/info"), { timeoutMs: this.timeouts.info, dispatcher: this.dispatcher });
    } catch (e) {
      logger.warn(`GET /json/info failed: ${describeError(e)}`);
      return null;
    }
  }

  /** Cached for the lifetime of the transport once the device has answered. */
  async supportsRgbw(): Promise<boolean> {
    if (this.rgbwCache !== undefined) return this.rgbwCache;
    const info = await this.getInfo();
    if (!info) return false;
    this.rgbwCache = readLedsInfo(info).rgbw ?? false;
    return this.rgbwCache;
  }

  async getTotalLedCount(): Promise<number | null> {
    return readLedsInfo(await this.getInfo()).count;
  }

  async fetchSegments(): Promise<Segment[]> {
    return segmentsFromState(await this.getState());
  }

  async renameSegment(id: number, name: string): Promise<boolean> {
    return this.postState(buildRenamePayload(id, name));
  }

  async applyToSegments(update: SegmentUpdate): Promise<boolean> {
    if (update.ids.length === 0) return true;
    return this.postState(buildSegmentsPayload(update));
  }

  async updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean> {
    const payload = buildSegmentBoundsPayload(segmentId, bounds);
    return payload ? this.postState(payload) : true;
  }

  async savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.postState(buildSavePresetPayload(presetId, state, presetName));
  }

  async loadPreset(presetId: number): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.postState(buildLoadPresetPayload(presetId));
  }

  dispose(): void {
    this.rgbwCache = undefined;
  }
}
