import { normalizePayload } from "../protocol/normalize.js";
import {
  buildLoadPresetPayload,
  buildRenamePayload,
  buildSavePresetPayload,
  buildSegmentBoundsPayload,
  buildSegmentsPayload,
  buildSetStatePayload,
  isValidPresetId,
  segmentsFromState,
} from "../protocol/segments.js";
import { createModuleLogger } from "../util/logger.js";
import type {
  DeviceState,
  DeviceTransport,
  JsonObject,
  JsonValue,
  Segment,
  SegmentBounds,
  SegmentUpdate,
  SetStateOptions,
  StatePayload,
  SyncSenderOptions,
} from "../util/types.js";

const logger = createModuleLogger("SimulatedTransport");

export type SimulatedTransportOptions = {
  segmentNames?: string[];
  ledsPerSegment?: number;
  rgbw?: boolean;
};

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * In-memory device for demo mode. Applies state writes the way the firmware
 * does: only the fields present in a write change.
 */
export class SimulatedTransport implements DeviceTransport {
  readonly kind = "simulated";
  private state: { on: boolean; bri: number; seg: JsonObject[] };
  private presets = new Map<number, StatePayload>();
  private config: JsonObject = {};
  private ledMap: string | null = null;
  private rgbw: boolean;
  private writes = 0;

  constructor(opts: SimulatedTransportOptions = {}) {
    const names = opts.segmentNames ?? ["Front", "Roof", "Garage"];
    const per = opts.ledsPerSegment ?? 50;
    this.rgbw = opts.rgbw ?? true;
    this.state = {
      on: true,
      bri: 180,
      seg: names.map((n, id) => ({
        id,
        n,
        start: id * per,
        stop: (id + 1) * per,
        fx: 0,
        sx: 128,
        ix: 128,
        grp: 1,
        spc: 0,
        of: 0,
        col: [[255, 255, 255, 0]],
      })),
    };
  }

  /** Number of state writes applied so far. */
  get writeCount(): number {
    return this.writes;
  }

  get lastLedMap(): string | null {
    return this.ledMap;
  }

  get currentConfig(): JsonObject {
    return structuredClone(this.config);
  }

  private apply(payload: StatePayload): boolean {
    const body = normalizePayload(payload);
    const { ps, psave, on, bri } = body;
    if (typeof ps === "number") {
      const preset = this.presets.get(ps);
      if (!preset) return false;
      return this.apply(preset);
    }
    if (typeof psave === "number") {
      const { psave: _slot, n: _name, ...rest } = body;
      this.presets.set(psave, rest);
    }

    this.writes++;
    if (typeof on === "boolean") this.state.on = on;
    if (typeof bri === "number") this.state.bri = Math.max(0, Math.min(255, Math.trunc(bri)));

    const seg = body.seg;
    const updates = Array.isArray(seg) ? seg : isObject(seg) ? [seg] : [];
    updates.forEach((update, index) => {
      if (!isObject(update)) return;
      const id = typeof update.id === "number" ? update.id : index;
      const target = this.state.seg.find((s) => s.id === id);
      if (target) Object.assign(target, structuredClone(update));
    });
    return true;
  }

  async getState(): Promise<DeviceState | null> {
    return structuredClone(this.state);
  }

  async setState(options: SetStateOptions): Promise<boolean> {
    return this.apply(buildSetStatePayload(options));
  }

  async applyJson(payload: StatePayload): Promise<boolean> {
    return this.apply(payload);
  }

  async applyConfig(cfg: JsonObject): Promise<boolean> {
    this.config = { ...this.config, ...structuredClone(cfg) };
    logger.debug("config stored", { cfg });
    return true;
  }

  async uploadLedMap(jsonContent: string): Promise<boolean> {
    this.ledMap = jsonContent;
    return true;
  }

  async configureSyncReceiver(): Promise<boolean> {
    return true;
  }

  async configureSyncSender(_options?: SyncSenderOptions): Promise<boolean> {
    return true;
  }

  async supportsRgbw(): Promise<boolean> {
    return this.rgbw;
  }

  async getTotalLedCount(): Promise<number | null> {
    return this.state.seg.reduce((max, s) => Math.max(max, typeof s.stop === "number" ? s.stop : 0), 0);
  }

  async fetchSegments(): Promise<Segment[]> {
    return segmentsFromState(await this.getState());
  }

  async renameSegment(id: number, name: string): Promise<boolean> {
    return this.apply(buildRenamePayload(id, name));
  }

  async applyToSegments(update: SegmentUpdate): Promise<boolean> {
    if (update.ids.length === 0) return true;
    return this.apply(buildSegmentsPayload(update));
  }

  async updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean> {
    const payload = buildSegmentBoundsPayload(segmentId, bounds);
    return payload ? this.apply(payload) : true;
  }

  async savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.apply(buildSavePresetPayload(presetId, state, presetName));
  }

  async loadPreset(presetId: number): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.apply(buildLoadPresetPayload(presetId));
  }

  dispose(): void {}
}
