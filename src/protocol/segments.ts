import { clampByte, rgbToRgbw } from "./color.js";
import type {
  Color,
  DeviceState,
  DeviceStateSnapshot,
  JsonObject,
  JsonValue,
  Segment,
  SegmentBounds,
  SegmentUpdate,
  SetStateOptions,
  StatePayload,
  SyncSenderOptions,
} from "../util/types.js";

export const MAX_SEGMENT_LEDS = 10000;
export const MIN_PRESET_ID = 1;
export const MAX_PRESET_ID = 250;
export const DEFAULT_DDP_PORT = 4048;

export function ledCount(segment: Pick<Segment, "start" | "stop">): number {
  return Math.max(0, Math.min(MAX_SEGMENT_LEDS, segment.stop - segment.start));
}

export function isValidPresetId(presetId: number): boolean {
  return Number.isInteger(presetId) && presetId >= MIN_PRESET_ID && presetId <= MAX_PRESET_ID;
}

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function intOf(value: JsonValue | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

function parseColors(col: JsonValue | undefined): Color[] {
  if (!Array.isArray(col)) return [];
  const colors: Color[] = [];
  for (const entry of col.slice(0, 3)) {
    if (!Array.isArray(entry) || entry.length < 3) continue;
    const [r, g, b, w] = entry.map(intOf);
    if (r === undefined || g === undefined || b === undefined) continue;
    colors.push(w === undefined ? { r, g, b } : { r, g, b, w });
  }
  return colors;
}

export function segmentFromWire(raw: JsonObject, fallbackIndex: number): Segment {
  const id = intOf(raw.id) ?? fallbackIndex;
  const n = raw.n;
  const name = typeof n === "string" && n.trim() !== "" ? n.trim() : `Channel ${id + 1}`;
  const segment: Segment = {
    id,
    name,
    start: intOf(raw.start) ?? 0,
    stop: intOf(raw.stop) ?? 0,
    colors: parseColors(raw.col),
  };
  const speed = intOf(raw.sx);
  const intensity = intOf(raw.ix);
  if (speed !== undefined) segment.speed = speed;
  if (intensity !== undefined) segment.intensity = intensity;
  return segment;
}

/** Firmware builds emit `seg` either as a list or as a single object. */
export function segmentsFromState(state: DeviceState | null): Segment[] {
  if (!state) return [];
  const seg = state.seg;
  if (Array.isArray(seg)) {
    const out: Segment[] = [];
    seg.forEach((entry, index) => {
      if (isObject(entry)) out.push(segmentFromWire(entry, index));
    });
    return out;
  }
  if (isObject(seg)) return [segmentFromWire(seg, 0)];
  return [];
}

export function toSnapshot(state: DeviceState): DeviceStateSnapshot {
  const bri = intOf(state.bri) ?? 0;
  const on = typeof state.on === "boolean" ? state.on : bri > 0;
  return { on, brightness: bri, segments: segmentsFromState(state) };
}

/**
 * One payload for one logical update. The segment entry is only included when
 * it carries speed or color; an empty `seg` would reset unrelated parameters.
 */
export function buildSetStatePayload(options: SetStateOptions): StatePayload {
  const payload: StatePayload = {};
  if (options.on !== undefined) payload.on = options.on;
  if (options.brightness !== undefined) payload.bri = clampByte(options.brightness);

  const segUpdate: JsonObject = { id: 0 };
  if (options.speed !== undefined) segUpdate.sx = clampByte(options.speed);
  if (options.color !== undefined || options.white !== undefined) {
    const color = options.color ?? { r: 0, g: 0, b: 0 };
    segUpdate.col = [
      rgbToRgbw(color.r, color.g, color.b, {
        explicitWhite: options.white,
        forceZeroWhite: options.forceZeroWhite === true,
      }),
    ];
  }
  if (Object.keys(segUpdate).length > 1) payload.seg = [segUpdate];
  return payload;
}

export function buildSegmentsPayload(update: SegmentUpdate): StatePayload {
  const seg: JsonObject[] = update.ids.map((id) => {
    const entry: JsonObject = { id };
    if (update.fx !== undefined) entry.fx = update.fx;
    if (update.speed !== undefined) entry.sx = clampByte(update.speed);
    if (update.intensity !== undefined) entry.ix = clampByte(update.intensity);
    if (update.color !== undefined) {
      const { r, g, b } = update.color;
      entry.col = [rgbToRgbw(r, g, b, { explicitWhite: update.white })];
    }
    return entry;
  });
  return { seg };
}

export function buildRenamePayload(id: number, name: string): StatePayload {
  return { seg: [{ id, n: name }] };
}

/** Returns null when there is nothing to change. */
export function buildSegmentBoundsPayload(segmentId: number, bounds: SegmentBounds): StatePayload | null {
  const entry: JsonObject = { id: segmentId };
  if (bounds.start !== undefined) entry.start = bounds.start;
  if (bounds.stop !== undefined) entry.stop = bounds.stop;
  return Object.keys(entry).length > 1 ? { seg: [entry] } : null;
}

export function buildSavePresetPayload(presetId: number, state: StatePayload, presetName?: string): StatePayload {
  const payload: StatePayload = { ...state, psave: presetId };
  if (presetName) payload.n = presetName;
  return payload;
}

export function buildLoadPresetPayload(presetId: number): StatePayload {
  return { ps: presetId };
}

export const SYNC_RECEIVER_PAYLOAD: StatePayload = { udpn: { recv: true } };

export function buildSyncSenderPayloads(options: SyncSenderOptions = {}): [udp: StatePayload, ddp: StatePayload] {
  const ddp: JsonObject = { en: true, port: options.ddpPort ?? DEFAULT_DDP_PORT };
  if (options.targets && options.targets.length > 0) ddp.targets = [...options.targets];
  return [{ udpn: { send: true } }, { ddp }];
}

export function readLedsInfo(info: JsonObject | null): { count: number | null; rgbw: boolean | null } {
  const leds = info?.leds;
  if (!isObject(leds)) return { count: null, rgbw: null };
  const count = intOf(leds.count) ?? null;
  const rgbw = typeof leds.rgbw === "boolean" ? leds.rgbw : null;
  return { count, rgbw };
}
