import { z } from "zod";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(z.string(), jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), jsonValueSchema);

export type Rgb = { r: number; g: number; b: number };

export type Color = Rgb & { w?: number };

/** Wire-level `/json/state` object, e.g. `{ on, bri, seg: [...] }`. */
export type DeviceState = JsonObject;

/** Outbound state update; see `normalizePayload`. */
export type StatePayload = JsonObject;

export type Segment = {
  id: number;
  name: string;
  start: number; // first LED
  stop: number; // exclusive
  speed?: number;
  intensity?: number;
  colors: Color[];
};

export type DeviceStateSnapshot = {
  on: boolean;
  brightness: number; // 0–255
  segments: Segment[];
};

export type SetStateOptions = {
  on?: boolean;
  brightness?: number;
  speed?: number;
  color?: Rgb;
  white?: number;
  forceZeroWhite?: boolean;
};

export type SegmentUpdate = {
  ids: number[];
  color?: Rgb;
  white?: number;
  fx?: number;
  speed?: number;
  intensity?: number;
};

export type SegmentBounds = { start?: number; stop?: number };

export type SyncSenderOptions = { targets?: string[]; ddpPort?: number };

export type TransportKind = "local" | "relay-queue" | "broker-relay" | "simulated";

/**
 * Capability set shared by every JSON-path transport. Expected failures
 * (unreachable device, malformed response, unsupported capability) resolve
 * to `false` / `null`; implementations never throw across this interface.
 */
export interface DeviceTransport {
  readonly kind: TransportKind;

  getState(): Promise<DeviceState | null>;
  setState(options: SetStateOptions): Promise<boolean>;
  applyJson(payload: StatePayload): Promise<boolean>;
  applyConfig(cfg: JsonObject): Promise<boolean>;
  uploadLedMap(jsonContent: string): Promise<boolean>;
  configureSyncReceiver(): Promise<boolean>;
  configureSyncSender(options?: SyncSenderOptions): Promise<boolean>;

  supportsRgbw(): Promise<boolean>;
  getTotalLedCount(): Promise<number | null>;

  fetchSegments(): Promise<Segment[]>;
  renameSegment(id: number, name: string): Promise<boolean>;
  applyToSegments(update: SegmentUpdate): Promise<boolean>;
  updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean>;

  /** `presetId` must be 1–250. */
  savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean>;
  loadPreset(presetId: number): Promise<boolean>;

  dispose(): void;
}
