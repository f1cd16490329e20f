import type { JsonObject, JsonValue, StatePayload } from "../util/types.js";

const LEGACY_KEYS: ReadonlyArray<[legacy: string, canonical: string]> = [
  ["gp", "grp"],
  ["sp", "spc"],
];

const PATTERN_DEFAULTS: ReadonlyArray<[key: string, value: number]> = [
  ["grp", 1],
  ["spc", 0],
  ["of", 0],
];

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeSegment(raw: JsonObject): JsonObject {
  const seg: JsonObject = { ...raw };

  for (const [legacy, canonical] of LEGACY_KEYS) {
    if (legacy in seg && !(canonical in seg)) {
      seg[canonical] = seg[legacy];
      delete seg[legacy];
    }
  }

  // `fx` marks a full pattern application; a segment without it is a slider nudge.
  if ("fx" in seg) {
    for (const [key, value] of PATTERN_DEFAULTS) {
      if (!(key in seg)) seg[key] = value;
    }
  }
  return seg;
}

/**
 * Returns a copy of `payload` in which every `seg` entry carrying `fx` also
 * carries `grp`, `spc` and `of`, and legacy `gp`/`sp` keys are renamed.
 *
 * The device only updates fields present in a write, so a pattern switch that
 * omits grouping/spacing/offset inherits the previous pattern's values.
 * The input is never mutated.
 */
export function normalizePayload(payload: StatePayload): StatePayload {
  const result: JsonObject = { ...payload };
  const seg = payload.seg;
  if (!Array.isArray(seg) || seg.length === 0) return result;

  result.seg = seg.map((entry) => (isObject(entry) ? normalizeSegment(entry) : entry));
  return result;
}
