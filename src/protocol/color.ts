export type Rgbw = [r: number, g: number, b: number, w: number];

export function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

export type RgbwOptions = {
  /** Used verbatim (clamped) when provided. */
  explicitWhite?: number;
  /** Forces W=0, keeping a saturated color on the RGB emitters only. */
  forceZeroWhite?: boolean;
};

/**
 * Splits an RGB color into color + white for warm-white-capable strips.
 * Without overrides the white channel takes `min(r, g, b)` and that amount is
 * subtracted from each color channel.
 */
export function rgbToRgbw(r: number, g: number, b: number, options: RgbwOptions = {}): Rgbw {
  if (options.explicitWhite !== undefined) {
    return [r, g, b, clampByte(options.explicitWhite)];
  }
  if (options.forceZeroWhite) {
    return [r, g, b, 0];
  }
  const w = Math.min(r, g, b);
  return [r - w, g - w, b - w, w];
}
