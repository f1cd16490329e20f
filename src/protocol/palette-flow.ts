import { bytesPerPixel } from "./frame-codec.js";

/** `[r, g, b]` or `[r, g, b, w]`, each 0..255. */
export type PaletteEntry = readonly number[];

export type PaletteFlowOptions = {
  palette: readonly PaletteEntry[];
  pixelCount: number;
  rgbw?: boolean;
  /** Cycles per second. */
  speed?: number;
  /** Spatial frequency, radians per pixel. */
  spread?: number;
};

const TWO_PI = 2 * Math.PI;

function channel(a: number, b: number, mix: number): number {
  return Math.trunc(Math.max(0, Math.min(255, a * (1 - mix) + b * mix)));
}

/**
 * Procedural frame source: every pixel blends two palette entries picked by
 * position, driven by a phase that advances with elapsed seconds rather than
 * frame count.
 */
export class PaletteFlowGenerator {
  readonly pixelCount: number;
  readonly rgbw: boolean;
  private palette: readonly PaletteEntry[];
  private speed: number;
  private spread: number;
  private t = 0;

  constructor(options: PaletteFlowOptions) {
    this.palette = options.palette;
    this.pixelCount = Math.max(0, Math.trunc(options.pixelCount));
    this.rgbw = options.rgbw ?? false;
    this.speed = options.speed ?? 0.2;
    this.spread = options.spread ?? 0.08;
  }

  /** Advances time by `dt` seconds and returns the next packed frame. */
  nextFrame(dt: number): Uint8Array {
    this.t += dt * this.speed * TWO_PI;
    const bpp = bytesPerPixel(this.rgbw);
    const out = new Uint8Array(this.pixelCount * bpp);
    const count = this.palette.length;
    if (count === 0) return out;

    const band = Math.max(1, 1 / this.spread);
    for (let i = 0; i < this.pixelCount; i++) {
      const phase = (this.t + i * this.spread) % TWO_PI;
      const mix = Math.sin(phase) * 0.5 + 0.5;
      const a = this.palette[Math.trunc(i / band) % count];
      const b = this.palette[(i + 1) % count];
      const base = i * bpp;
      out[base] = channel(a[0] ?? 0, b[0] ?? 0, mix);
      out[base + 1] = channel(a[1] ?? 0, b[1] ?? 0, mix);
      out[base + 2] = channel(a[2] ?? 0, b[2] ?? 0, mix);
      if (this.rgbw) out[base + 3] = channel(a[3] ?? 0, b[3] ?? 0, mix);
    }
    return out;
  }
}
