import { toSnapshot } from "./protocol/segments.js";
import { describeError } from "./util/errors.js";
import { createModuleLogger } from "./util/logger.js";
import { sleep } from "./util/timing.js";
import type { DeviceState, DeviceStateSnapshot } from "./util/types.js";

const logger = createModuleLogger("StatePoller");

export const POLL_INTERVAL_MS = 1500;
export const SETTLE_DELAY_MS = 500;
export const RECONNECT_INTERVAL_MS = 10000;

export type PollerUpdate = {
  connected: boolean;
  state: DeviceStateSnapshot | null;
  /** Queried once per connection; null until known. */
  rgbw: boolean | null;
};

export type PollerListener = (update: PollerUpdate) => void;

/** The read side of the contract the poller needs. */
export interface StateSource {
  getState(): Promise<DeviceState | null>;
  supportsRgbw(): Promise<boolean>;
}

export type StatePollerOptions = {
  intervalMs?: number;
  settleDelayMs?: number;
  reconnectIntervalMs?: number;
};

/**
 * Periodic reader of device state. Reads pause while a write is outstanding
 * and for a settle delay after it, so a read never returns the state from
 * before the write. An unreachable device drops to a slower reconnect probe.
 */
export class StatePoller {
  private source: StateSource;
  private intervalMs: number;
  private settleDelayMs: number;
  private reconnectIntervalMs: number;
  private pollTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private writes = 0;
  /** Counts writes begun; a read that spans one is stale. */
  private writeGeneration = 0;
  private reading = false;
  private listeners = new Set<PollerListener>();
  private last: PollerUpdate = { connected: false, state: null, rgbw: null };

  constructor(source: StateSource, opts: StatePollerOptions = {}) {
    this.source = source;
    this.intervalMs = opts.intervalMs ?? POLL_INTERVAL_MS;
    this.settleDelayMs = opts.settleDelayMs ?? SETTLE_DELAY_MS;
    this.reconnectIntervalMs = opts.reconnectIntervalMs ?? RECONNECT_INTERVAL_MS;
  }

  get latest(): PollerUpdate {
    return this.last;
  }

  get isWriting(): boolean {
    return this.writes > 0;
  }

  get isReconnecting(): boolean {
    return this.reconnectTimer !== null;
  }

  subscribe(listener: PollerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.pollTimer) return;
    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.pollTimer) clearInterval(this.pollTimer);
    this.pollTimer = null;
    this.cancelReconnect();
  }

  /**
   * Runs one read now unless a write or another read is in progress. A read
   * overtaken by a write is discarded.
   */
  async poll(): Promise<void> {
    if (this.writes > 0 || this.reading) return;
    this.reading = true;
    const generation = this.writeGeneration;
    const stale = () => this.writes > 0 || generation !== this.writeGeneration;
    try {
      const state = await this.source.getState();
      if (stale()) return;
      if (!state) {
        this.markDisconnected();
        return;
      }
      this.cancelReconnect();
      let rgbw = this.last.connected ? this.last.rgbw : null;
      if (rgbw === null) rgbw = await this.source.supportsRgbw();
      if (stale()) return;
      this.emit({ connected: true, state: toSnapshot(state), rgbw });
    } catch (e) {
      logger.warn(`poll failed: ${describeError(e)}`);
      if (!stale()) this.markDisconnected();
    } finally {
      this.reading = false;
    }
  }

  /**
   * Brackets a write: polling is suspended until `fn` settles and the settle
   * delay has passed. A write that reports failure marks the device
   * disconnected.
   */
  async runWrite(fn: () => Promise<boolean>): Promise<boolean> {
    this.writes++;
    this.writeGeneration++;
    try {
      const ok = await fn();
      if (!ok && this.last.connected) this.markDisconnected();
      await sleep(this.settleDelayMs);
      return ok;
    } finally {
      this.writes--;
    }
  }

  private markDisconnected(): void {
    if (this.last.connected || this.last.state !== null) {
      this.emit({ connected: false, state: null, rgbw: null });
    }
    this.ensureReconnect();
  }

  private ensureReconnect(): void {
    if (this.reconnectTimer) return;
    logger.info(`device unreachable, probing every ${this.reconnectIntervalMs}ms`);
    this.reconnectTimer = setInterval(() => {
      void this.probe();
    }, this.reconnectIntervalMs);
  }

  private async probe(): Promise<void> {
    try {
      const state = await this.source.getState();
      if (!state) return;
      this.cancelReconnect();
      logger.info("device reachable again");
      this.emit({ connected: true, state: toSnapshot(state), rgbw: null });
    } catch (e) {
      logger.debug(`reconnect probe failed: ${describeError(e)}`);
    }
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) clearInterval(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  private emit(update: PollerUpdate): void {
    this.last = update;
    for (const listener of this.listeners) listener(update);
  }
}
