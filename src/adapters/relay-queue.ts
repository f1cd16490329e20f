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
import {
  createCommand,
  isTerminal,
  type CommandRecord,
  type CommandStore,
  type CommandType,
} from "../relay/command-store.js";
import { describeError, UnsupportedCapabilityError } from "../util/errors.js";
import { createModuleLogger } from "../util/logger.js";
import { linkSignals, monotonicNow, sleep, type Clock, type LinkedSignal } from "../util/timing.js";
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

const logger = createModuleLogger("RelayQueueTransport");

export const RELAY_POLL_INTERVAL_MS = 500;
export const RELAY_COMMAND_TIMEOUT_MS = 30000;

export type RelayQueueTransportOptions = {
  store: CommandStore;
  userId: string;
  controllerId: string;
  controllerIp?: string;
  /** Empty for bridge mode, where a device on the home network polls the queue. */
  webhookUrl?: string;
  pollIntervalMs?: number;
  commandTimeoutMs?: number;
  now?: Clock;
};

type WaitOutcome = { kind: "done"; record: CommandRecord } | { kind: "timeout" } | { kind: "cancelled" };

/**
 * Store-and-forward relay: each operation writes one command record and polls
 * it until the executing side marks it terminal or the ceiling elapses. The
 * record is the single source of truth; this side only ever writes `timeout`.
 */
export class RelayQueueTransport implements DeviceTransport {
  readonly kind = "relay-queue";
  private store: CommandStore;
  private userId: string;
  private target: { controllerId: string; controllerIp?: string; webhookUrl?: string };
  private pollIntervalMs: number;
  private commandTimeoutMs: number;
  private now: Clock;
  private inflight = new Set<LinkedSignal>();

  constructor(opts: RelayQueueTransportOptions) {
    this.store = opts.store;
    this.userId = opts.userId;
    this.target = { controllerId: opts.controllerId, controllerIp: opts.controllerIp, webhookUrl: opts.webhookUrl };
    this.pollIntervalMs = opts.pollIntervalMs ?? RELAY_POLL_INTERVAL_MS;
    this.commandTimeoutMs = opts.commandTimeoutMs ?? RELAY_COMMAND_TIMEOUT_MS;
    this.now = opts.now ?? monotonicNow;
  }

  /**
   * Queues one command and waits for its result. Resolves null on enqueue
   * failure, `failed`, timeout or cancellation. Cancelling stops polling only;
   * the queued record stays where it is.
   */
  async executeCommand(type: CommandType, payload: JsonObject, signal?: AbortSignal): Promise<JsonObject | null> {
    let commandId: string;
    try {
      commandId = await this.store.enqueue(this.userId, createCommand(type, payload, this.target));
    } catch (e) {
      logger.error(`enqueue ${type} failed: ${describeError(e)}`);
      return null;
    }
    logger.debug(`queued ${type} as ${commandId}`, { payload });

    const linked = linkSignals(signal);
    this.inflight.add(linked);
    let outcome: WaitOutcome;
    try {
      outcome = await this.waitForCompletion(commandId, linked.signal);
    } finally {
      this.inflight.delete(linked);
      linked.unlink();
    }

    switch (outcome.kind) {
      case "cancelled":
        logger.info(`stopped waiting for ${type} (${commandId})`);
        return null;
      case "timeout":
        logger.warn(`${type} (${commandId}) timed out after ${this.commandTimeoutMs}ms`);
        await this.markTimeout(commandId);
        return null;
      case "done":
        if (outcome.record.status === "completed") return outcome.record.result ?? {};
        logger.warn(`${type} (${commandId}) ended as ${outcome.record.status}: ${outcome.record.error ?? "no error given"}`);
        return null;
    }
  }

  /** Neither a slow read nor the pause between reads runs past the deadline. */
  private async waitForCompletion(commandId: string, signal: AbortSignal): Promise<WaitOutcome> {
    const deadline = this.now() + this.commandTimeoutMs;
    let remaining = this.commandTimeoutMs;
    while (remaining > 0) {
      if (signal.aborted) return { kind: "cancelled" };
      try {
        const record = await this.fetchWithin(commandId, remaining, signal);
        if (record && isTerminal(record.status)) return { kind: "done", record };
      } catch (e) {
        logger.debug(`poll of ${commandId} failed: ${describeError(e)}`);
      }
      if (signal.aborted) return { kind: "cancelled" };
      remaining = deadline - this.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining), signal);
      remaining = deadline - this.now();
    }
    return signal.aborted ? { kind: "cancelled" } : { kind: "timeout" };
  }

  /** One store read, given up (as null) after `ms` or on abort. */
  private async fetchWithin(commandId: string, ms: number, signal: AbortSignal): Promise<CommandRecord | null> {
    const bound = linkSignals(signal);
    if (bound.signal.aborted) return null;
    const timer = setTimeout(() => bound.abort(), ms);
    try {
      return await Promise.race([
        this.store.fetch(this.userId, commandId, bound.signal),
        new Promise<null>((resolve) => bound.signal.addEventListener("abort", () => resolve(null), { once: true })),
      ]);
    } finally {
      clearTimeout(timer);
      bound.unlink();
    }
  }

  private async markTimeout(commandId: string): Promise<void> {
    try {
      await this.store.update(this.userId, commandId, { status: "timeout" });
    } catch (e) {
      logger.debug(`could not mark ${commandId} as timeout: ${describeError(e)}`);
    }
  }

  private async executeBool(type: CommandType, payload: JsonObject): Promise<boolean> {
    return (await this.executeCommand(type, payload)) !== null;
  }

  /** Stops every poll in progress. */
  cancelPending(): void {
    for (const linked of this.inflight) linked.abort();
    this.inflight.clear();
  }

  get pendingCount(): number {
    return this.inflight.size;
  }

  async getState(): Promise<DeviceState | null> {
    return this.executeCommand("getState", {});
  }

  async setState(options: SetStateOptions): Promise<boolean> {
    return this.executeBool("setState", normalizePayload(buildSetStatePayload(options)));
  }

  async applyJson(payload: StatePayload): Promise<boolean> {
    return this.executeBool("applyJson", normalizePayload(payload));
  }

  async applyConfig(cfg: JsonObject): Promise<boolean> {
    return this.executeBool("applyConfig", cfg);
  }

  /** The executing side cannot receive files. */
  async uploadLedMap(_jsonContent: string): Promise<boolean> {
    logger.info(new UnsupportedCapabilityError(this.kind, "ledmap upload").message);
    return false;
  }

  async configureSyncReceiver(): Promise<boolean> {
    return this.executeBool("configureSyncReceiver", SYNC_RECEIVER_PAYLOAD);
  }

  async configureSyncSender(options: SyncSenderOptions = {}): Promise<boolean> {
    const [udp, ddp] = buildSyncSenderPayloads(options);
    return this.executeBool("configureSyncSender", { ...udp, ...ddp });
  }

  async supportsRgbw(): Promise<boolean> {
    return readLedsInfo(await this.executeCommand("getInfo", {})).rgbw ?? false;
  }

  async getTotalLedCount(): Promise<number | null> {
    return readLedsInfo(await this.executeCommand("getInfo", {})).count;
  }

  async fetchSegments(): Promise<Segment[]> {
    return segmentsFromState(await this.getState());
  }

  async renameSegment(id: number, name: string): Promise<boolean> {
    return this.executeBool("renameSegment", buildRenamePayload(id, name));
  }

  async applyToSegments(update: SegmentUpdate): Promise<boolean> {
    if (update.ids.length === 0) return true;
    return this.executeBool("applyToSegments", normalizePayload(buildSegmentsPayload(update)));
  }

  async updateSegmentConfig(segmentId: number, bounds: SegmentBounds): Promise<boolean> {
    const payload = buildSegmentBoundsPayload(segmentId, bounds);
    return payload ? this.executeBool("updateSegmentConfig", payload) : true;
  }

  async savePreset(presetId: number, state: StatePayload, presetName?: string): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.executeBool("savePreset", normalizePayload(buildSavePresetPayload(presetId, state, presetName)));
  }

  async loadPreset(presetId: number): Promise<boolean> {
    if (!isValidPresetId(presetId)) return false;
    return this.executeBool("loadPreset", buildLoadPresetPayload(presetId));
  }

  dispose(): void {
    this.cancelPending();
  }
}
