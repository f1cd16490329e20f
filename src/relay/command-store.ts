import { randomUUID } from "node:crypto";
import type { Dispatcher } from "undici";
import { z } from "zod";
import { HttpStatusError, MalformedResponseError } from "../util/errors.js";
import { getJson, joinUrl, postJson, sendJson, type HttpOptions } from "../util/http.js";
import { jsonObjectSchema, type JsonObject } from "../util/types.js";

const commandTypes = [
  "getState",
  "getInfo",
  "setState",
  "applyJson",
  "applyConfig",
  "configureSyncReceiver",
  "configureSyncSender",
  "renameSegment",
  "applyToSegments",
  "updateSegmentConfig",
  "savePreset",
  "loadPreset",
] as const;
export type CommandType = (typeof commandTypes)[number];

export const commandStatusSchema = z.enum(["pending", "executing", "completed", "failed", "timeout"]);
export type CommandStatus = z.infer<typeof commandStatusSchema>;

export function isTerminal(status: CommandStatus): boolean {
  return status === "completed" || status === "failed" || status === "timeout";
}

export const commandRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  payload: jsonObjectSchema,
  controllerId: z.string(),
  controllerIp: z.string().default(""),
  webhookUrl: z.string().default(""),
  status: commandStatusSchema.catch("pending"),
  result: jsonObjectSchema.optional(),
  error: z.string().optional(),
  createdAt: z.string(),
  completedAt: z.string().optional(),
});
export type CommandRecord = z.infer<typeof commandRecordSchema>;

export type NewCommand = Omit<CommandRecord, "id" | "result" | "error" | "completedAt">;

export type CommandPatch = Partial<Pick<CommandRecord, "status" | "result" | "error" | "completedAt">>;

export function createCommand(
  type: CommandType,
  payload: JsonObject,
  target: { controllerId: string; controllerIp?: string; webhookUrl?: string }
): NewCommand {
  return {
    type,
    payload,
    controllerId: target.controllerId,
    controllerIp: target.controllerIp ?? "",
    webhookUrl: target.webhookUrl ?? "",
    status: "pending",
    createdAt: new Date().toISOString(),
  };
}

/**
 * Durable queue shared with the executing side, one collection per user
 * (`users/{userId}/commands`). Records are the command entity serialized as is.
 */
export interface CommandStore {
  /** Writes a new record and returns its store-assigned id. */
  enqueue(userId: string, command: NewCommand): Promise<string>;
  /** Resolves null when the record does not exist. `signal` may cut the read short. */
  fetch(userId: string, commandId: string, signal?: AbortSignal): Promise<CommandRecord | null>;
  update(userId: string, commandId: string, patch: CommandPatch): Promise<void>;
}

export type HttpCommandStoreOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

/** REST document-store client: POST to the collection, GET/PATCH single documents. */
export class HttpCommandStore implements CommandStore {
  private baseUrl: string;
  private http: HttpOptions;

  constructor({ baseUrl, token, timeoutMs = 10000, dispatcher }: HttpCommandStoreOptions) {
    this.baseUrl = baseUrl;
    this.http = {
      timeoutMs,
      dispatcher,
      headers: token ? { Authorization: `Bearer ${token}` } : undefined,
    };
  }

  private collection(userId: string) {
    return joinUrl(this.baseUrl, `users/${encodeURIComponent(userId)}/commands`);
  }

  private doc(userId: string, commandId: string) {
    return `${this.collection(userId)}/${encodeURIComponent(commandId)}`;
  }

  async enqueue(userId: string, command: NewCommand): Promise<string> {
    const url = this.collection(userId);
    const res = await postJson(url, command, this.http);
    const id = res.id;
    if (typeof id !== "string" || id === "") throw new MalformedResponseError(url);
    return id;
  }

  async fetch(userId: string, commandId: string, signal?: AbortSignal): Promise<CommandRecord | null> {
    const url = this.doc(userId, commandId);
    let raw: JsonObject;
    try {
      raw = await getJson(url, { ...this.http, signal });
    } catch (e) {
      if (e instanceof HttpStatusError && e.status === 404) return null;
      throw e;
    }
    const parsed = commandRecordSchema.safeParse({ id: commandId, ...raw });
    if (!parsed.success) throw new MalformedResponseError(url, parsed.error);
    return parsed.data;
  }

  async update(userId: string, commandId: string, patch: CommandPatch): Promise<void> {
    const body: JsonObject = {};
    if (patch.status !== undefined) body.status = patch.status;
    if (patch.result !== undefined) body.result = patch.result;
    if (patch.error !== undefined) body.error = patch.error;
    if (patch.completedAt !== undefined) body.completedAt = patch.completedAt;
    await sendJson("PATCH", this.doc(userId, commandId), body, this.http);
  }
}

type EnqueueListener = (userId: string, record: CommandRecord) => void;

/**
 * In-process queue. `complete` and `fail` play the executing side.
 */
export class MemoryCommandStore implements CommandStore {
  private records = new Map<string, { userId: string; record: CommandRecord }>();
  private listeners: EnqueueListener[] = [];

  async enqueue(userId: string, command: NewCommand): Promise<string> {
    const id = randomUUID();
    const record: CommandRecord = structuredClone({ ...command, id });
    this.records.set(id, { userId, record });
    for (const listener of this.listeners) listener(userId, structuredClone(record));
    return id;
  }

  async fetch(userId: string, commandId: string): Promise<CommandRecord | null> {
    const entry = this.records.get(commandId);
    if (!entry || entry.userId !== userId) return null;
    return structuredClone(entry.record);
  }

  async update(userId: string, commandId: string, patch: CommandPatch): Promise<void> {
    const entry = this.records.get(commandId);
    if (!entry || entry.userId !== userId) throw new Error(`Unknown command ${commandId}`);
    entry.record = { ...entry.record, ...structuredClone(patch) };
  }

  onEnqueue(listener: EnqueueListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  complete(commandId: string, result: JsonObject = {}): void {
    this.settle(commandId, { status: "completed", result });
  }

  fail(commandId: string, error: string): void {
    this.settle(commandId, { status: "failed", error });
  }

  get(commandId: string): CommandRecord | undefined {
    const entry = this.records.get(commandId);
    return entry ? structuredClone(entry.record) : undefined;
  }

  get size(): number {
    return this.records.size;
  }

  private settle(commandId: string, patch: CommandPatch): void {
    const entry = this.records.get(commandId);
    if (!entry) throw new Error(`Unknown command ${commandId}`);
    entry.record = { ...entry.record, ...patch, completedAt: new Date().toISOString() };
  }
}
