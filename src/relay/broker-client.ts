import type { Dispatcher } from "undici";
import { z } from "zod";
import { describeError } from "../util/errors.js";
import { getJson, joinUrl, postJson, type HttpOptions } from "../util/http.js";
import { createModuleLogger } from "../util/logger.js";
import type { JsonObject } from "../util/types.js";

const logger = createModuleLogger("BrokerClient");

export type CommandResult = { success: boolean; error?: string; command?: string };

export type BackendHealth = { online: boolean; mqttConnected: boolean; timestamp?: string };

const healthSchema = z.object({
  mqtt: z.string().optional(),
  timestamp: z.string().optional(),
});

const commandAckSchema = z.object({ command: z.string().optional() }).passthrough();

export type BrokerClientOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

/**
 * HTTP client for the backend bridge that publishes commands to devices over
 * its message broker. Delivery to the device is not acknowledged here; the
 * backend tracks device status on its own channel.
 */
export class BrokerClient {
  readonly baseUrl: string;
  private token: string | undefined;
  private timeoutMs: number;
  private dispatcher?: Dispatcher;

  constructor({ baseUrl, token, timeoutMs = 10000, dispatcher }: BrokerClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.token = token;
    this.timeoutMs = timeoutMs;
    this.dispatcher = dispatcher;
  }

  get isAuthenticated(): boolean {
    return this.token !== undefined && this.token !== "";
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  private http(): HttpOptions {
    const headers: Record<string, string> = {};
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    return { timeoutMs: this.timeoutMs, dispatcher: this.dispatcher, headers };
  }

  async checkHealth(): Promise<BackendHealth> {
    try {
      const body = healthSchema.parse(await getJson(joinUrl(this.baseUrl, "/health"), this.http()));
      return { online: true, mqttConnected: body.mqtt === "connected", timestamp: body.timestamp };
    } catch (e) {
      logger.warn(`health check failed: ${describeError(e)}`);
      return { online: false, mqttConnected: false };
    }
  }

  async sendCommand(deviceId: string, action: string, payload?: JsonObject): Promise<CommandResult> {
    if (!this.isAuthenticated) return { success: false, error: "Not authenticated" };
    const body: JsonObject = { action };
    if (payload) body.payload = payload;
    try {
      const res = await postJson(
        joinUrl(this.baseUrl, `/api/devices/${encodeURIComponent(deviceId)}/command`),
        body,
        this.http()
      );
      const ack = commandAckSchema.safeParse(res);
      return { success: true, command: ack.success ? ack.data.command : undefined };
    } catch (e) {
      logger.warn(`${action} for ${deviceId} failed: ${describeError(e)}`);
      return { success: false, error: "Command failed" };
    }
  }

  async sendWledState(deviceId: string, state: JsonObject): Promise<CommandResult> {
    return this.sendCommand(deviceId, "setState", state);
  }
}
