import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TransportSelector } from "./adapters/selector.js";
import { toSnapshot } from "./protocol/segments.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import { createModuleLogger } from "./util/logger.js";
import { jsonObjectSchema } from "./util/types.js";

const logger = createModuleLogger("McpServer");

export const SERVER_NAME = "wled-relay-mcp";
export const SERVER_VERSION = "0.2.0";

const FAILED = "Command failed or device unreachable.";

export type ServerOptions = {
  limiter?: TokenBucketLimiter;
};

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

function text(value: string): ToolResult {
  return { content: [{ type: "text", text: value }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

function failure(message = FAILED): ToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

const byte = z.number().int().min(0).max(255);
const presetId = z.number().int().min(1).max(250).describe("Preset slot 1-250");
const paletteEntry = z.array(byte).min(3).max(4);

export function createServer(selector: TransportSelector, opts: ServerOptions = {}): McpServer {
  const limiter = opts.limiter ?? new TokenBucketLimiter();
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  async function limited(tool: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
    if (!(await limiter.take())) {
      logger.warn(`${tool} rejected by rate limiter`);
      return failure("Too many requests, try again shortly.");
    }
    return run();
  }

  async function write(tool: string, done: string, run: () => Promise<boolean>): Promise<ToolResult> {
    return limited(tool, async () => ((await run()) ? text(done) : failure()));
  }

  server.registerTool("wled_get_state", {
    description: "Read power, brightness and segments from the device.",
    inputSchema: {}
  }, async () => limited("wled_get_state", async () => {
    const state = await selector.getState();
    return state ? json(toSnapshot(state)) : failure();
  }));

  server.registerTool("wled_set_power", {
    description: "Turn the device on or off.",
    inputSchema: { on: z.boolean() }
  }, async ({ on }) => write("wled_set_power", `Power ${on ? "on" : "off"} sent.`, () => selector.setState({ on })));

  server.registerTool("wled_set_brightness", {
    description: "Set master brightness (0-255).",
    inputSchema: { brightness: byte }
  }, async ({ brightness }) =>
    write("wled_set_brightness", `Brightness set to ${brightness}.`, () => selector.setState({ on: true, brightness })));

  server.registerTool("wled_set_color", {
    description: "Set the primary color of the main segment. White is only used on RGBW strips.",
    inputSchema: { r: byte, g: byte, b: byte, white: byte.optional() }
  }, async ({ r, g, b, white }) => write("wled_set_color", `Color set to rgb(${r},${g},${b}).`, async () => {
    const rgbw = await selector.supportsRgbw();
    return selector.setState({
      color: { r, g, b },
      white: rgbw ? white : undefined,
      forceZeroWhite: rgbw && white === undefined,
    });
  }));

  server.registerTool("wled_apply_json", {
    description: "Apply a raw /json/state payload, e.g. a full pattern with segments.",
    inputSchema: { payload: jsonObjectSchema }
  }, async ({ payload }) => write("wled_apply_json", "Payload applied.", () => selector.applyJson(payload)));

  server.registerTool("wled_list_segments", {
    description: "List segments with their LED ranges.",
    inputSchema: {}
  }, async () => limited("wled_list_segments", async () => json(await selector.fetchSegments())));

  server.registerTool("wled_rename_segment", {
    description: "Rename a segment.",
    inputSchema: { id: z.number().int().min(0), name: z.string().min(1).max(64) }
  }, async ({ id, name }) =>
    write("wled_rename_segment", `Segment ${id} renamed to ${name}.`, () => selector.renameSegment(id, name)));

  server.registerTool("wled_save_preset", {
    description: "Save a state payload into a preset slot.",
    inputSchema: { id: presetId, name: z.string().max(64).optional(), state: jsonObjectSchema.optional() }
  }, async ({ id, name, state }) =>
    write("wled_save_preset", `Preset ${id} saved.`, () => selector.savePreset(id, state ?? {}, name)));

  server.registerTool("wled_load_preset", {
    description: "Load a saved preset.",
    inputSchema: { id: presetId }
  }, async ({ id }) => write("wled_load_preset", `Preset ${id} loaded.`, () => selector.loadPreset(id)));

  server.registerTool("wled_stream_start", {
    description: "Stream a flowing palette animation over UDP. JSON color writes are paused while it runs.",
    inputSchema: {
      palette: z.array(paletteEntry).min(1).max(16),
      speed: z.number().min(0).max(5).optional(),
      spread: z.number().positive().max(1).optional(),
      pixelCount: z.number().int().min(1).max(10000).optional(),
    }
  }, async ({ palette, speed, spread, pixelCount }) =>
    write("wled_stream_start", "Stream started.", () => selector.startStream({ palette, speed, spread, pixelCount })));

  server.registerTool("wled_stream_stop", {
    description: "Stop the pixel stream.",
    inputSchema: {}
  }, async () => limited("wled_stream_stop", async () => {
    selector.stopStream();
    return text("Stream stopped.");
  }));

  server.registerTool("wled_transport_status", {
    description: "Show which transport handles commands and whether a stream is active.",
    inputSchema: { probe: z.boolean().optional().describe("Re-check connectivity first") }
  }, async ({ probe }) => limited("wled_transport_status", async () => {
    if (probe) await selector.probeConnectivity();
    return json(selector.status());
  }));

  return server;
}
