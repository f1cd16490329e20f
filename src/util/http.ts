import { fetch, type Dispatcher, type FormData } from "undici";
import { HttpStatusError, MalformedResponseError } from "./errors.js";
import { linkSignals } from "./timing.js";
import { jsonObjectSchema, type JsonObject, type JsonValue } from "./types.js";

export type HttpOptions = {
  timeoutMs: number;
  headers?: Record<string, string>;
  dispatcher?: Dispatcher;
  /** Aborts the request early, on top of `timeoutMs`. */
  signal?: AbortSignal;
};

type Body = { json: JsonValue } | { form: FormData } | undefined;

async function send(method: string, url: string, body: Body, opts: HttpOptions) {
  const headers: Record<string, string> = { Accept: "application/json", ...opts.headers };
  let payload: string | FormData | undefined;
  if (body && "json" in body) {
    headers["Content-Type"] = "application/json";
    payload = JSON.stringify(body.json);
  } else if (body) {
    payload = body.form;
  }
  const linked = linkSignals(AbortSignal.timeout(opts.timeoutMs), opts.signal);
  try {
    const res = await fetch(url, {
      method,
      headers,
      body: payload,
      signal: linked.signal,
      dispatcher: opts.dispatcher,
    });
    const text = await res.text();
    if (!res.ok) throw new HttpStatusError(method, url, res.status);
    return { status: res.status, text };
  } finally {
    linked.unlink();
  }
}

function parseObject(url: string, text: string): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new MalformedResponseError(url, e);
  }
  const parsed = jsonObjectSchema.safeParse(raw);
  if (!parsed.success) throw new MalformedResponseError(url, parsed.error);
  return parsed.data;
}

/** GETs a JSON object. Rejects on network failure, timeout, non-2xx or a non-object body. */
export async function getJson(url: string, opts: HttpOptions): Promise<JsonObject> {
  const { text } = await send("GET", url, undefined, opts);
  return parseObject(url, text);
}

/** Sends a JSON body; resolves with the parsed response object, or `{}` for an empty body. */
export async function sendJson(
  method: "POST" | "PATCH" | "PUT",
  url: string,
  json: JsonValue,
  opts: HttpOptions
): Promise<JsonObject> {
  const { text } = await send(method, url, { json }, opts);
  return text.trim() === "" ? {} : parseObject(url, text);
}

export async function postJson(url: string, json: JsonValue, opts: HttpOptions): Promise<JsonObject> {
  return sendJson("POST", url, json, opts);
}

export async function postForm(url: string, form: FormData, opts: HttpOptions): Promise<number> {
  const { status } = await send("POST", url, { form }, opts);
  return status;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
