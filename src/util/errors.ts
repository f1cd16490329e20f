/** Internal failure types. Transports catch these at the contract boundary. */

export enum ErrorCode {
  HTTP_STATUS = "http_status",
  MALFORMED_RESPONSE = "malformed_response",
  UNSUPPORTED_CAPABILITY = "unsupported_capability",
}

export class TransportError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
  }
}

export class HttpStatusError extends TransportError {
  readonly status: number;

  constructor(method: string, url: string, status: number) {
    super(ErrorCode.HTTP_STATUS, `${method} ${url} failed with status ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class MalformedResponseError extends TransportError {
  constructor(url: string, cause?: unknown) {
    super(ErrorCode.MALFORMED_RESPONSE, `Malformed response from ${url}`, { cause });
    this.name = "MalformedResponseError";
  }
}

export class UnsupportedCapabilityError extends TransportError {
  constructor(transport: string, capability: string) {
    super(ErrorCode.UNSUPPORTED_CAPABILITY, `${capability} is not supported by the ${transport} transport`);
    this.name = "UnsupportedCapabilityError";
  }
}

/** Renders any thrown value as a single log-friendly line. */
export function describeError(error: unknown): string {
  if (error instanceof TransportError) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
}
