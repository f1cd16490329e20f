export * from "./util/types.js";
export * from "./util/errors.js";
export { loadConfig, type AppConfig, type ConnectivitySetting } from "./util/config.js";
export { createModuleLogger, type ModuleLogger } from "./util/logger.js";
export { TokenBucketLimiter, type LimiterOptions } from "./util/limiter.js";

export { normalizePayload } from "./protocol/normalize.js";
export { rgbToRgbw, clampByte, type Rgbw, type RgbwOptions } from "./protocol/color.js";
export * from "./protocol/segments.js";
export * from "./protocol/frame-codec.js";
export { PaletteFlowGenerator, type PaletteEntry, type PaletteFlowOptions } from "./protocol/palette-flow.js";

export * from "./relay/command-store.js";
export * from "./relay/broker-client.js";

export { LocalTransport, LOCAL_TIMEOUTS, type LocalTransportOptions } from "./adapters/local.js";
export * from "./adapters/relay-queue.js";
export * from "./adapters/broker-relay.js";
export * from "./adapters/stream.js";
export { SimulatedTransport, type SimulatedTransportOptions } from "./adapters/simulated.js";
export * from "./adapters/selector.js";

export * from "./poller.js";
export { createServer, SERVER_NAME, SERVER_VERSION, type ServerOptions } from "./server.js";
