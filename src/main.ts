#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { TransportSelector, type TransportSelectorOptions } from "./adapters/selector.js";
import { BrokerClient } from "./relay/broker-client.js";
import { HttpCommandStore } from "./relay/command-store.js";
import { createServer, SERVER_NAME } from "./server.js";
import { loadConfig } from "./util/config.js";
import { describeError } from "./util/errors.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import { createModuleLogger } from "./util/logger.js";

const logger = createModuleLogger("main");

async function main() {
  const config = loadConfig();

  const deps: TransportSelectorOptions = { streamPort: config.streamPort };
  if (config.queueUrl) deps.commandStore = new HttpCommandStore({ baseUrl: config.queueUrl, token: config.queueToken });
  if (config.brokerUrl) deps.brokerClient = new BrokerClient({ baseUrl: config.brokerUrl, token: config.brokerToken });

  const selector = new TransportSelector(
    {
      host: config.host,
      connectivity: config.connectivity,
      demoMode: config.demoMode,
      remoteAccessEnabled: config.remoteAccessEnabled,
      brokerRelayEnabled: config.brokerRelayEnabled,
      userId: config.userId,
      controllerId: config.controllerId,
      controllerIp: config.host,
      webhookUrl: config.webhookUrl,
    },
    deps
  );
  if (config.connectivity === "auto") await selector.probeConnectivity();

  const server = createServer(selector, { limiter: new TokenBucketLimiter({ rps: config.rateRps }) });
  const shutdown = () => {
    selector.dispose();
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error(`close failed: ${describeError(e)}`);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_NAME} running (stdio), transport: ${selector.status().transport ?? "none"}`);
}

main().catch((e: unknown) => {
  logger.error(describeError(e));
  process.exit(1);
});
