// Wires the components from a GatewayConfig and starts listening.
import type { FastifyInstance } from "fastify";
import { BatchOrchestrator } from "./batch.js";
import { defaultEnvPath, loadProviderProfiles, parseConfig, resolveProfile, type GatewayConfig } from "./config.js";
import { buildGateway } from "./gateway.js";
import { createLogger, type Logger } from "./logger.js";
import { GatewayPipeline } from "./pipeline.js";
import { ResponseCache } from "./response-cache.js";
import type { ToolExecutor } from "./tool-loop.js";
import { HttpTransport } from "./transport.js";

export { buildGateway } from "./gateway.js";
export type { ToolExecutor } from "./tool-loop.js";

export interface StartOptions {
  config?: GatewayConfig;
  logger?: Logger;
  /** Run tool calls server-side, bounded by TOOL_MAX_ROUNDS */
  toolExecutor?: ToolExecutor;
}

export interface RunningGateway {
  app: FastifyInstance;
  logger: Logger;
  close(): Promise<void>;
}

export async function startGateway(options: StartOptions = {}): Promise<RunningGateway> {
  const config = options.config ?? parseConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const profiles = await loadProviderProfiles(config.provider.profilesFile);
  const profile = resolveProfile(profiles, config.provider.name);
  if (!profiles.has(profile.name)) {
    logger.warn({ provider: profile.name }, "no profile for provider; extensions will not be forwarded");
  }
  if (!config.provider.apiKey) {
    logger.warn(`PROVIDER_API_KEY not set; configure it in ${defaultEnvPath()}`);
  }

  const transport = new HttpTransport({
    baseUrl: config.provider.baseUrl,
    apiKey: config.provider.apiKey,
    timeoutMs: config.requestTimeoutMs,
    logger,
  });
  const cache = config.cache.enabled
    ? new ResponseCache({
        maxEntries: config.cache.maxEntries,
        ttlMs: config.cache.ttlMs,
        namespace: config.cache.namespace,
        maxEntryBytes: config.cache.maxEntryBytes,
        logger,
      })
    : undefined;
  const pipeline = new GatewayPipeline({ transport, profile, cache, logger });
  const batch = new BatchOrchestrator({
    pipeline,
    maxConcurrency: config.batch.maxConcurrency,
    streamingThreshold: config.batch.streamingThreshold,
    chunkSize: config.batch.chunkSize,
    maxBatchSize: config.batch.maxSize,
    itemTimeoutMs: config.batch.itemTimeoutMs,
    logger,
  });
  const tools = options.toolExecutor
    ? { executor: options.toolExecutor, maxRounds: config.toolMaxRounds }
    : undefined;
  const app = buildGateway({ pipeline, batch, cache, logger, tools });

  await app.listen({ port: config.port, host: config.host });
  logger.info(
    { provider: profile.name, baseUrl: config.provider.baseUrl, cache: config.cache.enabled, tools: Boolean(tools) },
    `gateway listening on http://${config.host}:${config.port}`,
  );

  return {
    app,
    logger,
    async close() {
      await app.close();
      await cache?.close();
    },
  };
}
