import type { AppConfig } from "./config";
import { ComposeSession, TestcontainersComposeRuntime, type ComposeRuntime, type ServiceEndpoints } from "./compose";
import { redisLivenessCheck } from "./liveness";
import { createChildLogger, type Logger } from "./logger";
import { waitUntilReady, type ReadinessCheck } from "./readiness";
import { buildRedisUri, REDIS_PORT } from "./uri";

export type Probe = (uri: string) => ReadinessCheck;

export interface ServiceReadinessOptions {
  timeout?: number;
  pause?: number;
  probe?: Probe;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Waits until the Redis-like `service` answers PING and returns its URI.
 */
export async function redisLikeServiceUri(
  endpoints: ServiceEndpoints,
  service: string,
  { timeout = 60_000, pause = 100, probe, signal, logger }: ServiceReadinessOptions = {}
): Promise<string> {
  const uri = buildRedisUri(endpoints.host(service), endpoints.portFor(service, REDIS_PORT));
  const check = probe ? probe(uri) : redisLivenessCheck(uri, { logger });

  await waitUntilReady(check, { timeout, pause, signal, description: service });

  logger?.info({ service, uri }, "service ready");
  return uri;
}

export interface StartDependenciesOptions {
  runtime?: ComposeRuntime;
  probe?: Probe;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Dependencies {
  session: ComposeSession;
  redisUri: string;
  keydbUri: string;
}

export async function startDependencies(
  config: AppConfig,
  { runtime = new TestcontainersComposeRuntime(), probe, signal, logger }: StartDependenciesOptions = {}
): Promise<Dependencies> {
  const log = logger ?? createChildLogger({ component: "dependencies" }, config.logLevel);
  const session = await ComposeSession.start(runtime, config.compose, log);

  const { timeout, pause, connectTimeout } = config.readiness;
  const options: ServiceReadinessOptions = {
    timeout,
    pause,
    signal,
    logger: log,
    probe: probe ?? ((uri) => redisLivenessCheck(uri, { connectTimeout, logger: log }))
  };

  try {
    const redisUri = await redisLikeServiceUri(session, "redis", options);
    const keydbUri = await redisLikeServiceUri(session, "keydb", options);
    return { session, redisUri, keydbUri };
  } catch (error) {
    try {
      await session.stop();
    } catch (cleanupError) {
      log.error({ err: cleanupError }, "teardown after failed readiness wait failed");
    }
    throw error;
  }
}
