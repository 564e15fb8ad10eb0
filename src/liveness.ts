import Redis, { type RedisOptions } from "ioredis";
import { createChildLogger, type Logger } from "./logger";
import type { ReadinessCheck } from "./readiness";

/** The slice of an ioredis client a liveness probe talks to. */
export interface ProbeClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  disconnect(): void;
}

export interface RedisLivenessCheckOptions {
  connectTimeout?: number;
  createClient?: (uri: string, connectTimeout: number) => ProbeClient;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT = 1000;

/**
 * One shot per attempt: the poller owns the retrying. `commandTimeout` bounds
 * a server that accepts the connection but never answers.
 */
export function probeClientOptions(connectTimeout: number): RedisOptions {
  return {
    lazyConnect: true,
    connectTimeout,
    commandTimeout: connectTimeout,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null
  };
}

function createProbeClient(uri: string, connectTimeout: number, logger: Logger): ProbeClient {
  const client = new Redis(uri, probeClientOptions(connectTimeout));
  client.on("error", (err: Error) => logger.trace({ err, uri }, "probe connection error"));
  return client;
}

export function redisLivenessCheck(uri: string, options: RedisLivenessCheckOptions = {}): ReadinessCheck {
  const connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
  const logger = options.logger ?? createChildLogger({ component: "liveness" });
  const createClient =
    options.createClient ?? ((target: string, timeout: number) => createProbeClient(target, timeout, logger));

  return async (signal) => {
    let client: ProbeClient | undefined;
    const onAbort = () => client?.disconnect();
    try {
      client = createClient(uri, connectTimeout);
      signal?.addEventListener("abort", onAbort, { once: true });
      await client.connect();
      return (await client.ping()) === "PONG";
    } catch (err) {
      logger.debug({ err, uri }, "liveness probe failed");
      return false;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      client?.disconnect();
    }
  };
}
