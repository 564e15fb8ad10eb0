import Redis from "ioredis";
import { createChildLogger, type Logger } from "./logger";

export interface InfoClient {
  info(): Promise<string>;
  quit(): Promise<string>;
}

export type ServerInfo = Record<string, string>;

/**
 * Accepts the URI of a Redis-like service and can do one thing: connect and
 * return the output of INFO.
 */
export class DemoApplication {
  constructor(
    readonly storageUri: string,
    private readonly createClient: (uri: string) => InfoClient = (uri) => new Redis(uri, { maxRetriesPerRequest: 1 }),
    private readonly logger: Logger = createChildLogger({ component: "demo" })
  ) {}

  async info(): Promise<ServerInfo> {
    const client = this.createClient(this.storageUri);
    try {
      return parseInfo(await client.info());
    } finally {
      try {
        await client.quit();
      } catch (err) {
        this.logger.warn({ err, storageUri: this.storageUri }, "closing the connection failed");
      }
    }
  }
}

export function parseInfo(raw: string): ServerInfo {
  const info: ServerInfo = {};

  for (const line of raw.split(/\r?\n/)) {
    if (line === "" || line.startsWith("#")) {
      continue;
    }

    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }

    info[line.slice(0, separator)] = line.slice(separator + 1);
  }

  return info;
}
