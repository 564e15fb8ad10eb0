/** Port every Redis-like service listens on inside its container. */
export const REDIS_PORT = 6379;

export function buildRedisUri(host: string, port: number, database?: number): string {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Invalid port ${port} for host ${host}`);
  }
  if (database !== undefined && (!Number.isInteger(database) || database < 0)) {
    throw new RangeError(`Invalid database index ${database}`);
  }

  // IPv6 literals need brackets to be told apart from the port
  const authority = host.includes(":") && !host.startsWith("[") ? `[${host}]:${port}` : `${host}:${port}`;
  return database === undefined ? `redis://${authority}` : `redis://${authority}/${database}`;
}
