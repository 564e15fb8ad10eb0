import path from "node:path";
import { z, ZodError } from "zod";
import { AppError, ErrorCodes } from "./errors";

type RawEnv = Record<string, string | undefined>;

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const durationSchema = (name: string, minimum: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(minimum, `${name} must be at least ${minimum}`);

const envSchema = z.object({
  COMPOSE_DIRECTORY: z.string().min(1, "COMPOSE_DIRECTORY must not be empty").default("test/integration"),
  COMPOSE_FILE: z.string().min(1, "COMPOSE_FILE must not be empty").default("docker-compose-test.linux.yaml"),
  // Static so that containers left by an interrupted session can be found and removed
  COMPOSE_PROJECT_NAME: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, "COMPOSE_PROJECT_NAME must be lowercase letters, digits, '-' or '_'")
    .default("compose-ready-demo"),
  READINESS_TIMEOUT_MS: durationSchema("READINESS_TIMEOUT_MS", 0).default(60_000),
  READINESS_PAUSE_MS: durationSchema("READINESS_PAUSE_MS", 0).default(100),
  PROBE_CONNECT_TIMEOUT_MS: durationSchema("PROBE_CONNECT_TIMEOUT_MS", 1).default(1_000),
  LOG_LEVEL: logLevelSchema.optional().default("info")
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export type AppConfig = {
  compose: {
    directory: string;
    file: string;
    projectName: string;
  };
  readiness: {
    timeout: number;
    pause: number;
    connectTimeout: number;
  };
  logLevel: LogLevel;
};

let cachedConfig: AppConfig | null = null;

export function loadConfig(env: RawEnv = process.env): AppConfig {
  try {
    const parsed = envSchema.parse(env);

    const config: AppConfig = {
      compose: {
        directory: path.resolve(parsed.COMPOSE_DIRECTORY),
        file: parsed.COMPOSE_FILE,
        projectName: parsed.COMPOSE_PROJECT_NAME
      },
      readiness: {
        timeout: parsed.READINESS_TIMEOUT_MS,
        pause: parsed.READINESS_PAUSE_MS,
        connectTimeout: parsed.PROBE_CONNECT_TIMEOUT_MS
      },
      logLevel: parsed.LOG_LEVEL
    };

    cachedConfig = config;
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const formatted = error.errors
        .map((issue) => {
          const [pathSegment] = issue.path;
          const identifier = typeof pathSegment === "string" ? pathSegment : "unknown";
          return `${identifier}: ${issue.message}`;
        })
        .join("; ");
      throw new AppError(ErrorCodes.INVALID_CONFIGURATION, `Invalid configuration: ${formatted}`, error.errors);
    }
    throw error;
  }
}

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  return loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
