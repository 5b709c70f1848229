import { z } from "zod";

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
};

const parseCsv = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

const parsePathSet = (value: string | undefined, fallback: string[]): string[] =>
  [...new Set(value === undefined ? fallback : parseCsv(value))];

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8815),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CORS_ORIGINS: z.string().default("http://localhost:3000"),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1048576),
  TRUST_PROXY: z.string().optional(),
  API_KEYS: z.string().optional(),
  API_KEY_HASHES: z
    .string()
    .optional()
    .refine((value) => parseCsv(value).every((entry) => /^[0-9a-fA-F]{64}$/.test(entry)), {
      message: "every entry must be a 64 character SHA-256 hex digest",
    }),
  REQUIRE_AUTH: z.string().optional(),
  AUTH_EXEMPT_PATHS: z.string().optional(),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_EXEMPT_PATHS: z.string().optional(),
  RATE_LIMIT_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60000),
  HEALTH_PATH: z.string().startsWith("/").default("/health"),
  METRICS_PATH: z.string().startsWith("/").default("/metrics"),
  TOOL_DEFAULT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  TOOL_PING_COUNT: z.coerce.number().int().positive().max(100).default(4),
  TOOL_TRACEROUTE_MAX_HOPS: z.coerce.number().int().positive().max(64).default(30),
  TOOL_NMAP_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  ALLOW_PRIVILEGED_COMMANDS: z.string().optional(),
});

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type ToolSettings = {
  defaultTimeoutSeconds: number;
  pingCount: number;
  tracerouteMaxHops: number;
  nmapTimeoutSeconds: number;
  allowPrivilegedCommands: boolean;
};

export type ServerEnv = {
  host: string;
  port: number;
  logLevel: LogLevel;
  corsOrigins: string[];
  bodyLimitBytes: number;
  trustProxy: boolean;
  auth: {
    apiKeys: string[];
    apiKeyHashes: string[];
    required: boolean;
    exemptPaths: string[];
  };
  rateLimit: {
    requestsPerWindow: number;
    windowSeconds: number;
    exemptPaths: string[];
    sweepIntervalMs: number;
  };
  healthPath: string;
  metricsPath: string;
  tools: ToolSettings;
};

export const parseServerEnv = (source: NodeJS.ProcessEnv): ServerEnv => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid server environment: ${issues}`);
  }

  const data = parsed.data;
  // Unset exemption lists follow the configured health and metrics routes.
  const defaultExemptPaths = [data.HEALTH_PATH, data.METRICS_PATH];

  return {
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    corsOrigins: parseCsv(data.CORS_ORIGINS),
    bodyLimitBytes: data.BODY_LIMIT_BYTES,
    trustProxy: parseBoolean(data.TRUST_PROXY, false),
    auth: {
      apiKeys: parseCsv(data.API_KEYS),
      apiKeyHashes: parseCsv(data.API_KEY_HASHES).map((entry) => entry.toLowerCase()),
      required: parseBoolean(data.REQUIRE_AUTH, true),
      exemptPaths: parsePathSet(data.AUTH_EXEMPT_PATHS, defaultExemptPaths),
    },
    rateLimit: {
      requestsPerWindow: data.RATE_LIMIT_REQUESTS,
      windowSeconds: data.RATE_LIMIT_WINDOW_SECONDS,
      exemptPaths: parsePathSet(data.RATE_LIMIT_EXEMPT_PATHS, defaultExemptPaths),
      sweepIntervalMs: data.RATE_LIMIT_SWEEP_INTERVAL_MS,
    },
    healthPath: data.HEALTH_PATH,
    metricsPath: data.METRICS_PATH,
    tools: {
      defaultTimeoutSeconds: data.TOOL_DEFAULT_TIMEOUT_SECONDS,
      pingCount: data.TOOL_PING_COUNT,
      tracerouteMaxHops: data.TOOL_TRACEROUTE_MAX_HOPS,
      nmapTimeoutSeconds: data.TOOL_NMAP_TIMEOUT_SECONDS,
      allowPrivilegedCommands: parseBoolean(data.ALLOW_PRIVILEGED_COMMANDS, false),
    },
  };
};

export const assertAuthConfigured = (env: ServerEnv): void => {
  if (!env.auth.required) {
    return;
  }

  if (env.auth.apiKeys.length === 0 && env.auth.apiKeyHashes.length === 0) {
    throw new Error("REQUIRE_AUTH is enabled but neither API_KEYS nor API_KEY_HASHES is set");
  }
};

export const serverEnv: ServerEnv = parseServerEnv(process.env);
