import { z } from "zod/v4";
import {
  DEFAULT_LOCALE,
  RATE_LIMIT_MAX_REQUESTS,
  RATE_LIMIT_WINDOW_MS,
} from "./config/constants.js";
import { SUPPORTED_REGIONS, type Region } from "./config/regions.js";
import { ValidationError } from "./utils/errors.js";
import type { LogLevel } from "./utils/logger.js";

const EnvSchema = z.object({
  BLIZZARD_CLIENT_ID: z.string().min(1).optional(),
  BLIZZARD_CLIENT_SECRET: z.string().min(1).optional(),
  BLIZZARD_REGION: z.enum(SUPPORTED_REGIONS).default("us"),
  BLIZZARD_LOCALE: z.string().min(1).default(DEFAULT_LOCALE),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(RATE_LIMIT_MAX_REQUESTS),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(RATE_LIMIT_WINDOW_MS),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface ApiCredentials {
  clientId: string;
  clientSecret: string;
}

export interface AppConfig {
  credentials: ApiCredentials | null;
  region: Region;
  locale: string;
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.map(String).join("."));
    throw new ValidationError(`Invalid configuration: ${keys.join(", ")}`);
  }

  const e = parsed.data;
  const credentials =
    e.BLIZZARD_CLIENT_ID && e.BLIZZARD_CLIENT_SECRET
      ? { clientId: e.BLIZZARD_CLIENT_ID, clientSecret: e.BLIZZARD_CLIENT_SECRET }
      : null;

  return {
    credentials,
    region: e.BLIZZARD_REGION,
    locale: e.BLIZZARD_LOCALE,
    rateLimit: {
      maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      windowMs: e.RATE_LIMIT_WINDOW_MS,
    },
    logLevel: e.LOG_LEVEL,
  };
}

export function requireCredentials(config: AppConfig): ApiCredentials {
  if (!config.credentials) {
    throw new ValidationError("BLIZZARD_CLIENT_ID and BLIZZARD_CLIENT_SECRET must be set");
  }
  return config.credentials;
}
