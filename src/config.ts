import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const USER_FILENAME = "<user_code>";

// Rendering bounds. These are fixed; only the run limits below can be overridden.
export const PREVIEW_WIDTH = 6;
export const MAX_REF_DEPTH = 3;
export const MAX_FORMAT_DEPTH = 2;
export const MAX_STRING_PREVIEW = 60;
export const STRING_CUT = MAX_STRING_PREVIEW - 3;
export const SCOPE_LIMIT = PREVIEW_WIDTH * 4;

export type RunLimits = {
  maxSteps: number;
  timeoutMs: number;
  memoryMb: number;
};

export type TracerConfig = RunLimits & {
  port: number;
  host: string;
  logLevel: LogLevel;
};

export const DEFAULT_LIMITS: RunLimits = {
  maxSteps: 2000,
  timeoutMs: 3000,
  memoryMb: 256,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  TRACER_MAX_STEPS: z.coerce.number().int().positive().default(DEFAULT_LIMITS.maxSteps),
  TRACER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LIMITS.timeoutMs),
  TRACER_MEMORY_MB: z.coerce.number().int().min(16).default(DEFAULT_LIMITS.memoryMb),
  TRACER_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("127.0.0.1"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TracerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue.path.length > 0 ? String(issue.path[0]) : "environment";
    throw new ConfigError(`Invalid ${name}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    maxSteps: e.TRACER_MAX_STEPS,
    timeoutMs: e.TRACER_TIMEOUT_MS,
    memoryMb: e.TRACER_MEMORY_MB,
    logLevel: e.TRACER_LOG_LEVEL,
    port: e.PORT,
    host: e.HOST,
  };
}
