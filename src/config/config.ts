import { z } from "zod";
import type { EnvironmentSource } from "../environment/types.ts";
import { LOG_LEVEL_NAMES, type LogLevel } from "../utils/logger.ts";
import { ConfigError } from "./errors.ts";

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && LOG_LEVEL_NAMES.some((l) => l === value),
  { message: `must be one of ${LOG_LEVEL_NAMES.join(", ")}` }
);

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/**
 * Gateway settings read from environment variables
 */
export const GatewayConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(LogLevelSchema)
    .default("info"),
  SERVER_SOFTWARE: z.string().min(1).default("cgi-test-scripts/1.0"),
  CGI_INHERIT_ENV: BooleanFlagSchema.default("false"),
});

export interface GatewayConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  serverSoftware: string;
  /** Whether scripts see the gateway's own environment besides CGI variables */
  inheritEnv: boolean;
}

/**
 * Validate configuration from an environment record.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: EnvironmentSource): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logLevel: parsed.data.LOG_LEVEL,
    serverSoftware: parsed.data.SERVER_SOFTWARE,
    inheritEnv: parsed.data.CGI_INHERIT_ENV,
  };
}
