/**
 * Registry configuration, read from the environment.
 *
 *   LOG_LEVEL         pino level, or "silent". Default: info
 *   REGISTRY_ADMIN    account that deploys and administers the registry
 *   REGISTRY_ADDRESS  the registry's own address. Default: derived from the admin
 */

import { getAddress, isAddress, type Address } from "viem";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const addressSchema = z
  .string()
  .refine((value) => isAddress(value), { message: "must be a 0x-prefixed 20-byte address" })
  .transform((value): Address => getAddress(value));

const logLevelSchema = z.enum(LOG_LEVELS).default("info");

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema,
  REGISTRY_ADMIN: addressSchema.optional(),
  REGISTRY_ADDRESS: addressSchema.optional(),
});

export interface RegistryConfig {
  logLevel: LogLevel;
  admin?: Address;
  registryAddress?: Address;
}

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    "Invalid registry environment",
    error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  );
}

/** Reads LOG_LEVEL alone; the registry variables are not looked at. */
export function loadLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const parsed = z.object({ LOG_LEVEL: logLevelSchema }).safeParse(env);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }
  return parsed.data.LOG_LEVEL;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RegistryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    admin: parsed.data.REGISTRY_ADMIN,
    registryAddress: parsed.data.REGISTRY_ADDRESS,
  };
}
