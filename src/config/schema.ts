import { z } from "zod";
import type { NetcomplyConfig } from "./types.js";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const auditSchema = z.object({
  templatePath: z.string().min(1).default("templates/cisco_ios_golden_config.yaml"),
  configDir: z.string().min(1).default("configs"),
  reportDir: z.string().min(1).default("reports"),
  concurrency: z.number().int().positive().default(4),
  timeoutMs: z.number().int().positive().default(30_000),
  export: z.boolean().default(true),
});

const retrySchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().nonnegative().default(500),
  maxDelayMs: z.number().positive().default(10_000),
});

export const netcomplyConfigSchema = z.object({
  logging: loggingSchema.default({}),
  audit: auditSchema.default({}),
  retry: retrySchema.default({}),
  devices: z.array(z.string().min(1)).default([]),
});

export function parseConfig(raw: unknown): NetcomplyConfig {
  return netcomplyConfigSchema.parse(raw);
}
