import { z } from "zod";

export const ruleEntrySchema = z.object({
  name: z.string().min(1).optional(),
  pattern: z.string().min(1),
  description: z.string().min(1),
  required: z.boolean().default(true),
  severity: z.string().default("HIGH"),
  scope: z.string().optional(),
});

export type RuleEntry = z.infer<typeof ruleEntrySchema>;

const metadataValueSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

export const templateMetadataSchema = z.object({
  name: metadataValueSchema.default("unnamed"),
  version: metadataValueSchema.default("0"),
  description: metadataValueSchema.default(""),
});

export const METADATA_KEYS = new Set(["name", "version", "description"]);

export const templateDocumentSchema = z.object({
  golden_config: z.record(z.string(), z.unknown()),
  forbidden_config: z.array(z.unknown()).optional(),
});
