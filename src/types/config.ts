/**
 * Configuration type definitions with Zod schemas
 */

import iconv from "iconv-lite";
import { z } from "zod";

const EncodingSchema = z
  .string()
  .refine((name) => iconv.encodingExists(name), {
    message: "Unknown encoding",
  });

export const LogLevelSchema = z.enum([
  "NONE",
  "DEBUG",
  "INFO",
  "WARNING",
  "ERROR",
  "CRITICAL",
]);

// Zod schemas
export const TableConfigSchema = z.object({
  // Tried in order when detecting the table's encoding
  encodings: z.array(EncodingSchema).min(1),
  delimiter: z.string().length(1),
  quote: z.string().length(1),
});

export const FilesConfigSchema = z.object({
  // Matched case-insensitively against each file's extension
  extensions: z.array(z.string().regex(/^\.[^./\\]+$/)).min(1),
  ignore: z.array(z.string()),
  followSymbolicLinks: z.boolean(),
  encoding: EncodingSchema,
  bom: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  // Defaults to the table file's directory
  directory: z.string().optional(),
  bom: z.boolean(),
});

export const ReplaceConfigSchema = z.object({
  source: z.string(),
  target: z.string(),
  table: TableConfigSchema,
  files: FilesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialReplaceConfigSchema = ReplaceConfigSchema.partial().extend({
  table: TableConfigSchema.partial().optional(),
  files: FilesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type TableConfig = z.infer<typeof TableConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ReplaceConfig = z.infer<typeof ReplaceConfigSchema>;
export type PartialReplaceConfig = z.infer<typeof PartialReplaceConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
