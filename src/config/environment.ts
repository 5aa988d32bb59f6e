/**
 * Environment configuration
 * Defaults for the converter and validator, read from environment variables
 */

import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const envSchema = z.object({
  NB_POST_LOG_LEVEL: logLevelSchema.default("info"),
  NB_POST_LAYOUT: z.string().min(1).default("single"),
  NB_POST_CATEGORIES: z.string().min(1).default("coding"),
  NB_POST_TAGS: z
    .string()
    .default("python,jupyter")
    .transform((value) =>
      value
        .split(",")
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0)
    ),
  NB_POST_TOC: booleanFlag.default("true"),
  NB_POST_AUTHOR_PROFILE: booleanFlag.default("false"),
});

export type Environment = z.infer<typeof envSchema>;

export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

let cachedEnvironment: Environment | undefined;

/**
 * Parsed on first use, so a bad variable only fails the command that needs it
 */
export function getEnv(): Environment {
  cachedEnvironment ??= loadEnvironment();
  return cachedEnvironment;
}

/**
 * Log level alone, never throwing: an unknown value is returned as `invalid`
 * and the level falls back to `info`.
 */
export function readLogLevel(
  source: NodeJS.ProcessEnv = process.env
): { level: z.infer<typeof logLevelSchema>; invalid?: string } {
  const raw = source.NB_POST_LOG_LEVEL;
  if (raw === undefined) {
    return { level: "info" };
  }
  const result = logLevelSchema.safeParse(raw);
  return result.success ? { level: result.data } : { level: "info", invalid: raw };
}
