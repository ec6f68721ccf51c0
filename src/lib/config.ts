/**
 * Environment configuration, validated with zod on first use. Importing the
 * package never reads the environment.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

export const NodeEnvSchema = z.enum(["development", "production", "test"]);
// host programs set their own NODE_ENV values (staging, ci, ...)
const HostNodeEnvSchema = NodeEnvSchema.catch("development");
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum([
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(["json", "pretty"]);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  NODE_ENV: HostNodeEnvSchema,
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_FORMAT: LogFormatSchema.default("pretty"),
  /** Level cap for the shortest-path search; 80 is the 4x4 worst case. */
  PUZZLE_SEARCH_MAX_DEPTH: z.coerce.number().int().min(1).max(200).default(80),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export type EnvIssue = { path: string; message: string };

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: EnvIssue[] };

export type PuzzleConfig = {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  search: {
    maxDepth: number;
  };
};

export const parseEnv = (
  env: Record<string, string | undefined> = process.env
): EnvValidationResult => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
  }
  return { success: true, data: result.data };
};

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): PuzzleConfig => {
  const result = parseEnv(env);
  if (!result.success) {
    const summary = result.errors
      .map((error) => `${error.path || "root"}: ${error.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${summary}`, {
      errors: result.errors,
    });
  }

  const { data } = result;
  return {
    nodeEnv: data.NODE_ENV,
    logging: {
      level: data.LOG_LEVEL,
      format: data.LOG_FORMAT,
    },
    search: {
      maxDepth: data.PUZZLE_SEARCH_MAX_DEPTH,
    },
  };
};

let cached: PuzzleConfig | null = null;

export const getConfig = (): PuzzleConfig => {
  if (!cached) cached = loadConfig();
  return cached;
};

export const resetConfig = () => {
  cached = null;
};
