import { resolve } from "path";
import { config as loadDotenv } from "dotenv";
import type { ZodError } from "zod";
import {
  environmentSchema,
  invocationSchema,
  type Environment,
  type InvocationConfig,
} from "./schema.js";
import { ConfigurationError } from "../mutator/errors.js";

export const MISSING_API_KEY_MESSAGE =
  "ANTHROPIC_API_KEY environment variable is required. Add it to .env or set it with: export ANTHROPIC_API_KEY=your-key";

/**
 * Read a dotenv file without touching `process.env`. The default `.env` is
 * optional; a file named explicitly must load.
 */
export function loadEnvFile(
  envFile: string | undefined,
  cwd: string
): Record<string, string> {
  const path = resolve(cwd, envFile ?? ".env");
  const values: Record<string, string> = {};
  const result = loadDotenv({ path, processEnv: values });

  if (result.error) {
    if (envFile !== undefined) {
      throw new ConfigurationError(
        `Could not load env file ${path}: ${result.error.message}`
      );
    }
    return {};
  }
  return values;
}

/**
 * Read the model credential from an environment map (usually `process.env`
 * after dotenv has run).
 */
export function loadEnvironment(
  env: Record<string, string | undefined>
): Environment {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(MISSING_API_KEY_MESSAGE);
  }
  return { apiKey: parsed.data.ANTHROPIC_API_KEY };
}

export interface CliOptions {
  path: string;
  type: string;
  description: string;
  files: string[];
  message: string;
  model?: string;
  maxTokens?: string;
}

/**
 * Map raw CLI options onto a validated, frozen invocation config.
 */
export function resolveInvocation(options: CliOptions): InvocationConfig {
  let maxTokens: number | undefined;
  if (options.maxTokens !== undefined) {
    maxTokens = Number(options.maxTokens);
    if (!Number.isInteger(maxTokens)) {
      throw new ConfigurationError(
        `Invalid configuration:\n  - maxTokens: expected an integer, got "${options.maxTokens}"`
      );
    }
  }

  const parsed = invocationSchema.safeParse({
    path: options.path,
    projectType: options.type,
    description: options.description,
    files: options.files,
    message: options.message,
    model: options.model,
    maxTokens,
  });

  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  return Object.freeze({ ...parsed.data, files: [...parsed.data.files] });
}

function formatIssues(error: ZodError): string {
  const lines = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `  - ${field}: ${issue.message}`;
  });
  return ["Invalid configuration:", ...lines].join("\n");
}
