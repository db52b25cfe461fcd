import type { InvocationConfig } from "../config/schema.js";
import { loadEnvFile, loadEnvironment, resolveInvocation } from "../config/loader.js";
import { mutateProject } from "../mutator/index.js";
import { MutatorError, formatMutatorError } from "../mutator/errors.js";
import type { CompletionSource, GitRunner } from "../mutator/types.js";
import { AnthropicCompletionSource } from "../utils/claude.js";
import { runGit } from "../utils/git.js";
import { log } from "../utils/logger.js";
import type { ProgramOptions } from "./program.js";
import { ConsoleReporter } from "./reporter.js";

export interface RunContext {
  env: Record<string, string | undefined>;
  cwd?: string;
  git?: GitRunner;
  createSource?: (apiKey: string) => CompletionSource;
  reporter?: ConsoleReporter;
}

/**
 * Load the env file, validate the credential and options, then run the
 * mutator. Variables already set in `context.env` win over the file.
 * Resolves with the process exit code.
 */
export async function runCommand(
  options: ProgramOptions,
  context: RunContext
): Promise<number> {
  const reporter = context.reporter ?? new ConsoleReporter();
  const cwd = context.cwd ?? process.cwd();

  let source: CompletionSource;
  let config: InvocationConfig;
  try {
    const env = { ...loadEnvFile(options.envFile, cwd), ...context.env };
    const { apiKey } = loadEnvironment(env);
    config = resolveInvocation(options);
    source = context.createSource
      ? context.createSource(apiKey)
      : new AnthropicCompletionSource(apiKey);
  } catch (error) {
    if (error instanceof MutatorError) {
      log.fail(formatMutatorError(error));
      return 1;
    }
    throw error;
  }

  const result = await mutateProject(config, {
    completions: source,
    git: context.git ?? runGit,
    progress: reporter,
    cwd,
  });

  if (!result.ok) {
    reporter.abort();
    log.fail(formatMutatorError(result.error));
    return 1;
  }
  return 0;
}
