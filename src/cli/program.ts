import { Command } from "commander";
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from "../config/schema.js";
import type { CliOptions } from "../config/loader.js";

export interface ProgramOptions extends CliOptions {
  envFile?: string;
}

export function createProgram(
  action: (options: ProgramOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name("gitsmith")
    .description(
      "Create or modify project files with Claude and commit the result to git"
    )
    .version("0.1.0")
    .requiredOption("-p, --path <path>", "Project directory (created if missing)")
    .requiredOption("-t, --type <type>", "Project type, e.g. python or nodejs")
    .requiredOption("-d, --description <description>", "Project description")
    .requiredOption(
      "-f, --files <files...>",
      "Relative paths of the files to create or modify"
    )
    .requiredOption("-m, --message <message>", "Commit message")
    .option("--model <model>", `Claude model to use (default: ${DEFAULT_MODEL})`)
    .option(
      "--max-tokens <n>",
      `Maximum output tokens per file (default: ${DEFAULT_MAX_TOKENS})`
    )
    .option("--env-file <path>", "dotenv file to load (default: .env)")
    .action(async (options: ProgramOptions) => {
      await action(options);
    });

  return program;
}
