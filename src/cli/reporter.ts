import chalk from "chalk";
import type { Ora } from "ora";
import type { ProgressEvent, ProgressSink } from "../mutator/types.js";
import { log, spinner } from "../utils/logger.js";

const VERBS = {
  create: { active: "Creating", done: "Created" },
  modify: { active: "Modifying", done: "Modified" },
} as const;

export interface TextOutput {
  write(text: string): unknown;
}

/**
 * Prints mutator progress to the terminal: streamed text goes straight to
 * stdout, the commit runs behind a spinner.
 */
export class ConsoleReporter implements ProgressSink {
  private commitSpinner: Ora | undefined;
  private midLine = false;

  constructor(private readonly out: TextOutput = process.stdout) {}

  report(event: ProgressEvent): void {
    switch (event.type) {
      case "directory-created":
        log.info(`Created project directory ${event.path}`);
        break;
      case "repository-initialized":
        log.info("Initialized git repository");
        break;
      case "file-started":
        log.heading(`${VERBS[event.task.action].active} ${event.task.relativePath}...`);
        break;
      case "fragment":
        this.out.write(event.text);
        this.midLine = true;
        break;
      case "file-written":
        this.out.write("\n");
        this.midLine = false;
        log.success(`${VERBS[event.file.action].done} ${event.file.relativePath}`);
        break;
      case "commit-started":
        console.log("");
        this.commitSpinner = spinner("Staging changes and committing...");
        break;
      case "committed": {
        this.commitSpinner?.succeed(
          `Committed ${chalk.dim(event.summary.commitHash.slice(0, 7))} ${event.summary.commitMessage}`
        );
        this.commitSpinner = undefined;
        const verb = event.summary.project.isNew ? "created" : "modified";
        log.heading(`Project ${verb} and committed to git!`);
        break;
      }
    }
  }

  /** End a half-streamed line and stop any running spinner after a failure. */
  abort(): void {
    if (this.midLine) {
      this.out.write("\n");
      this.midLine = false;
    }
    this.commitSpinner?.fail("Commit failed");
    this.commitSpinner = undefined;
  }
}
