export type ErrorKind = "configuration" | "external-tool" | "stream";

export type ExternalTool = "git" | "filesystem" | "model";

export type PipelineStep =
  | "prepare-directory"
  | "init"
  | "read"
  | "generate"
  | "write"
  | "add"
  | "commit"
  | "rev-parse";

export abstract class MutatorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input: missing credential, invalid flags, or a target that is not a directory. */
export class ConfigurationError extends MutatorError {
  readonly kind = "configuration";
}

export class ExternalToolError extends MutatorError {
  readonly kind = "external-tool";
  readonly tool: ExternalTool;
  readonly step: PipelineStep;
  readonly file?: string;

  constructor(
    message: string,
    context: { tool: ExternalTool; step: PipelineStep; file?: string; cause?: unknown }
  ) {
    super(message, { cause: context.cause });
    this.tool = context.tool;
    this.step = context.step;
    this.file = context.file;
  }
}

/**
 * The model stream broke after it had already produced output.
 * The file is left untouched.
 */
export class StreamError extends MutatorError {
  readonly kind = "stream";
  readonly file: string;
  readonly partialLength: number;

  constructor(
    message: string,
    context: { file: string; partialLength: number; cause?: unknown }
  ) {
    super(message, { cause: context.cause });
    this.file = context.file;
    this.partialLength = context.partialLength;
  }
}

/**
 * Raised by the git runner; carries the command line, exit code and output.
 * git reports some failures ("nothing to commit") on stdout only.
 */
export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    args: string[],
    exitCode: number | null,
    output: { stdout: string; stderr: string },
    cause?: unknown
  ) {
    const detail =
      output.stderr.trim() ||
      output.stdout.trim() ||
      (cause instanceof Error ? cause.message : "");
    super(
      `git ${args.join(" ")} failed` +
        (exitCode !== null ? ` (exit code ${exitCode})` : "") +
        (detail ? `: ${detail}` : ""),
      { cause }
    );
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Human-readable one-liner with the failing file/step appended when known. */
export function formatMutatorError(error: MutatorError): string {
  if (error instanceof ExternalToolError) {
    const where = error.file ? ` while processing ${error.file}` : "";
    return `${error.message} [${error.tool} ${error.step}${where}]`;
  }
  if (error instanceof StreamError) {
    return `${error.message} [${error.file}, ${error.partialLength} characters received]`;
  }
  return error.message;
}
