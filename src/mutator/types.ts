import type { MutatorError } from "./errors.js";

export type FileAction = "create" | "modify";

export interface FileTask {
  relativePath: string;
  absolutePath: string;
  previousContent: string;
  action: FileAction;
}

export interface GeneratedFile extends FileTask {
  content: string;
}

export interface ProjectDirectory {
  path: string;
  isNew: boolean;
}

export interface MutationSummary {
  project: ProjectDirectory;
  repositoryInitialized: boolean;
  files: GeneratedFile[];
  commitMessage: string;
  commitHash: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type MutationResult = Result<MutationSummary, MutatorError>;

export interface CompletionOptions {
  model: string;
  maxTokens: number;
}

/**
 * A language-model endpoint that answers a single user message with an
 * ordered, finite stream of text fragments.
 */
export interface CompletionSource {
  stream(prompt: string, options: CompletionOptions): AsyncIterable<string>;
}

export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export type ProgressEvent =
  | { type: "directory-created"; path: string }
  | { type: "repository-initialized"; path: string }
  | { type: "file-started"; task: FileTask }
  | { type: "fragment"; file: string; text: string }
  | { type: "file-written"; file: GeneratedFile }
  | { type: "commit-started"; message: string }
  | { type: "committed"; summary: MutationSummary };

export interface ProgressSink {
  report(event: ProgressEvent): void;
}
