import type { InvocationConfig } from "../config/schema.js";
import { MutatorError } from "./errors.js";
import { buildFilePrompt } from "./prompt.js";
import {
  commitAll,
  ensureRepository,
  loadFileTask,
  prepareDirectory,
  writeGeneratedFile,
} from "./project.js";
import { generateContent } from "./stream.js";
import type {
  CompletionSource,
  GeneratedFile,
  GitRunner,
  MutationResult,
  MutationSummary,
  ProgressSink,
} from "./types.js";

export interface MutatorDependencies {
  completions: CompletionSource;
  git: GitRunner;
  progress?: ProgressSink;
  /** Base for resolving a relative project path. Defaults to `process.cwd()`. */
  cwd?: string;
}

const silent: ProgressSink = { report: () => {} };

/**
 * Prepare the project directory, generate every requested file in order and
 * commit the result. Stops at the first failure; files written before it
 * are left on disk and nothing is committed.
 */
export async function mutateProject(
  config: InvocationConfig,
  deps: MutatorDependencies
): Promise<MutationResult> {
  const progress = deps.progress ?? silent;

  try {
    const project = prepareDirectory(config.path, deps.cwd);
    if (project.isNew) {
      progress.report({ type: "directory-created", path: project.path });
    }

    const repositoryInitialized = await ensureRepository(project, deps.git);
    if (repositoryInitialized) {
      progress.report({ type: "repository-initialized", path: project.path });
    }

    const files: GeneratedFile[] = [];
    for (const relativePath of config.files) {
      const task = loadFileTask(project.path, relativePath);
      progress.report({ type: "file-started", task });

      const content = await generateContent(
        deps.completions,
        buildFilePrompt(config, task),
        { model: config.model, maxTokens: config.maxTokens, file: relativePath },
        (text) => progress.report({ type: "fragment", file: relativePath, text })
      );

      const file: GeneratedFile = { ...task, content };
      writeGeneratedFile(file);
      files.push(file);
      progress.report({ type: "file-written", file });
    }

    progress.report({ type: "commit-started", message: config.message });
    const commitHash = await commitAll(project.path, config.message, deps.git);

    const summary: MutationSummary = {
      project,
      repositoryInitialized,
      files,
      commitMessage: config.message,
      commitHash,
    };
    progress.report({ type: "committed", summary });
    return { ok: true, value: summary };
  } catch (error) {
    if (error instanceof MutatorError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export { buildFilePrompt, actionFor } from "./prompt.js";
export { generateContent } from "./stream.js";
export {
  prepareDirectory,
  ensureRepository,
  isRepository,
  loadFileTask,
  writeGeneratedFile,
  commitAll,
} from "./project.js";
export * from "./errors.js";
export type * from "./types.js";
