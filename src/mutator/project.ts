import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import {
  ConfigurationError,
  ExternalToolError,
  describeError,
  type PipelineStep,
} from "./errors.js";
import { actionFor } from "./prompt.js";
import type { FileTask, GeneratedFile, GitRunner, ProjectDirectory } from "./types.js";

/**
 * Resolve the target path and make sure it is a directory, creating it when
 * missing. A path that exists as anything else is rejected untouched.
 */
export function prepareDirectory(path: string, cwd: string = process.cwd()): ProjectDirectory {
  const projectPath = resolve(cwd, path);

  if (existsSync(projectPath)) {
    let isDirectory: boolean;
    try {
      isDirectory = statSync(projectPath).isDirectory();
    } catch (error) {
      throw new ExternalToolError(`Could not inspect ${projectPath}: ${describeError(error)}`, {
        tool: "filesystem",
        step: "prepare-directory",
        cause: error,
      });
    }
    if (!isDirectory) {
      throw new ConfigurationError(`${projectPath} is not a directory`);
    }
    return { path: projectPath, isNew: false };
  }

  try {
    mkdirSync(projectPath, { recursive: true });
  } catch (error) {
    throw new ExternalToolError(`Could not create ${projectPath}: ${describeError(error)}`, {
      tool: "filesystem",
      step: "prepare-directory",
      cause: error,
    });
  }
  return { path: projectPath, isNew: true };
}

export function isRepository(projectPath: string): boolean {
  return existsSync(join(projectPath, ".git"));
}

/**
 * Run `git init` unless the directory already holds a repository.
 * Returns whether a repository was created.
 */
export async function ensureRepository(
  project: ProjectDirectory,
  git: GitRunner
): Promise<boolean> {
  if (!project.isNew && isRepository(project.path)) {
    return false;
  }
  await runStep(git, ["init"], project.path, "init");
  return true;
}

export function loadFileTask(projectPath: string, relativePath: string): FileTask {
  const absolutePath = join(projectPath, relativePath);

  try {
    mkdirSync(dirname(absolutePath), { recursive: true });
    const previousContent = existsSync(absolutePath)
      ? readFileSync(absolutePath, "utf-8")
      : "";
    return {
      relativePath,
      absolutePath,
      previousContent,
      action: actionFor(previousContent),
    };
  } catch (error) {
    throw new ExternalToolError(`Could not read ${relativePath}: ${describeError(error)}`, {
      tool: "filesystem",
      step: "read",
      file: relativePath,
      cause: error,
    });
  }
}

export function writeGeneratedFile(file: GeneratedFile): void {
  try {
    writeFileSync(file.absolutePath, file.content, "utf-8");
  } catch (error) {
    throw new ExternalToolError(
      `Could not write ${file.relativePath}: ${describeError(error)}`,
      { tool: "filesystem", step: "write", file: file.relativePath, cause: error }
    );
  }
}

/**
 * Stage every working-tree change and record a single commit.
 * Returns the new HEAD hash.
 */
export async function commitAll(
  projectPath: string,
  message: string,
  git: GitRunner
): Promise<string> {
  await runStep(git, ["add", "-A"], projectPath, "add");
  await runStep(git, ["commit", "-m", message], projectPath, "commit");
  const head = await runStep(git, ["rev-parse", "HEAD"], projectPath, "rev-parse");
  return head.trim();
}

async function runStep(
  git: GitRunner,
  args: string[],
  cwd: string,
  step: PipelineStep
): Promise<string> {
  try {
    return await git(args, cwd);
  } catch (error) {
    throw new ExternalToolError(describeError(error), { tool: "git", step, cause: error });
  }
}
