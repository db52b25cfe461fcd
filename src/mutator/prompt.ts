import type { InvocationConfig } from "../config/schema.js";
import type { FileAction, FileTask } from "./types.js";

export function actionFor(previousContent: string): FileAction {
  return previousContent.length > 0 ? "modify" : "create";
}

export function buildFilePrompt(
  config: Pick<InvocationConfig, "projectType" | "description">,
  task: Pick<FileTask, "relativePath" | "previousContent" | "action">
): string {
  const parts: string[] = [];

  parts.push(`Your task is to ${task.action} a file for a ${config.projectType} project.`);
  parts.push("");
  parts.push(`Project description: ${config.description}`);
  parts.push(`File path: ${task.relativePath}`);
  parts.push("");

  if (task.action === "modify") {
    parts.push("Here is the current content of the file. Modify it where needed:");
    parts.push("");
    parts.push(task.previousContent);
    parts.push("");
  } else {
    parts.push("Generate content appropriate for this file path.");
    parts.push("");
  }

  parts.push(
    "Reply with the complete file content only, without markdown fences or commentary."
  );

  return parts.join("\n");
}
