import { spawn } from "child_process";
import { GitCommandError } from "../mutator/errors.js";

/**
 * Run a git subcommand in `cwd` and resolve with its stdout.
 * Rejects with GitCommandError on a non-zero exit or when git cannot be spawned.
 */
export function runGit(args: string[], cwd: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    const errChunks: string[] = [];

    const proc = spawn("git", args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    proc.stdout?.on("data", (data: Buffer) => {
      chunks.push(data.toString());
    });

    proc.stderr?.on("data", (data: Buffer) => {
      errChunks.push(data.toString());
    });

    proc.on("error", (error) => {
      reject(
        new GitCommandError(
          args,
          null,
          { stdout: chunks.join(""), stderr: errChunks.join("") },
          error
        )
      );
    });

    proc.on("close", (code) => {
      if (code === 0) {
        resolve(chunks.join(""));
      } else {
        reject(
          new GitCommandError(args, code, {
            stdout: chunks.join(""),
            stderr: errChunks.join(""),
          })
        );
      }
    });
  });
}
