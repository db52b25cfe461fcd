import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FileTask } from "../../mutator/types.js";
import { ConsoleReporter } from "../reporter.js";

const task: FileTask = {
  relativePath: "main.py",
  absolutePath: "/tmp/demo/main.py",
  previousContent: "",
  action: "create",
};

describe("ConsoleReporter", () => {
  let written: string[];
  let reporter: ConsoleReporter;

  beforeEach(() => {
    written = [];
    reporter = new ConsoleReporter({ write: (text: string) => written.push(text) });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes fragments raw and ends the line once the file is written", () => {
    reporter.report({ type: "file-started", task });
    reporter.report({ type: "fragment", file: "main.py", text: "print(" });
    reporter.report({ type: "fragment", file: "main.py", text: "1)" });
    reporter.report({ type: "file-written", file: { ...task, content: "print(1)" } });

    expect(written).toEqual(["print(", "1)", "\n"]);
  });

  it("ends a half-streamed line when aborted", () => {
    reporter.report({ type: "file-started", task });
    reporter.report({ type: "fragment", file: "main.py", text: "par" });
    reporter.abort();

    expect(written).toEqual(["par", "\n"]);
  });

  it("writes nothing extra when aborted between files", () => {
    reporter.report({ type: "file-started", task });
    reporter.report({ type: "fragment", file: "main.py", text: "x" });
    reporter.report({ type: "file-written", file: { ...task, content: "x" } });
    reporter.abort();
    reporter.abort();

    expect(written).toEqual(["x", "\n"]);
  });
});
