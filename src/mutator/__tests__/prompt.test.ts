import { describe, expect, it } from "vitest";
import { actionFor, buildFilePrompt } from "../prompt.js";

const config = { projectType: "python", description: "a single hello-world script" };

describe("actionFor", () => {
  it("creates when there is no previous content", () => {
    expect(actionFor("")).toBe("create");
  });

  it("modifies when the file already has content", () => {
    expect(actionFor("print('hi')\n")).toBe("modify");
  });
});

describe("buildFilePrompt", () => {
  it("asks for a new file without any prior content", () => {
    const prompt = buildFilePrompt(config, {
      relativePath: "main.py",
      previousContent: "",
      action: "create",
    });

    expect(prompt).toBe(
      [
        "Your task is to create a file for a python project.",
        "",
        "Project description: a single hello-world script",
        "File path: main.py",
        "",
        "Generate content appropriate for this file path.",
        "",
        "Reply with the complete file content only, without markdown fences or commentary.",
      ].join("\n")
    );
  });

  it("includes the existing content verbatim when modifying", () => {
    const previousContent = "def greet():\n    return 'hi'\n";
    const prompt = buildFilePrompt(config, {
      relativePath: "src/greet.py",
      previousContent,
      action: "modify",
    });

    expect(prompt.startsWith("Your task is to modify a file for a python project.\n")).toBe(true);
    expect(prompt).toContain("File path: src/greet.py\n");
    expect(prompt).toContain(
      "Here is the current content of the file. Modify it where needed:\n\n" + previousContent + "\n"
    );
    expect(prompt).not.toContain("Generate content appropriate");
  });
});
