import { describe, expect, it } from "vitest";
import { ExternalToolError, StreamError } from "../errors.js";
import { generateContent } from "../stream.js";
import { FakeCompletionSource } from "./fakes.js";

const options = { model: "test-model", maxTokens: 256, file: "main.py" };

describe("generateContent", () => {
  it("concatenates fragments in arrival order and forwards each one", async () => {
    const source = new FakeCompletionSource([["print(", "'hello'", ")\n"]]);
    const seen: string[] = [];

    const content = await generateContent(source, "prompt", options, (text) => seen.push(text));

    expect(content).toBe("print('hello')\n");
    expect(seen).toEqual(["print(", "'hello'", ")\n"]);
    expect(source.prompts).toEqual(["prompt"]);
    expect(source.options).toEqual([{ model: "test-model", maxTokens: 256 }]);
  });

  it("skips empty fragments", async () => {
    const source = new FakeCompletionSource([["a", "", "b"]]);
    const seen: string[] = [];

    const content = await generateContent(source, "prompt", options, (text) => seen.push(text));

    expect(content).toBe("ab");
    expect(seen).toEqual(["a", "b"]);
  });

  it("returns an empty string for an empty stream", async () => {
    const source = new FakeCompletionSource([[]]);
    expect(await generateContent(source, "prompt", options)).toBe("");
  });

  it("reports a request failure when nothing was received", async () => {
    const source = new FakeCompletionSource([
      { fragments: [], failWith: new Error("401 invalid x-api-key") },
    ]);

    const error = await generateContent(source, "prompt", options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({
      kind: "external-tool",
      tool: "model",
      step: "generate",
      file: "main.py",
      message: "Model request failed: 401 invalid x-api-key",
    });
  });

  it("reports a broken stream once output has started", async () => {
    const source = new FakeCompletionSource([
      { fragments: ["abc", "de"], failWith: new Error("socket hang up") },
    ]);

    const error = await generateContent(source, "prompt", options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StreamError);
    expect(error).toMatchObject({
      kind: "stream",
      file: "main.py",
      partialLength: 5,
      message: "Model stream interrupted: socket hang up",
    });
  });
});
