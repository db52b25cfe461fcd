import { ExternalToolError, StreamError, describeError } from "./errors.js";
import type { CompletionOptions, CompletionSource } from "./types.js";

/**
 * Drain a completion stream, forwarding each fragment as it arrives and
 * returning the concatenation. Failures before the first fragment are
 * treated as a failed request; later ones as a broken stream.
 */
export async function generateContent(
  source: CompletionSource,
  prompt: string,
  options: CompletionOptions & { file: string },
  onFragment: (text: string) => void = () => {}
): Promise<string> {
  const { file, ...completionOptions } = options;
  let content = "";
  let received = 0;

  try {
    for await (const fragment of source.stream(prompt, completionOptions)) {
      if (!fragment) continue;
      received++;
      content += fragment;
      onFragment(fragment);
    }
  } catch (error) {
    if (received === 0) {
      throw new ExternalToolError(`Model request failed: ${describeError(error)}`, {
        tool: "model",
        step: "generate",
        file,
        cause: error,
      });
    }
    throw new StreamError(`Model stream interrupted: ${describeError(error)}`, {
      file,
      partialLength: content.length,
      cause: error,
    });
  }

  return content;
}
