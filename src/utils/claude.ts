import Anthropic from "@anthropic-ai/sdk";
import type { CompletionOptions, CompletionSource } from "../mutator/types.js";

/**
 * Streams Claude completions for a single user message. The client is built
 * from the key it is given; nothing is read from the environment here.
 */
export class AnthropicCompletionSource implements CompletionSource {
  private readonly client: Anthropic;

  constructor(apiKey: string, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey });
  }

  async *stream(prompt: string, options: CompletionOptions): AsyncGenerator<string> {
    const stream = this.client.messages.stream({
      model: options.model,
      max_tokens: options.maxTokens,
      messages: [{ role: "user", content: prompt }],
    });

    for await (const event of stream) {
      if (
        event.type === "content_block_delta" &&
        event.delta.type === "text_delta"
      ) {
        yield event.delta.text;
      }
    }
  }
}
