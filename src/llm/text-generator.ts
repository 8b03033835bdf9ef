import OpenAI from "openai";
import { ServiceError, errorMessage } from "../core/errors";
import { createLogger } from "../observability/logger";

const log = createLogger("llm");

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface OpenAiTextGeneratorOptions {
  baseUrl: string;
  model: string;
  apiKey: string;
  temperature?: number;
}

/**
 * Chat-completions client for any OpenAI-compatible endpoint. The default
 * configuration targets a local Ollama server.
 */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(
    private readonly options: OpenAiTextGeneratorOptions,
    client?: OpenAI,
  ) {
    this.client =
      client ??
      new OpenAI({ baseURL: options.baseUrl, apiKey: options.apiKey });
  }

  async generate(prompt: string): Promise<string> {
    log(
      "requesting completion from %s (%s)",
      this.options.baseUrl,
      this.options.model,
    );
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: "user", content: prompt }],
        ...(this.options.temperature !== undefined
          ? { temperature: this.options.temperature }
          : {}),
      });
      content = completion.choices[0]?.message.content;
    } catch (error) {
      throw new ServiceError(errorMessage(error), {
        model: this.options.model,
      });
    }

    if (!content || content.trim().length === 0) {
      throw new ServiceError("Text generation returned an empty completion", {
        model: this.options.model,
      });
    }
    return content.trim();
  }
}
