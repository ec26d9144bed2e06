import Groq from "groq-sdk";
import { buildMessages, cleanGeneratedContent } from "./index";
import type { ContentGenerator, GenerationContext, LlmConfig } from "./index";

export class GroqContentGenerator implements ContentGenerator {
  constructor(
    private readonly client: Groq,
    private readonly config: Pick<LlmConfig, "model" | "temperature">
  ) {}

  async generate(context: GenerationContext, instruction: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages: buildMessages(context, instruction),
      temperature: this.config.temperature,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Groq returned an empty completion");
    }
    return cleanGeneratedContent(content);
  }
}
