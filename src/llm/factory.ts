import OpenAI from "openai";
import Groq from "groq-sdk";
import { GroqContentGenerator } from "./groq";
import { OpenAIContentGenerator } from "./openai";
import type { ContentGenerator, LlmConfig } from "./index";

export interface GeneratorCredentials {
  openAiKey?: string;
  groqKey?: string;
}

// Retries are off; the client timeout matches the generation timeout
export function createContentGenerator(
  config: LlmConfig,
  credentials: GeneratorCredentials,
  timeoutMs: number
): ContentGenerator {
  switch (config.provider) {
    case "openai": {
      if (!credentials.openAiKey) throw new Error("OpenAI API key is required");
      const client = new OpenAI({ apiKey: credentials.openAiKey, timeout: timeoutMs, maxRetries: 0 });
      return new OpenAIContentGenerator(client, config);
    }
    case "groq": {
      if (!credentials.groqKey) throw new Error("Groq API key is required");
      const client = new Groq({ apiKey: credentials.groqKey, timeout: timeoutMs, maxRetries: 0 });
      return new GroqContentGenerator(client, config);
    }
  }
}
