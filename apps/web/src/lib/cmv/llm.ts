/**
 * Text-generation boundary.
 *
 * The summarizer and rebuttal generator talk to a TextGenerator; production
 * uses the AI SDK with an OpenAI provider built from the operator's key.
 *
 * @module cmv/llm
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText, NoObjectGeneratedError, Output } from "ai";
import type { z } from "zod";

export const DEFAULT_MODEL = "gpt-4o-2024-08-06";

export interface TextGenerationRequest {
  model: string;
  system: string;
  prompt: string;
  temperature: number;
  /** When set, the provider is asked for JSON matching this schema */
  schema?: z.ZodType;
}

export interface TextGenerator {
  /** Resolves to the raw completion text. Transport/auth errors reject. */
  complete(request: TextGenerationRequest): Promise<string>;
}

export type TextGeneratorFactory = (apiKey: string) => TextGenerator;

/**
 * Thrown when an action needs the LLM but the session has no API key.
 */
export class MissingApiKeyError extends Error {
  constructor(message = "Please provide the OpenAI API key to proceed.") {
    super(message);
    this.name = "MissingApiKeyError";
  }
}

export class AiSdkTextGenerator implements TextGenerator {
  private readonly provider: ReturnType<typeof createOpenAI>;

  constructor(apiKey: string) {
    if (!apiKey.trim()) {
      throw new MissingApiKeyError();
    }
    this.provider = createOpenAI({ apiKey: apiKey.trim() });
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    const startTime = Date.now();
    const base = {
      model: this.provider(request.model),
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
    };
    try {
      const result = request.schema
        ? await generateText({ ...base, output: Output.object({ schema: request.schema }) })
        : await generateText(base);
      console.log(`[LLM] ${request.model} responded in ${Date.now() - startTime}ms (${result.text.length} chars)`);
      return result.text;
    } catch (error) {
      // Structured output that fails the schema still carries the raw text;
      // hand it back so the caller's own parser decides what to do with it.
      if (request.schema && NoObjectGeneratedError.isInstance(error)) {
        console.warn(`[LLM] ${request.model} reply did not match the output schema`);
        return error.text ?? "";
      }
      throw error;
    }
  }
}

export const createAiSdkTextGenerator: TextGeneratorFactory = (apiKey) => new AiSdkTextGenerator(apiKey);
