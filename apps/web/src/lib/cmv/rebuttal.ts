/**
 * Rebuttal Generator
 *
 * Turns an Analysis into a persuasive reply. The model's text is returned
 * verbatim; failures propagate to the caller.
 *
 * @module cmv/rebuttal
 */

import type { TextGenerator } from "./llm";
import { DEFAULT_MODEL } from "./llm";
import type { Analysis } from "./types";

export const REBUTTAL_SYSTEM_PROMPT = `You are a helpful assistant.
You will be presented with an argument from the subreddit r/changemyview along
with the central rationale presented to support that argument.
Your task is to be extremely persuasive and argue against that position.
Be polite but make sure to address each point of rationale to counter the main argument.
Use evidence-based arguments as much as possible and provide realistic alternatives.
Structure and style your response like it is a post for the r/changemyview subreddit.`;

/** "1. first\n2. second" */
export function formatRationale(rationale: readonly string[]): string {
  return rationale.map((point, i) => `${i + 1}. ${point}`).join("\n");
}

export function buildRebuttalPrompt(analysis: Analysis): string {
  return `MAIN ARGUMENT: ${analysis.main_position}.\nRATIONALE: ${formatRationale(analysis.rationale)}`;
}

export class RebuttalGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly model: string = DEFAULT_MODEL,
  ) {}

  async rebut(analysis: Analysis): Promise<string> {
    const text = await this.generator.complete({
      model: this.model,
      system: REBUTTAL_SYSTEM_PROMPT,
      prompt: buildRebuttalPrompt(analysis),
      temperature: 0,
    });
    console.log(`[Rebuttal] Generated ${text.length} chars`);
    return text;
  }
}
