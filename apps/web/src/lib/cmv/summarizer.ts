/**
 * Summarizer
 *
 * Asks the model for the poster's main position and the reasons given for it,
 * as JSON in the Analysis shape. A reply that does not parse never fails the
 * request: the sentinel analysis is returned together with a ParseFailure.
 *
 * @module cmv/summarizer
 */

import type { TextGenerator } from "./llm";
import { DEFAULT_MODEL } from "./llm";
import { parseJsonReply } from "./json";
import { AnalysisSchema, createFallbackAnalysis, type Analysis, type ParseFailure } from "./types";
import { debugLog } from "../debug";

// ============================================================================
// PROMPTS
// ============================================================================

export const SUMMARIZER_SYSTEM_PROMPT = `You are a helpful assistant.
You will be presented with a post from the subreddit r/changemyview. Your task is
to extract the single main position the poster argues for, and each distinct
reason the poster gives in support of that position.
Return your response in the following JSON format:
{
  "main_position": "The main argument of the poster",
  "rationale": ["Point 1", "Point 2", "Point 3"]
}`;

export function buildSummarizerPrompt(title: string, body: string): string {
  return `TITLE: ${title}.\nTEXT: ${body}`;
}

export const PARSE_FAILURE_MESSAGE = "Failed to parse the analysis response. Using a default structure.";

// ============================================================================
// SUMMARIZER
// ============================================================================

export interface SummaryResult {
  analysis: Analysis;
  parseFailure: ParseFailure | null;
}

export class Summarizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly model: string = DEFAULT_MODEL,
  ) {}

  async summarize(title: string, body: string): Promise<SummaryResult> {
    const rawText = await this.generator.complete({
      model: this.model,
      system: SUMMARIZER_SYSTEM_PROMPT,
      prompt: buildSummarizerPrompt(title, body),
      temperature: 0,
      schema: AnalysisSchema,
    });

    return parseAnalysis(rawText);
  }
}

/**
 * Parse a raw model reply into an Analysis, or the sentinel on any failure.
 */
export function parseAnalysis(rawText: string): SummaryResult {
  const parsed = parseJsonReply(rawText);
  if (!parsed.ok) {
    return fallback(rawText, `Invalid JSON: ${parsed.error}`);
  }

  const validated = AnalysisSchema.safeParse(parsed.value);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
    return fallback(rawText, `Unexpected shape: ${issues.join("; ")}`);
  }

  return { analysis: validated.data, parseFailure: null };
}

function fallback(rawText: string, detail: string): SummaryResult {
  console.warn(`[Summarizer] ${PARSE_FAILURE_MESSAGE} (${detail})`);
  debugLog("[Summarizer] Unparseable reply", rawText);
  return {
    analysis: createFallbackAnalysis(),
    parseFailure: { message: PARSE_FAILURE_MESSAGE, rawText },
  };
}
