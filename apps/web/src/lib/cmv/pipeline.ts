/**
 * Analysis pipeline: Summarizer, then Rebuttal Generator.
 *
 * Not cached. Each call is two model round-trips; callers gate repeats
 * through the session entry's `analyzed` flag.
 *
 * @module cmv/pipeline
 */

import type { TextGenerator } from "./llm";
import { RebuttalGenerator } from "./rebuttal";
import { Summarizer } from "./summarizer";
import type { AnalysisOutcome, Thread } from "./types";

export interface AnalysisPipeline {
  analyze(thread: Thread): Promise<AnalysisOutcome>;
}

export class SummarizeThenRebutPipeline implements AnalysisPipeline {
  constructor(
    private readonly summarizer: Summarizer,
    private readonly rebuttalGenerator: RebuttalGenerator,
  ) {}

  async analyze(thread: Thread): Promise<AnalysisOutcome> {
    const { analysis, parseFailure } = await this.summarizer.summarize(thread.title, thread.selftext);
    // Parse failures still continue: the sentinel analysis is rebutted as-is
    const rebuttal = await this.rebuttalGenerator.rebut(analysis);
    return { analysis, rebuttal, parseFailure };
  }
}

export function createAnalysisPipeline(generator: TextGenerator, model?: string): AnalysisPipeline {
  return new SummarizeThenRebutPipeline(new Summarizer(generator, model), new RebuttalGenerator(generator, model));
}
