/**
 * Summarizer tests: request shape, JSON parsing, sentinel fallback.
 */

import { describe, it, expect, vi } from "vitest";
import {
  PARSE_FAILURE_MESSAGE,
  SUMMARIZER_SYSTEM_PROMPT,
  Summarizer,
  buildSummarizerPrompt,
  parseAnalysis,
} from "@/lib/cmv/summarizer";
import { AnalysisSchema } from "@/lib/cmv/types";
import { ScriptedTextGenerator } from "@test/helpers/fakes";

const SENTINEL = {
  main_position: "Could not extract main position",
  rationale: ["Could not extract rationale"],
};

describe("buildSummarizerPrompt", () => {
  it("formats title and body", () => {
    expect(buildSummarizerPrompt("CMV: X", "Because Y")).toBe("TITLE: CMV: X.\nTEXT: Because Y");
  });

  it("keeps an empty body", () => {
    expect(buildSummarizerPrompt("CMV: X", "")).toBe("TITLE: CMV: X.\nTEXT: ");
  });
});

describe("Summarizer.summarize", () => {
  it("sends a deterministic structured request with the fixed model", async () => {
    const generator = new ScriptedTextGenerator();
    await new Summarizer(generator).summarize("CMV: X", "Because Y");

    expect(generator.requests).toHaveLength(1);
    const request = generator.requests[0];
    expect(request.model).toBe("gpt-4o-2024-08-06");
    expect(request.temperature).toBe(0);
    expect(request.system).toBe(SUMMARIZER_SYSTEM_PROMPT);
    expect(request.prompt).toBe("TITLE: CMV: X.\nTEXT: Because Y");
    expect(request.schema).toBe(AnalysisSchema);
  });

  it("uses a configured model id", async () => {
    const generator = new ScriptedTextGenerator();
    await new Summarizer(generator, "gpt-4o-mini").summarize("t", "b");
    expect(generator.requests[0].model).toBe("gpt-4o-mini");
  });

  it("parses a well-formed reply", async () => {
    const generator = new ScriptedTextGenerator();
    const result = await new Summarizer(generator).summarize("t", "b");
    expect(result).toEqual({
      analysis: {
        main_position: "Cities should ban cars downtown",
        rationale: ["Cars pollute", "Streets are safer without traffic"],
      },
      parseFailure: null,
    });
  });

  it("returns the sentinel for an unterminated string and does not throw", async () => {
    const generator = new ScriptedTextGenerator();
    generator.summaryReply = '{"main_position": "Cars are bad, "rationale": ["unterminated';
    const result = await new Summarizer(generator).summarize("t", "b");

    expect(result.analysis).toEqual(SENTINEL);
    expect(result.parseFailure).toEqual({
      message: PARSE_FAILURE_MESSAGE,
      rawText: '{"main_position": "Cars are bad, "rationale": ["unterminated',
    });
  });

  it("propagates transport errors", async () => {
    const generator = new ScriptedTextGenerator();
    generator.error = new Error("connect ECONNREFUSED");
    await expect(new Summarizer(generator).summarize("t", "b")).rejects.toThrow("connect ECONNREFUSED");
  });
});

describe("parseAnalysis", () => {
  it("accepts a reply wrapped in a json code fence", () => {
    const raw = '```json\n{"main_position": "P", "rationale": ["a", "b"]}\n```';
    expect(parseAnalysis(raw)).toEqual({
      analysis: { main_position: "P", rationale: ["a", "b"] },
      parseFailure: null,
    });
  });

  it("accepts an empty rationale list", () => {
    expect(parseAnalysis('{"main_position": "P", "rationale": []}').analysis).toEqual({
      main_position: "P",
      rationale: [],
    });
  });

  it("falls back when the JSON has the wrong shape", () => {
    const result = parseAnalysis('{"position": "P", "reasons": ["a"]}');
    expect(result.analysis).toEqual(SENTINEL);
    expect(result.parseFailure?.message).toBe(PARSE_FAILURE_MESSAGE);
  });

  it("falls back when rationale is not a list of strings", () => {
    const result = parseAnalysis('{"main_position": "P", "rationale": "a"}');
    expect(result.analysis).toEqual(SENTINEL);
  });

  it("falls back for an empty reply", () => {
    expect(parseAnalysis("").analysis).toEqual(SENTINEL);
  });

  it("returns a fresh sentinel each time", () => {
    const a = parseAnalysis("nope").analysis;
    const b = parseAnalysis("nope").analysis;
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });

  it("emits a single warning per fallback", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    parseAnalysis("nope");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
