/**
 * Rebuttal generator tests: prompt formatting, verbatim output, no fallback.
 */

import { describe, it, expect } from "vitest";
import { REBUTTAL_SYSTEM_PROMPT, RebuttalGenerator, buildRebuttalPrompt, formatRationale } from "@/lib/cmv/rebuttal";
import { ScriptedTextGenerator } from "@test/helpers/fakes";

describe("formatRationale", () => {
  it("numbers each point from 1", () => {
    expect(formatRationale(["first", "second", "third"])).toBe("1. first\n2. second\n3. third");
  });

  it("is empty for no points", () => {
    expect(formatRationale([])).toBe("");
  });
});

describe("buildRebuttalPrompt", () => {
  it("embeds the main position and numbered rationale", () => {
    expect(buildRebuttalPrompt({ main_position: "Remote work is better", rationale: ["No commute", "Focus"] })).toBe(
      "MAIN ARGUMENT: Remote work is better.\nRATIONALE: 1. No commute\n2. Focus",
    );
  });
});

describe("RebuttalGenerator.rebut", () => {
  it("sends a free-text request at temperature 0 and returns the reply verbatim", async () => {
    const generator = new ScriptedTextGenerator();
    generator.rebuttalReply = "  **Consider this:**\n\nOffices build trust.  ";

    const text = await new RebuttalGenerator(generator).rebut({ main_position: "P", rationale: ["a"] });

    expect(text).toBe("  **Consider this:**\n\nOffices build trust.  ");
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]).toEqual({
      model: "gpt-4o-2024-08-06",
      system: REBUTTAL_SYSTEM_PROMPT,
      prompt: "MAIN ARGUMENT: P.\nRATIONALE: 1. a",
      temperature: 0,
    });
  });

  it("asks for a polite, evidence-based reply that addresses each point", () => {
    expect(REBUTTAL_SYSTEM_PROMPT).toContain("Be polite but make sure to address each point of rationale");
    expect(REBUTTAL_SYSTEM_PROMPT).toContain("Use evidence-based arguments");
  });

  it("propagates generator failures", async () => {
    const generator = new ScriptedTextGenerator();
    generator.error = Object.assign(new Error("Incorrect API key provided"), { statusCode: 401 });
    await expect(
      new RebuttalGenerator(generator).rebut({ main_position: "P", rationale: [] }),
    ).rejects.toThrow("Incorrect API key provided");
  });
});
