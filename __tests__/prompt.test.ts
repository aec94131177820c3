import { describe, expect, it } from "vitest";
import { buildExpertRulesPrompt, buildFixPrompt, buildMergePrompt, SYSTEM_PROMPT } from "../prompt";

describe("prompts", () => {
  it("describes the rule grammar and output format in the system prompt", () => {
    expect(SYSTEM_PROMPT).toContain("IF <condition> AND <condition> ... THEN <state>");
    expect(SYSTEM_PROMPT).toContain("```json");
  });

  it("quotes the expert text and lists the columns", () => {
    const prompt = buildExpertRulesPrompt("Speeds over 120 are faults.", ["speed", "load"]);
    expect(prompt).toContain('"Speeds over 120 are faults."');
    expect(prompt).toContain('DATASET COLUMNS\n["speed","load"]');
  });

  it("ends the merge task with the rule sets as JSON", () => {
    const prompt = buildMergePrompt([["IF a > 1 THEN OUTLIER"], []]);
    expect(prompt.endsWith('Rule sets to combine: [["IF a > 1 THEN OUTLIER"],[]]')).toBe(true);
  });

  it("lists every error and the current rules in a fix request", () => {
    const prompt = buildFixPrompt(["first error", "second error"], "the task", ["IF a > 1 THEN INLIER"]);
    expect(prompt.startsWith("Fix the following validation issues in the rules:\nfirst error\nsecond error\n\n")).toBe(
      true
    );
    expect(prompt).toContain("Original task: the task");
    expect(prompt).toContain('Current rules output:\n[\n  "IF a > 1 THEN INLIER"\n]');
    expect(prompt).toContain("3. Not contain 'INLIER'");
  });
});
