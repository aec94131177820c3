import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveRules, unwrapResponse } from "../repair";
import { fakeOracle, jsonBlock, MODEL_CONFIG, response } from "./helpers/oracle";

const TASK = "Merge the rule sets.";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("unwrapResponse", () => {
  it("returns the response text", () => {
    expect(unwrapResponse(response("IF $a$ > 1 THEN OUTLIER"))).toBe("IF $a$ > 1 THEN OUTLIER");
  });

  it("returns null for a missing or blank text", () => {
    expect(unwrapResponse(response(null))).toBeNull();
    expect(unwrapResponse(response("  \n"))).toBeNull();
  });
});

describe("resolveRules", () => {
  it("returns valid rules without calling the oracle", async () => {
    const { oracle, callModel } = fakeOracle();
    const outcome = await resolveRules(jsonBlock(["IF $speed$ > 120 THEN OUTLIER"]), {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
    });
    expect(callModel).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      status: "valid",
      rules: ["IF $speed$ > 120 THEN OUTLIER"],
      attempts: 0,
      errors: [],
      lastCandidate: ["IF $speed$ > 120 THEN OUTLIER"],
    });
  });

  it("asks for a fix and accepts the corrected answer", async () => {
    const { oracle, callModel } = fakeOracle(
      jsonBlock(["IF $speed$ > 120 THEN OUTLIER", "IF $load$ > 90 THEN OUTLIER"])
    );
    const outcome = await resolveRules(jsonBlock(["IF $speed$ > 120 OR $load$ > 90 THEN OUTLIER"]), {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
    });

    expect(outcome.status).toBe("valid");
    expect(outcome.rules).toEqual(["IF $speed$ > 120 THEN OUTLIER", "IF $load$ > 90 THEN OUTLIER"]);
    expect(outcome.attempts).toBe(1);

    expect(callModel).toHaveBeenCalledTimes(1);
    const [prompt, config] = callModel.mock.calls[0];
    expect(config).toBe(MODEL_CONFIG);
    expect(prompt).toContain(
      "Fix the following validation issues in the rules:\n" +
        "Rule 1 contains 'OR' which is not allowed: IF $speed$ > 120 OR $load$ > 90 THEN OUTLIER\n\n" +
        "Original task: Merge the rule sets."
    );
    expect(prompt).toContain('"IF $speed$ > 120 OR $load$ > 90 THEN OUTLIER"');
  });

  it("gives up after the attempt limit", async () => {
    const invalid = jsonBlock(["IF $a$ > 1 OR $b$ > 2 THEN OUTLIER"]);
    const { oracle, callModel } = fakeOracle(invalid, invalid, invalid);
    const outcome = await resolveRules(invalid, {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
      maxAttempts: 2,
    });

    expect(callModel).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe("exhausted");
    expect(outcome.rules).toEqual([]);
    expect(outcome.attempts).toBe(2);
    expect(outcome.errors).toEqual(["Rule 1 contains 'OR' which is not allowed: IF $a$ > 1 OR $b$ > 2 THEN OUTLIER"]);
    expect(outcome.lastCandidate).toEqual(["IF $a$ > 1 OR $b$ > 2 THEN OUTLIER"]);
  });

  it("makes no oracle call when the limit is zero", async () => {
    const { oracle, callModel } = fakeOracle();
    const outcome = await resolveRules("no rules here", {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
      maxAttempts: 0,
    });
    expect(callModel).not.toHaveBeenCalled();
    expect(outcome.status).toBe("exhausted");
    expect(outcome.errors).toEqual(["No rules found in the output."]);
  });

  it("ends with an empty result when the oracle fails", async () => {
    const { oracle } = fakeOracle(new Error("connection refused"));
    const outcome = await resolveRules("no rules here", {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
    });
    expect(outcome).toEqual({
      status: "oracle_error",
      rules: [],
      attempts: 1,
      errors: ["Oracle error: connection refused"],
      lastCandidate: [],
    });
  });

  it("ends with an empty result when the response has no text", async () => {
    const { oracle } = fakeOracle(null);
    const outcome = await resolveRules("no rules here", {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
    });
    expect(outcome.status).toBe("unreadable");
    expect(outcome.rules).toEqual([]);
    expect(outcome.errors).toEqual(["Oracle response had no text"]);
  });

  it("counts rules from the merged sets toward completeness", async () => {
    const sources = [
      ["IF $a$ > 1 THEN OUTLIER", "IF $b$ > 1 THEN OUTLIER"],
      ["IF $c$ > 1 THEN OUTLIER", "IF $d$ > 1 THEN OUTLIER"],
    ];
    const { oracle, callModel } = fakeOracle(jsonBlock(sources.flat()));
    const outcome = await resolveRules(jsonBlock(["IF $a$ > 1 THEN OUTLIER"]), {
      oracle,
      modelConfig: MODEL_CONFIG,
      taskDescription: TASK,
      sourceRuleSets: sources,
    });
    expect(callModel).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe("valid");
    expect(outcome.rules).toHaveLength(4);
  });
});
