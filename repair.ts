// TreeRules — Validate-and-fix loop with the rule-revision oracle
//
// The oracle's answer is extracted and validated; when it fails, the errors
// are sent back together with the original task and the oracle gets another
// try. The number of oracle calls is capped. resolveRules() never throws:
// every failure ends in an empty rule list and a status saying why.

import { DEFAULT_MAX_REPAIR_ATTEMPTS } from "./config";
import { describeResponse } from "./models/index";
import type { ModelAdapter, ModelConfig, ModelResponse } from "./models/index";
import { buildFixPrompt } from "./prompt";
import { extractRules, validateRules } from "./validator";

export type RepairStatus = "valid" | "exhausted" | "unreadable" | "oracle_error";

export interface RepairOutcome {
  status: RepairStatus;
  /** Validated rules; empty unless status is "valid". */
  rules: string[];
  /** Oracle calls made. */
  attempts: number;
  /** Errors from the last validation, or the oracle failure. */
  errors: string[];
  /** The last rules extracted, valid or not. */
  lastCandidate: string[];
}

export interface RepairOptions {
  oracle: ModelAdapter;
  modelConfig: ModelConfig;
  /** The task the oracle was originally given, restated in each fix request. */
  taskDescription: string;
  sourceRuleSets?: readonly unknown[];
  maxAttempts?: number;
}

/** Text of an oracle response, or null when it carries none. */
export function unwrapResponse(response: ModelResponse): string | null {
  const text = response.raw_response;
  if (typeof text !== "string" || !text.trim()) return null;
  return text;
}

export async function resolveRules(rawText: string, options: RepairOptions): Promise<RepairOutcome> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_REPAIR_ATTEMPTS;
  const sourceRuleSets = options.sourceRuleSets ?? [];

  let text = rawText;
  let attempts = 0;

  for (;;) {
    const rules = extractRules(text);
    const validation = validateRules(rules, sourceRuleSets);

    if (validation.isValid) {
      console.log(`[repair] ${rules.length} rule(s) valid after ${attempts} fix request(s)`);
      return { status: "valid", rules, attempts, errors: [], lastCandidate: rules };
    }

    const errors = [...validation.errors];
    console.warn(`[repair] Validation errors:\n${errors.join("\n")}`);

    if (attempts >= maxAttempts) {
      console.warn(`[repair] Gave up after ${attempts} fix request(s)`);
      return { status: "exhausted", rules: [], attempts, errors, lastCandidate: rules };
    }

    const prompt = buildFixPrompt(errors, options.taskDescription, rules);
    attempts++;

    let response: ModelResponse;
    try {
      response = await options.oracle.callModel(prompt, options.modelConfig);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`[repair] Oracle call failed (attempt ${attempts}/${maxAttempts}): ${msg}`);
      return {
        status: "oracle_error",
        rules: [],
        attempts,
        errors: [`Oracle error: ${msg}`],
        lastCandidate: rules,
      };
    }

    console.log(`[repair] Fix request ${attempts}/${maxAttempts} answered (${describeResponse(response)})`);

    const next = unwrapResponse(response);
    if (next === null) {
      console.error(
        `[repair] Oracle response had no text (finish_reason=${response.finish_reason ?? "unknown"})`
      );
      return {
        status: "unreadable",
        rules: [],
        attempts,
        errors: ["Oracle response had no text"],
        lastCandidate: rules,
      };
    }
    text = next;
  }
}
