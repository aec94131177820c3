// TreeRules — Oracle output rule extraction and validation
//
// The oracle answers in free text. Rules may come back as a JSON list in a
// fenced code block, as a `{ "new_rules": [...] }` object, as quoted lines,
// as a numbered list, or as bare lines. extractRules() pulls out the
// candidate OUTLIER rules; validateRules() checks them against the rule
// grammar and the merge policies.

import type { ValidationReport } from "./config";

// ─── Extraction ─────────────────────────────────────────────────────────────

// ``` + an optional one-word info string ending its line, then the body.
// One-line fences (```["IF …"]```) have no info string.
const CODE_BLOCK_PATTERN = /```(?:[\w-]*[ \t]*\n)?([\s\S]*?)```/g;

const NUMBERED_QUOTED_PATTERN = /^\d+\.\s*"(IF.*THEN OUTLIER)"/;

function isOutlierRule(value: unknown): value is string {
  return typeof value === "string" && value.includes("IF ") && value.includes("THEN OUTLIER");
}

function stripQuotes(line: string): string {
  return line.replace(/,$/, "").replace(/^["']+|["']+$/g, "");
}

function rulesFromJson(block: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch {
    return null;
  }

  if (Array.isArray(parsed)) {
    return parsed.filter(isOutlierRule);
  }
  if (parsed !== null && typeof parsed === "object" && "new_rules" in parsed) {
    const newRules: unknown = parsed.new_rules;
    if (Array.isArray(newRules)) {
      return newRules.filter(isOutlierRule);
    }
  }
  return null;
}

function rulesFromBlockLines(block: string): string[] {
  const rules: string[] = [];
  for (const raw of block.trim().split("\n")) {
    const line = raw.trim();
    if (line.startsWith('"') && isOutlierRule(line)) {
      rules.push(stripQuotes(line));
    } else if (line.startsWith("IF ") && line.includes("THEN OUTLIER")) {
      rules.push(line);
    }
  }
  return rules;
}

function rulesFromText(text: string): string[] {
  const rules: string[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.startsWith("IF ") && line.includes("THEN OUTLIER")) {
      rules.push(line);
      continue;
    }
    const numbered = line.match(NUMBERED_QUOTED_PATTERN);
    if (numbered) {
      rules.push(numbered[1]);
      continue;
    }
    if (/^"IF.*THEN OUTLIER"/.test(line) || /^'IF.*THEN OUTLIER'/.test(line)) {
      rules.push(stripQuotes(line));
    }
  }
  return rules;
}

/**
 * Pull candidate `IF … THEN OUTLIER` rules out of an oracle response.
 * Code blocks are tried first; the raw text is scanned only when no block
 * yields a rule.
 */
export function extractRules(rawText: string): string[] {
  const rules: string[] = [];

  for (const match of rawText.matchAll(CODE_BLOCK_PATTERN)) {
    const block = match[1].trim();
    const fromJson = rulesFromJson(block);
    if (fromJson !== null) {
      rules.push(...fromJson);
      continue;
    }
    rules.push(...rulesFromBlockLines(block));
  }

  if (rules.length > 0) return rules;
  return rulesFromText(rawText);
}

// ─── Validation ─────────────────────────────────────────────────────────────

function report(errors: string[]): ValidationReport {
  return Object.freeze({ isValid: errors.length === 0, errors: Object.freeze([...errors]) });
}

function countOutlierRules(ruleSets: readonly unknown[]): number {
  let total = 0;
  for (const ruleSet of ruleSets) {
    if (!Array.isArray(ruleSet)) continue;
    for (const rule of ruleSet) {
      if (typeof rule === "string" && rule.includes("THEN OUTLIER")) total++;
    }
  }
  return total;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Check extracted rules against the rule grammar and merge policies.
 *
 * The "fewer rules than expected" check reads like a warning but blocks
 * like any other error: the repair loop relies on it to ask the oracle for
 * the rules it dropped. It only runs once every rule passes the other
 * checks.
 *
 * @param sourceRuleSets  The rule sets the oracle was asked to merge.
 */
export function validateRules(rules: unknown, sourceRuleSets: readonly unknown[] = []): ValidationReport {
  const errors: string[] = [];

  if (!Array.isArray(rules)) {
    return report(["Output must be a list of rules."]);
  }
  if (rules.length === 0) {
    return report(["No rules found in the output."]);
  }

  rules.forEach((rule: unknown, index) => {
    const n = index + 1;
    if (typeof rule !== "string") {
      errors.push(`Rule ${n} must be a string, got ${typeName(rule)}.`);
      return;
    }
    if (rule.includes("THEN INLIER")) {
      errors.push(`Rule ${n} contains INLIER but should only contain OUTLIER: ${rule}`);
    }
    if (!(rule.startsWith("IF ") && rule.includes("THEN OUTLIER"))) {
      errors.push(`Rule ${n} does not follow pattern 'IF ... THEN OUTLIER': ${rule}`);
    }
    if (rule.includes(" OR ")) {
      errors.push(`Rule ${n} contains 'OR' which is not allowed: ${rule}`);
    }
  });

  if (errors.length === 0) {
    const expected = countOutlierRules(sourceRuleSets);
    if (expected > 2 && rules.length < expected * 0.5) {
      errors.push(
        `Warning: Output has significantly fewer rules (${rules.length}) than expected. ` +
          `Make sure no valid rules were skipped.`
      );
    }
  }

  return report(errors);
}
