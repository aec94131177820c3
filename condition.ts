// TreeRules — Condition grammar
//
// A condition is a single predicate `$feature$ OP threshold [unit]`. The
// dollar signs delimit the feature so column names may hold spaces,
// brackets and comparison characters ("Total no. cycles with p>150 bar").
// Parsing is best-effort: a fragment that does not match comes back as a
// partial match and the caller decides what to do with it.

import type { Condition, DatasetRow, Operator } from "./config";

export type ConditionMatch =
  | { kind: "match"; condition: Condition }
  | { kind: "partial"; fragment: string; reason: string };

// Longer operators first so ">=" never reads as ">" followed by "=".
const OPERATOR_SOURCE = "(>=|<=|==|>|<)";

const NUMBER_SOURCE = "(-?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][-+]?\\d+)?)";

// km/h before km, and km before h, so alternation picks the longest unit.
const UNITS = ["km/h", "bar", "km", "h", "dm3", "l", "kg", "t", "rpm", "liters", "kilograms", "tons"];

// The number is always read in full; a unit only counts as a whole word, so
// "120.5x" is 120.5 with no unit and "7 liters" is not "7 l".
const DELIMITED_PATTERN = new RegExp(
  `\\$(.*?)\\$\\s*${OPERATOR_SOURCE}\\s*${NUMBER_SOURCE}(?![\\d.])` +
    `(?:\\s*(${UNITS.map(escapeRegExp).join("|")})(?![A-Za-z0-9]))?`
);

const PLAIN_PATTERN = new RegExp(`^(.+?)\\s*${OPERATOR_SOURCE}\\s*${NUMBER_SOURCE}$`);

const INVERSES: Record<Operator, Operator> = {
  ">=": "<",
  "<": ">=",
  "<=": ">",
  ">": "<=",
  "==": "==",
};

/**
 * Parse a `$feature$ OP value [unit]` fragment. The match is searched
 * anywhere in the fragment, so a leading "IF" or trailing noise is fine.
 */
export function parseCondition(fragment: string): ConditionMatch {
  const text = fragment.trim().replace(/^IF\s+/i, "");
  const match = text.match(DELIMITED_PATTERN);
  if (!match) {
    return { kind: "partial", fragment, reason: "no $feature$ OP value predicate found" };
  }

  const [, rawFeature, operator, literal, unit] = match;
  const feature = rawFeature.trim();
  if (!feature) {
    return { kind: "partial", fragment, reason: "empty feature name" };
  }
  if (!isOperator(operator)) {
    return { kind: "partial", fragment, reason: `unknown operator "${operator}"` };
  }

  const condition: Condition = {
    feature,
    operator,
    threshold: Number(literal),
    literal,
  };
  if (unit) condition.unit = unit;
  return { kind: "match", condition };
}

/**
 * Parse an undelimited `feature OP value` as it appears in tree dumps
 * (e.g. "Distance [km] <= 135.750"). Returns null when the text is not a
 * single comparison.
 */
export function parsePlainCondition(text: string): Condition | null {
  const match = text.trim().match(PLAIN_PATTERN);
  if (!match) return null;
  const [, rawFeature, operator, literal] = match;
  const feature = rawFeature.trim();
  if (!feature || !isOperator(operator)) return null;
  return { feature, operator, threshold: Number(literal), literal };
}

export function evaluateCondition(condition: Condition, row: DatasetRow): boolean {
  const value = row[condition.feature];
  if (value === undefined) return false;
  return compare(value, condition.operator, condition.threshold);
}

export function compare(value: number, operator: Operator, threshold: number): boolean {
  switch (operator) {
    case ">":
      return value > threshold;
    case "<":
      return value < threshold;
    case ">=":
      return value >= threshold;
    case "<=":
      return value <= threshold;
    case "==":
      return value === threshold;
  }
}

/** Negate a comparison: `>=` ↔ `<`, `<=` ↔ `>`. Equality has no single-operator negation and is returned as is. */
export function invertOperator(operator: Operator): Operator {
  return INVERSES[operator];
}

export function invertCondition(condition: Condition): Condition {
  return { ...condition, operator: invertOperator(condition.operator) };
}

export function isOperator(value: string): value is Operator {
  return value === ">" || value === "<" || value === ">=" || value === "<=" || value === "==";
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
