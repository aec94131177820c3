// TreeRules — Rule text model
//
// Canonical text form of a rule:
//   IF <cond> AND <cond> ... THEN OUTLIER|INLIER
// A rule without conditions renders as "IF <no conditions> THEN <label>".

import type { Condition, Rule, RuleLabel } from "./config";

export const NO_CONDITIONS = "<no conditions>";

export interface FormatOptions {
  /** Wrap feature names in `$…$`, the form the condition grammar reads. */
  delimit?: boolean;
}

export function formatCondition(condition: Condition, options: FormatOptions = {}): string {
  const feature = options.delimit ? `$${condition.feature}$` : condition.feature;
  const unit = condition.unit ? ` ${condition.unit}` : "";
  return `${feature} ${condition.operator} ${condition.literal}${unit}`;
}

export function formatRule(rule: Rule, options: FormatOptions = {}): string {
  const body =
    rule.conditions.length > 0
      ? rule.conditions.map((c) => formatCondition(c, options)).join(" AND ")
      : NO_CONDITIONS;
  return `IF ${body} THEN ${rule.label}`;
}

export function formatRules(rules: Rule[], options: FormatOptions = {}): string[] {
  return rules.map((rule) => formatRule(rule, options));
}

/**
 * Split rule text into its condition part and label. Returns null when the
 * text carries no `THEN OUTLIER` / `THEN INLIER` clause.
 */
export function splitRuleText(text: string): { conditionText: string; label: RuleLabel } | null {
  const match = text.match(/^\s*(?:IF\b)?\s*([\s\S]*?)\s*THEN\s+(OUTLIER|INLIER)\b/);
  if (!match) return null;
  const label: RuleLabel = match[2] === "OUTLIER" ? "OUTLIER" : "INLIER";
  return { conditionText: match[1], label };
}

/** Split a rule's condition text into its AND-joined conjuncts. */
export function splitConjuncts(conditionText: string): string[] {
  return conditionText
    .split(/\s+AND\s+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

const FEATURE_INDEX = /^feature_(\d+)$/;

/**
 * Replace `feature_N` placeholder names with the N-th dataset column.
 * Names are matched whole, so `feature_1` never touches `feature_10`.
 * Indices past the end of `columns` are left as they are.
 */
export function renameFeatures(rule: Rule, columns: readonly string[]): Rule {
  return {
    ...rule,
    conditions: rule.conditions.map((condition) => {
      const match = condition.feature.match(FEATURE_INDEX);
      if (!match) return condition;
      const column = columns[parseInt(match[1], 10)];
      return column === undefined ? condition : { ...condition, feature: column };
    }),
  };
}

/**
 * Rewrite a plain-text rule so every conjunct's column name is wrapped in
 * `$…$`. Each conjunct is matched against the longest column name it starts
 * with; conjuncts already delimited, or naming no known column, are kept.
 */
export function delimitRuleFeatures(text: string, columns: readonly string[]): string {
  const parts = splitRuleText(text);
  if (!parts) return text;

  const byLength = [...columns].sort((a, b) => b.length - a.length);
  const conjuncts = splitConjuncts(parts.conditionText).map((conjunct) => {
    if (conjunct.startsWith("$")) return conjunct;
    for (const column of byLength) {
      if (!conjunct.startsWith(column)) continue;
      const rest = conjunct.slice(column.length);
      if (/^\s*(>=|<=|==|>|<)/.test(rest)) {
        return `$${column}$${rest}`;
      }
    }
    return conjunct;
  });

  const body = conjuncts.length > 0 ? conjuncts.join(" AND ") : NO_CONDITIONS;
  return `IF ${body} THEN ${parts.label}`;
}
