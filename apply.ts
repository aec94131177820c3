// TreeRules — Rule application engine
//
// Relabels a dataset from a rule set. Each OUTLIER rule is a conjunction of
// `$feature$ OP value` conditions; a row matching every condition of any
// rule is an outlier. INLIER rules are never consulted.

import type { ColumnData, Condition, Dataset, DatasetRow, Diagnostic, LabeledDataset } from "./config";
import { evaluateCondition, parseCondition } from "./condition";
import { NO_CONDITIONS, splitConjuncts, splitRuleText } from "./rules";

export interface ApplyResult extends LabeledDataset {
  diagnostics: Diagnostic[];
}

/**
 * Parse the conditions of an OUTLIER rule. Fragments that do not parse are
 * reported and left out, so they constrain nothing.
 * Returns null for rules that are not OUTLIER rules.
 */
export function outlierConditions(rule: string, diagnostics: Diagnostic[] = []): Condition[] | null {
  const parts = splitRuleText(rule);
  if (!parts || parts.label !== "OUTLIER") return null;
  if (parts.conditionText.trim() === NO_CONDITIONS) return [];

  const conditions: Condition[] = [];
  for (const fragment of splitConjuncts(parts.conditionText)) {
    const match = parseCondition(fragment);
    if (match.kind === "match") {
      conditions.push(match.condition);
    } else {
      diagnostics.push({
        source: "condition",
        message: `skipped condition: ${match.reason}`,
        text: fragment,
      });
    }
  }
  return conditions;
}

export function applyRules(rules: readonly string[], dataset: Dataset): ApplyResult {
  const diagnostics: Diagnostic[] = [];
  const outlier = dataset.map(() => false);
  const columns = new Set(dataset.flatMap((row) => Object.keys(row)));

  for (const rule of rules) {
    const conditions = outlierConditions(rule, diagnostics);
    if (conditions === null) continue;

    const missing = conditions.filter((c) => !columns.has(c.feature));
    for (const condition of missing) {
      diagnostics.push({
        source: "apply",
        message: `unknown column "${condition.feature}"; rule matches no rows`,
        text: rule,
      });
    }
    if (missing.length > 0) continue;

    let matched = 0;
    dataset.forEach((row, i) => {
      if (conditions.every((condition) => evaluateCondition(condition, row))) {
        if (!outlier[i]) matched++;
        outlier[i] = true;
      }
    });
    if (matched > 0) {
      console.log(`[apply] ${rule} -> ${matched} new outlier row(s)`);
    }
  }

  return { rows: [...dataset], outlier, diagnostics };
}

/**
 * Build rows from column data, dropping any row with a missing, null or
 * non-finite cell. Returns the surviving rows and how many were dropped.
 */
export function datasetFromColumns(data: ColumnData): { rows: Dataset; columns: string[]; dropped: number } {
  const columns = Object.keys(data);
  const length = columns.reduce((max, column) => Math.max(max, data[column].length), 0);

  const rows: Dataset = [];
  let dropped = 0;
  for (let i = 0; i < length; i++) {
    const row: DatasetRow = {};
    let complete = true;
    for (const column of columns) {
      const value = data[column][i];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        complete = false;
        break;
      }
      row[column] = value;
    }
    if (complete) rows.push(row);
    else dropped++;
  }

  return { rows, columns, dropped };
}

/** Labels for retraining: -1 marks an outlier, 1 an inlier. */
export function toTrainingLabels(labeled: LabeledDataset): number[] {
  return labeled.outlier.map((isOutlier) => (isOutlier ? -1 : 1));
}

/** Flatten a labeled dataset into records carrying the `outlier` column. */
export function toRecords(labeled: LabeledDataset): Array<Record<string, number | boolean>> {
  return labeled.rows.map((row, i) => ({ ...row, outlier: labeled.outlier[i] ?? false }));
}
