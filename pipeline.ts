// TreeRules — Expert rule integration pipeline
//
// tree dump -> tree rules -> expert rules (oracle) -> merged rules (oracle)
// -> repair -> delimit -> apply -> training labels
//
// integrateExpertRules() never throws on oracle failure. A failed merge
// leaves the merged set empty, so every row stays an inlier.

import type { ColumnData, Diagnostic, LabeledDataset, RulesAlgorithm } from "./config";
import { applyRules, datasetFromColumns, toTrainingLabels } from "./apply";
import { describeResponse } from "./models/index";
import type { ModelAdapter, ModelConfig } from "./models/index";
import { buildExpertRulesPrompt, buildMergePrompt, SYSTEM_PROMPT } from "./prompt";
import type { RepairOutcome } from "./repair";
import { resolveRules, unwrapResponse } from "./repair";
import { delimitRuleFeatures, formatRules } from "./rules";
import { extractTreeRules } from "./trees/index";
import { extractRules } from "./validator";

export interface IntegrationInput {
  algorithm: RulesAlgorithm;
  treeText: string;
  dataset: ColumnData;
  expertText: string;
  oracle: ModelAdapter;
  modelConfig: ModelConfig;
  maxAttempts?: number;
}

export interface IntegrationResult {
  /** Rules read from the tree dump, in canonical text form. */
  treeRules: string[];
  /** OUTLIER rules the oracle read out of the expert text. */
  expertRules: string[];
  /** Validated merged rules with `$feature$` delimiters, ready to apply. */
  mergedRules: string[];
  repair: RepairOutcome;
  labeled: LabeledDataset;
  /** -1 for outliers, 1 for inliers; one per surviving row. */
  labels: number[];
  diagnostics: Diagnostic[];
}

/** One oracle request; null when it fails or comes back empty. */
async function ask(oracle: ModelAdapter, prompt: string, config: ModelConfig, step: string): Promise<string | null> {
  try {
    const response = await oracle.callModel(prompt, config);
    console.log(`[pipeline] ${step}: answered (${describeResponse(response)})`);
    const text = unwrapResponse(response);
    if (text === null) {
      console.warn(`[pipeline] ${step}: oracle response had no text`);
    }
    return text;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[pipeline] ${step}: oracle call failed: ${msg}`);
    return null;
  }
}

export async function integrateExpertRules(input: IntegrationInput): Promise<IntegrationResult> {
  const { rows, columns, dropped } = datasetFromColumns(input.dataset);
  if (dropped > 0) {
    console.log(`[pipeline] Dropped ${dropped} row(s) with missing values`);
  }

  const modelConfig: ModelConfig = {
    ...input.modelConfig,
    systemPrompt: input.modelConfig.systemPrompt ?? SYSTEM_PROMPT,
  };

  const parsed = extractTreeRules(input.algorithm, input.treeText, columns);
  const treeRules = formatRules(parsed.rules);
  const diagnostics: Diagnostic[] = [...parsed.diagnostics];
  console.log(`[pipeline] ${treeRules.length} rule(s) from the ${input.algorithm} tree`);

  const expertText = await ask(
    input.oracle,
    buildExpertRulesPrompt(input.expertText, columns),
    modelConfig,
    "expert rules"
  );
  const expertRules = expertText === null ? [] : extractRules(expertText);
  console.log(`[pipeline] ${expertRules.length} expert rule(s)`);

  const ruleSets = [treeRules, expertRules];
  const mergePrompt = buildMergePrompt(ruleSets);
  const mergedText = await ask(input.oracle, mergePrompt, modelConfig, "merge");

  const repair: RepairOutcome =
    mergedText === null
      ? {
          status: "unreadable",
          rules: [],
          attempts: 0,
          errors: ["Merge request returned no text"],
          lastCandidate: [],
        }
      : await resolveRules(mergedText, {
          oracle: input.oracle,
          modelConfig,
          taskDescription: mergePrompt,
          sourceRuleSets: ruleSets,
          maxAttempts: input.maxAttempts,
        });

  const mergedRules = repair.rules.map((rule) => delimitRuleFeatures(rule, columns));
  const applied = applyRules(mergedRules, rows);
  diagnostics.push(...applied.diagnostics);

  const labeled: LabeledDataset = { rows: applied.rows, outlier: applied.outlier };
  const labels = toTrainingLabels(labeled);
  const outliers = labels.filter((label) => label === -1).length;
  console.log(
    `[pipeline] Repair ${repair.status}; ${mergedRules.length} merged rule(s) mark ${outliers}/${rows.length} row(s) as outliers`
  );

  return { treeRules, expertRules, mergedRules, repair, labeled, labels, diagnostics };
}
