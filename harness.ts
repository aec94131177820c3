#!/usr/bin/env node

import * as dotenv from "dotenv";
dotenv.config({ override: true });
import * as fs from "node:fs";
import { applyRules, datasetFromColumns, toRecords } from "./apply";
import { loadColumnData, loadRuleList, loadText, parseArgs, printUsage, UsageError } from "./cli";
import type { CliArgs } from "./cli";
import { loadSettings } from "./config";
import type { Diagnostic, RulesAlgorithm } from "./config";
import { getModel } from "./models/index";
import type { ModelConfig } from "./models/index";
import { integrateExpertRules } from "./pipeline";
import { formatRules } from "./rules";
import { extractTreeRules } from "./trees/index";
import { extractRules, validateRules } from "./validator";

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function reportDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    const where = d.line !== undefined ? ` line ${d.line}` : "";
    const text = d.text !== undefined ? ` (${d.text})` : "";
    console.warn(`[${d.source}]${where}: ${d.message}${text}`);
  }
}

function writeOutput(out: string, value: unknown): void {
  const json = JSON.stringify(value, null, 2);
  if (out) {
    fs.writeFileSync(out, json + "\n");
    console.log(`Wrote ${out}`);
  } else {
    console.log(json);
  }
}

function requireAlgorithm(args: CliArgs): RulesAlgorithm {
  if (args.algorithm === null) throw new UsageError(`${args.command} requires --algorithm`);
  return args.algorithm;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function runExtract(args: CliArgs): void {
  const columns = args.dataset
    ? datasetFromColumns(loadColumnData(args.dataset)).columns
    : args.columns;

  const result = extractTreeRules(requireAlgorithm(args), loadText(args.tree), columns);
  reportDiagnostics(result.diagnostics);
  for (const rule of formatRules(result.rules, { delimit: args.delimit })) {
    console.log(rule);
  }
}

function runValidate(args: CliArgs): boolean {
  const rules = extractRules(loadText(args.rules));
  const report = validateRules(rules);
  writeOutput(args.out, { rules, isValid: report.isValid, errors: report.errors });
  return report.isValid;
}

function runApply(args: CliArgs): void {
  const rules = loadRuleList(args.rules);
  const { rows, dropped } = datasetFromColumns(loadColumnData(args.dataset));
  if (dropped > 0) {
    console.warn(`Dropped ${dropped} row(s) with missing values`);
  }

  const result = applyRules(rules, rows);
  reportDiagnostics(result.diagnostics);
  writeOutput(args.out, toRecords(result));
}

async function runIntegrate(args: CliArgs): Promise<boolean> {
  const settings = loadSettings();
  const modelName = args.model ?? settings.model;
  const modelConfig: ModelConfig = {
    model: modelName,
    temperature: args.temperature ?? settings.temperature,
    maxTokens: args.maxTokens ?? settings.maxTokens,
  };

  const oracle = getModel(modelName);
  console.log(`Oracle: ${oracle.displayName} (${modelName})`);

  const result = await integrateExpertRules({
    algorithm: requireAlgorithm(args),
    treeText: loadText(args.tree),
    dataset: loadColumnData(args.dataset),
    expertText: args.expertFile ? loadText(args.expertFile) : args.expertText,
    oracle,
    modelConfig,
    maxAttempts: args.maxAttempts ?? settings.maxRepairAttempts,
  });
  reportDiagnostics(result.diagnostics);

  writeOutput(args.out, {
    treeRules: result.treeRules,
    expertRules: result.expertRules,
    mergedRules: result.mergedRules,
    repair: {
      status: result.repair.status,
      attempts: result.repair.attempts,
      errors: result.repair.errors,
    },
    rows: toRecords(result.labeled),
    labels: result.labels,
  });
  return result.repair.status === "valid";
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

async function run(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    printUsage();
    process.exit(1);
  }

  switch (args.command) {
    case "extract":
      runExtract(args);
      break;
    case "validate":
      if (!runValidate(args)) process.exitCode = 2;
      break;
    case "apply":
      runApply(args);
      break;
    case "integrate":
      if (!(await runIntegrate(args))) process.exitCode = 2;
      break;
  }
}

run().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
