// TreeRules — Command-line argument parsing and input files

import * as fs from "node:fs";
import { z } from "zod";
import { RULES_ALGORITHMS } from "./config";
import type { ColumnData, RulesAlgorithm } from "./config";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Command = "extract" | "validate" | "apply" | "integrate";

export interface CliArgs {
  command: Command;
  algorithm: RulesAlgorithm | null;
  tree: string;
  dataset: string;
  columns: string[];
  rules: string;
  expertText: string;
  expertFile: string;
  model: string | null;
  maxAttempts: number | null;
  maxTokens: number | null;
  temperature: number | null;
  delimit: boolean;
  out: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ---------------------------------------------------------------------------
// Input schemas
// ---------------------------------------------------------------------------

export const ColumnDataSchema = z
  .record(z.string(), z.array(z.number().nullable()))
  .refine((data) => Object.keys(data).length > 0, { message: "dataset has no columns" });

export const RuleListSchema = z.array(z.string());

const AlgorithmSchema = z.enum(RULES_ALGORITHMS);

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

const COMMANDS: readonly Command[] = ["extract", "validate", "apply", "integrate"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseCount(flag: string, value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return n;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...args] = argv;
  if (command === undefined || !isCommand(command)) {
    throw new UsageError(command === undefined ? "No command given" : `Unknown command: ${command}`);
  }

  const parsed: CliArgs = {
    command,
    algorithm: null,
    tree: "",
    dataset: "",
    columns: [],
    rules: "",
    expertText: "",
    expertFile: "",
    model: null,
    maxAttempts: null,
    maxTokens: null,
    temperature: null,
    delimit: false,
    out: "",
  };

  const value = (i: number): string => {
    const next = args[i];
    if (next === undefined) throw new UsageError(`${args[i - 1]} expects a value`);
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--algorithm": {
        const algorithm = AlgorithmSchema.safeParse(value(++i));
        if (!algorithm.success) {
          throw new UsageError(`--algorithm must be one of ${RULES_ALGORITHMS.join(", ")}`);
        }
        parsed.algorithm = algorithm.data;
        break;
      }
      case "--tree":
        parsed.tree = value(++i);
        break;
      case "--dataset":
        parsed.dataset = value(++i);
        break;
      case "--columns":
        parsed.columns = value(++i)
          .split(",")
          .map((c) => c.trim())
          .filter((c) => c.length > 0);
        break;
      case "--rules":
        parsed.rules = value(++i);
        break;
      case "--expert-text":
        parsed.expertText = value(++i);
        break;
      case "--expert-file":
        parsed.expertFile = value(++i);
        break;
      case "--model":
        parsed.model = value(++i);
        break;
      case "--max-attempts":
        parsed.maxAttempts = parseCount("--max-attempts", value(++i));
        break;
      case "--max-tokens": {
        const maxTokens = parseCount("--max-tokens", value(++i));
        if (maxTokens === 0) throw new UsageError("--max-tokens must be at least 1");
        parsed.maxTokens = maxTokens;
        break;
      }
      case "--temperature": {
        const raw = value(++i);
        const temperature = parseFloat(raw);
        if (Number.isNaN(temperature)) {
          throw new UsageError(`--temperature expects a number, got "${raw}"`);
        }
        parsed.temperature = temperature;
        break;
      }
      case "--delimit":
        parsed.delimit = true;
        break;
      case "--out":
        parsed.out = value(++i);
        break;
      default:
        throw new UsageError(`Unknown argument: ${args[i]}`);
    }
  }

  requireFor(parsed);
  return parsed;
}

function requireFor(args: CliArgs): void {
  const missing: string[] = [];
  const needs = (flag: string, present: boolean): void => {
    if (!present) missing.push(flag);
  };

  switch (args.command) {
    case "extract":
      needs("--algorithm", args.algorithm !== null);
      needs("--tree", !!args.tree);
      break;
    case "validate":
      needs("--rules", !!args.rules);
      break;
    case "apply":
      needs("--rules", !!args.rules);
      needs("--dataset", !!args.dataset);
      break;
    case "integrate":
      needs("--algorithm", args.algorithm !== null);
      needs("--tree", !!args.tree);
      needs("--dataset", !!args.dataset);
      needs("--expert-text or --expert-file", !!args.expertText || !!args.expertFile);
      break;
  }

  if (missing.length > 0) {
    throw new UsageError(`${args.command} requires ${missing.join(", ")}`);
  }
}

export function printUsage(): void {
  console.log(`
Usage: tree-rules <command> [options]

Commands:
  extract     Turn a tree dump into rules
  validate    Extract and check rules from an oracle answer
  apply       Label dataset rows with OUTLIER rules
  integrate   Merge tree rules with expert knowledge and relabel the dataset

extract:
  --algorithm <tag>         FIGS, OptimalTree or GreedyTree
  --tree <path>             Tree dump text file
  --columns <list>          Comma-separated column names for feature_N
  --dataset <path>          Column data JSON; its keys name the columns
  --delimit                 Wrap feature names in $...$

validate:
  --rules <path>            Oracle answer text

apply:
  --rules <path>            JSON list of rule strings
  --dataset <path>          Column data JSON ({"column": [values...]})
  --out <path>              Write labeled rows here instead of stdout

integrate:
  --algorithm <tag>         FIGS, OptimalTree or GreedyTree
  --tree <path>             Tree dump text file
  --dataset <path>          Column data JSON
  --expert-text <text>      Expert knowledge, inline
  --expert-file <path>      Expert knowledge, from a file
  --model <name>            Oracle model (default: RULES_MODEL or gpt-4o-mini)
  --temperature <n>         Oracle temperature (default: ORACLE_TEMPERATURE or 0.1)
  --max-tokens <n>          Max tokens per oracle answer (default: ORACLE_MAX_TOKENS or 4096)
  --max-attempts <n>        Fix requests before giving up (default: REPAIR_MAX_ATTEMPTS or 3)
  --out <path>              Write the result JSON here instead of stdout
`);
}

// ---------------------------------------------------------------------------
// Input files
// ---------------------------------------------------------------------------

function readJson(filepath: string): unknown {
  const text = fs.readFileSync(filepath, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${filepath} is not valid JSON: ${msg}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseColumnData(value: unknown, source = "dataset"): ColumnData {
  const parsed = ColumnDataSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseRuleList(value: unknown, source = "rules"): string[] {
  const parsed = RuleListSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadColumnData(filepath: string): ColumnData {
  return parseColumnData(readJson(filepath), filepath);
}

export function loadRuleList(filepath: string): string[] {
  return parseRuleList(readJson(filepath), filepath);
}

export function loadText(filepath: string): string {
  return fs.readFileSync(filepath, "utf-8");
}
