// TreeRules — Shared types and default configuration

import { z } from "zod";

// ─── Rule types ─────────────────────────────────────────────────────────────

export type Operator = ">" | "<" | ">=" | "<=" | "==";

export type RuleLabel = "OUTLIER" | "INLIER";

export interface Condition {
  feature: string;
  operator: Operator;
  threshold: number;
  literal: string; // threshold text as parsed, rendered back verbatim
  unit?: string;
}

export interface Rule {
  conditions: Condition[];
  label: RuleLabel;
}

export type RuleSet = Rule[];

// ─── Diagnostics ────────────────────────────────────────────────────────────

export type DiagnosticSource = "indentation" | "recursive" | "condition" | "apply";

export interface Diagnostic {
  source: DiagnosticSource;
  message: string;
  line?: number; // 1-based line in the input text, when known
  text?: string;
}

export interface TreeParseResult {
  rules: RuleSet;
  diagnostics: Diagnostic[];
}

// ─── Validation ─────────────────────────────────────────────────────────────

export interface ValidationReport {
  readonly isValid: boolean;
  readonly errors: readonly string[];
}

// ─── Datasets ───────────────────────────────────────────────────────────────

export type DatasetRow = Record<string, number>;

export type Dataset = DatasetRow[];

/** A dataset plus the `outlier` column, one entry per row. */
export interface LabeledDataset {
  rows: Dataset;
  outlier: boolean[];
}

/** Column-oriented dataset as it arrives from callers: `{ column: values[] }`. */
export type ColumnData = Record<string, Array<number | null>>;

// ─── Algorithms ─────────────────────────────────────────────────────────────

export const RULES_ALGORITHMS = ["FIGS", "OptimalTree", "GreedyTree"] as const;

export type RulesAlgorithm = (typeof RULES_ALGORITHMS)[number];

export type TreeDialect = "indentation" | "recursive";

// ─── Defaults ───────────────────────────────────────────────────────────────

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 4096;

/** Oracle calls the repair loop may make before giving up. */
export const DEFAULT_MAX_REPAIR_ATTEMPTS = 3;

/** Header lines printed above a FIGS tree dump. */
export const RECURSIVE_HEADER_LINES = 5;

// ─── Environment settings ───────────────────────────────────────────────────

const SettingsSchema = z.object({
  RULES_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  ORACLE_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  ORACLE_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  REPAIR_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(DEFAULT_MAX_REPAIR_ATTEMPTS),
});

export interface Settings {
  model: string;
  temperature: number;
  maxTokens: number;
  maxRepairAttempts: number;
}

/**
 * Read oracle settings from the environment. Empty strings count as unset,
 * so a blank line in `.env` falls back to the default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = SettingsSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid settings: ${detail}`);
  }
  return {
    model: parsed.data.RULES_MODEL,
    temperature: parsed.data.ORACLE_TEMPERATURE,
    maxTokens: parsed.data.ORACLE_MAX_TOKENS,
    maxRepairAttempts: parsed.data.REPAIR_MAX_ATTEMPTS,
  };
}
