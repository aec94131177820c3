// TreeRules — Indentation dialect parser
//
// Parses the pipe/dash text export of a greedy or optimal tree:
//
//   |--- feature_8 <= 462.55
//   |   |--- weights: [0.00, 6.00] class: 1.0
//   |--- feature_8 >  462.55
//   |   |--- weights: [11.00, 0.00] class: 0.0
//
// into one rule per leaf, in document (pre-order) order.

import type { Condition, Diagnostic, Rule, TreeParseResult } from "../config";
import { isOperator } from "../condition";
import type { TreeParser } from "./index";

export interface SplitLine {
  kind: "split";
  condition: Condition;
  depth: number;
}

export interface LeafLine {
  kind: "leaf";
  weight0: number;
  weight1: number;
  classValue: number;
  depth: number;
}

export type IndentationLine = SplitLine | LeafLine;

const INDENT_UNIT = "|   ";

const SPLIT_PATTERN =
  /^\s*\|[|\s-]+\s+(feature_\d+)\s*(<=|>=|<|>)\s*([0-9.]+)\s*$/;

const LEAF_PATTERN =
  /^\s*\|[|\s-]+\s+weights:\s*\[([0-9.]+),\s*([0-9.]+)\]\s+class:\s*([0-9.]+)\s*$/;

/** Depth of a line: how many times the indentation unit occurs in it. */
export function lineDepth(line: string): number {
  return line.split(INDENT_UNIT).length - 1;
}

/** Classify one line of the dump, or null for anything else. */
export function tokenizeLine(line: string): IndentationLine | null {
  const split = line.match(SPLIT_PATTERN);
  if (split) {
    const [, feature, operator, literal] = split;
    if (!isOperator(operator)) return null;
    return {
      kind: "split",
      condition: { feature, operator, threshold: Number(literal), literal },
      depth: lineDepth(line),
    };
  }

  const leaf = line.match(LEAF_PATTERN);
  if (leaf) {
    return {
      kind: "leaf",
      weight0: parseFloat(leaf[1]),
      weight1: parseFloat(leaf[2]),
      classValue: parseFloat(leaf[3]),
      depth: lineDepth(line),
    };
  }

  return null;
}

/**
 * Walk the dump keeping the path of open conditions on a stack. Before a
 * split or leaf at depth d is processed the stack is cut back to d entries,
 * so the stack always equals the path from the root to the current node.
 */
export function parseIndentationTree(text: string): TreeParseResult {
  const rules: Rule[] = [];
  const diagnostics: Diagnostic[] = [];
  const path: Condition[] = [];

  const lines = text.trim().split(/\r?\n/);
  lines.forEach((line, index) => {
    if (!line.trim()) return;

    const token = tokenizeLine(line);
    if (!token) {
      diagnostics.push({
        source: "indentation",
        message: "line is neither a split nor a leaf",
        line: index + 1,
        text: line,
      });
      return;
    }

    if (token.depth > path.length) {
      diagnostics.push({
        source: "indentation",
        message: `${token.kind} at depth ${token.depth} has only ${path.length} open condition(s)`,
        line: index + 1,
        text: line,
      });
    }
    path.length = Math.min(path.length, token.depth);

    if (token.kind === "split") {
      path.push(token.condition);
      return;
    }

    rules.push({
      conditions: [...path],
      label: token.classValue === 0 ? "INLIER" : "OUTLIER",
    });
  });

  return { rules, diagnostics };
}

export class IndentationTreeParser implements TreeParser {
  readonly name = "indentation";
  readonly dialect = "indentation" as const;

  parse(text: string): TreeParseResult {
    return parseIndentationTree(text);
  }
}
