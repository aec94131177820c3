// TreeRules — Recursive dialect parser
//
// Parses the tab-indented dump of a FIGS model:
//
//   speed <= 120.500 (Tree #0 root)
//   	Val: 0.000 (leaf)
//   	load >= 30.000 (split)
//   		Val: 1.000 (leaf)
//   		Val: 0.000 (leaf)
//
// The dump only writes each split's condition once. The first child is the
// branch where the condition does NOT hold, so its path gets the inverted
// comparison; the second child gets the condition as written.
//
// Parsing happens in two passes: lines are tokenized, then an arena of
// indexed nodes is built over contiguous token ranges.

import type { Condition, Diagnostic, Rule, RuleLabel, TreeParseResult } from "../config";
import { RECURSIVE_HEADER_LINES } from "../config";
import { invertCondition, parsePlainCondition } from "../condition";
import type { TreeParser } from "./index";

export type NodeKind = "root" | "split" | "leaf";

export interface TreeToken {
  kind: NodeKind;
  depth: number; // leading tabs
  text: string; // marker stripped for root/split, verbatim for leaves
  line: number; // 1-based line in the full dump
}

export interface ArenaNode {
  kind: NodeKind;
  text: string;
  condition: Condition | null;
  left: number | null;
  right: number | null;
  line: number;
}

export interface TreeArena {
  nodes: ArenaNode[];
  root: number | null;
}

const ROOT_MARKER = "(Tree #0 root)";
const SPLIT_MARKER = "(split)";

const LEAF_LABELS = new Map<string, RuleLabel>([
  ["Val: 1.000 (leaf)", "OUTLIER"],
  ["Val: 0.000 (leaf)", "INLIER"],
]);

/** Drop the model header printed above the tree. */
export function stripHeader(text: string, headerLines = RECURSIVE_HEADER_LINES): string[] {
  return text.split(/\r?\n/).slice(headerLines);
}

export function tokenize(lines: string[], lineOffset = 0): TreeToken[] {
  const tokens: TreeToken[] = [];
  lines.forEach((raw, index) => {
    if (!raw.trim()) return;

    let depth = 0;
    while (raw[depth] === "\t") depth++;
    const content = raw.slice(depth);
    const trimmed = content.trim();

    let kind: NodeKind = "leaf";
    let text = content;
    if (trimmed.endsWith(ROOT_MARKER)) {
      kind = "root";
      text = content.replace(ROOT_MARKER, "").trimEnd();
    } else if (trimmed.endsWith(SPLIT_MARKER)) {
      kind = "split";
      text = content.replace(SPLIT_MARKER, "").trimEnd();
    }

    tokens.push({ kind, depth, text, line: lineOffset + index + 1 });
  });
  return tokens;
}

/**
 * Build the arena. A node owns the tokens after it in its range; among
 * those, the ones sitting at the node's child level (or shallower) start
 * sibling subtrees. With two or more such boundaries the range splits at
 * the second one into left and right; with fewer the whole range is a
 * single left child.
 */
export function buildArena(tokens: TreeToken[], diagnostics: Diagnostic[] = []): TreeArena {
  const nodes: ArenaNode[] = [];

  function build(start: number, end: number, level: number): number {
    const token = tokens[start];
    const id = nodes.length;
    const node: ArenaNode = {
      kind: token.kind,
      text: token.text,
      condition: null,
      left: null,
      right: null,
      line: token.line,
    };
    nodes.push(node);

    if (token.kind === "leaf") return id;

    node.condition = parsePlainCondition(token.text);
    if (!node.condition) {
      diagnostics.push({
        source: "recursive",
        message: `${token.kind} text is not a single comparison`,
        line: token.line,
        text: token.text,
      });
    }

    const childStart = start + 1;
    if (childStart >= end) {
      diagnostics.push({
        source: "recursive",
        message: `${token.kind} has no children`,
        line: token.line,
        text: token.text,
      });
      return id;
    }

    const childLevel = level + 1;
    const boundaries: number[] = [];
    for (let i = childStart; i < end; i++) {
      if (tokens[i].depth <= childLevel) boundaries.push(i);
    }

    if (boundaries.length > 1) {
      const rightStart = boundaries[1];
      node.left = build(childStart, rightStart, childLevel);
      node.right = build(rightStart, end, childLevel);
    } else {
      node.left = build(childStart, end, childLevel);
    }
    return id;
  }

  const root = tokens.length > 0 ? build(0, tokens.length, tokens[0].depth) : null;
  return { nodes, root };
}

/**
 * Depth-first rule extraction. Leaves whose text is not exactly one of the
 * two class values produce no rule.
 */
export function extractArenaRules(arena: TreeArena, diagnostics: Diagnostic[] = []): Rule[] {
  const rules: Rule[] = [];
  if (arena.root === null) return rules;

  function visit(id: number | null, path: Condition[], parent: ArenaNode | null): void {
    if (id === null) {
      diagnostics.push({
        source: "recursive",
        message: "split is missing a branch",
        line: parent?.line,
        text: parent?.text,
      });
      return;
    }

    const node = arena.nodes[id];
    if (node.kind === "leaf") {
      const label = LEAF_LABELS.get(node.text);
      if (label) {
        rules.push({ conditions: path, label });
      } else {
        diagnostics.push({
          source: "recursive",
          message: "leaf value is not a class label",
          line: node.line,
          text: node.text,
        });
      }
      return;
    }

    // Already reported while building the arena.
    if (!node.condition || (node.left === null && node.right === null)) return;
    visit(node.left, [...path, invertCondition(node.condition)], node);
    visit(node.right, [...path, node.condition], node);
  }

  visit(arena.root, [], null);
  return rules;
}

export function parseRecursiveTree(text: string): TreeParseResult {
  const diagnostics: Diagnostic[] = [];
  const tokens = tokenize(stripHeader(text), RECURSIVE_HEADER_LINES);
  const arena = buildArena(tokens, diagnostics);
  const rules = extractArenaRules(arena, diagnostics);
  return { rules, diagnostics };
}

export class RecursiveTreeParser implements TreeParser {
  readonly name = "recursive";
  readonly dialect = "recursive" as const;

  parse(text: string): TreeParseResult {
    return parseRecursiveTree(text);
  }
}
