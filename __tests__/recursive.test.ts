import * as fs from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { invertOperator } from "../condition";
import type { Rule } from "../config";
import { formatRules } from "../rules";
import {
  buildArena,
  extractArenaRules,
  parseRecursiveTree,
  RecursiveTreeParser,
  stripHeader,
  tokenize,
} from "../trees/recursive";

const FIGS_TREE = fs.readFileSync(path.join(__dirname, "fixtures", "figs-tree.txt"), "utf-8");

const HEADER = ["> ----", "> model", ">", ">", "> ----"].join("\n");

function dump(...lines: string[]): string {
  return [HEADER, ...lines].join("\n");
}

describe("tokenize", () => {
  it("strips markers and counts tabs", () => {
    const tokens = tokenize(stripHeader(FIGS_TREE), 5);
    expect(tokens).toEqual([
      { kind: "root", depth: 0, text: "speed <= 120.500", line: 6 },
      { kind: "leaf", depth: 1, text: "Val: 0.000 (leaf)", line: 7 },
      { kind: "split", depth: 1, text: "load >= 30.000", line: 8 },
      { kind: "leaf", depth: 2, text: "Val: 1.000 (leaf)", line: 9 },
      { kind: "leaf", depth: 2, text: "Val: 0.000 (leaf)", line: 10 },
      { kind: "leaf", depth: 1, text: "+", line: 11 },
    ]);
  });
});

describe("buildArena", () => {
  it("splits children at the second boundary", () => {
    const arena = buildArena(tokenize(stripHeader(FIGS_TREE)));
    expect(arena.root).toBe(0);
    const root = arena.nodes[0];
    expect(root.left).toBe(1);
    expect(root.right).toBe(2);
    expect(arena.nodes[2]).toMatchObject({ kind: "split", left: 3, right: 4 });
  });

  it("gives a node with one child only a left branch", () => {
    const arena = buildArena(tokenize(["speed <= 120.500 (Tree #0 root)", "\tVal: 1.000 (leaf)"]));
    expect(arena.nodes[0]).toMatchObject({ left: 1, right: null });
  });

  it("has no root without tokens", () => {
    expect(buildArena([])).toEqual({ nodes: [], root: null });
  });
});

describe("parseRecursiveTree", () => {
  it("ignores the separator line closing a tree", () => {
    const withSeparator = parseRecursiveTree(FIGS_TREE);
    const withoutSeparator = parseRecursiveTree(FIGS_TREE.replace(/\t\+\n$/, ""));
    expect(FIGS_TREE.endsWith("\t+\n")).toBe(true);
    expect(withSeparator).toEqual(withoutSeparator);
  });

  it("sends the inverted condition down the first branch", () => {
    const { rules, diagnostics } = parseRecursiveTree(FIGS_TREE);
    expect(diagnostics).toEqual([]);
    expect(formatRules(rules)).toEqual([
      "IF speed > 120.500 THEN INLIER",
      "IF speed <= 120.500 AND load < 30.000 THEN OUTLIER",
      "IF speed <= 120.500 AND load >= 30.000 THEN INLIER",
    ]);
  });

  it("keeps feature and threshold identical across sibling branches", () => {
    const { rules } = parseRecursiveTree(
      dump(
        "Distance [km] > 135.750 (Tree #0 root)",
        "\tFuel [l] <= 12.000 (split)",
        "\t\tVal: 1.000 (leaf)",
        "\t\tVal: 0.000 (leaf)",
        "\tVal: 1.000 (leaf)"
      )
    );
    const byPath = (rule: Rule) => rule.conditions;
    const [first, second, third] = rules.map(byPath);

    // Inside the first root branch, both leaves share the inverted root condition.
    expect(first[0]).toEqual(second[0]);
    expect(first[0].operator).toBe(invertOperator(third[0].operator));
    expect(first[0].feature).toBe(third[0].feature);
    expect(first[0].literal).toBe(third[0].literal);

    expect(first[1].operator).toBe(">");
    expect(second[1].operator).toBe("<=");
    expect(formatRules(rules)).toEqual([
      "IF Distance [km] <= 135.750 AND Fuel [l] > 12.000 THEN OUTLIER",
      "IF Distance [km] <= 135.750 AND Fuel [l] <= 12.000 THEN INLIER",
      "IF Distance [km] > 135.750 THEN OUTLIER",
    ]);
  });

  it("drops leaves that are not class labels", () => {
    const { rules, diagnostics } = parseRecursiveTree(
      dump("speed <= 120.500 (Tree #0 root)", "\tVal: 0.412 (leaf)", "\tVal: 1.000 (leaf)")
    );
    expect(formatRules(rules)).toEqual(["IF speed <= 120.500 THEN OUTLIER"]);
    expect(diagnostics).toEqual([
      { source: "recursive", message: "leaf value is not a class label", line: 7, text: "Val: 0.412 (leaf)" },
    ]);
  });

  it("reports a split with a single child and keeps its one branch", () => {
    const { rules, diagnostics } = parseRecursiveTree(
      dump("speed <= 120.500 (Tree #0 root)", "\tVal: 1.000 (leaf)")
    );
    expect(formatRules(rules)).toEqual(["IF speed > 120.500 THEN OUTLIER"]);
    expect(diagnostics).toEqual([
      { source: "recursive", message: "split is missing a branch", line: 6, text: "speed <= 120.500" },
    ]);
  });

  it("renders a tree that is a single leaf with no conditions", () => {
    const { rules } = parseRecursiveTree(dump("Val: 1.000 (leaf)"));
    expect(formatRules(rules)).toEqual(["IF <no conditions> THEN OUTLIER"]);
  });

  it("skips blank lines", () => {
    const { rules } = parseRecursiveTree(
      dump("speed <= 120.500 (Tree #0 root)", "", "\tVal: 0.000 (leaf)", "\tVal: 1.000 (leaf)", "")
    );
    expect(formatRules(rules)).toEqual(["IF speed > 120.500 THEN INLIER", "IF speed <= 120.500 THEN OUTLIER"]);
  });

  it("returns no rules for indentation-dialect text", () => {
    const { rules } = parseRecursiveTree(dump("|--- feature_8 <= 462.55", "|   |--- weights: [0.00, 6.00] class: 1.0"));
    expect(rules).toEqual([]);
  });

  it("is exposed through the parser interface", () => {
    const parser = new RecursiveTreeParser();
    expect(parser.dialect).toBe("recursive");
    expect(extractArenaRules(buildArena([]))).toEqual([]);
    expect(parser.parse(FIGS_TREE).rules).toHaveLength(3);
  });
});
