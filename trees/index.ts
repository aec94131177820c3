import type { RulesAlgorithm, TreeDialect, TreeParseResult } from "../config";
import { renameFeatures } from "../rules";
import { IndentationTreeParser } from "./indentation";
import { RecursiveTreeParser } from "./recursive";

export interface TreeParser {
  name: string;
  dialect: TreeDialect;
  parse(text: string): TreeParseResult;
}

// Each rules algorithm prints its trees in exactly one dialect. The caller
// names the algorithm; the dump's content is never sniffed.
const PARSERS: Record<RulesAlgorithm, () => TreeParser> = {
  FIGS: () => new RecursiveTreeParser(),
  OptimalTree: () => new IndentationTreeParser(),
  GreedyTree: () => new IndentationTreeParser(),
};

export function getTreeParser(algorithm: RulesAlgorithm): TreeParser {
  return PARSERS[algorithm]();
}

/**
 * Parse a tree dump into rules. Indentation dumps name features by index
 * (`feature_3`), so their rules are renamed to the dataset's columns.
 */
export function extractTreeRules(
  algorithm: RulesAlgorithm,
  text: string,
  columns: readonly string[] = []
): TreeParseResult {
  const parser = getTreeParser(algorithm);
  const result = parser.parse(text);

  if (result.rules.length === 0 && text.trim()) {
    console.warn(
      `[trees] ${algorithm} dump produced no rules (${parser.dialect} dialect, ${result.diagnostics.length} diagnostic(s))`
    );
  }

  if (parser.dialect === "indentation" && columns.length > 0) {
    return {
      rules: result.rules.map((rule) => renameFeatures(rule, columns)),
      diagnostics: result.diagnostics,
    };
  }
  return result;
}

export { IndentationTreeParser, RecursiveTreeParser };
