// TreeRules — Prompt template builder
//
// Builds the prompts sent to the rule-revision oracle: turning expert text
// into rules, merging rule sets, and asking for fixes when the oracle's
// rules fail validation.

// --- Rule grammar reference (included verbatim in every prompt) -------------

const RULE_FORMAT = `\
RULE FORMAT
Every rule is one line:
  IF <condition> AND <condition> ... THEN <state>

Where:
  <condition>  -- a parameter name, a comparison operator and a number,
                  optionally followed by a unit
  <operator>   -- one of  >  >=  <  <=  ==
  <state>      -- OUTLIER or INLIER

Keywords IF, AND, THEN, OUTLIER and INLIER are always uppercase.
Conditions are only ever joined with AND.`;

const NO_OR_EXAMPLE = `\
###EXAMPLE:
Incorrect: ["IF Total no. compaction cycles > 100 AND (Total no. compaction cycles with p>100 bar < 10 OR Total fuel consumed [dm3] > 40) THEN OUTLIER"]
Correct: [  "IF Total no. compaction cycles > 100 AND Total no. compaction cycles with p>100 bar < 10 THEN OUTLIER",
            "IF Total no. compaction cycles > 100 AND Total fuel consumed [dm3] > 40 THEN OUTLIER" ]
###END OF EXAMPLE`;

const OUTPUT_FORMAT = `\
OUTPUT FORMAT
Answer with a single JSON list of strings inside a \`\`\`json code block,
one rule per string. No commentary outside the code block.`;

/**
 * Static system prompt — identical for every call.
 * Separated out so adapters can cache it.
 */
export const SYSTEM_PROMPT = `\
You are a quality assurance engineer who turns expert knowledge and
decision-tree output into rule sets without contradictions. You never
drop a rule that is not contradictory, and you never change a rule you
were asked to keep.

${RULE_FORMAT}

${OUTPUT_FORMAT}`;

// --- Prompt builders ---------------------------------------------------------

/**
 * Ask the oracle to read rules out of an expert's free text. Parameter names
 * must be taken from the dataset's columns.
 */
export function buildExpertRulesPrompt(expertText: string, columns: readonly string[]): string {
  return `\
-------------------------------------
EXPERT TEXT TO BE ANALYSED
"${expertText}"
-------------------------------------

DATASET COLUMNS
${JSON.stringify(columns)}

Identify every rule in the expert text about unusual parameter values.
Name parameters exactly as they appear in the dataset columns, and name
states OUTLIER or INLIER. If a sentence combines alternatives with "or",
write one rule per alternative.

${NO_OR_EXAMPLE}

Do not include the example in your output, only rules found in the text.`;
}

/**
 * The merge task. Kept as a standalone string because the repair loop
 * restates it verbatim in every fix request.
 */
export function buildMergePrompt(ruleSets: readonly (readonly string[])[]): string {
  return `\
Given two provided sets of rules, merge the sets into one set of rules following this thought process:
1. Ensure the combined set of rules are consistent and comprehensive.
2. Ensure there are no inconsistencies in the combined set of rules.
3. Ensure there are no contradictions in the combined set of rules.
4. Ensure there is no skipped information in the combined set of rules, meaning under no circumstances
any rule should be skipped or not included in the final output, given particular rule is not contradictory/inconsistent.
5. Only rules describing given example being "OUTLIER" are to be saved. Rules for "INLIER" should be removed from the combined set.

Note that:
- Your task is to not modify particular rules under any circumstances
- You must not use "OR" under any circumstances, split the rules into separate ones in such case - follow example:

${NO_OR_EXAMPLE}

Rule sets to combine: ${JSON.stringify(ruleSets)}`;
}

/**
 * Follow-up request after a failed validation: every error verbatim, the
 * original task, the current rules, and the hard constraints.
 */
export function buildFixPrompt(
  errors: readonly string[],
  taskDescription: string,
  currentRules: readonly string[]
): string {
  return `\
Fix the following validation issues in the rules:
${errors.join("\n")}

Original task: ${taskDescription}

Current rules output:
${JSON.stringify(currentRules, null, 2)}

Please provide a corrected set of rules that address all the validation issues.
Remember that ALL rules must:
1. Follow the pattern 'IF ... THEN OUTLIER'
2. Not contain 'OR' (split into separate rules)
3. Not contain 'INLIER'
4. Include all non-contradictory rules from both input sets
5. Have no inconsistencies or contradictions`;
}
