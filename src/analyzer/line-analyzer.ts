/**
 * Line Analyzer
 *
 * Applies the catalog's rules to the changed lines of one file. Matching is
 * purely textual: string literals and comments are not recognized, so a
 * pattern inside a comment still matches.
 */

import { splitLines } from '../diff/line-diff.js';
import type { RuleCatalog } from '../catalog/catalog.js';
import type { MatchResult, Rule } from '../catalog/types.js';
import type { FileChange } from '../git/type.js';
import type { Language } from '../language/classifier.js';
import type { Finding } from './types.js';

const MAX_SNIPPET_LENGTH = 200;
const MAX_MATCH_LENGTH = 80;
const CONTEXT_RADIUS = 2;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Fill `{{match}}` and `{{language}}` placeholders
 */
export function renderTemplate(template: string, values: { match: string; language: Language }): string {
  return template
    .replace(/\{\{\s*match\s*\}\}/g, () => truncate(values.match, MAX_MATCH_LENGTH))
    .replace(/\{\{\s*language\s*\}\}/g, () => values.language);
}

/**
 * Lines around `index`, numbered and with the centre line marked
 */
export function contextAround(lines: readonly string[], index: number, radius: number = CONTEXT_RADIUS): string[] {
  const start = Math.max(0, index - radius);
  const end = Math.min(lines.length, index + radius + 1);
  const context: string[] = [];
  for (let i = start; i < end; i++) {
    const marker = i === index ? '>>> ' : '    ';
    context.push(`${marker}${String(i + 1).padStart(3)}: ${truncate(lines[i] ?? '', MAX_SNIPPET_LENGTH)}`);
  }
  return context;
}

/**
 * Evaluate one rule at one line. A matcher that throws counts as no match.
 */
export function evaluateRule(
  rule: Rule,
  lines: readonly string[],
  index: number,
  language: Language
): MatchResult | null {
  try {
    const { matcher } = rule;
    if (matcher.kind === 'pattern') {
      const match = matcher.regex.exec(lines[index] ?? '');
      return match === null ? null : { match: match[0].trim() };
    }
    return matcher.test({ lines, index, radius: matcher.radius, language });
  } catch {
    return null;
  }
}

/**
 * Run every applicable rule against every changed line of a file
 *
 * Findings are ordered by line, then by the rule's position in
 * `catalog.rulesFor(change.language)`. Line numbers past the end of the
 * content are ignored.
 */
export function analyzeFile(change: FileChange, contents: string, catalog: RuleCatalog): Finding[] {
  const lines = splitLines(contents);
  const rules = catalog.rulesFor(change.language);
  const findings: Finding[] = [];

  for (const lineNumber of change.changedLines) {
    const index = lineNumber - 1;
    if (index < 0 || index >= lines.length) continue;
    const line = lines[index] ?? '';
    const context = contextAround(lines, index);

    rules.forEach((rule, rank) => {
      const result = evaluateRule(rule, lines, index, change.language);
      if (result === null) return;

      const values = { match: result.match, language: change.language };
      const finding: Finding = {
        rule_id: rule.id,
        rule_rank: rank,
        file_path: change.path,
        line_number: lineNumber,
        severity: rule.severity,
        category: rule.category,
        title: rule.title,
        description: renderTemplate(rule.description, values),
        suggestion: renderTemplate(rule.suggestion, values),
        change_status: change.status,
        code_snippet: truncate(line.trim(), MAX_SNIPPET_LENGTH),
        context_lines: [...context],
      };
      if (rule.owasp !== undefined) finding.owasp_tag = rule.owasp;
      findings.push(Object.freeze(finding));
    });
  }

  return findings;
}
