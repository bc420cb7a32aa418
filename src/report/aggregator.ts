/**
 * Finding Aggregator
 *
 * Deduplicates, orders and tallies the findings of every analyzed file into
 * a Report. Pure: the same multiset of findings always yields the same
 * Report, whatever order it arrives in.
 */

import type { Category, Severity } from '../catalog/types.js';
import { SEVERITIES, SEVERITY_ORDER } from '../catalog/types.js';
import type { SkippedFile } from '../git/type.js';
import type { Finding, Report } from '../analyzer/types.js';

/**
 * Options for aggregation
 */
export interface AggregationOptions {
  /** Revision labels recorded in the report */
  source?: string;
  target?: string;
  /** Files that could not be read */
  skipped?: readonly SkippedFile[];
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Severity first (critical before info), then file, line and rule
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity] ||
    compareStrings(a.file_path, b.file_path) ||
    a.line_number - b.line_number ||
    a.rule_rank - b.rule_rank ||
    compareStrings(a.rule_id, b.rule_id) ||
    compareLeftovers(a, b)
  );
}

/**
 * Order findings that agree on every key above, so duplicates with differing
 * text still resolve the same way
 */
function compareLeftovers(a: Finding, b: Finding): number {
  return (
    compareStrings(a.change_status, b.change_status) ||
    compareStrings(a.description, b.description) ||
    compareStrings(a.code_snippet, b.code_snippet)
  );
}

function dedupeKey(finding: Finding): string {
  return `${finding.file_path}\0${finding.line_number}\0${finding.rule_id}`;
}

/**
 * Drop findings with the same file, line and rule id, keeping the first in
 * severity-first order
 */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of [...findings].sort(compareFindings)) {
    const key = dedupeKey(finding);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }
  return unique;
}

export function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    info: 0,
  };

  for (const finding of findings) {
    counts[finding.severity]++;
  }

  return counts;
}

export function countByCategory(findings: readonly Finding[]): Record<Category, number> {
  const counts: Record<Category, number> = {
    security: 0,
    performance: 0,
    maintainability: 0,
    style: 0,
    testing: 0,
    documentation: 0,
  };

  for (const finding of findings) {
    counts[finding.category]++;
  }

  return counts;
}

/**
 * Build the report for one run
 *
 * @param findings - Findings of every analyzed file, in any order
 * @param analyzedPaths - Paths of every analyzed file, with or without findings
 */
export function aggregate(
  findings: readonly Finding[],
  analyzedPaths: Iterable<string>,
  options?: AggregationOptions
): Report {
  // Deduplication walks findings in report order, so its output is already sorted
  const ordered = dedupeFindings(findings);
  const skipped = [...(options?.skipped ?? [])].sort((a, b) => compareStrings(a.path, b.path));

  return {
    source: options?.source ?? '',
    target: options?.target ?? '',
    files_analyzed: new Set(analyzedPaths).size,
    files_skipped: skipped.length,
    skipped,
    findings: ordered,
    severity_counts: countBySeverity(ordered),
    category_counts: countByCategory(ordered),
  };
}

/**
 * Group findings by file, preserving their order
 */
export function groupByFile(findings: readonly Finding[]): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();

  for (const finding of findings) {
    const existing = groups.get(finding.file_path) || [];
    existing.push(finding);
    groups.set(finding.file_path, existing);
  }

  return groups;
}

/**
 * Whether any finding is at or above the given severity
 */
export function meetsThreshold(report: Report, threshold: Severity): boolean {
  return SEVERITIES.some(
    (severity) => SEVERITY_ORDER[severity] >= SEVERITY_ORDER[threshold] && report.severity_counts[severity] > 0
  );
}

/**
 * Group findings by severity, preserving their order
 */
export function groupBySeverity(findings: readonly Finding[]): Record<Severity, Finding[]> {
  const groups: Record<Severity, Finding[]> = {
    critical: [],
    high: [],
    medium: [],
    low: [],
    info: [],
  };

  for (const finding of findings) {
    groups[finding.severity].push(finding);
  }

  return groups;
}
