/**
 * Analyzer Types
 * Findings produced by rule matching and the report built from them
 */

import type { Category, Severity } from '../catalog/types.js';
import type { ChangeStatus, SkippedFile } from '../git/type.js';

/**
 * One rule match on one changed line. Never mutated after creation.
 */
export interface Finding {
  /** Id of the rule that matched */
  rule_id: string;
  /** Index of the rule in the catalog's list for the file's language */
  rule_rank: number;
  file_path: string;
  /** 1-based line in the target version of the file */
  line_number: number;
  severity: Severity;
  category: Category;
  /** OWASP Top-10 category, for security rules */
  owasp_tag?: string;
  title: string;
  description: string;
  suggestion: string;
  change_status: ChangeStatus;
  /** The matched line, trimmed */
  code_snippet: string;
  /**
   * Up to two lines either side of the match, each as `NNN: text` with the
   * matched line marked `>>> `
   */
  context_lines: string[];
}

/**
 * Aggregated result of one analysis run
 */
export interface Report {
  /** Source revision the changes were measured against */
  source: string;
  /** Target revision */
  target: string;
  /** Distinct files analyzed, including those without findings */
  files_analyzed: number;
  /** Files dropped because they could not be read */
  files_skipped: number;
  skipped: SkippedFile[];
  /** Ordered by severity, then file, line and rule */
  findings: Finding[];
  severity_counts: Record<Severity, number>;
  category_counts: Record<Category, number>;
}

/**
 * Thrown when an analysis is aborted. No report is produced.
 */
export class AnalysisCancelledError extends Error {
  constructor(
    public readonly completedFiles: number,
    public readonly totalFiles: number
  ) {
    super(`Analysis cancelled after ${completedFiles}/${totalFiles} files`);
    this.name = 'AnalysisCancelledError';
  }
}
