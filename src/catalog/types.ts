/**
 * Rule Catalog types
 */

import type { Language, SupportedLanguage } from '../language/classifier.js';

export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const CATEGORIES = [
  'security',
  'performance',
  'maintainability',
  'style',
  'testing',
  'documentation',
] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * Severity rank, higher is more severe
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  info: 0,
};

/**
 * Lines a windowed heuristic may look at around the changed line
 */
export interface LineWindow {
  /** All lines of the file, 0-based */
  lines: readonly string[];
  /** 0-based index of the line under test */
  index: number;
  /** How far before and after `index` the heuristic may look */
  radius: number;
  language: Language;
}

/**
 * Result of a positive match. `match` fills the `{{match}}` placeholder.
 */
export interface MatchResult {
  match: string;
}

export type Matcher =
  | { kind: 'pattern'; regex: RegExp }
  | { kind: 'window'; heuristic: string; radius: number; test: (window: LineWindow) => MatchResult | null };

/**
 * A detection rule. Immutable once the catalog is built.
 */
export interface Rule {
  id: string;
  /** Languages the rule applies to, or 'generic' for every file */
  languages: readonly SupportedLanguage[] | 'generic';
  category: Category;
  severity: Severity;
  /** OWASP Top-10 (2021) category, e.g. "A03" */
  owasp?: string;
  title: string;
  /** May contain {{match}} and {{language}} */
  description: string;
  suggestion: string;
  matcher: Matcher;
  /** File the rule was loaded from */
  source: string;
}

/**
 * Thrown while building the catalog. Fatal at startup.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code: 'DUPLICATE_ID' | 'INVALID_PATTERN' | 'UNKNOWN_HEURISTIC' | 'INVALID_RULE' | 'READ_FAILED',
    public readonly source?: string
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}
