/**
 * Report Emitter
 *
 * Renders a Report as summary, detailed, JSON or Markdown text. Pure
 * formatting: nothing here reorders or filters findings.
 */

import type { Finding, Report } from '../analyzer/types.js';
import type { Category, Severity } from '../catalog/types.js';
import { CATEGORIES, SEVERITIES } from '../catalog/types.js';
import { groupByFile, groupBySeverity } from './aggregator.js';

export const OUTPUT_FORMATS = ['summary', 'detailed', 'json', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type RiskLevel = 'high' | 'medium' | 'low';

const SEVERITY_ICONS: Record<Severity, string> = {
  critical: '🔴',
  high: '🟠',
  medium: '🟡',
  low: '🔵',
  info: '💡',
};

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
  info: 'Info',
};

const CATEGORY_LABELS: Record<Category, string> = {
  security: 'Security',
  performance: 'Performance',
  maintainability: 'Maintainability',
  style: 'Style',
  testing: 'Testing',
  documentation: 'Documentation',
};

/**
 * Determine overall risk level based on severity counts
 */
export function determineRiskLevel(report: Report): RiskLevel {
  const counts = report.severity_counts;
  if (counts.critical > 0 || counts.high > 2) return 'high';
  if (counts.high > 0 || counts.medium > 5) return 'medium';
  return 'low';
}

function riskIcon(level: RiskLevel): string {
  return level === 'high' ? '🔴' : level === 'medium' ? '🟡' : '🟢';
}

function owaspSuffix(finding: Finding): string {
  return finding.owasp_tag ? ` [OWASP ${finding.owasp_tag}]` : '';
}

function filesLine(report: Report): string {
  const skipped = report.files_skipped > 0 ? ` | Skipped: ${report.files_skipped}` : '';
  return `Files analyzed: ${report.files_analyzed}${skipped} | Findings: ${report.findings.length}`;
}

/**
 * Format report as JSON string
 */
export function formatAsJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Format a short summary (for CLI output)
 */
export function formatAsSummary(report: Report): string {
  const lines: string[] = [];
  const risk = determineRiskLevel(report);

  lines.push(`${riskIcon(risk)} Risk Level: ${risk.toUpperCase()}`);
  lines.push('');

  lines.push('Findings:');
  for (const severity of SEVERITIES) {
    lines.push(`  ${(SEVERITY_LABELS[severity] + ':').padEnd(10)}${report.severity_counts[severity]}`);
  }
  lines.push('');

  // Top findings (if any)
  const top = report.findings.slice(0, 5);
  if (top.length > 0) {
    lines.push('Top Findings:');
    for (const finding of top) {
      lines.push(
        `  ${SEVERITY_ICONS[finding.severity]} ${finding.file_path}:${finding.line_number} - ${finding.title}${owaspSuffix(finding)}`
      );
    }
    lines.push('');
  }

  lines.push(filesLine(report));

  return lines.join('\n');
}

/**
 * Format every finding, grouped by file
 */
export function formatAsDetailed(report: Report): string {
  const lines: string[] = [];

  lines.push(`Analysis ${report.source}..${report.target}`);
  lines.push(filesLine(report));
  lines.push('');

  if (report.findings.length === 0) {
    lines.push('No findings.');
  }

  for (const [file, findings] of groupByFile(report.findings)) {
    lines.push(file);
    for (const finding of findings) {
      lines.push(
        `  ${String(finding.line_number).padStart(5)}  ${SEVERITY_LABELS[finding.severity].padEnd(8)} ${finding.category.padEnd(15)} ${finding.title}${owaspSuffix(finding)} (${finding.rule_id})`
      );
      lines.push(`         ${finding.description}`);
      if (finding.context_lines.length > 0) {
        for (const context of finding.context_lines) {
          lines.push(`         ${context}`);
        }
      } else {
        lines.push(`         > ${finding.code_snippet}`);
      }
      lines.push(`         Suggestion: ${finding.suggestion}`);
    }
    lines.push('');
  }

  if (report.skipped.length > 0) {
    lines.push('Skipped files:');
    for (const skipped of report.skipped) {
      lines.push(`  ${skipped.path}: ${skipped.reason}`);
    }
    lines.push('');
  }

  lines.push('By category:');
  for (const category of CATEGORIES) {
    lines.push(`  ${(CATEGORY_LABELS[category] + ':').padEnd(17)}${report.category_counts[category]}`);
  }

  return lines.join('\n');
}

/**
 * Format a single finding as Markdown
 */
function formatFindingMarkdown(finding: Finding): string {
  const lines: string[] = [];

  lines.push(`#### ${finding.title}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Rule** | \`${finding.rule_id}\` |`);
  lines.push(`| **Location** | \`${finding.file_path}:${finding.line_number}\` |`);
  lines.push(`| **Category** | ${CATEGORY_LABELS[finding.category]} |`);
  if (finding.owasp_tag) {
    lines.push(`| **OWASP** | ${finding.owasp_tag} |`);
  }
  lines.push(`| **Change** | ${finding.change_status} |`);
  lines.push('');
  lines.push(finding.description);
  lines.push('');
  lines.push('```');
  if (finding.context_lines.length > 0) {
    lines.push(...finding.context_lines);
  } else {
    lines.push(finding.code_snippet);
  }
  lines.push('```');
  lines.push('');
  lines.push(`**Suggestion:** ${finding.suggestion}`);
  lines.push('');

  return lines.join('\n');
}

/**
 * Format report as Markdown
 */
export function formatAsMarkdown(report: Report): string {
  const lines: string[] = [];
  const risk = determineRiskLevel(report);

  lines.push('# Code Analysis Report');
  lines.push('');
  lines.push('## Summary');
  lines.push('');
  lines.push(`**Range**: \`${report.source}\`..\`${report.target}\``);
  lines.push('');
  lines.push(`**Risk Level**: ${riskIcon(risk)} ${risk.toUpperCase()}`);
  lines.push('');
  lines.push(`| Severity | Count |`);
  lines.push(`|----------|-------|`);
  for (const severity of SEVERITIES) {
    lines.push(`| ${SEVERITY_ICONS[severity]} ${SEVERITY_LABELS[severity]} | ${report.severity_counts[severity]} |`);
  }
  lines.push('');

  lines.push('## Findings');
  lines.push('');
  if (report.findings.length === 0) {
    lines.push('No findings.');
    lines.push('');
  } else {
    const bySeverity = groupBySeverity(report.findings);
    for (const severity of SEVERITIES) {
      const group = bySeverity[severity];
      if (group.length === 0) continue;
      lines.push(`### ${SEVERITY_ICONS[severity]} ${SEVERITY_LABELS[severity]}`);
      lines.push('');
      for (const finding of group) {
        lines.push(formatFindingMarkdown(finding));
      }
    }
  }

  lines.push('## Metrics');
  lines.push('');
  lines.push(`| Metric | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Files Analyzed | ${report.files_analyzed} |`);
  lines.push(`| Files Skipped | ${report.files_skipped} |`);
  for (const category of CATEGORIES) {
    lines.push(`| ${CATEGORY_LABELS[category]} | ${report.category_counts[category]} |`);
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Format report in the requested output format
 */
export function formatReport(report: Report, format: OutputFormat = 'summary'): string {
  switch (format) {
    case 'json':
      return formatAsJson(report);
    case 'markdown':
      return formatAsMarkdown(report);
    case 'detailed':
      return formatAsDetailed(report);
    case 'summary':
      return formatAsSummary(report);
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
