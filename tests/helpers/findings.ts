import type { Finding } from '../../src/analyzer/types.js';
import type { FileChange } from '../../src/git/type.js';
import { classifyLanguage } from '../../src/language/classifier.js';

/**
 * A committed change touching the given lines
 */
export function change(path: string, changedLines: number[]): FileChange {
  return {
    path,
    status: 'committed',
    changedLines,
    language: classifyLanguage(path),
    revision: { kind: 'commit', sha: 'c2' },
  };
}

export function createMockFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    rule_id: 'test-rule',
    rule_rank: 0,
    file_path: 'src/app.ts',
    line_number: 1,
    severity: 'medium',
    category: 'maintainability',
    title: 'Test finding',
    description: 'Test description',
    suggestion: 'Test suggestion',
    change_status: 'committed',
    code_snippet: 'const x = 1;',
    context_lines: [],
    ...overrides,
  };
}
