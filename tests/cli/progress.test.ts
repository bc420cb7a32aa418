import { describe, it, expect } from 'vitest';
import { ProgressPrinter, createProgressPrinter } from '../../src/cli/progress.js';
import { MemoryStream } from '../helpers/memory-stream.js';

describe('ProgressPrinter', () => {
  it('should print plain lines when the stream is not a terminal', () => {
    const output = new MemoryStream();
    const printer = new ProgressPrinter({ output });

    printer.phase(3, 3, 'Analyzing changed lines');
    printer.fileAnalyzed('src/a.ts', 2, 1, 4);
    printer.fileAnalyzed('b.py', 0, 4, 4);
    printer.fileSkipped('c.rs', 'Permission denied: c.rs');
    printer.stats([
      { label: 'Files', value: 4 },
      { label: 'Findings', value: 2 },
    ]);
    printer.complete(2, 1500);

    expect(output.text().split('\n')).toEqual([
      '',
      '[3/3] Analyzing changed lines',
      '      ⏳ [1/4] src/a.ts 2 findings (25%)',
      '      ⏳ [4/4] b.py clean (100%)',
      '      ⚠ Skipped c.rs: Permission denied: c.rs',
      '      Files: 4  Findings: 2',
      '',
      '✅ Analysis complete: 2 findings in 1.5s',
      '',
      '',
    ]);
  });

  it('should report 100% for an empty run', () => {
    const output = new MemoryStream();
    createProgressPrinter({ output }).fileAnalyzed('a.ts', 0, 0, 0);

    expect(output.text()).toBe('      ⏳ [0/0] a.ts clean (100%)\n');
  });

  it('should draw a spinner and clear it before the next line', () => {
    const output = new MemoryStream();
    const printer = new ProgressPrinter({ output, spinner: true });

    printer.progress('working');
    printer.success('done');

    expect(output.chunks[0]).toBe('\r      ⠋ working');
    expect(output.chunks[1]).toBe('\r' + ' '.repeat('working'.length + 10) + '\r');
    expect(output.chunks[2]).toMatch(/^      ✓ done \(\d+ms\)\n$/);
  });

  it('should wrap text in ANSI colors when enabled', () => {
    const output = new MemoryStream();
    new ProgressPrinter({ output, colors: true }).failed('boom');

    expect(output.text()).toContain('\x1b[31m❌ Analysis failed: boom\x1b[0m');
  });
});
