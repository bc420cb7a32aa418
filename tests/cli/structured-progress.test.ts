import { describe, it, expect } from 'vitest';
import { createStructuredProgressPrinter } from '../../src/cli/structured-progress.js';
import { createAnalysisEventEmitter, type AnalysisEvent } from '../../src/cli/events.js';
import { createProgressPrinterWithMode, nullProgressPrinter, ProgressPrinter } from '../../src/cli/index.js';
import { aggregate } from '../../src/report/aggregator.js';
import { MemoryStream } from '../helpers/memory-stream.js';

describe('AnalysisEventEmitter', () => {
  it('should track state across events', () => {
    const emitter = createAnalysisEventEmitter();
    const types: string[] = [];
    emitter.onEvent((event) => types.push(event.type));

    emitter.analysisStart({ repoPath: '.', source: 'main', target: 'HEAD' });
    emitter.fileAnalyzed('a.ts', 2, 1, 2);
    emitter.fileSkipped('b.ts', 'unreadable');
    emitter.analysisComplete(2);

    const state = emitter.getState();
    expect(types).toEqual(['analysis:start', 'file:analyzed', 'file:skipped', 'analysis:complete']);
    expect(state.status).toBe('completed');
    expect(state.files).toEqual({ total: 2, completed: 1, skipped: 1 });
    expect(state.findings).toBe(2);
  });

  it('should return copies of its state', () => {
    const emitter = createAnalysisEventEmitter();
    const state = emitter.getState();
    state.findings = 99;

    expect(emitter.getState().findings).toBe(0);
  });

  it('should record failures', () => {
    const emitter = createAnalysisEventEmitter();
    emitter.analysisError('boom', 'Loading');

    expect(emitter.getState()).toMatchObject({ status: 'failed', error: 'boom' });
  });
});

describe('StructuredProgressPrinter', () => {
  it('should write one JSON event per line', () => {
    const output = new MemoryStream();
    const printer = createStructuredProgressPrinter({ output });

    printer.initAnalysis('/repo', 'main', 'HEAD');
    printer.phase(1, 2, 'Locating');
    printer.phase(2, 2, 'Analyzing');
    printer.fileAnalyzed('src/a.ts', 1, 1, 1);
    printer.complete(1);

    expect(output.lines().map((e) => e.type)).toEqual([
      'analysis:start',
      'phase:start',
      'phase:complete',
      'phase:start',
      'file:analyzed',
      'phase:complete',
      'analysis:complete',
    ]);
    expect(output.lines()[4].data).toMatchObject({ path: 'src/a.ts', findings: 1, completed: 1, total: 1 });
  });

  it('should filter event types and call the handler', () => {
    const output = new MemoryStream();
    const seen: AnalysisEvent[] = [];
    const printer = createStructuredProgressPrinter({
      output,
      eventTypes: ['report'],
      onEvent: (event) => seen.push(event),
    });

    printer.warn('ignored');
    printer.report(aggregate([], [], { source: 'a', target: 'b' }));

    expect(seen.map((e) => e.type)).toEqual(['report']);
    expect(output.lines()).toHaveLength(1);
    expect(output.lines()[0].data).toMatchObject({ report: { source: 'a', target: 'b', files_analyzed: 0 } });
  });

  it('should only emit progress messages when verbose', () => {
    const quiet = new MemoryStream();
    createStructuredProgressPrinter({ output: quiet }).progress('working');
    const chatty = new MemoryStream();
    createStructuredProgressPrinter({ output: chatty, verbose: true }).progress('working');

    expect(quiet.lines()).toHaveLength(0);
    expect(chatty.lines()[0]).toMatchObject({ type: 'log', data: { level: 'debug', message: 'working' } });
  });
});

describe('createProgressPrinterWithMode', () => {
  it('should pick the printer for each mode', () => {
    expect(createProgressPrinterWithMode({ mode: 'silent' })).toBe(nullProgressPrinter);
    expect(createProgressPrinterWithMode({ mode: 'tty' })).toBeInstanceOf(ProgressPrinter);
    expect(createProgressPrinterWithMode({ mode: 'json', jsonOutput: new MemoryStream() })).not.toBe(
      nullProgressPrinter
    );
  });
});
