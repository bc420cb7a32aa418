/**
 * Structured Progress Printer
 *
 * Outputs JSON Lines (NDJSON) for service integration.
 * Each line is a valid JSON object representing an analysis event.
 */

import type { Report } from '../analyzer/types.js';
import type { IProgressPrinter } from './progress.js';
import {
  AnalysisEventEmitter,
  type AnalysisEvent,
  type AnalysisStateSnapshot,
  createAnalysisEventEmitter,
} from './events.js';

export interface StructuredProgressOptions {
  /**
   * Output stream to write JSON lines to (default: process.stderr)
   * Using stderr keeps stdout clean for the final report
   */
  output?: NodeJS.WritableStream;

  /**
   * Include debug-level events (default: false)
   */
  verbose?: boolean;

  /**
   * Event filter - only emit events of these types (default: all)
   */
  eventTypes?: AnalysisEvent['type'][];

  /**
   * Custom event handler (in addition to JSON output)
   */
  onEvent?: (event: AnalysisEvent) => void;

  /**
   * Disable JSON output, only use event handlers (default: false)
   */
  silent?: boolean;
}

/**
 * Implements IProgressPrinter but writes structured JSON lines
 */
export class StructuredProgressPrinter implements IProgressPrinter {
  private output: NodeJS.WritableStream;
  private verbose: boolean;
  private eventTypes?: Set<AnalysisEvent['type']>;
  private onEventHandler?: (event: AnalysisEvent) => void;
  private silent: boolean;

  private emitter: AnalysisEventEmitter;
  private phaseStartTime: number;
  private stepStartTime: number;

  private currentPhase = { step: 0, total: 0, name: '' };

  constructor(options: StructuredProgressOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.verbose = options.verbose ?? false;
    this.eventTypes = options.eventTypes ? new Set(options.eventTypes) : undefined;
    this.onEventHandler = options.onEvent;
    this.silent = options.silent ?? false;

    this.phaseStartTime = Date.now();
    this.stepStartTime = Date.now();

    this.emitter = createAnalysisEventEmitter();

    this.emitter.onEvent((event) => {
      if (this.eventTypes && !this.eventTypes.has(event.type)) {
        return;
      }

      if (this.onEventHandler) {
        this.onEventHandler(event);
      }

      if (!this.silent) {
        this.writeJson(event);
      }
    });
  }

  /**
   * Get current state snapshot
   */
  getState(): AnalysisStateSnapshot {
    return this.emitter.getState();
  }

  private writeJson(event: AnalysisEvent): void {
    // Writing after the stream ended raises ERR_STREAM_WRITE_AFTER_END
    if (!this.output.writable) {
      return;
    }
    this.output.write(JSON.stringify(event) + '\n');
  }

  // ============ IProgressPrinter Implementation ============

  phase(step: number, total: number, message: string): void {
    // Complete previous phase if any
    if (this.currentPhase.step > 0 && this.currentPhase.step < step) {
      this.emitter.phaseComplete(
        this.currentPhase.step,
        this.currentPhase.total,
        this.currentPhase.name,
        Date.now() - this.phaseStartTime
      );
    }

    this.phaseStartTime = Date.now();
    this.stepStartTime = Date.now();
    this.currentPhase = { step, total, name: message };

    this.emitter.phaseStart(step, total, message);
  }

  success(message: string): void {
    this.emitter.log('info', message, { elapsedMs: Date.now() - this.stepStartTime, type: 'success' });
    this.stepStartTime = Date.now();
  }

  warn(message: string): void {
    this.emitter.log('warn', message);
  }

  progress(message: string): void {
    // No spinner in structured mode; progress is debug noise
    if (this.verbose) {
      this.emitter.log('debug', message, { type: 'progress' });
    }
  }

  fileAnalyzed(path: string, findings: number, completed: number, total: number): void {
    this.emitter.fileAnalyzed(path, findings, completed, total);
  }

  fileSkipped(path: string, reason: string): void {
    this.emitter.fileSkipped(path, reason);
  }

  complete(findings: number): void {
    if (this.currentPhase.step > 0) {
      this.emitter.phaseComplete(
        this.currentPhase.step,
        this.currentPhase.total,
        this.currentPhase.name,
        Date.now() - this.phaseStartTime
      );
    }

    this.emitter.analysisComplete(findings);
  }

  failed(message: string): void {
    this.emitter.analysisError(message, this.currentPhase.name || undefined);
  }

  stats(items: Array<{ label: string; value: string | number }>): void {
    const data: Record<string, string | number> = {};
    for (const item of items) {
      data[item.label] = item.value;
    }
    this.emitter.log('info', 'stats', data);
  }

  /**
   * Output the final report as an event
   */
  report(report: Report): void {
    this.emitter.report(report);
  }

  /**
   * Initialize the run with full context (call at the start)
   */
  initAnalysis(repoPath: string, source: string, target: string): void {
    this.emitter.analysisStart({ repoPath, source, target });
  }
}

/**
 * Create a structured progress printer
 */
export function createStructuredProgressPrinter(
  options?: StructuredProgressOptions
): StructuredProgressPrinter {
  return new StructuredProgressPrinter(options);
}
