/**
 * Analysis Event System
 *
 * Provides structured events for tracking analysis progress.
 * Designed for both interactive CLI and service integration.
 */

import { EventEmitter } from 'node:events';
import type { Report } from '../analyzer/types.js';

// ============ Event Data Types ============

export interface AnalysisStartData {
  repoPath: string;
  source: string;
  target: string;
  timestamp: string;
}

export interface PhaseData {
  phase: number;
  totalPhases: number;
  name: string;
  timestamp: string;
}

export interface PhaseCompleteData extends PhaseData {
  elapsedMs: number;
}

export interface FileAnalyzedData {
  path: string;
  findings: number;
  completed: number;
  total: number;
  timestamp: string;
}

export interface FileSkippedData {
  path: string;
  reason: string;
  timestamp: string;
}

export interface AnalysisCompleteData {
  totalFindings: number;
  elapsedMs: number;
  timestamp: string;
}

export interface AnalysisErrorData {
  error: string;
  phase?: string;
  timestamp: string;
}

export interface LogData {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface ReportData {
  report: Report;
  timestamp: string;
}

// ============ Event Union Type ============

export type AnalysisEvent =
  | { type: 'analysis:start'; data: AnalysisStartData }
  | { type: 'analysis:complete'; data: AnalysisCompleteData }
  | { type: 'analysis:error'; data: AnalysisErrorData }
  | { type: 'phase:start'; data: PhaseData }
  | { type: 'phase:complete'; data: PhaseCompleteData }
  | { type: 'file:analyzed'; data: FileAnalyzedData }
  | { type: 'file:skipped'; data: FileSkippedData }
  | { type: 'log'; data: LogData }
  | { type: 'report'; data: ReportData };

// ============ State Snapshot ============

export interface AnalysisStateSnapshot {
  status: 'idle' | 'running' | 'completed' | 'failed';
  phase: {
    current: number;
    total: number;
    name: string;
  };
  files: {
    total: number;
    completed: number;
    skipped: number;
    current?: string;
  };
  findings: number;
  timing: {
    startedAt: string;
    elapsedMs: number;
  };
  error?: string;
}

// ============ Event Emitter ============

export type AnalysisEventHandler = (event: AnalysisEvent) => void;

export class AnalysisEventEmitter extends EventEmitter {
  private state: AnalysisStateSnapshot;
  private startTime: number;

  constructor() {
    super();
    this.startTime = Date.now();
    this.state = this.createInitialState();
  }

  private createInitialState(): AnalysisStateSnapshot {
    return {
      status: 'idle',
      phase: { current: 0, total: 0, name: '' },
      files: { total: 0, completed: 0, skipped: 0 },
      findings: 0,
      timing: { startedAt: new Date().toISOString(), elapsedMs: 0 },
    };
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private updateElapsed(): void {
    this.state.timing.elapsedMs = Date.now() - this.startTime;
  }

  /**
   * Get current state snapshot (read-only copy)
   */
  getState(): AnalysisStateSnapshot {
    this.updateElapsed();
    return structuredClone(this.state);
  }

  /**
   * Subscribe to all events
   */
  onEvent(handler: AnalysisEventHandler): void {
    this.on('event', handler);
  }

  private emitEvent(event: AnalysisEvent): void {
    this.updateElapsed();
    this.emit('event', event);
  }

  // ============ Event Emitters ============

  analysisStart(data: Omit<AnalysisStartData, 'timestamp'>): void {
    this.startTime = Date.now();
    this.state = this.createInitialState();
    this.state.status = 'running';
    this.state.timing.startedAt = this.timestamp();

    this.emitEvent({
      type: 'analysis:start',
      data: { ...data, timestamp: this.timestamp() },
    });
  }

  analysisComplete(totalFindings: number): void {
    this.state.status = 'completed';
    this.state.findings = totalFindings;
    this.state.files.current = undefined;
    this.updateElapsed();

    this.emitEvent({
      type: 'analysis:complete',
      data: {
        totalFindings,
        elapsedMs: this.state.timing.elapsedMs,
        timestamp: this.timestamp(),
      },
    });
  }

  analysisError(error: string, phase?: string): void {
    this.state.status = 'failed';
    this.state.error = error;

    this.emitEvent({
      type: 'analysis:error',
      data: { error, phase, timestamp: this.timestamp() },
    });
  }

  phaseStart(phase: number, totalPhases: number, name: string): void {
    this.state.phase = { current: phase, total: totalPhases, name };

    this.emitEvent({
      type: 'phase:start',
      data: { phase, totalPhases, name, timestamp: this.timestamp() },
    });
  }

  phaseComplete(phase: number, totalPhases: number, name: string, elapsedMs: number): void {
    this.emitEvent({
      type: 'phase:complete',
      data: { phase, totalPhases, name, elapsedMs, timestamp: this.timestamp() },
    });
  }

  fileAnalyzed(path: string, findings: number, completed: number, total: number): void {
    this.state.files.total = total;
    this.state.files.completed = completed;
    this.state.files.current = path;
    this.state.findings += findings;

    this.emitEvent({
      type: 'file:analyzed',
      data: { path, findings, completed, total, timestamp: this.timestamp() },
    });
  }

  fileSkipped(path: string, reason: string): void {
    this.state.files.skipped++;

    this.emitEvent({
      type: 'file:skipped',
      data: { path, reason, timestamp: this.timestamp() },
    });
  }

  log(level: LogData['level'], message: string, details?: Record<string, unknown>): void {
    this.emitEvent({
      type: 'log',
      data: { level, message, details, timestamp: this.timestamp() },
    });
  }

  report(report: Report): void {
    this.emitEvent({
      type: 'report',
      data: { report, timestamp: this.timestamp() },
    });
  }
}

/**
 * Create a new event emitter instance
 */
export function createAnalysisEventEmitter(): AnalysisEventEmitter {
  return new AnalysisEventEmitter();
}
