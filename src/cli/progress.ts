/**
 * CLI Progress Printer
 *
 * Real-time progress output for an analysis run. Writes to stderr so stdout
 * carries only the report.
 */

import type { Report } from '../analyzer/types.js';
import { formatDuration } from '../utils/index.js';

/**
 * Progress printer options
 */
export interface ProgressPrinterOptions {
  /** Stream to write to (default: process.stderr) */
  output?: NodeJS.WritableStream;
  /** Enable colored output (default: true if TTY) */
  colors?: boolean;
  /** Enable spinner animation (default: true if TTY) */
  spinner?: boolean;
}

/**
 * Progress printer interface (for null object pattern)
 */
export interface IProgressPrinter {
  phase(step: number, total: number, message: string): void;
  success(message: string): void;
  warn(message: string): void;
  progress(message: string): void;
  /** A file finished analysis */
  fileAnalyzed(path: string, findings: number, completed: number, total: number): void;
  /** A file could not be read and was left out */
  fileSkipped(path: string, reason: string): void;
  complete(findings: number, time?: number): void;
  failed(message: string): void;
  stats(items: Array<{ label: string; value: string | number }>): void;

  // Report output (for json-logs mode)
  report?(report: Report): void;
}

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

/**
 * Spinner frames
 */
const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * CLI Progress Printer
 */
export class ProgressPrinter implements IProgressPrinter {
  private output: NodeJS.WritableStream;
  private useColors: boolean;
  private useSpinner: boolean;
  private spinnerIndex = 0;
  private spinnerInterval: ReturnType<typeof setInterval> | null = null;
  private currentSpinnerLine = '';
  private startTime: number;
  private stepStartTime: number;

  constructor(options: ProgressPrinterOptions = {}) {
    const output = options.output ?? process.stderr;
    const isTTY = 'isTTY' in output && output.isTTY === true;
    this.output = output;
    this.useColors = options.colors ?? isTTY;
    this.useSpinner = options.spinner ?? isTTY;
    this.startTime = Date.now();
    this.stepStartTime = Date.now();
  }

  /**
   * Color helper
   */
  private c(color: keyof typeof colors, text: string): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private line(text = ''): void {
    this.output.write(text + '\n');
  }

  phase(step: number, total: number, message: string): void {
    this.stopSpinner();
    this.stepStartTime = Date.now();
    this.line();
    this.line(this.c('bold', this.c('blue', `[${step}/${total}] ${message}`)));
  }

  /**
   * Print a success message with elapsed time
   */
  success(message: string): void {
    this.stopSpinner();
    const elapsed = formatDuration(Date.now() - this.stepStartTime);
    this.line(`      ${this.c('green', '✓')} ${message} ${this.c('gray', `(${elapsed})`)}`);
    this.stepStartTime = Date.now();
  }

  warn(message: string): void {
    this.stopSpinner();
    this.line(`      ${this.c('yellow', '⚠')} ${message}`);
  }

  /**
   * Print a progress item with spinner
   */
  progress(message: string): void {
    this.stopSpinner();
    this.currentSpinnerLine = message;

    if (this.useSpinner) {
      this.spinnerIndex = 0;
      this.writeSpinner();
      this.spinnerInterval = setInterval(() => {
        this.spinnerIndex = (this.spinnerIndex + 1) % spinnerFrames.length;
        this.writeSpinner();
      }, 80);
      // The spinner must never keep the process alive
      this.spinnerInterval.unref();
    } else {
      this.line(`      ${this.c('yellow', '⏳')} ${message}`);
    }
  }

  private writeSpinner(): void {
    const frame = spinnerFrames[this.spinnerIndex];
    this.output.write(`\r      ${this.c('yellow', frame || '⏳')} ${this.currentSpinnerLine}`);
  }

  private stopSpinner(): void {
    if (this.spinnerInterval) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = null;
      if (this.useSpinner && this.currentSpinnerLine) {
        // Clear the line
        this.output.write('\r' + ' '.repeat(this.currentSpinnerLine.length + 10) + '\r');
      }
      this.currentSpinnerLine = '';
    }
  }

  fileAnalyzed(path: string, findings: number, completed: number, total: number): void {
    const percent = total > 0 ? Math.round((completed / total) * 100) : 100;
    const detail = findings > 0 ? this.c('yellow', `${findings} findings`) : this.c('gray', 'clean');
    this.progress(`[${completed}/${total}] ${path} ${detail} ${this.c('gray', `(${percent}%)`)}`);
  }

  fileSkipped(path: string, reason: string): void {
    this.warn(`Skipped ${path}: ${reason}`);
  }

  /**
   * Print final summary
   */
  complete(findings: number, time?: number): void {
    this.stopSpinner();
    const elapsed = time ?? Date.now() - this.startTime;
    this.line();
    this.line(
      this.c('bold', this.c('green', `✅ Analysis complete: ${findings} findings in ${formatDuration(elapsed)}`))
    );
    this.line();
  }

  failed(message: string): void {
    this.stopSpinner();
    this.line();
    this.line(this.c('bold', this.c('red', `❌ Analysis failed: ${message}`)));
    this.line();
  }

  /**
   * Print stats in a compact format
   */
  stats(items: Array<{ label: string; value: string | number }>): void {
    this.stopSpinner();
    const parts = items.map((item) => `${this.c('gray', item.label + ':')} ${item.value}`);
    this.line(`      ${parts.join('  ')}`);
  }
}

/**
 * Create a progress printer instance
 */
export function createProgressPrinter(options?: ProgressPrinterOptions): ProgressPrinter {
  return new ProgressPrinter(options);
}

/**
 * Progress mode for createProgressPrinterWithMode
 */
export type ProgressMode = 'auto' | 'tty' | 'json' | 'silent';

/**
 * Default no-op progress printer for when progress is disabled
 */
export const nullProgressPrinter: IProgressPrinter = {
  phase: () => {},
  success: () => {},
  warn: () => {},
  progress: () => {},
  fileAnalyzed: () => {},
  fileSkipped: () => {},
  complete: () => {},
  failed: () => {},
  stats: () => {},
};
