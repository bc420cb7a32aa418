/**
 * CLI Module
 *
 * Progress output and event system for analysis runs.
 */

import {
  createProgressPrinter,
  nullProgressPrinter,
  type IProgressPrinter,
  type ProgressMode,
} from './progress.js';
import { type StructuredProgressPrinter, createStructuredProgressPrinter } from './structured-progress.js';
import type { AnalysisEvent } from './events.js';

export {
  ProgressPrinter,
  createProgressPrinter,
  nullProgressPrinter,
  type IProgressPrinter,
  type ProgressPrinterOptions,
  type ProgressMode,
} from './progress.js';

export {
  AnalysisEventEmitter,
  createAnalysisEventEmitter,
  type AnalysisEvent,
  type AnalysisEventHandler,
  type AnalysisStateSnapshot,
} from './events.js';

export {
  StructuredProgressPrinter,
  createStructuredProgressPrinter,
  type StructuredProgressOptions,
} from './structured-progress.js';

/**
 * Options for creating a progress printer with mode selection
 */
export interface CreateProgressPrinterOptions {
  /** Progress output mode */
  mode?: ProgressMode;
  /** Enable verbose output */
  verbose?: boolean;
  /** Custom event handler (json mode) */
  onEvent?: (event: AnalysisEvent) => void;
  /** Output stream for JSON mode (default: process.stderr) */
  jsonOutput?: NodeJS.WritableStream;
}

/**
 * Create a progress printer based on the specified mode
 *
 * @example
 * ```typescript
 * // Interactive output when stderr is a terminal, nothing otherwise
 * const printer = createProgressPrinterWithMode({ mode: 'auto' });
 *
 * // NDJSON events for a supervising service
 * const printer = createProgressPrinterWithMode({ mode: 'json' });
 * ```
 */
export function createProgressPrinterWithMode(
  options: CreateProgressPrinterOptions = {}
): IProgressPrinter | StructuredProgressPrinter {
  const mode = options.mode ?? 'auto';

  switch (mode) {
    case 'silent':
      return nullProgressPrinter;

    case 'json':
      return createStructuredProgressPrinter({
        verbose: options.verbose,
        output: options.jsonOutput,
        onEvent: options.onEvent,
      });

    case 'tty':
      return createProgressPrinter();

    case 'auto':
      return process.stderr.isTTY ? createProgressPrinter() : nullProgressPrinter;
  }
}
