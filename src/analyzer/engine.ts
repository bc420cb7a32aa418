/**
 * Analysis Engine
 *
 * Fans the files of a ChangeSet out over a bounded worker pool, then
 * aggregates once every file has finished. Aggregation never sees a partial
 * file set: a cancelled run throws instead of returning a report.
 */

import type { RuleCatalog } from '../catalog/catalog.js';
import type { ChangeSet, FileChange, GitProvider, SkippedFile } from '../git/type.js';
import { IoError } from '../git/type.js';
import { nullProgressPrinter, type IProgressPrinter } from '../cli/progress.js';
import { aggregate } from '../report/aggregator.js';
import { defaultConcurrency, withConcurrency } from '../utils/index.js';
import { analyzeFile } from './line-analyzer.js';
import type { Finding, Report } from './types.js';
import { AnalysisCancelledError } from './types.js';

export interface AnalysisOptions {
  /** Worker pool size (default: available CPU parallelism) */
  concurrency?: number;
  /** Abort the run; files already in progress finish, then AnalysisCancelledError is thrown */
  signal?: AbortSignal;
  /** Progress printer for per-file telemetry */
  progress?: IProgressPrinter;
}

/**
 * Outcome of one file's analysis
 */
export type FileOutcome =
  | { kind: 'analyzed'; path: string; findings: Finding[] }
  | { kind: 'skipped'; skipped: SkippedFile };

/**
 * Read and analyze a single file. Unreadable content turns into a skip.
 *
 * Content carried on the change is used as is; only changes without it are
 * read from the provider.
 */
export async function analyzeChange(
  change: FileChange,
  provider: GitProvider,
  catalog: RuleCatalog
): Promise<FileOutcome> {
  let contents = change.contents;
  try {
    if (contents === undefined) {
      contents = await provider.readBlob(change.revision, change.path);
    }
  } catch (error: unknown) {
    if (!(error instanceof IoError)) throw error;
    return { kind: 'skipped', skipped: { path: change.path, reason: error.message } };
  }

  if (contents === undefined) {
    return { kind: 'skipped', skipped: { path: change.path, reason: 'file no longer exists' } };
  }

  return { kind: 'analyzed', path: change.path, findings: analyzeFile(change, contents, catalog) };
}

/**
 * Analyze every file of a ChangeSet and build the report
 *
 * @throws {AnalysisCancelledError} If `signal` aborts before every file finished
 */
export async function runAnalysis(
  changeSet: ChangeSet,
  provider: GitProvider,
  catalog: RuleCatalog,
  options: AnalysisOptions = {}
): Promise<Report> {
  const progress = options.progress ?? nullProgressPrinter;
  const total = changeSet.files.length;
  let completed = 0;

  if (options.signal?.aborted) {
    throw new AnalysisCancelledError(0, total);
  }

  const tasks = changeSet.files.map((change) => async (): Promise<FileOutcome> => {
    const outcome = await analyzeChange(change, provider, catalog);
    completed++;
    if (outcome.kind === 'analyzed') {
      progress.fileAnalyzed(outcome.path, outcome.findings.length, completed, total);
    } else {
      progress.fileSkipped(outcome.skipped.path, outcome.skipped.reason);
    }
    return outcome;
  });

  const outcomes = await withConcurrency(tasks, {
    concurrency: options.concurrency ?? defaultConcurrency(),
    signal: options.signal,
  });

  // Join barrier: every started task has settled. Anything less than the full set is discarded.
  if (options.signal?.aborted || completed < total) {
    throw new AnalysisCancelledError(completed, total);
  }

  const findings: Finding[] = [];
  const analyzedPaths: string[] = [];
  const skipped: SkippedFile[] = [...changeSet.skipped];

  for (const outcome of outcomes) {
    if (outcome === undefined) continue;
    if (outcome.kind === 'analyzed') {
      analyzedPaths.push(outcome.path);
      findings.push(...outcome.findings);
    } else {
      skipped.push(outcome.skipped);
    }
  }

  return aggregate(findings, analyzedPaths, {
    source: changeSet.source,
    target: changeSet.target,
    skipped,
  });
}
