/**
 * Line-based diff
 *
 * Finds the target lines that a shortest edit script inserts, using Myers'
 * O(ND) algorithm over the region left after trimming the common prefix and
 * suffix.
 */

/**
 * Computes which lines of a target text are new relative to a source text
 */
export interface LineDiffer {
  /** 1-based, strictly increasing line numbers of the target */
  changedLines(source: string, target: string): number[];
}

export interface MyersDifferOptions {
  /**
   * Give up on a minimal script beyond this many edits and report every line
   * of the differing region as changed
   */
  maxEditDistance?: number;
}

const DEFAULT_OPTIONS: Required<MyersDifferOptions> = {
  maxEditDistance: 2000,
};

/**
 * Split text into lines. A trailing newline does not start another line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function range(start: number, end: number): number[] {
  return Array.from({ length: Math.max(0, end - start) }, (_, i) => start + i);
}

/**
 * 0-based indexes of `b` inserted by a shortest edit script from `a` to `b`,
 * or `undefined` when the script is longer than `maxEdits`
 */
function insertedIndexes(a: readonly string[], b: readonly string[], maxEdits: number): number[] | undefined {
  const n = a.length;
  const m = b.length;
  if (m === 0) return [];
  if (n === 0) return range(0, m);

  const max = n + m;
  const limit = Math.min(max, maxEdits);
  const offset = max + 1;
  const v = new Array<number>(2 * max + 3).fill(0);
  // trace[d] holds diagonals -(d+1)..d+1 as they were before step d
  const trace: number[][] = [];

  for (let d = 0; d <= limit; d++) {
    trace.push(v.slice(offset - d - 1, offset + d + 2));

    for (let k = -d; k <= d; k += 2) {
      let x =
        k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])
          ? v[offset + k + 1]
          : v[offset + k - 1] + 1;
      let y = x - k;

      while (x < n && y < m && a[x] === b[y]) {
        x++;
        y++;
      }
      v[offset + k] = x;

      if (x >= n && y >= m) {
        return backtrack(trace, d, n, m);
      }
    }
  }

  return undefined;
}

function backtrack(trace: readonly number[][], depth: number, n: number, m: number): number[] {
  const inserted: number[] = [];
  let x = n;
  let y = m;

  for (let d = depth; d > 0; d--) {
    const snapshot = trace[d];
    const at = (k: number): number => snapshot[k + d + 1];
    const k = x - y;
    const prevK = k === -d || (k !== d && at(k - 1) < at(k + 1)) ? k + 1 : k - 1;
    const prevX = at(prevK);
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      x--;
      y--;
    }
    // A vertical move consumed b[prevY]
    if (x === prevX) inserted.push(prevY);

    x = prevX;
    y = prevY;
  }

  return inserted.reverse();
}

/**
 * Myers line differ
 */
export class MyersLineDiffer implements LineDiffer {
  private readonly options: Required<MyersDifferOptions>;

  constructor(options: MyersDifferOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  changedLines(source: string, target: string): number[] {
    const a = splitLines(source);
    const b = splitLines(target);

    let start = 0;
    while (start < a.length && start < b.length && a[start] === b[start]) start++;

    let endA = a.length;
    let endB = b.length;
    while (endA > start && endB > start && a[endA - 1] === b[endB - 1]) {
      endA--;
      endB--;
    }

    const inserted =
      insertedIndexes(a.slice(start, endA), b.slice(start, endB), this.options.maxEditDistance) ??
      range(0, endB - start);

    return inserted.map((index) => index + start + 1);
  }
}
