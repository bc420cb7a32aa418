/**
 * Windowed heuristics
 *
 * Matchers that need more than the changed line itself. Each one looks at
 * most `radius` lines before and after the line under test and keeps no
 * state between calls.
 */

import type { LineWindow, MatchResult } from './types.js';

export type Heuristic = (window: LineWindow) => MatchResult | null;

/** Function bodies longer than this are reported by long-function */
export const LONG_FUNCTION_LINES = 50;

const TAB_WIDTH = 4;

const LOOP_HEADER = /^\s*(?:(?:for|while)\b|loop\s*\{)|\.forEach\s*\(/;

/**
 * Line at `offset` from the line under test, or undefined outside the window
 */
function lineAt(window: LineWindow, offset: number): string | undefined {
  if (Math.abs(offset) > window.radius) return undefined;
  return window.lines[window.index + offset];
}

export function indentOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width += 1;
    else if (ch === '\t') width += TAB_WIDTH;
    else break;
  }
  return width;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Walk outwards through the enclosing lines (by indentation) above the line
 * under test and return the first one that opens a loop
 */
function enclosingLoop(window: LineWindow): string | undefined {
  const current = lineAt(window, 0);
  if (current === undefined) return undefined;

  let threshold = indentOf(current);
  for (let offset = -1; threshold > 0; offset--) {
    const line = lineAt(window, offset);
    if (line === undefined) return undefined;
    if (isBlank(line)) continue;

    const indent = indentOf(line);
    if (indent < threshold) {
      if (LOOP_HEADER.test(line)) return line.trim();
      threshold = indent;
    }
  }
  return undefined;
}

const nestedLoop: Heuristic = (window) => {
  const current = lineAt(window, 0);
  if (current === undefined || !LOOP_HEADER.test(current)) return null;
  const outer = enclosingLoop(window);
  return outer === undefined ? null : { match: current.trim() };
};

const awaitInLoop: Heuristic = (window) => {
  const current = lineAt(window, 0);
  if (current === undefined || !/\bawait\b/.test(current) || /\bfor\s+await\b/.test(current)) {
    return null;
  }
  return enclosingLoop(window) === undefined ? null : { match: current.trim() };
};

const stringConcatInLoop: Heuristic = (window) => {
  const current = lineAt(window, 0);
  if (current === undefined) return null;
  const concat = /\b\w+\s*\+=\s*(?:f?["'`]|\w+\s*\+\s*["'`])/.exec(current);
  if (concat === null) return null;
  return enclosingLoop(window) === undefined ? null : { match: concat[0] };
};

/**
 * First line above `offset` that is not blank and not an attribute/decorator
 */
function previousSignificant(window: LineWindow, offset: number): string | undefined {
  for (let o = offset - 1; ; o--) {
    const line = lineAt(window, o);
    if (line === undefined) return undefined;
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#[') || trimmed.startsWith('@')) continue;
    return trimmed;
  }
}

function hasDocAbove(window: LineWindow): boolean {
  const above = previousSignificant(window, 0);
  if (above === undefined) return false;
  return above.startsWith('///') || above.startsWith('//!') || above.endsWith('*/');
}

/**
 * A Python def is documented when the first statement after the signature is
 * a string literal
 */
function hasPythonDocstring(window: LineWindow): boolean {
  let offset = 0;
  for (;;) {
    const line = lineAt(window, offset);
    if (line === undefined) return false;
    if (/:\s*(?:#.*)?$/.test(line)) break;
    offset++;
  }

  for (offset++; ; offset++) {
    const line = lineAt(window, offset);
    if (line === undefined) return false;
    if (isBlank(line)) continue;
    return /^\s*[rRbBuU]?("""|''')/.test(line);
  }
}

const missingDocComment: Heuristic = (window) => {
  const current = lineAt(window, 0);
  if (current === undefined) return null;

  switch (window.language) {
    case 'rust': {
      const fn = /^\s*pub(?:\([^)]*\))?\s+(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+(\w+)/.exec(current);
      if (fn === null || hasDocAbove(window)) return null;
      return { match: fn[1] ?? fn[0] };
    }
    case 'python': {
      const def = /^\s*(?:async\s+)?def\s+([A-Za-z]\w*)\s*\(/.exec(current);
      if (def === null || hasPythonDocstring(window)) return null;
      return { match: def[1] ?? def[0] };
    }
    case 'javascript':
    case 'typescript': {
      const fn = /^\s*export\s+(?:default\s+)?(?:async\s+)?function\*?\s+(\w+)/.exec(current);
      if (fn === null || hasDocAbove(window)) return null;
      return { match: fn[1] ?? fn[0] };
    }
    case 'unknown':
      return null;
  }
};

/**
 * Length of the function starting at the line under test, counted to its
 * closing brace (or dedent for Python). Stops counting at the window edge.
 */
function functionLength(window: LineWindow, header: string): number {
  if (window.language === 'python') {
    const base = indentOf(header);
    let lastBody = 0;
    for (let offset = 1; ; offset++) {
      const line = lineAt(window, offset);
      if (line === undefined) return lastBody + 1;
      if (isBlank(line)) continue;
      if (indentOf(line) <= base) return lastBody + 1;
      lastBody = offset;
    }
  }

  let depth = 0;
  let opened = false;
  for (let offset = 0; ; offset++) {
    const line = lineAt(window, offset);
    if (line === undefined) return offset;
    for (const ch of line) {
      if (ch === '{') {
        depth++;
        opened = true;
      } else if (ch === '}') {
        depth--;
      }
    }
    if (opened && depth <= 0) return offset + 1;
  }
}

const FUNCTION_HEADER: Record<LineWindow['language'], RegExp | undefined> = {
  rust: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+\w+/,
  javascript: /\bfunction\b[^(]*\(|^\s*(?:export\s+)?(?:const|let)\s+\w+\s*=\s*(?:async\s*)?\([^)]*\)\s*=>\s*\{/,
  typescript: /\bfunction\b[^(]*\(|^\s*(?:export\s+)?(?:const|let)\s+\w+\s*=\s*(?:async\s*)?\([^)]*\)[^=]*=>\s*\{/,
  python: /^\s*(?:async\s+)?def\s+\w+/,
  unknown: undefined,
};

const longFunction: Heuristic = (window) => {
  const current = lineAt(window, 0);
  const header = FUNCTION_HEADER[window.language];
  if (current === undefined || header === undefined || !header.test(current)) return null;

  const length = functionLength(window, current);
  if (length <= LONG_FUNCTION_LINES) return null;
  return { match: `${length} lines` };
};

/**
 * Heuristics addressable from rule files by name
 */
export const HEURISTICS: ReadonlyMap<string, Heuristic> = new Map<string, Heuristic>([
  ['nested-loop', nestedLoop],
  ['await-in-loop', awaitInLoop],
  ['string-concat-in-loop', stringConcatInLoop],
  ['missing-doc-comment', missingDocComment],
  ['long-function', longFunction],
]);
