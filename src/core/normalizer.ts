/**
 * Normalizer - raw source text to a SourceUnit of function-level snippets.
 *
 * JavaScript and TypeScript are parsed with the TypeScript compiler API, the
 * other languages with tree-sitter. Code outside any function becomes module
 * snippets. When a parser is missing or reports a syntax error, the unit
 * falls back to coarse line blocks and is marked degraded.
 */

import type { Language, Snippet, SnippetKind, SourceUnit } from '../types.js';
import { ParseDegraded } from './errors.js';
import { extractWithTreeSitter } from './parsers/tree-sitter-extractor.js';
import { extractWithTypeScript } from './parsers/typescript-extractor.js';
import type { Extraction } from './parsers/types.js';

export const MAX_BLOCK_LINES = 40;
export const SOFT_BLOCK_LINES = 20;

export function normalize(text: string, language: Language, path: string): SourceUnit {
  if (text.trim() === '') {
    return freezeUnit({ path, language, text, snippets: [], degraded: false });
  }

  const lines = new LineIndex(text);
  try {
    const snippets = toSnippets(extract(text, language, path), text, path, lines);
    return freezeUnit({ path, language, text, snippets, degraded: false });
  } catch (error) {
    if (!(error instanceof ParseDegraded)) {
      throw error;
    }
    return freezeUnit({
      path,
      language,
      text,
      snippets: lexicalScan(text, path, lines),
      degraded: true,
      degradedReason: error.message,
    });
  }
}

function extract(text: string, language: Language, path: string): Extraction {
  if (language === 'javascript' || language === 'typescript') {
    return extractWithTypeScript(text, language, path);
  }
  return extractWithTreeSitter(text, language);
}

/**
 * Function snippets, plus one module snippet per run of lines outside any
 * function, trimmed to the lines that carry code.
 */
function toSnippets(extraction: Extraction, text: string, path: string, lines: LineIndex): Snippet[] {
  const builder = new SnippetBuilder(text, path);
  const covered: boolean[] = new Array<boolean>(lines.count + 1).fill(false);
  const code: boolean[] = new Array<boolean>(lines.count + 1).fill(false);

  for (const fn of extraction.functions) {
    builder.add('function', fn.start, fn.end, lines, fn.name);
    for (let line = lines.lineOf(fn.start); line <= lines.lineOf(fn.end - 1); line++) {
      covered[line] = true;
    }
  }
  for (const token of extraction.tokens) {
    for (let line = lines.lineOf(token.start); line <= lines.lineOf(token.end - 1); line++) {
      code[line] = true;
    }
  }

  let first: number | undefined;
  let last: number | undefined;
  const flush = () => {
    if (first !== undefined && last !== undefined) {
      builder.add('module', lines.startOf(first), lines.endOf(last), lines);
    }
    first = undefined;
    last = undefined;
  };

  for (let line = 1; line <= lines.count; line++) {
    if (covered[line]) {
      flush();
    } else if (code[line]) {
      if (first === undefined) first = line;
      last = line;
    }
  }
  flush();

  return builder.build();
}

function freezeUnit(unit: SourceUnit): SourceUnit {
  for (const snippet of unit.snippets) {
    Object.freeze(snippet);
  }
  Object.freeze(unit.snippets);
  return Object.freeze(unit);
}

// ─────────────────────────────────────────────────────────────
// Line bookkeeping
// ─────────────────────────────────────────────────────────────

class LineIndex {
  private readonly starts: number[] = [0];

  constructor(private readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.starts.push(i + 1);
    }
  }

  get count(): number {
    return this.starts.length;
  }

  /** 1-based line containing the offset. */
  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  startOf(line: number): number {
    return this.starts[line - 1];
  }

  /** Offset just past the last character of the line, newline excluded. */
  endOf(line: number): number {
    return line < this.starts.length ? this.starts[line] - 1 : this.text.length;
  }

  slice(source: string, line: number): string {
    return source.slice(this.startOf(line), this.endOf(line));
  }
}

class SnippetBuilder {
  private readonly snippets: Snippet[] = [];
  private readonly ids = new Set<string>();

  constructor(private readonly text: string, private readonly path: string) {}

  /** `start` and `end` are string indices; the snippet records UTF-8 byte offsets. */
  add(kind: SnippetKind, start: number, end: number, lines: LineIndex, functionName?: string): void {
    const startLine = lines.lineOf(start);
    const endLine = lines.lineOf(Math.max(start, end - 1));
    let id = `${this.path}:${startLine}-${endLine}`;
    for (let n = 2; this.ids.has(id); n++) {
      id = `${this.path}:${startLine}-${endLine}#${n}`;
    }
    this.ids.add(id);
    const snippet: Snippet = {
      id,
      startLine,
      endLine,
      startOffset: byteOffset(this.text, start),
      endOffset: byteOffset(this.text, end),
      text: this.text.slice(start, end),
      kind,
    };
    if (functionName !== undefined) snippet.functionName = functionName;
    this.snippets.push(snippet);
  }

  build(): Snippet[] {
    return [...this.snippets].sort((a, b) => a.startOffset - b.startOffset || a.endOffset - b.endOffset);
  }
}

function byteOffset(text: string, index: number): number {
  return Buffer.byteLength(text.slice(0, index), 'utf8');
}

// ─────────────────────────────────────────────────────────────
// Lexical fallback
// ─────────────────────────────────────────────────────────────

function lexicalScan(text: string, path: string, lines: LineIndex): Snippet[] {
  const builder = new SnippetBuilder(text, path);
  const isBlank = (line: number) => lines.slice(text, line).trim() === '';

  const emit = (first: number, last: number) => {
    let end = last;
    while (end > first && isBlank(end)) end--;
    builder.add('block', lines.startOf(first), lines.endOf(end), lines);
  };

  let start: number | undefined;
  for (let line = 1; line <= lines.count; line++) {
    if (start === undefined) {
      if (!isBlank(line)) start = line;
      continue;
    }
    if (isBlank(line) && line - start >= SOFT_BLOCK_LINES) {
      emit(start, line - 1);
      start = undefined;
    } else if (line - start + 1 === MAX_BLOCK_LINES) {
      emit(start, line);
      start = undefined;
    }
  }
  if (start !== undefined) {
    emit(start, lines.count);
  }

  return builder.build();
}

/**
 * The whole unit as one snippet, for file-scope reasoning and run-level
 * features.
 */
export function wholeFileSnippet(unit: SourceUnit): Snippet {
  const endLine = unit.text.split('\n').length;
  return {
    id: `${unit.path}:1-${endLine}`,
    startLine: 1,
    endLine,
    startOffset: 0,
    endOffset: Buffer.byteLength(unit.text, 'utf8'),
    text: unit.text,
    kind: 'module',
  };
}

/** The first `maxLines` lines of the unit, for prompts that need file context. */
export function headSnippet(unit: SourceUnit, maxLines: number): Snippet {
  const rows = unit.text.split('\n');
  if (rows.length <= maxLines) return wholeFileSnippet(unit);
  const text = rows.slice(0, maxLines).join('\n');
  return {
    id: `${unit.path}:1-${maxLines}`,
    startLine: 1,
    endLine: maxLines,
    startOffset: 0,
    endOffset: Buffer.byteLength(text, 'utf8'),
    text,
    kind: 'module',
  };
}
