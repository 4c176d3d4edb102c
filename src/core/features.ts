/**
 * Snippet feature extraction for the stage 1 classifier.
 *
 * The vector is fixed and named; model artifacts refer to features by name
 * and are rejected at load time if they mention one that is not listed here.
 */

import type { Snippet } from '../types.js';

export const FEATURE_NAMES = [
  'unsafeCopyCalls',
  'boundedCopyCalls',
  'formatCalls',
  'lengthSizedCopies',
  'execCalls',
  'evalCalls',
  'deserializeCalls',
  'boundsChecks',
  'fixedBuffers',
  'smallBufferRatio',
  'queryLiterals',
  'markupLiterals',
  'interpolationMarkers',
  'untrustedInputRefs',
  'lineCount',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];
export type FeatureVector = Readonly<Record<FeatureName, number>>;

export function isFeatureName(name: string): name is FeatureName {
  return FEATURE_NAMES.some((feature) => feature === name);
}

// ─────────────────────────────────────────────────────────────
// Call groups
// ─────────────────────────────────────────────────────────────

const UNSAFE_COPY = ['strcpy', 'strcat', 'wcscpy', 'wcscat', 'stpcpy', 'gets'];
const BOUNDED_COPY = ['strncpy', 'strncat', 'strlcpy', 'strlcat', 'snprintf', 'memcpy_s', 'strcpy_s', 'strcat_s'];
const FORMAT = ['sprintf', 'vsprintf'];
const EXEC = [
  'system', 'popen', 'execl', 'execlp', 'execv', 'execvp', 'execSync', 'shell_exec', 'passthru',
  'subprocess.run', 'subprocess.call', 'subprocess.Popen', 'child_process.exec',
];
const DESERIALIZE = [
  'pickle.load', 'pickle.loads', 'yaml.load', 'marshal.loads', 'unserialize', 'ObjectInputStream', 'readObject',
];

const CALL_KEYWORDS = new Set(['if', 'for', 'while', 'switch', 'return', 'sizeof', 'catch', 'function', 'typeof']);

/**
 * Call-site histogram: dotted callee name to number of call sites.
 * Method calls on arbitrary receivers count under their bare name too.
 */
export function callHistogram(text: string): Map<string, number> {
  const histogram = new Map<string, number>();
  const bump = (name: string) => histogram.set(name, (histogram.get(name) ?? 0) + 1);

  for (const match of text.matchAll(/(?<![\w$])([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)\s*\(/g)) {
    const name = match[1];
    const bare = name.slice(name.lastIndexOf('.') + 1);
    if (CALL_KEYWORDS.has(bare)) continue;
    bump(name);
    if (bare !== name) bump(bare);
  }
  return histogram;
}

function sumCalls(histogram: Map<string, number>, names: readonly string[]): number {
  let total = 0;
  for (const name of names) total += histogram.get(name) ?? 0;
  return total;
}

function count(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

// ─────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────

// eval/exec as free functions only; regex.exec() is not code evaluation
const DYNAMIC_EVAL = /(?<![.\w$])(?:eval|exec)\s*\(|\bnew\s+Function\s*\(/g;
const LENGTH_SIZED_COPY = /\bmem(?:cpy|move)\s*\([^;]*?\bstrlen\s*\(/g;
const BOUNDS_CHECK = /\bif\s*\([^)\n]*\b(?:len|length|size|count|max|cap)\w*\b[^)\n]*[<>]/gi;
const SIZEOF = /\bsizeof\b/g;
const FIXED_BUFFER = /\b(?:char|wchar_t|u?int\d*_t|unsigned\s+char|byte)\s+\w+\s*\[\s*(\d+)\s*\]/g;
const QUERY_LITERAL = /["'`][^"'`\n]*\b(?:select\s[^"'`\n]*\sfrom|insert\s+into|update\s+\w+\s+set|delete\s+from)\b/gi;
const MARKUP_LITERAL = /["'`][^"'`\n]*<\/?[a-z][a-z0-9]*\b[^"'`\n]*>/gi;
const MARKUP_SINK = /\.innerHTML\s*=|\bdangerouslySetInnerHTML\b|\bdocument\.write\s*\(/g;
const INTERPOLATION = /%s|\$\{|\{\w+\}|\.format\s*\(|["'`]\s*\+\s*[A-Za-z_]/g;
const UNTRUSTED_INPUT = /\b(?:argv|user_input|userInput|getenv|scanf|fgets|recv|input)\b|\breq(?:uest)?\.(?:body|query|params|args|form|GET|POST)\b/g;

const SMALL_BUFFER_BYTES = 16;
const LINE_SCALE = 50;

export function extractFeatures(snippet: Snippet): FeatureVector {
  const text = snippet.text;
  const histogram = callHistogram(text);

  const bufferSizes = Array.from(text.matchAll(FIXED_BUFFER), (match) => Number(match[1]));
  const smallBuffers = bufferSizes.filter((size) => size <= SMALL_BUFFER_BYTES).length;

  return Object.freeze({
    unsafeCopyCalls: sumCalls(histogram, UNSAFE_COPY),
    boundedCopyCalls: sumCalls(histogram, BOUNDED_COPY),
    formatCalls: sumCalls(histogram, FORMAT),
    lengthSizedCopies: count(text, LENGTH_SIZED_COPY),
    execCalls: sumCalls(histogram, EXEC),
    evalCalls: count(text, DYNAMIC_EVAL),
    deserializeCalls: sumCalls(histogram, DESERIALIZE),
    boundsChecks: count(text, BOUNDS_CHECK) + count(text, SIZEOF),
    fixedBuffers: bufferSizes.length,
    smallBufferRatio: bufferSizes.length === 0 ? 0 : smallBuffers / bufferSizes.length,
    queryLiterals: count(text, QUERY_LITERAL),
    markupLiterals: count(text, MARKUP_LITERAL) + count(text, MARKUP_SINK),
    interpolationMarkers: count(text, INTERPOLATION),
    untrustedInputRefs: count(text, UNTRUSTED_INPUT),
    lineCount: Math.min((snippet.endLine - snippet.startLine + 1) / LINE_SCALE, 1),
  });
}
