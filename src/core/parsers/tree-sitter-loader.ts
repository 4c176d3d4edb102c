/**
 * Lazy loading of tree-sitter and its grammars.
 *
 * The bindings are native add-ons, so each grammar is required on first use
 * and a failure is cached; the normalizer then degrades the unit instead of
 * failing the run.
 */

import { createRequire } from 'node:module';
import type Parser from 'tree-sitter';
import type { Language } from '../../types.js';

const require = createRequire(import.meta.url);

export type Grammar = NonNullable<Parameters<Parser['setLanguage']>[0]>;

type ParserConstructor = typeof Parser;

interface GrammarModule {
  packageName: string;
  /** Export holding the grammar, for packages that bundle several. */
  exportName?: string;
}

const GRAMMARS: Partial<Record<Language, GrammarModule>> = {
  c: { packageName: 'tree-sitter-c' },
  cpp: { packageName: 'tree-sitter-cpp' },
  java: { packageName: 'tree-sitter-java' },
  go: { packageName: 'tree-sitter-go' },
  csharp: { packageName: 'tree-sitter-c-sharp' },
  rust: { packageName: 'tree-sitter-rust' },
  php: { packageName: 'tree-sitter-php', exportName: 'php' },
  python: { packageName: 'tree-sitter-python' },
};

// ─────────────────────────────────────────────────────────────
// Module state
// ─────────────────────────────────────────────────────────────

let cachedParser: ParserConstructor | null = null;
let parserError: string | null = null;
const cachedGrammars = new Map<Language, Grammar>();
const grammarErrors = new Map<Language, string>();

/**
 * A parser configured for the language.
 *
 * @throws Error when tree-sitter or the grammar cannot be loaded
 */
export function createTreeSitterParser(language: Language): Parser {
  const ParserClass = loadParser();
  const parser = new ParserClass();
  parser.setLanguage(loadGrammar(language));
  return parser;
}

// ─────────────────────────────────────────────────────────────
// Internals
// ─────────────────────────────────────────────────────────────

function loadParser(): ParserConstructor {
  if (cachedParser) return cachedParser;
  if (parserError !== null) {
    throw new Error(`tree-sitter is not available: ${parserError}`);
  }
  try {
    const loaded: ParserConstructor = require('tree-sitter');
    cachedParser = loaded;
    return loaded;
  } catch (error) {
    parserError = error instanceof Error ? error.message : String(error);
    throw new Error(`tree-sitter is not available: ${parserError}`);
  }
}

function loadGrammar(language: Language): Grammar {
  const cached = cachedGrammars.get(language);
  if (cached) return cached;

  const entry = GRAMMARS[language];
  if (!entry) {
    throw new Error(`no tree-sitter grammar for language '${language}'`);
  }
  const previous = grammarErrors.get(language);
  if (previous !== undefined) {
    throw new Error(`${entry.packageName} is not available: ${previous}`);
  }

  try {
    const exported = require(entry.packageName);
    const grammar: Grammar = entry.exportName ? exported[entry.exportName] : exported;
    cachedGrammars.set(language, grammar);
    return grammar;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    grammarErrors.set(language, message);
    throw new Error(`${entry.packageName} is not available: ${message}`);
  }
}
