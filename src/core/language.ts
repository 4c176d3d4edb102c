import { extname } from 'path';
import type { Language } from '../types.js';

const EXTENSIONS: Record<string, Language> = {
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.hh': 'cpp',
  '.java': 'java',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.go': 'go',
  '.cs': 'csharp',
  '.php': 'php',
  '.rs': 'rust',
  '.py': 'python',
};

const C_SIGNALS = [/^\s*#include\s*[<"]/m, /\bmalloc\s*\(/, /\bprintf\s*\(/];

/**
 * Map a file to a language tag by extension, sniffing the content for C
 * when the extension says nothing.
 */
export function detectLanguage(path: string, text = ''): Language {
  const byExtension = EXTENSIONS[extname(path).toLowerCase()];
  if (byExtension) {
    return byExtension;
  }
  if (C_SIGNALS.some((signal) => signal.test(text))) {
    return 'c';
  }
  return 'other';
}
