/**
 * Built-in known-vulnerability rules.
 *
 * Each rule maps one lexical signature to a category and CWE. Confidences are
 * fixed baselines: a rule at or above the stage 1 block threshold can block
 * a build on its own.
 */

import type { RuleDefinitionInput } from '../core/rule-index.js';

export const KNOWN_PATTERNS_VERSION = 'known-patterns@1.2.0';

const C_FAMILY = ['c', 'cpp'] as const;

// A call whose single argument is not one plain string literal.
const NON_LITERAL_CALL = String.raw`\s*\((?!\s*["'\x60][^"'\x60\n]*["'\x60]\s*\))`;

export const KNOWN_PATTERN_RULES: RuleDefinitionInput[] = [
  // ─────────────────────────────────────────────────────────────
  // Buffer overflow
  // ─────────────────────────────────────────────────────────────
  {
    id: 'BO-UNBOUNDED-COPY',
    name: 'Unbounded string copy',
    category: 'buffer-overflow',
    cweId: 'CWE-120',
    severity: 'critical',
    pattern: String.raw`\b(?:strcpy|strcat|wcscpy|wcscat|stpcpy|gets)\s*\(`,
    confidence: 0.9,
    languages: [...C_FAMILY],
    description: 'Copies into a destination buffer without checking its size.',
    fix: 'Use a bounded copy (snprintf, strlcpy) with the destination size and check for truncation.',
  },
  {
    id: 'BO-UNTRUSTED-LENGTH',
    name: 'Copy length taken from the source',
    category: 'buffer-overflow',
    cweId: 'CWE-805',
    severity: 'critical',
    pattern: String.raw`\bmem(?:cpy|move)\s*\([^;]*\bstrlen\s*\(`,
    confidence: 0.85,
    languages: [...C_FAMILY],
    description: 'The copy length comes from the source string rather than the destination capacity.',
    fix: 'Bound the length by the destination size before copying.',
  },
  {
    id: 'BO-UNBOUNDED-FORMAT',
    name: 'Unbounded formatted write',
    category: 'buffer-overflow',
    cweId: 'CWE-120',
    severity: 'high',
    pattern: String.raw`\bv?sprintf\s*\(`,
    confidence: 0.75,
    languages: [...C_FAMILY],
    description: 'Formats into a fixed buffer with no length limit.',
    fix: 'Use snprintf with the buffer size and check the return value.',
  },
  {
    id: 'BO-FORMAT-STRING',
    name: 'Non-literal format string',
    category: 'buffer-overflow',
    cweId: 'CWE-134',
    severity: 'high',
    pattern: String.raw`\b(?:printf|syslog)\s*\(\s*[A-Za-z_]\w*\s*\)`,
    confidence: 0.7,
    languages: [...C_FAMILY],
    description: 'A variable is used as the format string.',
    fix: 'Pass the value as an argument to a literal format: printf("%s", value).',
  },

  // ─────────────────────────────────────────────────────────────
  // Injection
  // ─────────────────────────────────────────────────────────────
  {
    id: 'INJ-SQL-INTERPOLATION',
    name: 'SQL built from interpolated input',
    category: 'injection',
    cweId: 'CWE-89',
    severity: 'critical',
    pattern: String.raw`["'\x60][^"'\x60\n]*\b(?:select\s.+?\sfrom|insert\s+into|update\s+\w+\s+set|delete\s+from)\b[^\n;]*?(?:%s|%d|\$\{|\{\w*\}|["'\x60]\s*\+|\.format\s*\()`,
    flags: 'i',
    confidence: 0.85,
    description: 'A SQL statement is assembled by formatting or concatenating values into the query text.',
    fix: 'Use parameterized queries or prepared statements; never splice values into SQL.',
  },
  {
    id: 'INJ-MARKUP',
    name: 'Raw markup sink',
    category: 'injection',
    cweId: 'CWE-79',
    severity: 'high',
    pattern: String.raw`\.innerHTML\s*=|\bdangerouslySetInnerHTML\b|\bdocument\.write\s*\(`,
    confidence: 0.7,
    languages: ['javascript', 'typescript', 'php'],
    description: 'Writes a string into the page as markup.',
    fix: 'Assign textContent or render through an escaping template.',
  },
  {
    id: 'INJ-OS-COMMAND',
    name: 'Shell command from dynamic input',
    category: 'injection',
    cweId: 'CWE-78',
    severity: 'critical',
    pattern: String.raw`\b(?:system|popen|shell_exec|passthru|execSync)` + NON_LITERAL_CALL + String.raw`|\bshell\s*=\s*True\b`,
    confidence: 0.8,
    description: 'Runs a shell command whose text is not a fixed literal.',
    fix: 'Invoke the program directly with an argument vector and validate every argument.',
  },

  // ─────────────────────────────────────────────────────────────
  // Code execution and deserialization
  // ─────────────────────────────────────────────────────────────
  {
    id: 'EXEC-DYNAMIC-CODE',
    name: 'Dynamic code evaluation',
    category: 'code-execution',
    cweId: 'CWE-95',
    severity: 'critical',
    pattern: String.raw`(?<![.\w$])(?:eval|exec)` + NON_LITERAL_CALL + String.raw`|\bnew\s+Function\s*\(`,
    confidence: 0.8,
    languages: ['javascript', 'typescript', 'python', 'php'],
    description: 'Evaluates a string as code.',
    fix: 'Replace evaluation with a lookup table or a real parser for the expected input.',
  },
  {
    id: 'DESER-UNSAFE-LOAD',
    name: 'Unsafe deserialization',
    category: 'deserialization',
    cweId: 'CWE-502',
    severity: 'high',
    pattern: String.raw`\bpickle\.loads?\s*\(|\byaml\.load\s*\((?![^)\n]*SafeLoader)|\bmarshal\.loads\s*\(|\bunserialize\s*\(|\bnew\s+ObjectInputStream\s*\(|\bBinaryFormatter\b`,
    confidence: 0.8,
    description: 'Deserializes data with a loader that can instantiate arbitrary types.',
    fix: 'Use a data-only format (JSON) or a safe loader, and validate the result.',
  },

  // ─────────────────────────────────────────────────────────────
  // Non-blocking categories
  // ─────────────────────────────────────────────────────────────
  {
    id: 'PATH-TRAVERSAL',
    name: 'File access with a composed path',
    category: 'path-traversal',
    cweId: 'CWE-22',
    severity: 'medium',
    pattern: String.raw`\b(?:fopen|open|readFile(?:Sync)?|createReadStream|sendFile)\s*\([^)\n]*(?:\+\s*[A-Za-z_]|\$\{|%s|\.\.[\\/])`,
    confidence: 0.5,
    description: 'Opens a file whose path is concatenated from other values.',
    fix: 'Resolve the path and verify it stays under the intended base directory.',
  },
  {
    id: 'HARDCODED-SECRET',
    name: 'Hardcoded credential',
    category: 'hardcoded-secret',
    cweId: 'CWE-798',
    severity: 'high',
    pattern: String.raw`\b(?:password|passwd|pwd|secret|api_?key|access_?token|auth_?token)\w*\s*[:=]\s*["'][^"'\n]{4,}["']`,
    flags: 'i',
    confidence: 0.7,
    description: 'A credential is embedded in source.',
    fix: 'Load the credential from the environment or a secret store.',
  },
];
