import { readFileSync } from 'fs';
import { z } from 'zod';
import YAML from 'yaml';
import { Category, Language, Severity } from '../types.js';
import type { Snippet } from '../types.js';
import { KNOWN_PATTERNS_VERSION, KNOWN_PATTERN_RULES } from '../rules/known-patterns.js';
import { ConfigError, errorMessage } from './errors.js';
import { formatZodError } from './validation.js';

export const RuleDefinition = z.object({
  id: z.string().regex(/^[A-Z0-9-]+$/, 'rule ids are upper-case words joined by dashes'),
  name: z.string(),
  category: Category,
  cweId: z.string().regex(/^CWE-\d+$/).optional(),
  severity: Severity,
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).default(''),
  confidence: z.number().min(0).max(1),
  languages: z.array(Language).default([]),
  description: z.string(),
  fix: z.string(),
});
export type RuleDefinition = z.infer<typeof RuleDefinition>;
export type RuleDefinitionInput = z.input<typeof RuleDefinition>;

export const RulePackFile = z.object({
  name: z.string(),
  version: z.string(),
  rules: z.array(RuleDefinition),
});
export type RulePackFile = z.infer<typeof RulePackFile>;

export interface DetectionRule extends RuleDefinition {
  readonly stage: 1;
  readonly regex: RegExp;
}

export interface RuleIndex {
  readonly version: string;
  readonly rules: readonly DetectionRule[];
  rulesFor(language: Language): readonly DetectionRule[];
}

export interface RuleMatch {
  line: number;
  text: string;
}

/**
 * Compile and freeze the rule index. Built once per process and shared
 * read-only by every run.
 */
export function loadRuleIndex(
  definitions: readonly RuleDefinitionInput[] = KNOWN_PATTERN_RULES,
  version: string = KNOWN_PATTERNS_VERSION
): RuleIndex {
  const parsed = z.array(RuleDefinition).safeParse(definitions);
  if (!parsed.success) {
    throw new ConfigError(`Invalid rule definitions: ${formatZodError(parsed.error)}`);
  }

  const seen = new Set<string>();
  const rules: DetectionRule[] = parsed.data.map((definition) => {
    if (seen.has(definition.id)) {
      throw new ConfigError(`Duplicate rule id: ${definition.id}`);
    }
    seen.add(definition.id);
    Object.freeze(definition.languages);
    return Object.freeze({
      ...definition,
      stage: 1 as const,
      regex: compile(definition),
    });
  });
  Object.freeze(rules);

  const byLanguage = new Map<Language, readonly DetectionRule[]>();
  const rulesFor = (language: Language): readonly DetectionRule[] => {
    let applicable = byLanguage.get(language);
    if (!applicable) {
      applicable = Object.freeze(
        rules.filter((rule) => rule.languages.length === 0 || rule.languages.includes(language))
      );
      byLanguage.set(language, applicable);
    }
    return applicable;
  };

  return Object.freeze({ version, rules, rulesFor });
}

/**
 * Built-in rules plus any rule packs named in config. Pack rules must not
 * reuse built-in ids.
 */
export function loadRuleIndexWithPacks(packPaths: readonly string[]): RuleIndex {
  if (packPaths.length === 0) {
    return loadRuleIndex();
  }
  const definitions: RuleDefinitionInput[] = [...KNOWN_PATTERN_RULES];
  const versions = [KNOWN_PATTERNS_VERSION];
  for (const path of packPaths) {
    const pack = readRulePack(path);
    definitions.push(...pack.rules);
    versions.push(`${pack.name}@${pack.version}`);
  }
  return loadRuleIndex(definitions, versions.join('+'));
}

export function readRulePack(path: string): RulePackFile {
  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read rule pack ${path}: ${errorMessage(error)}`);
  }
  const result = RulePackFile.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid rule pack ${path}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

function compile(definition: RuleDefinition): RegExp {
  try {
    return new RegExp(definition.pattern, definition.flags + 'g');
  } catch (error) {
    throw new ConfigError(`Rule ${definition.id} has an invalid pattern: ${errorMessage(error)}`);
  }
}

/**
 * Every match of the rule inside the snippet, with absolute line numbers.
 */
export function matchRule(rule: DetectionRule, snippet: Snippet): RuleMatch[] {
  const matches: RuleMatch[] = [];
  // matchAll works on a copy of the regex, so the shared one keeps lastIndex 0
  for (const match of snippet.text.matchAll(rule.regex)) {
    const before = snippet.text.slice(0, match.index ?? 0);
    const line = snippet.startLine + countNewlines(before);
    matches.push({ line, text: match[0] });
  }
  return matches;
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') count++;
  }
  return count;
}
