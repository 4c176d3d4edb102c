/**
 * SARIF 2.1.0 output, for code-scanning uploads.
 */

import type { Finding, GateDecision, Severity } from '../types.js';
import { VERSION } from '../version.js';

export const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';
export const TOOL_NAME = 'stagegate';

type SarifLevel = 'error' | 'warning' | 'note';

export interface SarifRule {
  id: string;
  shortDescription: { text: string };
  properties: { category: string; cweId?: string };
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{
    physicalLocation: {
      artifactLocation: { uri: string };
      region: { startLine: number; endLine: number };
    };
  }>;
  properties: { findingId: string; stage: number; confidence: number; source: string };
}

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifRule[] } };
    results: SarifResult[];
    properties: { runId: string; overallVerdict: string; exitCode: number };
  }>;
}

const LEVELS: Record<Severity, SarifLevel> = {
  critical: 'error',
  high: 'error',
  medium: 'warning',
  low: 'note',
};

/** Rule findings keep their rule id; the rest are keyed by source and category. */
export function sarifRuleId(finding: Finding): string {
  return finding.ruleId ?? `${finding.source}/${finding.category}`;
}

function describe(finding: Finding): string {
  const lead = finding.rationale ?? `${finding.category} (${finding.source})`;
  return finding.fix ? `${lead}. Fix: ${finding.fix}` : lead;
}

export function outputSarif(decision: GateDecision, toolVersion: string = VERSION): SarifLog {
  const findings = [...decision.stages.stage1.findings, ...decision.stages.stage2.findings];

  const rules = new Map<string, SarifRule>();
  for (const finding of findings) {
    const id = sarifRuleId(finding);
    if (rules.has(id)) continue;
    const properties: SarifRule['properties'] = { category: finding.category };
    if (finding.cweId) properties.cweId = finding.cweId;
    rules.set(id, { id, shortDescription: { text: `${finding.category} finding` }, properties });
  }

  return {
    $schema: SARIF_SCHEMA,
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: TOOL_NAME,
            version: toolVersion,
            rules: [...rules.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)),
          },
        },
        results: findings.map((finding) => ({
          ruleId: sarifRuleId(finding),
          level: LEVELS[finding.severity],
          message: { text: describe(finding) },
          locations: [
            {
              physicalLocation: {
                artifactLocation: { uri: finding.file },
                region: { startLine: finding.lineStart, endLine: finding.lineEnd },
              },
            },
          ],
          properties: {
            findingId: finding.id,
            stage: finding.stage,
            confidence: finding.confidence,
            source: finding.source,
          },
        })),
        properties: {
          runId: decision.runId,
          overallVerdict: decision.overallVerdict,
          exitCode: decision.exitCode,
        },
      },
    ],
  };
}
