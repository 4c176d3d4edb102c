/**
 * Human-Readable Finding Report
 *
 * Turns gate findings into a tester-friendly format:
 * - Title = what goes wrong (outcome, not implementation)
 * - What happens = plain English consequence
 * - How to check = steps a tester would take
 * - Technical details = folded away, for developers
 */

import type { Category, Finding, GateDecision, Severity } from '../types.js';

export interface HumanReadableFinding {
  id: string;
  humanTitle: string;
  whatHappens: string;
  howToCheck: string[];
  impact: string;
  severity: Severity;
  category: Category;
  technicalDetails: {
    file: string;
    lineStart: number;
    lineEnd: number;
    cweId?: string;
    confidence: number;
    source: Finding['source'];
    ruleId?: string;
    rationale?: string;
    fix?: string;
  };
}

// ─────────────────────────────────────────────────────────────
// Category templates
// ─────────────────────────────────────────────────────────────

interface CategoryTemplate {
  humanTitle: (finding: Finding) => string;
  whatHappens: string;
  impact: (severity: Severity) => string;
  checkHints: string[];
}

const CATEGORY_TEMPLATES: Record<Category, CategoryTemplate> = {
  'buffer-overflow': {
    humanTitle: () => 'Long input can overwrite memory and crash or take over the program',
    whatHappens: 'Data is copied into a fixed-size buffer without checking that it fits.',
    impact: (s) => s === 'critical' ? 'An attacker may run their own code inside the process.' :
                   'The program can crash or corrupt data it holds.',
    checkHints: ['Send input far longer than the field expects', 'Include format characters such as %s and %n in text input'],
  },
  'injection': {
    humanTitle: (f) => f.cweId === 'CWE-89' ? 'Database can be manipulated by attackers' :
                       f.cweId === 'CWE-78' ? 'System commands can be hijacked' :
                       f.cweId === 'CWE-79' ? 'Malicious scripts can run in user browsers' :
                       'User input can be used to attack the system',
    whatHappens: 'Input is pasted into a query, command or page without escaping.',
    impact: (s) => s === 'critical' ? 'Data breach or full system compromise is possible.' :
                   'Sensitive data exposure or unauthorized actions are possible.',
    checkHints: ['Include quotes or semicolons in form data', 'Try URL parameters with encoded characters'],
  },
  'code-execution': {
    humanTitle: () => 'Text sent by a user can be run as code',
    whatHappens: 'A string built at run time is evaluated as program code.',
    impact: () => 'Anyone who controls that string controls the program.',
    checkHints: ['Submit input that looks like code (for example 1+1)', 'Check whether the output changes accordingly'],
  },
  'deserialization': {
    humanTitle: () => 'Uploaded or stored data can smuggle in objects that run code',
    whatHappens: 'Untrusted bytes are loaded with a deserializer that can build arbitrary objects.',
    impact: () => 'A crafted payload may execute code when it is loaded.',
    checkHints: ['Find where saved files or cookies are read back', 'Replace their content with unexpected data'],
  },
  'path-traversal': {
    humanTitle: () => 'Attackers can read or write files outside the intended folder',
    whatHappens: 'A file path is built from input without pinning it to a base directory.',
    impact: () => 'Configuration, keys or other users\' files may be exposed.',
    checkHints: ['Use ../ sequences in file name parameters', 'Try absolute paths in upload or download fields'],
  },
  'hardcoded-secret': {
    humanTitle: () => 'Passwords or API keys are visible in the code',
    whatHappens: 'A credential is written directly into the source.',
    impact: () => 'Anyone with the code or the built artifact has the credential.',
    checkHints: ['Search the build output for the credential', 'Rotate the key and check what stops working'],
  },
  'business-logic': {
    humanTitle: () => 'The feature can be used in a way its rules should not allow',
    whatHappens: 'The code lets a sequence of actions reach a state the business rules forbid.',
    impact: (s) => s === 'critical' || s === 'high' ? 'Money, stock or access can be obtained without paying or permission.' :
                   'Records can end up inconsistent.',
    checkHints: ['Repeat the same step twice (apply a coupon, submit a payment)', 'Call the operation as a user without the expected role'],
  },
  'unclassified': {
    humanTitle: () => 'Suspicious code that needs a closer look',
    whatHappens: 'The reasoning backend flagged this code without naming a category.',
    impact: () => 'Impact unknown until a developer reviews it.',
    checkHints: ['Ask the owning team to review the flagged lines'],
  },
};

export function toHumanReadable(finding: Finding): HumanReadableFinding {
  const template = CATEGORY_TEMPLATES[finding.category];
  const howToCheck = [...template.checkHints];
  const fileName = finding.file.split('/').pop() || finding.file;
  if (/api|route|controller|handler/i.test(fileName)) {
    howToCheck.unshift(`Exercise the endpoint implemented in ${fileName}`);
  }

  return {
    id: finding.id,
    humanTitle: template.humanTitle(finding),
    whatHappens: template.whatHappens,
    howToCheck: howToCheck.slice(0, 3),
    impact: template.impact(finding.severity),
    severity: finding.severity,
    category: finding.category,
    technicalDetails: {
      file: finding.file,
      lineStart: finding.lineStart,
      lineEnd: finding.lineEnd,
      cweId: finding.cweId,
      confidence: finding.confidence,
      source: finding.source,
      ruleId: finding.ruleId,
      rationale: finding.rationale,
      fix: finding.fix,
    },
  };
}

const SEVERITY_ICON: Record<Severity, string> = {
  critical: '🔴',
  high: '🟠',
  medium: '🟡',
  low: '⚪',
};

export function formatHumanReadableMarkdown(finding: HumanReadableFinding): string {
  const details = finding.technicalDetails;
  const location = details.lineEnd > details.lineStart
    ? `${details.file}:${details.lineStart}-${details.lineEnd}`
    : `${details.file}:${details.lineStart}`;

  const technical = [
    `- **ID:** ${finding.id}`,
    `- **File:** \`${location}\``,
    `- **Category:** ${finding.category}${details.cweId ? ` (${details.cweId})` : ''}`,
    `- **Confidence:** ${details.confidence.toFixed(2)} via ${details.ruleId ? `rule ${details.ruleId}` : details.source}`,
  ];
  if (details.rationale) technical.push('', details.rationale);
  if (details.fix) technical.push('', `**Suggested Fix:** ${details.fix}`);

  return `### ${SEVERITY_ICON[finding.severity]} ${finding.humanTitle}

**What happens:** ${finding.whatHappens}

**How to check:**
${finding.howToCheck.map((step, i) => `${i + 1}. ${step}`).join('\n')}

**Impact:** ${finding.impact}

<details>
<summary>Technical Details</summary>

${technical.join('\n')}

</details>
`;
}

/**
 * Tester-facing summary of every finding in a decision, grouped by severity.
 */
export function outputHumanReadableMarkdown(decision: GateDecision): string {
  const { stage1, stage2 } = decision.stages;
  const findings = [...stage1.findings, ...stage2.findings].map(toHumanReadable);

  const sections: string[] = [`# Security Gate Findings

> **${findings.length} finding(s)** in ${decision.inputs.length} file(s); gate verdict: **${decision.overallVerdict}**`];

  const groups: Array<[Severity, string]> = [
    ['critical', 'Critical Issues'],
    ['high', 'High Priority Issues'],
    ['medium', 'Medium Priority Issues'],
    ['low', 'Low Priority Issues'],
  ];
  for (const [severity, heading] of groups) {
    const group = findings.filter((finding) => finding.severity === severity);
    if (group.length > 0) {
      sections.push(`## ${SEVERITY_ICON[severity]} ${heading}\n\n${group.map(formatHumanReadableMarkdown).join('\n')}`);
    }
  }

  if (findings.length === 0) {
    sections.push('No findings to check.');
  }

  return sections.join('\n\n') + '\n';
}
