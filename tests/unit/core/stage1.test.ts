import { describe, it, expect } from 'vitest';
import { normalize } from '../../../src/core/normalizer.js';
import { runStage1 } from '../../../src/core/stage1.js';
import { FakeReasoningClient, failingClient, reasoningFinding } from '../../helpers/fake-reasoning.js';
import { makeContext, source } from '../../helpers/context.js';

const VULNERABLE = source(
  '#include <string.h>',
  '',
  'void copy_name(const char *input) {',
  '    char buf[16];',
  '    strcpy(buf, input);',
  '}'
);

const REMEDIATED = source(
  '#include <string.h>',
  '',
  'void copy_name(const char *input) {',
  '    char buf[64];',
  '    if (strlen(input) >= sizeof(buf)) return;',
  '    snprintf(buf, sizeof(buf), "%s", input);',
  '}'
);

describe('core/stage1', () => {
  it('should block on an unbounded copy into a small buffer', async () => {
    const report = await runStage1([normalize(VULNERABLE, 'c', 'src/name.c')], makeContext());

    expect(report.verdict).toBe('block');
    expect(report.findings).toEqual([
      {
        id: 'S1-001',
        stage: 1,
        category: 'buffer-overflow',
        cweId: 'CWE-120',
        file: 'src/name.c',
        lineStart: 5,
        lineEnd: 5,
        confidence: 0.9,
        severity: 'critical',
        source: 'rule',
        ruleId: 'BO-UNBOUNDED-COPY',
        fix: 'Use a bounded copy (snprintf, strlcpy) with the destination size and check for truncation.',
      },
    ]);
    expect(report.errors).toEqual([]);
  });

  it('should pass the remediated version', async () => {
    const report = await runStage1([normalize(REMEDIATED, 'c', 'src/name.c')], makeContext());

    expect(report.verdict).toBe('pass');
    expect(report.findings).toEqual([]);
  });

  it('should include rationales in explain mode', async () => {
    const report = await runStage1([normalize(VULNERABLE, 'c', 'src/name.c')], makeContext({ explain: true }));

    expect(report.findings[0].rationale).toBe(
      'Unbounded string copy: Copies into a destination buffer without checking its size.'
    );
  });

  describe('explanations', () => {
    it('should ask the backend to explain findings in explain mode', async () => {
      const client = new FakeReasoningClient(() => [
        reasoningFinding({
          rationale: 'A name longer than 15 bytes overwrites the stack.',
          fix: 'Use snprintf with sizeof(buf).',
        }),
      ]);

      const report = await runStage1(
        [normalize(VULNERABLE, 'c', 'src/name.c')],
        makeContext({ explain: true }, { reasoning: client })
      );

      expect(client.requests.map((request) => [request.promptTemplate.id, request.snippet.id])).toEqual([
        ['explain-finding', 'src/name.c:3-6'],
      ]);
      expect(client.requests[0].context).toContain('S1-001: buffer-overflow (CWE-120), severity critical');
      expect(report.explanations).toEqual([
        'S1-001: A name longer than 15 bytes overwrites the stack. Fix: Use snprintf with sizeof(buf).',
      ]);
      expect(report.verdict).toBe('block');
    });

    it('should fall back to CWE advice when the backend fails', async () => {
      const report = await runStage1(
        [normalize(VULNERABLE, 'c', 'src/name.c')],
        makeContext({ explain: true }, { reasoning: failingClient('unavailable') })
      );

      expect(report.explanations).toEqual([
        'CWE-120: Potential buffer overflow. Avoid unsafe functions and add bounds checks.',
      ]);
      expect(report.notes).toContain(
        'S1-001: explanation from built-in CWE advice (unavailable: fake backend unavailable)'
      );
      expect(report.errors).toEqual([]);
    });

    it('should use CWE advice without a backend', async () => {
      const report = await runStage1([normalize(VULNERABLE, 'c', 'src/name.c')], makeContext({ explain: true }));

      expect(report.explanations).toEqual([
        'CWE-120: Potential buffer overflow. Avoid unsafe functions and add bounds checks.',
      ]);
      expect(report.notes).toContain('explanations from built-in CWE advice: no reasoning backend is configured');
    });

    it('should explain at most three findings', async () => {
      const client = new FakeReasoningClient(() => [reasoningFinding({ rationale: 'Overflow.' })]);
      const units = ['a.c', 'b.c', 'c.c', 'd.c'].map((path) => normalize(VULNERABLE, 'c', path));

      const report = await runStage1(units, makeContext({ explain: true }, { reasoning: client }));

      expect(report.findings).toHaveLength(4);
      expect(client.requests).toHaveLength(3);
      expect(report.explanations).toEqual(['S1-001: Overflow.', 'S1-002: Overflow.', 'S1-003: Overflow.']);
      expect(report.notes).toContain('explained the first 3 of 4 finding(s)');
    });

    it('should leave explanations out of ordinary runs', async () => {
      const report = await runStage1([normalize(VULNERABLE, 'c', 'src/name.c')], makeContext());

      expect(report.explanations).toBeUndefined();
    });
  });

  it('should give identical reports for identical input', async () => {
    const unit = normalize(VULNERABLE, 'c', 'src/name.c');

    const first = await runStage1([unit], makeContext());
    const second = await runStage1([unit], makeContext());

    expect(second).toEqual(first);
  });

  it('should pass with no findings on empty input', async () => {
    const report = await runStage1([normalize('', 'c', 'empty.c')], makeContext());

    expect(report.verdict).toBe('pass');
    expect(report.summary.total).toBe(0);
  });

  it('should cap rule hits before merging with the classifier', async () => {
    const unit = normalize(
      source(
        'void f(char *a, char *b) {',
        '    strcpy(a, b);',
        '    strcpy(a, b);',
        '    strcpy(a, b);',
        '}'
      ),
      'c',
      'f.c'
    );

    const report = await runStage1([unit], makeContext({ stage1: { maxHitsPerRule: 2 } }));

    // the classifier (0.989) outscores the strongest rule hit and replaces it
    expect(report.findings.map((finding) => [finding.source, finding.lineStart, finding.confidence])).toEqual([
      ['classifier', 1, 0.989],
      ['rule', 3, 0.9],
    ]);
  });

  it('should not block on categories outside the blocking list', async () => {
    const unit = normalize('const char *password = "test-secret";', 'c', 'cfg.c');

    const report = await runStage1([unit], makeContext());

    expect(report.findings.map((finding) => finding.ruleId)).toEqual(['HARDCODED-SECRET']);
    expect(report.verdict).toBe('pass');
  });

  it('should note degraded inputs', async () => {
    const report = await runStage1([normalize('void f() {\n  strcpy(a, b);\n', 'c', 'broken.c')], makeContext());

    expect(report.notes).toHaveLength(1);
    expect(report.notes[0]).toMatch(/^broken\.c: analyzed as coarse blocks \((?:syntax error|missing '.+') at line \d+\)$/);
    expect(report.verdict).toBe('block');
  });

  describe('llm-only mode', () => {
    it('should ask the reasoning backend instead of the rules', async () => {
      const client = new FakeReasoningClient((snippet) =>
        snippet.functionName === 'copy_name'
          ? [reasoningFinding({ issue: 'Stack buffer overflow', category: 'buffer-overflow', severity: 'critical', line: 5, confidence: 0.9 })]
          : []
      );

      const report = await runStage1(
        [normalize(VULNERABLE, 'c', 'src/name.c')],
        makeContext({ mode: 'llm_only' }, { reasoning: client })
      );

      expect(client.requests.map((request) => request.promptTemplate.id)).toEqual([
        'known-vulnerabilities',
        'known-vulnerabilities',
      ]);
      expect(report.findings).toHaveLength(1);
      expect(report.findings[0]).toMatchObject({
        source: 'reasoning',
        category: 'buffer-overflow',
        lineStart: 5,
        lineEnd: 5,
        confidence: 0.9,
      });
      expect(report.findings[0].rationale).toBeUndefined();
      expect(report.verdict).toBe('block');
      expect(report.notes).toContain('rule matcher and classifier replaced by the reasoning backend (llm-only mode)');
    });

    it('should be indeterminate when the backend fails', async () => {
      const report = await runStage1(
        [normalize(VULNERABLE, 'c', 'src/name.c')],
        makeContext({ mode: 'llm_only' }, { reasoning: failingClient('rate_limit') })
      );

      expect(report.verdict).toBe('indeterminate');
      expect(report.errors.map((error) => [error.kind, error.snippetId])).toEqual([
        ['rate_limit', 'src/name.c:1-1'],
        ['rate_limit', 'src/name.c:3-6'],
      ]);
    });
  });
});
