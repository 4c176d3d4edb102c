import { describe, it, expect } from 'vitest';
import { defaultConfig } from '../../../src/core/config.js';
import { InternalInvariantViolation } from '../../../src/core/errors.js';
import { GateOrchestrator, exitCodeFor, runGate } from '../../../src/core/gate.js';
import type { GateInput, GateRunOptions } from '../../../src/core/gate.js';
import { buildStageReport, skippedReport } from '../../../src/core/report.js';
import type { StagegateConfigInput } from '../../../src/types.js';
import { FakeReasoningClient, failingClient, reasoningFinding } from '../../helpers/fake-reasoning.js';
import { builtinArtifacts, makeContext, source } from '../../helpers/context.js';

const VULNERABLE: GateInput = {
  path: 'src/name.c',
  text: source(
    'void copy_name(const char *input) {',
    '    char buf[16];',
    '    strcpy(buf, input);',
    '}'
  ),
};

const CLEAN: GateInput = {
  path: 'src/add.c',
  text: source(
    'int add(int a, int b) {',
    '    return a + b;',
    '}'
  ),
};

function options(config: StagegateConfigInput = {}, extra: Partial<GateRunOptions> = {}): GateRunOptions {
  return { config: defaultConfig(config), artifacts: builtinArtifacts(), runId: 'run-test', ...extra };
}

describe('core/gate', () => {
  describe('full mode', () => {
    it('should stop after a stage 1 block', async () => {
      const client = new FakeReasoningClient();

      const decision = await runGate([VULNERABLE], options({}, { reasoning: client }));

      expect(decision.overallVerdict).toBe('block');
      expect(decision.exitCode).toBe(11);
      expect(decision.trace).toEqual(['READY', 'STAGE1_RUNNING', 'DONE']);
      expect(decision.stages.stage2.verdict).toBe('skipped');
      expect(decision.stages.stage2.notes).toEqual(['not reached: stage 1 blocked']);
      expect(decision.stages.stage3.notes).toEqual(['not reached: stage 1 blocked']);
      expect(client.requests).toHaveLength(0);
    });

    it('should run every stage on clean code', async () => {
      const decision = await runGate([CLEAN], options({}, { reasoning: new FakeReasoningClient() }));

      expect(decision.overallVerdict).toBe('pass');
      expect(decision.exitCode).toBe(0);
      expect(decision.trace).toEqual(['READY', 'STAGE1_RUNNING', 'STAGE2_RUNNING', 'STAGE3_RUNNING', 'DONE']);
      expect(decision.stages.stage3.forecast).toMatchObject({ basis: 'single-point', score: 0 });
      expect(decision.versions).toEqual({
        rules: 'known-patterns@1.2.0',
        classifier: 'snippet-logreg-2024.10',
        temporal: 'risk-ar3-2024.10',
        reasoning: 'fake',
      });
    });

    it('should exit 12 when stage 2 blocks', async () => {
      const client = new FakeReasoningClient(() => [reasoningFinding({ issue: 'Negative quantity accepted' })]);

      const decision = await runGate([CLEAN], options({}, { reasoning: client }));

      expect(decision.exitCode).toBe(12);
      expect(decision.trace).toEqual(['READY', 'STAGE1_RUNNING', 'STAGE2_RUNNING', 'DONE']);
      expect(decision.stages.stage3.notes).toEqual(['not reached: stage 2 blocked']);
    });

    it('should exit 14 when a stage is indeterminate', async () => {
      const decision = await runGate([CLEAN], options({}, { reasoning: failingClient('timeout') }));

      expect(decision.overallVerdict).toBe('indeterminate');
      expect(decision.exitCode).toBe(14);
      expect(decision.stages.stage3.verdict).toBe('pass');
    });

    it('should pass an indeterminate run when failOnIndeterminate is off', async () => {
      const decision = await runGate(
        [CLEAN],
        options({ failOnIndeterminate: false }, { reasoning: failingClient('timeout') })
      );

      expect(decision.overallVerdict).toBe('indeterminate');
      expect(decision.exitCode).toBe(0);
    });

    it('should still run stage 2 after a stage 1 block when asked to', async () => {
      const client = new FakeReasoningClient();

      const decision = await runGate([VULNERABLE], options({ stage2: { runWhenBlocked: true } }, { reasoning: client }));

      expect(decision.trace).toEqual(['READY', 'STAGE1_RUNNING', 'STAGE2_RUNNING', 'DONE']);
      expect(decision.stages.stage2.verdict).toBe('pass');
      expect(decision.exitCode).toBe(11);
      expect(client.requests).toHaveLength(1);
    });
  });

  describe('modes', () => {
    it('should run only stage 1 in stage1_only mode', async () => {
      const decision = await runGate([CLEAN], options({ mode: 'stage1_only' }));

      expect(decision.trace).toEqual(['READY', 'STAGE1_RUNNING', 'DONE']);
      expect(decision.stages.stage2.notes).toEqual(['not selected in stage1_only mode']);
      expect(decision.stages.stage3.verdict).toBe('skipped');
      expect(decision.versions.reasoning).toBeUndefined();
    });

    it('should run only stage 2 in stage2_only mode', async () => {
      const decision = await runGate([VULNERABLE], options({ mode: 'stage2_only' }, { reasoning: new FakeReasoningClient() }));

      expect(decision.trace).toEqual(['READY', 'STAGE2_RUNNING', 'DONE']);
      expect(decision.stages.stage1.verdict).toBe('skipped');
      expect(decision.exitCode).toBe(0);
    });

    it('should forecast without findings in stage3_only mode', async () => {
      const decision = await runGate([VULNERABLE], options({ mode: 'stage3_only' }));

      expect(decision.trace).toEqual(['READY', 'STAGE3_RUNNING', 'DONE']);
      expect(decision.stages.stage3.forecast?.currentPoint).toEqual({
        unsafeCallDensity: 25,
        degradedShare: 0,
        linesOfCode: 4,
      });
    });
  });

  describe('inputs', () => {
    it('should sort inputs by path and detect languages', async () => {
      const decision = await runGate(
        [{ path: 'b.py', text: 'x = 1' }, { path: 'a.c', text: 'int x;' }],
        options({ mode: 'stage1_only' })
      );

      expect(decision.inputs.map((input) => [input.path, input.language])).toEqual([
        ['a.c', 'c'],
        ['b.py', 'python'],
      ]);
    });

    it('should record degraded inputs', async () => {
      const decision = await runGate([{ path: 'x.c', text: 'int f() {' }], options({ mode: 'stage1_only' }));

      expect(decision.inputs[0]).toEqual({
        path: 'x.c',
        language: 'c',
        degraded: true,
        degradedReason: expect.stringMatching(/^(?:syntax error|missing '.+') at line 1$/),
        snippets: 1,
      });
    });
  });

  describe('GateOrchestrator', () => {
    it('should refuse to run twice', async () => {
      const orchestrator = new GateOrchestrator(makeContext({ mode: 'stage1_only' }));
      await orchestrator.run([CLEAN]);

      expect(orchestrator.state).toBe('DONE');
      await expect(orchestrator.run([CLEAN])).rejects.toThrow(InternalInvariantViolation);
    });
  });

  describe('exitCodeFor', () => {
    it('should give the earliest blocking stage', () => {
      const block1 = buildStageReport(1, 'block', []);
      const block3 = buildStageReport(3, 'block', []);

      expect(exitCodeFor(block1, skippedReport(2, 'x'), block3, true)).toBe(11);
      expect(exitCodeFor(buildStageReport(1, 'pass', []), skippedReport(2, 'x'), block3, true)).toBe(13);
    });

    it('should let a block win over indeterminate', () => {
      const indeterminate = buildStageReport(1, 'indeterminate', []);

      expect(exitCodeFor(indeterminate, buildStageReport(2, 'block', []), skippedReport(3, 'x'), true)).toBe(12);
    });
  });
});
