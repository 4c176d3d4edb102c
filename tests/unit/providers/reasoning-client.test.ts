import { describe, it, expect, vi } from 'vitest';
import {
  ExecutorReasoningClient,
  backoffDelay,
  normalizeResponse,
  toReasoningError,
} from '../../../src/providers/reasoning-client.js';
import type { PromptTemplate, RetryPolicy } from '../../../src/providers/reasoning-client.js';
import type { PromptExecutor } from '../../../src/providers/executor.js';
import { ReasoningServiceError } from '../../../src/core/errors.js';
import { numberLines } from '../../../src/providers/prompts/constants.js';
import { parseReasoningOutput } from '../../../src/core/validation.js';
import type { Snippet } from '../../../src/types.js';

const SNIPPET: Snippet = {
  id: 'a.c:9-10',
  startLine: 9,
  endLine: 10,
  startOffset: 0,
  endOffset: 3,
  text: 'a\nb',
  kind: 'function',
};

const TEMPLATE: PromptTemplate = {
  id: 'test',
  render: ({ snippet }) => `review ${snippet.id}`,
  strictSuffix: ' STRICT',
};

const POLICY: RetryPolicy = { retries: 0, baseDelayMs: 100, maxDelayMs: 150, timeoutMs: 1000 };

type Step = string | Error;

function scriptedExecutor(steps: Step[]): PromptExecutor & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    name: 'scripted',
    prompts,
    isAvailable: async () => true,
    runPrompt: async (prompt) => {
      prompts.push(prompt);
      const step = steps.shift();
      if (step === undefined) throw new Error('script exhausted');
      if (step instanceof Error) throw step;
      return { output: step };
    },
  };
}

function request() {
  return { snippet: SNIPPET, context: '', promptTemplate: TEMPLATE };
}

describe('providers/reasoning-client', () => {
  describe('ExecutorReasoningClient', () => {
    it('should parse a JSON reply', async () => {
      const executor = scriptedExecutor(['{"findings":[{"issue":"Refund without check","severity":"high","confidence":0.9,"line":9}]}']);
      const client = new ExecutorReasoningClient(executor, { policy: POLICY });

      const response = await client.request(request());

      expect(client.name).toBe('scripted');
      expect(executor.prompts).toEqual(['review a.c:9-10']);
      expect(response.findings).toEqual([
        { issue: 'Refund without check', severity: 'high', confidence: 0.9, line: 9, rationale: '' },
      ]);
    });

    it('should ask once more with the strict suffix when the reply is not JSON', async () => {
      const executor = scriptedExecutor(['Sure! Here is my review.', '{"findings":[]}']);
      const client = new ExecutorReasoningClient(executor, { policy: POLICY });

      const response = await client.request(request());

      expect(response.findings).toEqual([]);
      expect(executor.prompts).toEqual(['review a.c:9-10', 'review a.c:9-10 STRICT']);
    });

    it('should fail with invalid_response after the strict re-ask', async () => {
      const executor = scriptedExecutor(['nope', 'still nope']);
      const client = new ExecutorReasoningClient(executor, { policy: POLICY });

      await expect(client.request(request())).rejects.toMatchObject({ kind: 'invalid_response' });
      expect(executor.prompts).toHaveLength(2);
    });

    it('should retry transient failures with exponential backoff', async () => {
      const executor = scriptedExecutor([
        new ReasoningServiceError('rate_limit', 'slow down'),
        new ReasoningServiceError('rate_limit', 'slow down'),
        '{"findings":[]}',
      ]);
      const sleep = vi.fn(async () => {});
      const client = new ExecutorReasoningClient(executor, { policy: { ...POLICY, retries: 2 }, sleep });

      await client.request(request());

      expect(executor.prompts).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[100], [150]]);
    });

    it('should give up once retries are spent', async () => {
      const executor = scriptedExecutor([
        new ReasoningServiceError('unavailable', 'down'),
        new ReasoningServiceError('unavailable', 'down'),
      ]);
      const client = new ExecutorReasoningClient(executor, { policy: { ...POLICY, retries: 1 }, sleep: async () => {} });

      await expect(client.request(request())).rejects.toMatchObject({ kind: 'unavailable', message: 'down' });
      expect(executor.prompts).toHaveLength(2);
    });

    it('should not retry authentication failures', async () => {
      const executor = scriptedExecutor([new ReasoningServiceError('auth', 'bad key'), '{"findings":[]}']);
      const sleep = vi.fn(async () => {});
      const client = new ExecutorReasoningClient(executor, { policy: { ...POLICY, retries: 3 }, sleep });

      await expect(client.request(request())).rejects.toMatchObject({ kind: 'auth' });
      expect(executor.prompts).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should time out a backend that never replies', async () => {
      const executor: PromptExecutor = {
        name: 'silent',
        isAvailable: async () => true,
        runPrompt: () => new Promise(() => {}),
      };
      const client = new ExecutorReasoningClient(executor, { policy: { ...POLICY, timeoutMs: 20 } });

      await expect(client.request(request())).rejects.toMatchObject({
        kind: 'timeout',
        message: 'silent: no reply within 20ms',
      });
    });
  });

  describe('normalizeResponse', () => {
    it('should map words to confidences and fill in defaults', () => {
      const response = normalizeResponse({
        findings: [
          { title: 'Stale price', severity: 'HIGH', confidence: 'medium', rationale: '' },
          { severity: 'bogus', rationale: 'r' },
          { issue: 'x', severity: 'low', confidence: 1.7, line: 12.9, rationale: '' },
        ],
      });

      expect(response.findings).toEqual([
        { issue: 'Stale price', severity: 'high', confidence: 0.5, rationale: '' },
        { issue: 'Unnamed issue', severity: 'medium', confidence: 0.5, rationale: 'r' },
        { issue: 'x', severity: 'low', confidence: 1, line: 12, rationale: '' },
      ]);
    });
  });

  describe('helpers', () => {
    it('should double the delay up to the cap', () => {
      const policy = { baseDelayMs: 500, maxDelayMs: 8000 };

      expect([0, 1, 3, 5].map((attempt) => backoffDelay(attempt, policy))).toEqual([500, 1000, 4000, 8000]);
    });

    it('should classify raw errors by message', () => {
      expect(toReasoningError(new Error('request timed out'), 'x')).toMatchObject({ kind: 'timeout', message: 'x: request timed out' });
      expect(toReasoningError(new Error('HTTP 429'), 'x').kind).toBe('rate_limit');
      expect(toReasoningError(new Error('401 Unauthorized'), 'x').kind).toBe('auth');
      expect(toReasoningError('socket closed', 'x').kind).toBe('unavailable');
    });

    it('should number snippet lines with absolute positions', () => {
      expect(numberLines(SNIPPET)).toBe(' 9 | a\n10 | b');
    });

    it('should pull JSON out of fenced replies with trailing commas', () => {
      const parsed = parseReasoningOutput('```json\n{"findings":[{"issue":"a",}],}\n```');

      expect(parsed).toEqual({ success: true, data: { findings: [{ issue: 'a', rationale: '' }] } });
    });
  });
});
