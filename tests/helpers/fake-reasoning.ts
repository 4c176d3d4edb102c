import type { Snippet } from '../../src/types.js';
import { ReasoningServiceError } from '../../src/core/errors.js';
import type {
  ReasoningClient,
  ReasoningFinding,
  ReasoningRequest,
  ReasoningResponse,
} from '../../src/providers/reasoning-client.js';

type Script = (snippet: Snippet) => ReasoningFinding[] | ReasoningServiceError;

/**
 * In-process reasoning backend. Replies come from a script keyed by the
 * snippet; returning an error makes the request fail with it.
 */
export class FakeReasoningClient implements ReasoningClient {
  readonly name: string;
  readonly requests: ReasoningRequest[] = [];
  private readonly script: Script;

  constructor(script: Script = () => [], name = 'fake') {
    this.script = script;
    this.name = name;
  }

  async request(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.requests.push(request);
    const reply = this.script(request.snippet);
    if (reply instanceof ReasoningServiceError) {
      throw reply;
    }
    return { findings: reply };
  }
}

export function failingClient(kind: ReasoningServiceError['kind'] = 'unavailable'): FakeReasoningClient {
  return new FakeReasoningClient(() => new ReasoningServiceError(kind, `fake backend ${kind}`));
}

export function reasoningFinding(overrides: Partial<ReasoningFinding> = {}): ReasoningFinding {
  return {
    issue: 'Coupon applied twice',
    severity: 'high',
    confidence: 0.8,
    rationale: 'Both discounts can apply to the same order',
    ...overrides,
  };
}
