/**
 * What a structural parser hands back to the normalizer. Offsets are string
 * indices into the source text.
 */

export interface FunctionSpan {
  start: number;
  end: number;
  name?: string;
}

export interface TokenSpan {
  start: number;
  end: number;
}

export interface Extraction {
  functions: FunctionSpan[];
  /** Non-comment tokens, used to find module-level code between functions. */
  tokens: TokenSpan[];
}
