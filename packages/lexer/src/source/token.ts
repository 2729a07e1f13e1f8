import type { Span } from './span';

/**
 * A token produced by a rule
 *
 * `K` is whatever the host uses to tell tokens apart: a string union, an enum,
 * or an object carrying a parsed value.
 */
export interface Token<K> {
  readonly kind: K;
  readonly span: Span;
}

export function createToken<K>(kind: K, span: Span): Token<K> {
  return { kind, span };
}
