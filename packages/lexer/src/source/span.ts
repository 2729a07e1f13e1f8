import { invariant } from '../invariant';
import type { SourceText } from './source-text';

/**
 * Half-open `[start, end)` offset range into some source text
 *
 * A span never covers zero characters; building one with `start >= end` is a
 * programming error and throws an InvariantViolation.
 */
export class Span {
  /** Inclusive start offset */
  readonly start: number;
  /** Exclusive end offset */
  readonly end: number;

  constructor(start: number, end: number) {
    invariant(
      Number.isInteger(start) && Number.isInteger(end) && start >= 0,
      `Span bounds must be non-negative integers, got [${start}, ${end})`,
    );
    invariant(start < end, 'Span start must be less than end');
    this.start = start;
    this.end = end;
  }

  get length(): number {
    return this.end - this.start;
  }

  contains(offset: number): boolean {
    return offset >= this.start && offset < this.end;
  }

  toString(): string {
    return `${this.start}..${this.end}`;
  }
}

/**
 * Text covered by a span
 */
export function sliceSpan(source: SourceText, span: Span): string {
  return source.text.slice(span.start, span.end);
}
