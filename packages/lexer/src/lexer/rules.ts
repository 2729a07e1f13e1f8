import type { Cursor } from './cursor';
import { BaseRule } from './rule';

const WHITESPACE = /\s/u;

/**
 * Skips Unicode whitespace and never produces a token
 */
export class SkipWhitespaceRule extends BaseRule<never> {
  readonly name = 'skip-whitespace';

  tryMatch(cursor: Cursor): null {
    while (cursor.currentChar !== null && WHITESPACE.test(cursor.currentChar)) {
      cursor.advance();
    }
    return null;
  }

  isConsuming(): boolean {
    return false;
  }
}
