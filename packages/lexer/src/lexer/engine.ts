import { createLogger, type Logger } from '@tokweave/logger';
import { DiagnosticError } from '../errors';
import { invariant } from '../invariant';
import type { SourceText } from '../source/source-text';
import { Span } from '../source/span';
import type { Token } from '../source/token';
import { Cursor } from './cursor';
import type { Rule } from './rule';

/**
 * Default limits for the engine
 */
export const DEFAULT_ENGINE_OPTIONS = {
  /**
   * Consecutive `nextToken()` calls that may end where they started before the
   * engine reports a stall (set to Infinity to disable)
   */
  maxStalledRounds: 1,
} as const;

export interface EngineOptions {
  logger?: Logger;
  maxStalledRounds?: number;
}

/**
 * Rule-dispatch tokenizer
 *
 * Each `nextToken()` call tries the rules in list order and returns the first
 * token one of them produces. Before each attempt the cursor position is
 * recorded; a consuming rule that returns `null` is rolled back to it, while a
 * non-consuming rule keeps whatever it skipped. A rule that throws aborts the
 * call with its error and the cursor is left where the rule put it.
 *
 * @example
 * ```ts
 * const engine = new Engine(SourceText.fromString('main.tw', 'let x'), [
 *   new SkipWhitespaceRule(),
 *   letRule,
 *   identifierRule,
 * ]);
 *
 * for (const token of engine.tokens()) {
 *   console.log(token.kind, sliceSpan(engine.source, token.span));
 * }
 * ```
 */
export class Engine<K> {
  readonly source: SourceText;
  readonly cursor: Cursor;
  private readonly rules: readonly Rule<K>[];
  private readonly logger: Logger;
  private readonly maxStalledRounds: number;
  private stalledRounds = 0;
  /** Where the previous `nextToken()` call left the cursor */
  private lastEnd = 0;

  constructor(source: SourceText, rules: readonly Rule<K>[], options: EngineOptions = {}) {
    const maxStalledRounds = options.maxStalledRounds ?? DEFAULT_ENGINE_OPTIONS.maxStalledRounds;
    invariant(
      maxStalledRounds >= 0 && (Number.isInteger(maxStalledRounds) || maxStalledRounds === Infinity),
      `maxStalledRounds must be a non-negative integer or Infinity, got ${maxStalledRounds}`,
    );

    this.source = source;
    this.cursor = new Cursor(source);
    this.rules = [...rules];
    this.maxStalledRounds = maxStalledRounds;
    this.logger = (options.logger ?? createLogger({ environment: 'production' })).child({
      source: source.name,
    });
  }

  get position(): number {
    return this.cursor.position;
  }

  get currentChar(): string | null {
    return this.cursor.currentChar;
  }

  /**
   * Produce the next token, or `null` when no rule matched
   *
   * A call is a stalled round when it starts and ends at the offset the
   * previous call ended at. Moving the cursor between calls starts the count
   * again.
   *
   * @throws {DiagnosticError} When a rule fails, or when the engine stalls
   */
  nextToken(): Token<K> | null {
    const start = this.cursor.position;
    if (start !== this.lastEnd) {
      this.stalledRounds = 0;
    }

    const token = this.dispatch();
    const end = this.cursor.position;
    this.lastEnd = end;

    if (end !== start) {
      this.stalledRounds = 0;
      return token;
    }

    this.stalledRounds++;
    if (this.stalledRounds > this.maxStalledRounds) {
      this.logger.warn('tokenizer_stalled', { position: start, rounds: this.stalledRounds });
      throw new DiagnosticError('tokenizer made no progress', this.source, this.stallSpan(start))
        .withNote(
          `${this.stalledRounds} consecutive calls to nextToken() ended at offset ${start}`,
        );
    }

    return token;
  }

  /**
   * Yield tokens until no rule matches
   *
   * Each run starts with a fresh stall count, so iterating again at the end of
   * the text yields nothing instead of throwing.
   */
  *tokens(): Generator<Token<K>, void, undefined> {
    this.stalledRounds = 0;
    for (let token = this.nextToken(); token !== null; token = this.nextToken()) {
      yield token;
    }
  }

  tokenize(): Token<K>[] {
    return Array.from(this.tokens());
  }

  /**
   * Rewind to the start of the text
   */
  reset(): void {
    this.cursor.jumpTo(0);
    this.stalledRounds = 0;
    this.lastEnd = 0;
  }

  /**
   * The character the engine stalled on; at the end of the text, the last
   * character (or `0..1` for empty text)
   */
  private stallSpan(offset: number): Span {
    const length = this.source.length;
    const char = this.cursor.currentChar;
    if (char !== null) {
      return new Span(offset, offset + char.length);
    }
    const last = Array.from(this.source.text).pop();
    return last === undefined ? new Span(0, 1) : new Span(length - last.length, length);
  }

  private dispatch(): Token<K> | null {
    for (const [index, rule] of this.rules.entries()) {
      const ruleName = rule.name ?? `#${index}`;
      const before = this.cursor.position;

      let token: Token<K> | null;
      try {
        token = rule.tryMatch(this.cursor);
      } catch (error) {
        this.logger.debug('rule_failed', { rule: ruleName, position: this.cursor.position });
        throw error;
      }

      if (token !== null) {
        this.logger.debug('rule_matched', {
          rule: ruleName,
          start: token.span.start,
          end: token.span.end,
        });
        return token;
      }

      if (rule.isConsuming() && this.cursor.position !== before) {
        this.logger.debug('rule_backtracked', {
          rule: ruleName,
          from: this.cursor.position,
          to: before,
        });
        this.cursor.jumpTo(before);
      }
    }

    return null;
  }
}
