import type { Token } from '../source/token';
import type { Cursor } from './cursor';

/**
 * A unit of match logic tried by the engine
 *
 * `tryMatch` returns a token, or `null` when the rule does not apply at the
 * cursor. It may throw a DiagnosticError, which aborts the current
 * `nextToken()` call. Rules get the cursor as an explicit handle and never see
 * the engine's rule list.
 */
export interface Rule<K> {
  /** Shown in engine logs */
  readonly name?: string;
  tryMatch(cursor: Cursor): Token<K> | null;
  /**
   * Consuming rules are rolled back when they return `null`; non-consuming
   * (skip) rules keep whatever they advanced over.
   */
  isConsuming(): boolean;
}

export abstract class BaseRule<K> implements Rule<K> {
  abstract tryMatch(cursor: Cursor): Token<K> | null;

  isConsuming(): boolean {
    return true;
  }
}

export interface RuleDefinition<K> {
  name?: string;
  match: (cursor: Cursor) => Token<K> | null;
  /** Default: true */
  consuming?: boolean;
}

/**
 * Build a rule from a match function
 *
 * @example
 * ```ts
 * const letRule = defineRule<'let'>({
 *   name: 'let',
 *   match(cursor) {
 *     if (!cursor.startsWith('let')) return null;
 *     const start = cursor.position;
 *     cursor.advanceBy(3);
 *     return createToken('let', cursor.spanFrom(start));
 *   },
 * });
 * ```
 */
export function defineRule<K>(definition: RuleDefinition<K>): Rule<K> {
  const consuming = definition.consuming ?? true;
  return {
    name: definition.name,
    tryMatch: (cursor) => definition.match(cursor),
    isConsuming: () => consuming,
  };
}
