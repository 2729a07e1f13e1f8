import { invariant } from '../invariant';
import type { SourceText } from '../source/source-text';
import { Span } from '../source/span';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Mutable scan position over a source text
 *
 * `currentChar` is `null` exactly when `position` is at or past the end of the
 * text; otherwise it is the character (one code point) starting at `position`.
 * Offsets are string offsets and must sit on character boundaries: an offset
 * between the two halves of a surrogate pair is rejected.
 */
export class Cursor {
  readonly source: SourceText;
  private _position: number = 0;
  private _currentChar: string | null = null;

  constructor(source: SourceText) {
    this.source = source;
    this.jumpTo(0);
  }

  get position(): number {
    return this._position;
  }

  get currentChar(): string | null {
    return this._currentChar;
  }

  get isExhausted(): boolean {
    return this._currentChar === null;
  }

  /**
   * Step over the current character
   *
   * Stepping off the last character leaves the cursor at `position === length`.
   */
  advance(): void {
    if (this._currentChar === null) return;

    const next = this._position + this._currentChar.length;
    if (next < this.source.length) {
      this._position = next;
      this._currentChar = this.charAt(next);
    } else {
      this._position = this.source.length;
      this._currentChar = null;
    }
  }

  /**
   * Step over up to `count` characters, stopping early at the end of the text
   */
  advanceBy(count: number): void {
    for (let i = 0; i < count && this._currentChar !== null; i++) {
      this.advance();
    }
  }

  /**
   * Move to an absolute offset
   *
   * `length` itself is the end-of-input position; anything outside `[0, length]`
   * exhausts the cursor at `length + 1`.
   */
  jumpTo(position: number): void {
    const length = this.source.length;

    if (Number.isInteger(position) && position >= 0 && position < length) {
      invariant(
        !this.splitsSurrogatePair(position),
        `Offset ${position} in ${this.source.name} falls inside a character`,
      );
      this._position = position;
      this._currentChar = this.charAt(position);
    } else if (position === length) {
      this._position = length;
      this._currentChar = null;
    } else {
      this._position = length + 1;
      this._currentChar = null;
    }
  }

  /**
   * Whether the text at the cursor begins with `literal`
   */
  startsWith(literal: string): boolean {
    return this._currentChar !== null && this.source.text.startsWith(literal, this._position);
  }

  /**
   * Unscanned text from the cursor to the end
   */
  remaining(): string {
    return this.source.text.slice(Math.min(this._position, this.source.length));
  }

  /**
   * Span from `start` up to the cursor
   */
  spanFrom(start: number): Span {
    return new Span(start, Math.min(this._position, this.source.length));
  }

  private charAt(offset: number): string {
    const codePoint = this.source.text.codePointAt(offset);
    invariant(codePoint !== undefined, `Offset ${offset} is outside ${this.source.name}`);
    return String.fromCodePoint(codePoint);
  }

  private splitsSurrogatePair(offset: number): boolean {
    const text = this.source.text;
    return (
      offset > 0 &&
      isLowSurrogate(text.charCodeAt(offset)) &&
      isHighSurrogate(text.charCodeAt(offset - 1))
    );
  }
}
