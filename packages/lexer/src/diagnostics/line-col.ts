/**
 * 1-based line and column of an offset
 */
export interface LineCol {
  line: number;
  column: number;
}

/**
 * Locate an offset by scanning `text` from the start
 *
 * Every `\n` starts a new line; any other character moves one column right.
 * A newline therefore sits one column past the last character of its line, and
 * an offset past the end reports the position after the final character.
 */
export function locate(text: string, offset: number): LineCol {
  let line = 1;
  let column = 1;
  let index = 0;

  for (const char of text) {
    if (index === offset) break;

    if (char === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    index += char.length;
  }

  return { line, column };
}
