import { describe, expect, it } from 'vitest';
import { locate } from '../src/index';

describe('locate', () => {
  const source = 'Hello\nWorld';

  it('maps offsets to 1-based lines and columns', () => {
    expect(locate(source, 0)).toEqual({ line: 1, column: 1 }); // 'H'
    expect(locate(source, 4)).toEqual({ line: 1, column: 5 }); // 'o'
    expect(locate(source, 5)).toEqual({ line: 1, column: 6 }); // '\n'
    expect(locate(source, 6)).toEqual({ line: 2, column: 1 }); // 'W'
    expect(locate(source, 10)).toEqual({ line: 2, column: 5 }); // 'd'
  });

  it('reports the position after the last character for the end offset', () => {
    expect(locate(source, 11)).toEqual({ line: 2, column: 6 });
    expect(locate(source, 99)).toEqual({ line: 2, column: 6 });
  });

  it('handles empty text', () => {
    expect(locate('', 0)).toEqual({ line: 1, column: 1 });
  });

  it('counts consecutive newlines as separate lines', () => {
    expect(locate('a\n\n\nb', 4)).toEqual({ line: 4, column: 1 });
  });

  it('counts a surrogate pair as one column', () => {
    expect(locate('😀x', 2)).toEqual({ line: 1, column: 2 });
  });
});
