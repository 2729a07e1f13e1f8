import chalk, { Chalk } from 'chalk';
import type { SourceText } from '../source/source-text';
import type { Span } from '../source/span';
import { locate, type LineCol } from './line-col';

export interface FormatOptions {
  /** Force colour on or off; auto-detected when omitted */
  color?: boolean;
}

export interface RenderOptions extends FormatOptions {
  /** Receives each rendered line; defaults to `console.error` */
  write?: (line: string) => void;
}

interface Palette {
  error: (s: string) => string;
  gutter: (s: string) => string;
  strong: (s: string) => string;
  caret: (s: string) => string;
}

const plain = (s: string): string => s;

function createPalette(color: boolean | undefined): Palette {
  if (color === false) {
    return { error: plain, gutter: plain, strong: plain, caret: plain };
  }

  const c = color === true && chalk.level === 0 ? new Chalk({ level: 1 }) : chalk;
  return {
    error: (s) => c.red.bold(s),
    gutter: (s) => c.cyan.bold(s),
    strong: (s) => c.bold(s),
    caret: (s) => c.red.bold(s),
  };
}

/**
 * Source lines as the report prints them: split on `\n`, a trailing `\r`
 * dropped, and no phantom empty line after a final newline
 */
function splitLines(text: string): string[] {
  if (text === '') return [];

  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) lines.pop();
  return lines;
}

function charCount(line: string): number {
  return Array.from(line).length;
}

function repeat(s: string, count: number): string {
  return s.repeat(Math.max(0, count));
}

/**
 * Caret-annotated error report over a span of source text
 *
 * @example
 * ```ts
 * new DiagnosticReport('unterminated string', source, new Span(4, 9))
 *   .addContext('while scanning a string literal')
 *   .addNote('strings cannot span lines')
 *   .render();
 * ```
 */
export class DiagnosticReport {
  readonly message: string;
  readonly source: SourceText;
  readonly span: Span;
  private readonly context: string[] = [];
  private readonly notes: string[] = [];

  constructor(message: string, source: SourceText, span: Span) {
    this.message = message;
    this.source = source;
    this.span = span;
  }

  addContext(text: string): this {
    this.context.push(text);
    return this;
  }

  addNote(text: string): this {
    this.notes.push(text);
    return this;
  }

  /**
   * Build the report lines without writing them anywhere
   */
  format(options: FormatOptions = {}): string[] {
    const c = createPalette(options.color);
    const start = locate(this.source.text, this.span.start);
    const end = locate(this.source.text, this.span.end);
    // The stored end is exclusive; show the column of the last covered character
    const endColumn = end.column - 1;

    const width = String(Math.max(start.line, end.line)).length;
    const pad = repeat(' ', width);
    const gutter = `${pad} ${c.gutter('|')}`;

    const out: string[] = [
      `${c.error('error')}${c.strong(':')} ${c.strong(this.message)}`,
      `${pad}${c.gutter('-->')} ${this.location(start, end, endColumn)}`,
      gutter,
    ];

    const lines = splitLines(this.source.text).slice(start.line - 1, end.line);

    lines.forEach((line, index) => {
      const lineNumber = start.line + index;
      const label = String(lineNumber);
      out.push(`${c.gutter(label)}${repeat(' ', width - label.length)} ${c.gutter('|')} ${line}`);

      let indent = 0;
      let carets: number;
      if (lineNumber === start.line && lineNumber === end.line) {
        indent = start.column - 1;
        carets = endColumn - start.column + 1;
      } else if (lineNumber === start.line) {
        indent = start.column - 1;
        carets = charCount(line) - start.column + 1;
      } else if (lineNumber === end.line) {
        carets = endColumn + 1;
      } else {
        carets = charCount(line);
      }

      out.push(`${gutter} ${repeat(' ', indent)}${c.caret(repeat('^', carets))}`);
    });

    if (this.context.length > 0 || this.notes.length > 0) {
      out.push(gutter);
    }
    for (const text of this.context) {
      out.push(`${pad} ${c.gutter('=')} ${text}`);
    }
    for (const text of this.notes) {
      out.push(`${pad} ${c.gutter('=')} ${c.strong('note:')} ${text}`);
    }

    return out;
  }

  /**
   * Write the report to the diagnostic stream
   */
  render(options: RenderOptions = {}): void {
    const write = options.write ?? ((line: string) => console.error(line));
    for (const line of this.format(options)) {
      write(line);
    }
  }

  private location(start: LineCol, end: LineCol, endColumn: number): string {
    const name = this.source.name;
    if (start.line !== end.line) {
      return `${name}:${start.line}:${start.column}-${end.line}:${endColumn}`;
    }
    // A span past the end of the text has nothing to cover
    if (endColumn <= start.column) {
      return `${name}:${start.line}:${start.column}`;
    }
    return `${name}:${start.line}:${start.column}-${endColumn}`;
  }
}
