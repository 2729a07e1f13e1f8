/**
 * Error type for tokenizer failures
 *
 * Rules throw a DiagnosticError to report a problem in the scanned text; the
 * engine hands it back to the caller untouched.
 */

import { locate } from './diagnostics/line-col';
import { DiagnosticReport, type RenderOptions } from './diagnostics/report';
import type { SourceText } from './source/source-text';
import type { Span } from './source/span';

export class DiagnosticError extends Error {
  /** The message without location */
  readonly summary: string;
  /** The text the span points into */
  readonly source: SourceText;
  /** Where the problem is */
  readonly span: Span;
  private readonly contextLines: string[] = [];
  private readonly noteLines: string[] = [];

  constructor(summary: string, source: SourceText, span: Span) {
    const { line, column } = locate(source.text, span.start);
    super(`${summary} at ${source.name}:${line}:${column}`);
    this.name = 'DiagnosticError';
    this.summary = summary;
    this.source = source;
    this.span = span;
  }

  get context(): readonly string[] {
    return this.contextLines;
  }

  get notes(): readonly string[] {
    return this.noteLines;
  }

  withContext(text: string): this {
    this.contextLines.push(text);
    return this;
  }

  withNote(text: string): this {
    this.noteLines.push(text);
    return this;
  }

  toReport(): DiagnosticReport {
    const report = new DiagnosticReport(this.summary, this.source, this.span);
    for (const text of this.contextLines) report.addContext(text);
    for (const text of this.noteLines) report.addNote(text);
    return report;
  }

  render(options: RenderOptions = {}): void {
    this.toReport().render(options);
  }
}
