import { describe, expect, it } from 'vitest';
import { DiagnosticError, invariant, InvariantViolation, SourceText, Span } from '../src/index';

describe('DiagnosticError', () => {
  const source = SourceText.fromString('main.tw', 'let x = 10;\nlet = 2;');

  it('puts the start location in the message', () => {
    const error = new DiagnosticError('expected a name', source, new Span(16, 17));

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DiagnosticError');
    expect(error.message).toBe('expected a name at main.tw:2:5');
    expect(error.summary).toBe('expected a name');
  });

  it('collects context and notes in order', () => {
    const error = new DiagnosticError('expected a name', source, new Span(16, 17))
      .withContext('in a let binding')
      .withNote('names start with a letter')
      .withNote('did you mean `let y = 2`?');

    expect(error.context).toEqual(['in a let binding']);
    expect(error.notes).toEqual(['names start with a letter', 'did you mean `let y = 2`?']);
  });

  it('converts to an equivalent report', () => {
    const error = new DiagnosticError('expected a name', source, new Span(16, 17))
      .withContext('in a let binding')
      .withNote('names start with a letter');

    expect(error.toReport().format({ color: false })).toEqual([
      'error: expected a name',
      ' --> main.tw:2:5',
      '  |',
      '2 | let = 2;',
      '  |     ^',
      '  |',
      '  = in a let binding',
      '  = note: names start with a letter',
    ]);
  });

  it('renders through its report', () => {
    const lines: string[] = [];
    new DiagnosticError('expected a name', source, new Span(16, 17)).render({
      color: false,
      write: (line) => lines.push(line),
    });

    expect(lines[0]).toBe('error: expected a name');
    expect(lines).toHaveLength(5);
  });
});

describe('invariant', () => {
  it('passes when the condition holds', () => {
    expect(() => invariant(true, 'never shown')).not.toThrow();
  });

  it('throws an InvariantViolation otherwise', () => {
    expect(() => invariant(false, 'broken')).toThrow(InvariantViolation);
    expect(() => invariant(false, 'broken')).toThrow('broken');
  });
});
