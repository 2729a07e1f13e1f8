/**
 * Thrown when a caller breaks a precondition of the library
 *
 * This signals a bug in the code driving the tokenizer (an empty span, a jump into
 * the middle of a character), not a problem in the text being scanned, so it is
 * never wrapped in a DiagnosticError.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}
