export { SourceText, type ReadSourceOptions } from './source-text';
export { Span, sliceSpan } from './span';
export { createToken, type Token } from './token';
