/**
 * @tokweave/lexer
 *
 * Tokenizers assembled from ordered, backtracking match rules, plus
 * caret-annotated diagnostics for the spans they report.
 */

export {
  BaseRule,
  Cursor,
  DEFAULT_ENGINE_OPTIONS,
  defineRule,
  Engine,
  SkipWhitespaceRule,
} from './lexer/index';
export type { EngineOptions, Rule, RuleDefinition } from './lexer/index';

export { createToken, SourceText, Span, sliceSpan } from './source/index';
export type { ReadSourceOptions, Token } from './source/index';

export { DiagnosticReport, locate } from './diagnostics/index';
export type { FormatOptions, LineCol, RenderOptions } from './diagnostics/index';

export { DiagnosticError } from './errors';
export { invariant, InvariantViolation } from './invariant';

export {
  ConfigError,
  engineOptionsFromConfig,
  loadConfig,
  parseEnvFile,
  renderOptionsFromConfig,
} from './config';
export type { TokweaveConfig } from './config';
