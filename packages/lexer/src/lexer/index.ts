export { Cursor } from './cursor';
export { DEFAULT_ENGINE_OPTIONS, Engine, type EngineOptions } from './engine';
export { BaseRule, defineRule, type Rule, type RuleDefinition } from './rule';
export { SkipWhitespaceRule } from './rules';
