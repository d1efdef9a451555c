export type { Span, Field, Rewrite } from './primitives';
export type { QuoteForm, LexicalGrammar } from './grammar';
export { DEFAULT_GRAMMAR, resolveGrammar } from './grammar';
export type { OptionalParameter, RewriteRule, LiteralShape } from './rules';
export type { RewriteOptions } from './registry';
export { defineRule, defineShape } from './registry';
export type {
  ScanResult,
  MalformedReason,
  ExtractResult,
  SkipReason,
  RewriteDecision,
  ConstructionSite,
  DiagnosticKind,
  Diagnostic,
  SourceRewriteResult
} from './results';
export type { Simplify } from './types-helper';
