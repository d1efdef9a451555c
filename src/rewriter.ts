import type {
  ConvergentRewritingLifecycle,
  NonInterferencePolicy
} from './architecture';
import type {
  Diagnostic,
  LexicalGrammar,
  LiteralShape,
  Rewrite,
  RewriteOptions,
  RewriteRule,
  SourceRewriteResult
} from './types';

import { resolveGrammar } from './types';
import { RewriteFailureError } from './errors';
import { scanConstruction } from './scanner';
import { extractFields } from './extractor';
import { decideRewrite } from './policy';
import { renderHelperBlock, renderRewrite } from './emitter';
import { lineOf, resolveSite } from './site';
import {
  findHelperAnchor,
  findHelperBodies,
  hasCandidates,
  needsHelperDeclaration
} from './guard';

/**
 * Upper bound on rewrite rounds. Each productive round removes at least one
 * marker, so real inputs converge long before this.
 */
const MAX_ROUNDS = 32;

type PassResult = {
  text: string;
  rewrites: Rewrite[];
  diagnostics: Diagnostic[];
  rulesUsed: RewriteRule[];
};

/**
 * Runs one left-to-right pass of a shape over `text`.
 *
 * For each candidate: scan → extract → decide → resolve site → render, then
 * splice. Malformed literals are reported and stepped over; skipped ones are
 * reported and scanned into. An unterminated literal ends the pass.
 */
function runShapePass(
  text: string,
  shape: LiteralShape,
  grammar: LexicalGrammar
): PassResult {
  const parts: string[] = [];
  const rewrites: Rewrite[] = [];
  const diagnostics: Diagnostic[] = [];
  const rulesUsed: RewriteRule[] = [];
  const { marker } = shape;
  const helperBodies = findHelperBodies(
    text,
    shape.rules.map(rule => rule.helperName),
    grammar
  );

  let cursor = 0;
  let copiedUntil = 0;

  while (cursor < text.length) {
    // 1. Scan
    const scan = scanConstruction(text, cursor, marker, grammar);
    if (scan.kind === 'not-found') break;

    if (scan.kind === 'unterminated') {
      diagnostics.push({
        kind: 'UnterminatedLiteral',
        marker,
        line: lineOf(text, scan.start),
        reason: 'end-of-buffer',
        message: `${marker}${grammar.open} is never closed; the rest of the file is left unchanged.`
      });
      break;
    }

    const { span } = scan;
    const line = lineOf(text, span.start);

    // A literal left in place is not consumed: literals nested in its body
    // are still candidates. Malformed and rewritten spans are stepped over.
    cursor = scan.bodyStart;

    // 2. Extract
    const extraction = extractFields(text, span, grammar);
    if (extraction.kind === 'malformed') {
      diagnostics.push({
        kind: 'MalformedLiteral',
        marker,
        line,
        reason: extraction.reason,
        message: `Cannot split ${marker}${grammar.open}...${grammar.close} into fields (${extraction.reason}): ${extraction.segment}`
      });
      cursor = span.end;
      continue;
    }

    // 3. Decide
    const decision = decideRewrite(extraction.fields, shape.rules);
    if (decision.kind === 'skip') {
      diagnostics.push({
        kind: 'Skipped',
        marker,
        line,
        reason: decision.reason,
        message: `Left ${marker}${grammar.open}...${grammar.close} unchanged (${decision.reason}).`
      });
      continue;
    }

    const insideHelper = helperBodies.some(
      body =>
        body.helperName === decision.rule.helperName &&
        body.span.start <= span.start &&
        span.end <= body.span.end
    );
    if (insideHelper) {
      diagnostics.push({
        kind: 'Skipped',
        marker,
        line,
        reason: 'inside-helper',
        message: `Left ${marker}${grammar.open}...${grammar.close} unchanged: it is part of ${decision.rule.helperName}'s own body.`
      });
      continue;
    }

    // 4. Resolve site
    const site = resolveSite(text, span, grammar);
    if (site.kind === 'inline' && decision.extraFields.length > 0) {
      const extras = decision.extraFields.map(field => field.name).join(', ');
      diagnostics.push({
        kind: 'Skipped',
        marker,
        line,
        reason: 'no-receiver',
        message: `Left inline ${marker}${grammar.open}...${grammar.close} unchanged: extra fields (${extras}) have no receiver.`
      });
      continue;
    }

    // 5. Render
    const replacementText = renderRewrite(
      site,
      decision.rule,
      decision.coreFields,
      decision.extraFields,
      grammar
    );

    const original = text.slice(span.start, span.end);
    if (replacementText === original) {
      diagnostics.push({
        kind: 'Skipped',
        marker,
        line,
        reason: 'already-rewritten',
        message: `Left ${marker}${grammar.open}...${grammar.close} unchanged (already-rewritten).`
      });
      continue;
    }

    // 6. Splice (left-to-right rebuild)
    parts.push(text.slice(copiedUntil, span.start), replacementText);
    copiedUntil = span.end;
    cursor = span.end;

    rewrites.push({
      span,
      replacementText,
      helperName: decision.rule.helperName,
      marker,
      line
    });
    rulesUsed.push(decision.rule);
  }

  if (rewrites.length === 0) {
    return { text, rewrites, diagnostics, rulesUsed };
  }

  parts.push(text.slice(copiedUntil));
  return { text: parts.join(''), rewrites, diagnostics, rulesUsed };
}

/**
 * Inserts the declarations of helpers used by `rules` that `original` does
 * not declare, at the anchor after the import block.
 */
function insertHelperDeclarations(
  text: string,
  original: string,
  rules: readonly RewriteRule[],
  grammar: LexicalGrammar
): { text: string; inserted: string[] } {
  const declarationByHelper = new Map<string, string>();
  for (const rule of rules) {
    if (rule.declaration && !declarationByHelper.has(rule.helperName)) {
      declarationByHelper.set(rule.helperName, rule.declaration);
    }
  }

  const missing = needsHelperDeclaration(
    original,
    Array.from(declarationByHelper.keys()),
    grammar
  );
  if (missing.length === 0) return { text, inserted: [] };

  const block = renderHelperBlock(
    missing.flatMap(name => {
      const declaration = declarationByHelper.get(name);
      return declaration ? [declaration] : [];
    })
  );

  const anchor = findHelperAnchor(text, grammar);
  if (anchor === 0) {
    return { text: `${block}\n\n${text}`, inserted: missing };
  }

  const lead = text.charAt(anchor - 1) === '\n' ? '\n' : '\n\n';
  const inserted = `${text.slice(0, anchor)}${lead}${block}\n${text.slice(anchor)}`;
  return { text: inserted, inserted: missing };
}

/**
 * Rewrites every matching construction expression of one source buffer.
 *
 * Pipeline
 * --------
 * 1. Guard
 *    Without any marker in code the input is returned as-is (`changed: false`,
 *    same string).
 *
 * 2. Rounds
 *    A round runs one pass per configured shape, each over the buffer
 *    produced by the previous one. Rounds repeat until one applies no
 *    rewrite: literals nested in a relocated value, or moved by another
 *    shape into a declaration, are reached by a later round.
 *
 * 3. Helpers
 *    Declarations of helpers that were used, carry a `declaration`, and are
 *    not yet declared in the input are inserted once after the import block.
 *
 * The function is pure: no I/O, no shared state. Text outside rewritten spans
 * (and the helper anchor) is preserved byte-for-byte
 * (see {@link NonInterferencePolicy}); re-running on the output is a no-op
 * (see {@link ConvergentRewritingLifecycle}).
 *
 * @param source - The original file text.
 * @param options - Shapes, grammar overrides and helper insertion toggle.
 * @throws RewriteFailureError when the rounds do not converge.
 */
export function rewriteSource(
  source: string,
  options: RewriteOptions
): SourceRewriteResult {
  const grammar = resolveGrammar(options.grammar);
  const markers = options.shapes.map(shape => shape.marker);

  // 1. Guard
  if (!hasCandidates(source, grammar, markers)) {
    return {
      text: source,
      changed: false,
      rewrites: [],
      helpersInserted: [],
      diagnostics: []
    };
  }

  // 2. Rounds
  let text = source;
  const rewrites: Rewrite[] = [];
  const rulesUsed: RewriteRule[] = [];
  let diagnostics: Diagnostic[] = [];
  let converged = false;

  for (let round = 0; round < MAX_ROUNDS && !converged; round++) {
    const roundDiagnostics: Diagnostic[] = [];
    let roundRewrites = 0;

    for (const shape of options.shapes) {
      const result = runShapePass(text, shape, grammar);
      text = result.text;
      rewrites.push(...result.rewrites);
      rulesUsed.push(...result.rulesUsed);
      roundDiagnostics.push(...result.diagnostics);
      roundRewrites += result.rewrites.length;
    }

    // Only the final, non-productive round reports: earlier rounds see
    // literals that are relocated later and would report them twice.
    diagnostics = roundDiagnostics;
    converged = roundRewrites === 0;
  }

  if (!converged) {
    throw new RewriteFailureError(
      `Rewriting did not converge after ${MAX_ROUNDS} rounds.`
    );
  }

  if (rewrites.length === 0) {
    return { text: source, changed: false, rewrites, helpersInserted: [], diagnostics };
  }

  // 3. Helpers
  let helpersInserted: string[] = [];
  if (options.insertHelperDeclarations ?? true) {
    const insertion = insertHelperDeclarations(text, source, rulesUsed, grammar);
    text = insertion.text;
    helpersInserted = insertion.inserted;
  }

  return { text, changed: true, rewrites, helpersInserted, diagnostics };
}
