/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Scanning vs. Extraction vs. Policy
 *
 * DEFINITION
 * 2. Balanced Span
 *
 * POLICY
 * 3. Non-Interference
 * 4. First-Match-Wins Rule Selection
 * 5. Per-File Atomicity
 *
 * LIFECYCLE
 * 6. Convergent Rewriting (Idempotence)
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> POLICY -> LIFECYCLE
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Scanning vs. Extraction vs. Policy
 *
 * ---
 *
 * The engine recognizes one literal shape, a construction expression:
 *
 *   d := &Device{
 *     Serial: "s1",
 *     Meta:   map[string]int{"x": 1},
 *   }
 *
 * and relocates its fields into a helper call plus assignments. It does not
 * parse the host language. The work is split into three independent steps:
 *
 * 1. Scanning (where does the literal end?)
 *    A marker is followed by an opening delimiter; the end is found by a
 *    nesting counter that ignores delimiters inside strings and comments.
 *    A flat regular expression cannot bound `{ ... { ... } ... }`.
 *
 * 2. Extraction (what are the fields?)
 *    The body is split on commas at nesting depth zero, then each segment on
 *    its first top-level name/value separator.
 *
 * 3. Policy (what should it become?)
 *    A caller-ordered table of `(requiredFieldNames, helperName)` rules.
 *    Field combinations are data, not hand-written patterns.
 */

/**
 * ARCHITECTURAL DEFINITION (2)
 * Balanced Span
 *
 * ---
 *
 * A span is the half-open range `[start, end)` from the first character of
 * the marker to just past the matching closing delimiter.
 *
 * Invariants
 * ----------
 * - Within the span, outside string and comment regions, the number of
 *   opening and closing delimiters is equal.
 * - Spans consumed during one pass never overlap; the scan resumes at
 *   `span.end`.
 *
 * A marker whose body never balances produces no span
 * (`UnterminatedLiteral`); the remainder of the buffer is left as-is.
 */
export type BalancedSpanDefinition = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Non-Interference
 *
 * ---
 *
 * Text outside every rewritten span is byte-identical before and after a
 * run. The only exception is the helper declaration block, which is inserted
 * at the anchor after the file's import block and nowhere else.
 *
 * Enforcement
 * -----------
 * The output buffer is rebuilt left-to-right from untouched slices of the
 * input and replacement texts. Offsets are never shifted in place.
 */
export type NonInterferencePolicy = never;

/**
 * ARCHITECTURAL POLICY (4)
 * First-Match-Wins Rule Selection
 *
 * ---
 *
 * Rules are evaluated in configured order. The first rule whose required
 * fields are all present wins, even if a later rule would consume more
 * fields.
 *
 *   rules: [
 *     { requiredFieldNames: ['Serial', 'IP', 'Manufacturer', 'Model'], helperName: 'newFullTestDevice' },
 *     { requiredFieldNames: ['Serial', 'IP'], helperName: 'newTestDevice' }
 *   ]
 *
 * Callers must order rules from most required fields to fewest. A rule whose
 * required set includes an earlier rule's required set can never win; the
 * rule validator reports it as shadowed.
 */
export type FirstMatchWinsPolicy = never;

/**
 * ARCHITECTURAL POLICY (5)
 * Per-File Atomicity
 *
 * ---
 *
 * A file is never left with a partial set of rewrites.
 *
 * 1. The whole new buffer is computed in memory.
 * 2. The backup collaborator persists the original. Failure aborts the write.
 * 3. The new buffer is written once (temporary file, then rename).
 *
 * An interrupted run leaves processed files fully rewritten (with backups)
 * and the rest untouched.
 */
export type PerFileAtomicityPolicy = never;

/**
 * ARCHITECTURAL LIFECYCLE (6)
 * Convergent Rewriting (Idempotence)
 *
 * ---
 *
 * `rewrite(rewrite(x)) === rewrite(x)`.
 *
 * 1. Guard
 *    A buffer without any marker is returned unchanged (same string).
 *
 * 2. Pass
 *    Scan, extract, decide and render every literal of one shape. A rewritten
 *    literal loses its marker, so it cannot match again.
 *
 * 3. Rounds
 *    Literals nested inside a rewritten literal's values are only reachable
 *    after the outer one is relocated. A round runs every shape's pass; rounds
 *    repeat until one applies no rewrite.
 *
 * 4. Output-form detection
 *    Literals without fields (`&Device{}` in a helper body), literals whose
 *    rendered replacement equals their own text, and literals inside the body
 *    of the helper they would be rewritten to are skipped.
 *
 * 5. Helpers
 *    A declaration is inserted only for helpers used in this run and not yet
 *    declared in the file, so a second run finds them declared.
 */
export type ConvergentRewritingLifecycle = never;
