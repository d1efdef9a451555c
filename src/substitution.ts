export type CallPrefixSubstitution = {
  /**
   * Receiver being renamed (e.g. `console`).
   */
  from: string;

  /**
   * Replacement receiver (e.g. `window.__pm_shared`).
   */
  to: string;

  /**
   * Method names whose calls are renamed.
   * @default ['debug', 'info', 'warn', 'error', 'trace', 'log']
   */
  methods?: readonly string[];
};

export const DEFAULT_METHODS: readonly string[] = [
  'debug',
  'info',
  'warn',
  'error',
  'trace',
  'log'
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Renames `<from>.<method>(` to `<to>.<method>(` verbatim.
 *
 * A plain token substitution: no structural parsing, no string or comment
 * awareness. The receiver must start at an identifier boundary
 * (`myconsole.log(` is untouched) and whitespace before `(` is dropped.
 *
 * @example
 * substituteCallPrefix('console.warn ("x")', { from: 'console', to: 'log' })
 * // → { text: 'log.warn("x")', count: 1 }
 */
export function substituteCallPrefix(
  source: string,
  options: CallPrefixSubstitution
): { text: string; count: number } {
  const methods = options.methods ?? DEFAULT_METHODS;
  if (methods.length === 0) return { text: source, count: 0 };

  const pattern = new RegExp(
    `(?<![\\w$.])${escapeRegExp(options.from)}\\.(${methods.map(escapeRegExp).join('|')})\\s*\\(`,
    'g'
  );

  let count = 0;
  const text = source.replace(pattern, (_match, method: string) => {
    count++;
    return `${options.to}.${method}(`;
  });

  return { text: count === 0 ? source : text, count };
}
