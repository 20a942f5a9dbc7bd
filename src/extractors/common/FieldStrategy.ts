/**
 * Ordered field strategies
 *
 * Each field lists its strategies most-structured first; the first one that
 * yields a non-empty value wins.
 */

export type FieldStrategy<TScope> = (scope: TScope) => string | undefined;

export function firstMatch<TScope>(
  scope: TScope,
  strategies: readonly FieldStrategy<TScope>[],
  fallback = "",
): string {
  for (const strategy of strategies) {
    const value = strategy(scope);
    if (value) {
      return value;
    }
  }
  return fallback;
}
