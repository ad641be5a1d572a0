/**
 * Run one unit of work per target concurrently and collect the outcomes
 * into a map keyed by target. Each unit produces its own entry; the map is
 * assembled only after every unit settles, so no target's failure can
 * affect another's entry.
 */
export async function fanOut<T, R>(
  targets: readonly T[],
  keyOf: (target: T) => string,
  run: (target: T) => Promise<R>,
  onError: (target: T, error: unknown) => R,
): Promise<Record<string, R>> {
  const settled = await Promise.all(
    targets.map(async (target): Promise<[string, R]> => {
      try {
        return [keyOf(target), await run(target)];
      } catch (error) {
        return [keyOf(target), onError(target, error)];
      }
    }),
  );
  return Object.fromEntries(settled);
}
