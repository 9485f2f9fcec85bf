/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results are stored by index, so the output order matches the input order
 * whatever order the calls settle in. The first rejection stops scheduling
 * new items and is rethrown once in-flight calls have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const errors: unknown[] = [];
  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (errors.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));

  if (errors.length > 0) {
    throw errors[0];
  }

  return results;
}
