export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker-pool fan-out: at most `concurrency` workers pull items until the list is drained.
 *
 * Items finish in completion order, not submission order. `shouldStop` is checked before
 * each item is pulled, so a caller can bound work by a counter updated inside `worker`.
 * A rejected worker rejects the whole run; callers that need per-item isolation catch
 * inside `worker`.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  shouldStop: () => boolean = () => false
): Promise<void> {
  if (items.length === 0) return;
  let cursor = 0;
  const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  await Promise.all(
    Array.from({ length: size }).map(async () => {
      while (true) {
        if (shouldStop()) break;
        const index = cursor;
        cursor += 1;
        if (index >= items.length) break;
        await worker(items[index]);
      }
    })
  );
}

/** In-place Fisher–Yates shuffle. */
export function shuffleInPlace<T>(items: T[], random: () => number = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/** `k` distinct items drawn uniformly, in draw order. */
export function randomSample<T>(items: readonly T[], k: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  shuffleInPlace(pool, random);
  return pool.slice(0, Math.max(0, Math.min(Math.floor(k), pool.length)));
}
