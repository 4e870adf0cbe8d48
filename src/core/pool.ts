/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep input order.
 * Each idle worker takes the next unclaimed index, so slow items do not hold up the rest.
 * After a worker throws, no new items start; the pool settles every running lane before rethrowing.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0
  let halted = false

  const lane = async (): Promise<void> => {
    while (!halted && next < items.length) {
      const i = next++
      try {
        results[i] = await worker(items[i], i)
      } catch (e) {
        halted = true
        throw e
      }
    }
  }

  const lanes = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
  const settled = await Promise.allSettled(Array.from({ length: lanes }, lane))
  for (const s of settled) {
    if (s.status === 'rejected') throw s.reason
  }
  return results
}
